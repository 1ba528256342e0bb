import {Event, type ErrorEvent} from '../util/evented';

import type {Geometry} from 'geojson';
import type {LatLng} from '../geo/lat_lng';
import type {AnnotationType} from '../annotation/annotation';
import type {JsonValue} from '../style/expression';

/**
 * Why the camera started moving, as reported by the renderer.
 *
 * | code | reason |
 * |------|--------|
 * | 0 | `unknown` |
 * | 1 | `apiGesture` |
 * | 2 | `developerAnimation` |
 * | 3 | `apiAnimation` |
 */
export type CameraMoveReason = 'unknown' | 'apiGesture' | 'developerAnimation' | 'apiAnimation';

export const cameraMoveReasons: ReadonlyArray<CameraMoveReason> = ['unknown', 'apiGesture', 'developerAnimation', 'apiAnimation'];

/**
 * Phase of a continuous interaction such as a camera move or a rotation.
 */
export type InteractionPhase = 'start' | 'move' | 'end';

/**
 * An annotation as described in click and drag events.
 */
export type AnnotationDescriptor = {
    id: number;
    type: AnnotationType;
    draggable: boolean;
    data?: {[key: string]: JsonValue};
    geometry?: Geometry;
};

/**
 * An event without a payload
 */
export class MapEvent<T extends 'mapRendered' | 'mapLoaded' | 'styleLoaded' | 'cameraIdle' | 'fling'> extends Event<T> {}

/**
 * `MapClickEvent` is the event type for taps on the map.
 */
export class MapClickEvent extends Event<'mapClick' | 'mapLongClick'> {
    /**
     * The geographic location of the tap.
     */
    readonly latLng: LatLng;

    constructor(type: 'mapClick' | 'mapLongClick', latLng: LatLng) {
        super(type);
        this.latLng = latLng;
    }
}

export class CameraMoveEvent extends Event<'cameraMove'> {
    readonly phase: InteractionPhase;
    /**
     * Only reported when the move starts, and only by renderers that know it.
     */
    readonly reason: CameraMoveReason | undefined;

    constructor(phase: InteractionPhase, reason?: CameraMoveReason) {
        super('cameraMove');
        this.phase = phase;
        this.reason = reason;
    }
}

/**
 * `RotateEvent` reports the progress of a rotation gesture. Angles are in degrees.
 */
export class RotateEvent extends Event<'rotate'> {
    readonly phase: InteractionPhase;
    /**
     * The angle a gesture must turn before it is recognized as a rotation.
     */
    readonly angleThreshold: number;
    readonly deltaSinceStart: number;
    readonly deltaSinceLast: number;

    constructor(phase: InteractionPhase, angleThreshold: number, deltaSinceStart: number, deltaSinceLast: number) {
        super('rotate');
        this.phase = phase;
        this.angleThreshold = angleThreshold;
        this.deltaSinceStart = deltaSinceStart;
        this.deltaSinceLast = deltaSinceLast;
    }
}

export class FpsChangedEvent extends Event<'fpsChanged'> {
    readonly fps: number;

    constructor(fps: number) {
        super('fpsChanged');
        this.fps = fps;
    }
}

export class AnnotationEvent extends Event<'annotationClick' | 'annotationLongClick'> {
    readonly annotation: AnnotationDescriptor;

    constructor(type: 'annotationClick' | 'annotationLongClick', annotation: AnnotationDescriptor) {
        super(type);
        this.annotation = annotation;
    }
}

/**
 * `AnnotationDragEvent` reports an annotation being dragged. `geometry` is where the drag
 * started and `updatedGeometry` where the annotation is now.
 */
export class AnnotationDragEvent extends Event<'annotationDrag'> {
    readonly annotationId: number;
    readonly annotationType: AnnotationType;
    readonly geometry: Geometry;
    readonly updatedGeometry: Geometry;
    readonly phase: InteractionPhase;

    constructor(annotationId: number, annotationType: AnnotationType, geometry: Geometry, updatedGeometry: Geometry, phase: InteractionPhase) {
        super('annotationDrag');
        this.annotationId = annotationId;
        this.annotationType = annotationType;
        this.geometry = geometry;
        this.updatedGeometry = updatedGeometry;
        this.phase = phase;
    }
}

/**
 * `MapEventType` - a mapping between the event name and the event object its listeners receive.
 */
export type MapEventType = {
    /**
     * Fired after the renderer draws a frame.
     */
    mapRendered: MapEvent<'mapRendered'>;
    /**
     * Fired once, after the map view is ready.
     */
    mapLoaded: MapEvent<'mapLoaded'>;
    /**
     * Fired whenever a style finishes loading.
     */
    styleLoaded: MapEvent<'styleLoaded'>;
    mapClick: MapClickEvent;
    mapLongClick: MapClickEvent;
    /**
     * Fired when the camera stops after a move and no animation is pending.
     */
    cameraIdle: MapEvent<'cameraIdle'>;
    cameraMove: CameraMoveEvent;
    rotate: RotateEvent;
    fling: MapEvent<'fling'>;
    fpsChanged: FpsChangedEvent;
    annotationClick: AnnotationEvent;
    annotationLongClick: AnnotationEvent;
    annotationDrag: AnnotationDragEvent;
    /**
     * Fired when a listener throws or the renderer sends a payload that cannot be read.
     */
    error: ErrorEvent;
};

export type MapEventName = keyof MapEventType;
