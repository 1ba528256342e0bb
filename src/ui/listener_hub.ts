import {Evented, ErrorEvent} from '../util/evented';
import {UnsupportedShapeError, type ListenerCallbackError} from '../util/bridge_error';
import {isFiniteNumber, isPlainObject} from '../util/util';
import {LatLng} from '../geo/lat_lng';
import {geometryFromArgs} from '../source/query_features';
import {toJsonValue, type JsonValue} from '../style/expression';
import {
    AnnotationDragEvent,
    AnnotationEvent,
    CameraMoveEvent,
    FpsChangedEvent,
    MapClickEvent,
    MapEvent,
    RotateEvent,
    cameraMoveReasons,
    type AnnotationDescriptor,
    type CameraMoveReason,
    type InteractionPhase,
    type MapEventType
} from './events';

import type {AnnotationType} from '../annotation/annotation';

const annotationTypes: ReadonlyArray<AnnotationType> = ['circle', 'symbol', 'polygon', 'polyline'];

function decodeNumber(wire: unknown, name: string): number {
    if (!isFiniteNumber(wire)) throw new UnsupportedShapeError(`a number for "${name}"`, wire);
    return wire;
}

function decodeReason(wire: unknown): CameraMoveReason | undefined {
    if (wire === undefined || wire === null) return undefined;
    if (!Number.isInteger(wire) || !isFiniteNumber(wire)) throw new UnsupportedShapeError('a camera move reason code', wire);
    return cameraMoveReasons[wire] ?? 'unknown';
}

function decodeAnnotationType(wire: unknown): AnnotationType {
    const name = typeof wire === 'string' ? wire.toLowerCase() : undefined;
    const type = annotationTypes.find(t => t === name);
    if (!type) throw new UnsupportedShapeError('an annotation type', wire);
    return type;
}

function decodeAnnotationId(wire: unknown): number {
    if (!Number.isInteger(wire) || !isFiniteNumber(wire)) throw new UnsupportedShapeError('an annotation id', wire);
    return wire;
}

function decodeAnnotationData(wire: unknown): {[key: string]: JsonValue} | undefined {
    if (wire === undefined || wire === null) return undefined;
    let data: unknown = wire;
    if (typeof wire === 'string') {
        try {
            data = JSON.parse(wire);
        } catch {
            throw new UnsupportedShapeError('annotation data', wire);
        }
    }
    const json = toJsonValue(data);
    if (!isPlainObject(json)) throw new UnsupportedShapeError('annotation data', wire);
    return json;
}

/**
 * Reads the annotation map the renderer sends with click events:
 * `{id, type, draggable, data?, geometry?}`.
 */
export function annotationFromArgs(wire: unknown): AnnotationDescriptor {
    if (!isPlainObject(wire)) throw new UnsupportedShapeError('an annotation map', wire);
    const annotation: AnnotationDescriptor = {
        id: decodeAnnotationId(wire.id),
        type: decodeAnnotationType(wire.type),
        draggable: wire.draggable === true
    };
    const data = decodeAnnotationData(wire.data);
    if (data !== undefined) annotation.data = data;
    if (wire.geometry !== undefined && wire.geometry !== null) annotation.geometry = geometryFromArgs(wire.geometry);
    return annotation;
}

function dragPhase(wire: unknown): InteractionPhase {
    if (wire === 'start') return 'start';
    if (wire === 'dragging') return 'move';
    return 'end';
}

/**
 * Receives the renderer's callbacks and hands each one, decoded, to the listeners of
 * its channel.
 *
 * Every `onX` method is an entry point for the renderer. It never throws: a payload that
 * cannot be read, and any exception thrown by a listener, is reported as an
 * {@link ErrorEvent} on the `error` channel, or logged when nobody listens to it.
 */
export class ListenerHub extends Evented<MapEventType> {
    onMapRendered() {
        this.fire('mapRendered', new MapEvent('mapRendered'));
    }

    onMapLoaded() {
        this.fire('mapLoaded', new MapEvent('mapLoaded'));
    }

    onStyleLoaded() {
        this.fire('styleLoaded', new MapEvent('styleLoaded'));
    }

    /**
     * @param latLng - `[latitude, longitude]`
     */
    onMapClick(latLng: unknown) {
        this._dispatch('mapClick', () => new MapClickEvent('mapClick', LatLng.fromArgs(latLng)));
    }

    onMapLongClick(latLng: unknown) {
        this._dispatch('mapLongClick', () => new MapClickEvent('mapLongClick', LatLng.fromArgs(latLng)));
    }

    onCameraIdle() {
        this.fire('cameraIdle', new MapEvent('cameraIdle'));
    }

    /**
     * @param reason - integer reason code, see {@link CameraMoveReason}
     */
    onCameraMoveStarted(reason?: unknown) {
        this._dispatch('cameraMove', () => new CameraMoveEvent('start', decodeReason(reason)));
    }

    onCameraMove() {
        this.fire('cameraMove', new CameraMoveEvent('move'));
    }

    onCameraMoveEnd() {
        this.fire('cameraMove', new CameraMoveEvent('end'));
    }

    onRotateStarted(angleThreshold: unknown, deltaSinceStart: unknown, deltaSinceLast: unknown) {
        this._dispatchRotate('start', angleThreshold, deltaSinceStart, deltaSinceLast);
    }

    onRotate(angleThreshold: unknown, deltaSinceStart: unknown, deltaSinceLast: unknown) {
        this._dispatchRotate('move', angleThreshold, deltaSinceStart, deltaSinceLast);
    }

    onRotateEnd(angleThreshold: unknown, deltaSinceStart: unknown, deltaSinceLast: unknown) {
        this._dispatchRotate('end', angleThreshold, deltaSinceStart, deltaSinceLast);
    }

    onFling() {
        this.fire('fling', new MapEvent('fling'));
    }

    onFpsChanged(fps: unknown) {
        this._dispatch('fpsChanged', () => new FpsChangedEvent(decodeNumber(fps, 'fps')));
    }

    onAnnotationClick(annotation: unknown) {
        this._dispatch('annotationClick', () => new AnnotationEvent('annotationClick', annotationFromArgs(annotation)));
    }

    onAnnotationLongClick(annotation: unknown) {
        this._dispatch('annotationLongClick', () => new AnnotationEvent('annotationLongClick', annotationFromArgs(annotation)));
    }

    /**
     * @param phase - `'start'`, `'dragging'`, anything else ends the drag
     */
    onAnnotationDrag(id: unknown, type: unknown, geometry: unknown, updatedGeometry: unknown, phase: unknown) {
        this._dispatch('annotationDrag', () => new AnnotationDragEvent(
            decodeAnnotationId(id),
            decodeAnnotationType(type),
            geometryFromArgs(geometry),
            geometryFromArgs(updatedGeometry),
            dragPhase(phase)
        ));
    }

    _dispatchRotate(phase: InteractionPhase, angleThreshold: unknown, deltaSinceStart: unknown, deltaSinceLast: unknown) {
        this._dispatch('rotate', () => new RotateEvent(
            phase,
            decodeNumber(angleThreshold, 'angleThreshold'),
            decodeNumber(deltaSinceStart, 'deltaSinceStart'),
            decodeNumber(deltaSinceLast, 'deltaSinceLast')
        ));
    }

    /**
     * Decodes the payload once, then fires it. Nothing is fired when decoding fails.
     */
    _dispatch<K extends keyof MapEventType>(type: K, decode: () => MapEventType[K]) {
        let event: MapEventType[K];
        try {
            event = decode();
        } catch (e) {
            this._reportError(e instanceof Error ? e : new UnsupportedShapeError(`a payload for "${type}"`, e));
            return;
        }
        this.fire(type, event);
    }

    _reportListenerError(error: ListenerCallbackError) {
        // an error listener that throws is only logged
        if (error.eventType === 'error') {
            console.error(error);
        } else {
            this._reportError(error);
        }
    }

    _reportError(error: Error) {
        if (this.listens('error')) {
            this.fire('error', new ErrorEvent(error));
        } else {
            console.error(error);
        }
    }
}
