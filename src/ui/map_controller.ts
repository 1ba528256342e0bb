import Point from '@mapbox/point-geometry';
import {ListenerHub} from './listener_hub';
import {CameraPosition} from '../geo/camera_position';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {visibleRegionFromArgs, type VisibleRegion} from '../geo/visible_region';
import {queriedFeaturesFromArgs, queryRenderedFeaturesArgs, type QueriedFeature, type QueryGeometry, type QueryRenderedFeaturesOptions} from '../source/query_features';
import {AssetStyleImage, NetworkStyleImage, type ImageLoader, type StyleImage, type StyleImageArgs} from '../style/style_image';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber} from '../util/util';

import type {Listener} from '../util/evented';
import type {MapEventType} from './events';
import type {LayerPosition, RendererHost} from './renderer_host';
import type {Annotation} from '../annotation/annotation';
import type {Source} from '../source/source';
import type {SerializedProperties} from '../style/properties';
import type {StyleLayer} from '../style/style_layer';

export type MapControllerOptions = {
    /**
     * Loads network and asset images before they are handed to the renderer. Without one,
     * their url or asset name is passed through for the renderer to resolve.
     */
    imageLoader?: ImageLoader;
};

/**
 * The application's handle on a native map: adds and removes style entities, queries the
 * renderer, and registers listeners for its events.
 *
 * Calls never throw or reject. When the renderer refuses a call or answers with something
 * that cannot be read, the call resolves to `false`, `null` or `[]` and the error is
 * reported on the `error` channel of {@link MapController#listeners}.
 *
 * @example
 * ```ts
 * const controller = new MapController(host);
 * controller.addOnMapClickListener(e => console.log(e.latLng.toString()));
 * await controller.addSource(new GeoJSONSource('points', {url: 'https://example.com/points.geojson'}));
 * await controller.addLayer(new CircleStyleLayer('points', 'points'));
 * ```
 */
export class MapController {
    readonly host: RendererHost;
    readonly listeners: ListenerHub;
    _imageLoader: ImageLoader | undefined;

    constructor(host: RendererHost, options: MapControllerOptions = {}) {
        this.host = host;
        this.listeners = new ListenerHub();
        this._imageLoader = options.imageLoader;
    }

    /**
     * Adds a layer to the style. At most one of `above`, `below` and `index` may be given.
     */
    addLayer(layer: StyleLayer, position: LayerPosition = {}): Promise<boolean> {
        return this._call(false, async () => {
            const given = [position.above, position.below, position.index].filter(value => value !== undefined);
            if (given.length > 1) {
                throw new Error(`Layer "${layer.id}" can be positioned by only one of above, below or index`);
            }
            if (position.index !== undefined && (!Number.isInteger(position.index) || position.index < 0)) {
                throw new UnsupportedShapeError('a non-negative layer index', position.index);
            }
            const args = layer.serialize();
            await this.host.addLayer({...args, ...this._rendererTransitions(args)}, position);
            return true;
        });
    }

    removeLayer(layerId: string): Promise<boolean> {
        return this._call(false, () => this.host.removeLayer(layerId));
    }

    isLayerExist(layerId: string): Promise<boolean> {
        return this._call(false, async () => {
            const layer = await this.host.getLayer(layerId);
            return layer !== null && layer !== undefined;
        });
    }

    addSource(source: Source): Promise<boolean> {
        return this._call(false, async () => {
            await this.host.addSource(source.serialize());
            return true;
        });
    }

    removeSource(sourceId: string): Promise<boolean> {
        return this._call(false, () => this.host.removeSource(sourceId));
    }

    isSourceExist(sourceId: string): Promise<boolean> {
        return this._call(false, async () => {
            const source = await this.host.getSource(sourceId);
            return source !== null && source !== undefined;
        });
    }

    addAnnotation(annotation: Annotation): Promise<boolean> {
        return this._call(false, async () => {
            const args = annotation.serialize();
            await this.host.addAnnotation({...args, ...this._rendererTransitions(args)});
            return true;
        });
    }

    removeAnnotation(annotation: Annotation): Promise<boolean> {
        return this._call(false, () => this.host.removeAnnotation(annotation.type, annotation.id));
    }

    /**
     * Adds an image to the style, loading its bytes first when an image loader is set.
     */
    addStyleImage(image: StyleImage): Promise<boolean> {
        return this._call(false, async () => {
            await this.host.addImage(await this._imageArgs(image));
            return true;
        });
    }

    removeStyleImage(imageId: string): Promise<boolean> {
        return this._call(false, () => this.host.removeImage(imageId));
    }

    hasStyleImage(imageId: string): Promise<boolean> {
        return this._call(false, () => this.host.hasImage(imageId));
    }

    /**
     * Returns the features rendered at a screen point, inside a screen rectangle, or at a
     * geographic position.
     *
     * @example
     * ```ts
     * const features = await controller.queryRenderedFeatures({point: [20, 35]}, {layerIds: ['points']});
     * ```
     */
    queryRenderedFeatures(geometry: QueryGeometry, options: QueryRenderedFeaturesOptions = {}): Promise<Array<QueriedFeature>> {
        return this._call<Array<QueriedFeature>>([], async () => {
            const wire = await this.host.queryRenderedFeatures(queryRenderedFeaturesArgs(geometry, options));
            return queriedFeaturesFromArgs(wire);
        });
    }

    getCameraPosition(): Promise<CameraPosition | null> {
        return this._call<CameraPosition | null>(null, async () => CameraPosition.fromArgs(await this.host.getCameraPosition()));
    }

    getVisibleRegion(): Promise<VisibleRegion | null> {
        return this._call<VisibleRegion | null>(null, async () => visibleRegionFromArgs(await this.host.getVisibleRegion()));
    }

    /**
     * Returns the screen position, in pixels, of a geographic position.
     */
    toScreenLocation(latLng: LatLngLike): Promise<Point | null> {
        return this._call<Point | null>(null, async () => {
            const wire = await this.host.toScreenLocation(LatLng.convert(latLng).toArgs());
            if (!Array.isArray(wire) || wire.length !== 2 || !wire.every(isFiniteNumber)) {
                throw new UnsupportedShapeError('[x, y]', wire);
            }
            return new Point(wire[0], wire[1]);
        });
    }

    addOnMapRenderedListener(listener: Listener<MapEventType['mapRendered']>) { this.listeners.on('mapRendered', listener); }
    removeOnMapRenderedListener(listener: Listener<MapEventType['mapRendered']>) { this.listeners.off('mapRendered', listener); }

    addOnMapLoadedListener(listener: Listener<MapEventType['mapLoaded']>) { this.listeners.on('mapLoaded', listener); }
    removeOnMapLoadedListener(listener: Listener<MapEventType['mapLoaded']>) { this.listeners.off('mapLoaded', listener); }

    addOnStyleLoadedListener(listener: Listener<MapEventType['styleLoaded']>) { this.listeners.on('styleLoaded', listener); }
    removeOnStyleLoadedListener(listener: Listener<MapEventType['styleLoaded']>) { this.listeners.off('styleLoaded', listener); }

    addOnMapClickListener(listener: Listener<MapEventType['mapClick']>) { this.listeners.on('mapClick', listener); }
    removeOnMapClickListener(listener: Listener<MapEventType['mapClick']>) { this.listeners.off('mapClick', listener); }

    addOnMapLongClickListener(listener: Listener<MapEventType['mapLongClick']>) { this.listeners.on('mapLongClick', listener); }
    removeOnMapLongClickListener(listener: Listener<MapEventType['mapLongClick']>) { this.listeners.off('mapLongClick', listener); }

    addOnCameraIdleListener(listener: Listener<MapEventType['cameraIdle']>) { this.listeners.on('cameraIdle', listener); }
    removeOnCameraIdleListener(listener: Listener<MapEventType['cameraIdle']>) { this.listeners.off('cameraIdle', listener); }

    addOnCameraMoveListener(listener: Listener<MapEventType['cameraMove']>) { this.listeners.on('cameraMove', listener); }
    removeOnCameraMoveListener(listener: Listener<MapEventType['cameraMove']>) { this.listeners.off('cameraMove', listener); }

    addOnRotateListener(listener: Listener<MapEventType['rotate']>) { this.listeners.on('rotate', listener); }
    removeOnRotateListener(listener: Listener<MapEventType['rotate']>) { this.listeners.off('rotate', listener); }

    addOnFlingListener(listener: Listener<MapEventType['fling']>) { this.listeners.on('fling', listener); }
    removeOnFlingListener(listener: Listener<MapEventType['fling']>) { this.listeners.off('fling', listener); }

    addOnFpsChangedListener(listener: Listener<MapEventType['fpsChanged']>) { this.listeners.on('fpsChanged', listener); }
    removeOnFpsChangedListener(listener: Listener<MapEventType['fpsChanged']>) { this.listeners.off('fpsChanged', listener); }

    addOnAnnotationClickListener(listener: Listener<MapEventType['annotationClick']>) { this.listeners.on('annotationClick', listener); }
    removeOnAnnotationClickListener(listener: Listener<MapEventType['annotationClick']>) { this.listeners.off('annotationClick', listener); }

    addOnAnnotationLongClickListener(listener: Listener<MapEventType['annotationLongClick']>) { this.listeners.on('annotationLongClick', listener); }
    removeOnAnnotationLongClickListener(listener: Listener<MapEventType['annotationLongClick']>) { this.listeners.off('annotationLongClick', listener); }

    addOnAnnotationDragListener(listener: Listener<MapEventType['annotationDrag']>) { this.listeners.on('annotationDrag', listener); }
    removeOnAnnotationDragListener(listener: Listener<MapEventType['annotationDrag']>) { this.listeners.off('annotationDrag', listener); }

    addOnErrorListener(listener: Listener<MapEventType['error']>) { this.listeners.on('error', listener); }
    removeOnErrorListener(listener: Listener<MapEventType['error']>) { this.listeners.off('error', listener); }

    /**
     * Removes every listener. The controller stays usable for style calls, but events are
     * no longer delivered.
     */
    dispose() {
        this.listeners.dispose();
    }

    /**
     * Transitions are kept in milliseconds up to this point; this is the one place where
     * they are converted for renderers that take seconds.
     */
    _rendererTransitions(args: SerializedProperties): Pick<SerializedProperties, 'transition'> {
        if (this.host.transitionUnit !== 'seconds') return {transition: args.transition};
        const transition: SerializedProperties['transition'] = {};
        for (const key of Object.keys(args.transition)) {
            const {delay, duration} = args.transition[key];
            transition[key] = {delay: delay / 1000, duration: duration / 1000};
        }
        return {transition};
    }

    async _imageArgs(image: StyleImage): Promise<StyleImageArgs> {
        if (this._imageLoader && (image instanceof NetworkStyleImage || image instanceof AssetStyleImage)) {
            const bytes = await this._imageLoader.load(image);
            if (bytes === null) throw new Error(`Could not load image "${image.id}"`);
            return {imageId: image.id, sdf: image.sdf, bytes};
        }
        return image.serialize();
    }

    async _call<T>(fallback: T, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (e) {
            this.listeners._reportError(e instanceof Error ? e : new Error(String(e)));
            return fallback;
        }
    }
}
