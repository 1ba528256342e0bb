import type {AnnotationArgs, AnnotationType} from '../annotation/annotation';
import type {QueryRenderedFeaturesArgs} from '../source/query_features';
import type {SourceArgs} from '../source/source';
import type {LayerArgs} from '../style/style_layer';
import type {StyleImageArgs} from '../style/style_image';

/**
 * Where a layer is inserted in the layer stack. With no position the layer goes on top.
 */
export type LayerPosition = {
    /**
     * Id of an existing layer to draw the new layer above.
     */
    above?: string;
    /**
     * Id of an existing layer to draw the new layer below.
     */
    below?: string;
    /**
     * Index in the layer stack, 0 being the bottom.
     */
    index?: number;
};

/**
 * The native renderer, seen from this side of the bridge. It receives the serialized
 * entities and answers queries with plain maps and lists, which the controller decodes.
 *
 * Methods reject when the renderer refuses a call, for instance with a
 * `DuplicateEntityIdError` when an id is already in use.
 */
export interface RendererHost {
    /**
     * Unit in which the renderer expects transition delays and durations.
     * @defaultValue 'milliseconds'
     */
    readonly transitionUnit?: 'milliseconds' | 'seconds';

    addLayer(layer: LayerArgs, position: LayerPosition): Promise<void>;
    removeLayer(layerId: string): Promise<boolean>;
    /**
     * Resolves to the layer's description, or `null` when there is no such layer.
     */
    getLayer(layerId: string): Promise<unknown>;

    addSource(source: SourceArgs): Promise<void>;
    removeSource(sourceId: string): Promise<boolean>;
    getSource(sourceId: string): Promise<unknown>;

    addAnnotation(annotation: AnnotationArgs): Promise<void>;
    removeAnnotation(type: AnnotationType, annotationId: number): Promise<boolean>;

    addImage(image: StyleImageArgs): Promise<void>;
    removeImage(imageId: string): Promise<boolean>;
    hasImage(imageId: string): Promise<boolean>;

    queryRenderedFeatures(query: QueryRenderedFeaturesArgs): Promise<unknown>;
    getCameraPosition(): Promise<unknown>;
    getVisibleRegion(): Promise<unknown>;
    /**
     * Resolves to the `[x, y]` screen position of a geographic position.
     */
    toScreenLocation(latLng: [number, number] | [number, number, number]): Promise<unknown>;
}
