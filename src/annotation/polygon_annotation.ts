import {Annotation, type AnnotationArgs, type AnnotationOptions} from './annotation';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {fillProperties, type FillStyleProperties} from '../style/style_layer/fill_style_layer';

import type {PropertyTable} from '../style/properties';

export type PolygonAnnotationProperties = Pick<FillStyleProperties,
    'fillSortKey' |
    'fillAntialias' |
    'fillColor' | 'fillColorTransition' |
    'fillOpacity' | 'fillOpacityTransition' |
    'fillOutlineColor' | 'fillOutlineColorTransition' |
    'fillPattern' | 'fillPatternTransition'
>;

export const polygonAnnotationProperties: PropertyTable<PolygonAnnotationProperties> = {
    fillSortKey: fillProperties.fillSortKey,
    fillAntialias: fillProperties.fillAntialias,
    fillColor: fillProperties.fillColor,
    fillOpacity: fillProperties.fillOpacity,
    fillOutlineColor: fillProperties.fillOutlineColor,
    fillPattern: fillProperties.fillPattern
};

/**
 * A filled polygon. The first ring is the outline, the others are holes.
 */
export class PolygonAnnotation extends Annotation<PolygonAnnotationProperties> {
    readonly rings: Array<Array<LatLng>>;

    constructor(rings: Array<Array<LatLngLike>>, properties: PolygonAnnotationProperties = {}, options: AnnotationOptions = {}) {
        super('polygon', properties, polygonAnnotationProperties, options);
        if (rings.length === 0 || rings[0].length < 3) {
            throw new Error('A polygon annotation needs an outline of at least three positions');
        }
        this.rings = rings.map(ring => ring.map(LatLng.convert));
    }

    _geometry(): Pick<AnnotationArgs, 'points'> {
        return {points: this.rings.map(ring => ring.map(position => position.toArgs()))};
    }
}
