import {Annotation, type AnnotationArgs, type AnnotationOptions} from './annotation';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {lineProperties, type LineStyleProperties} from '../style/style_layer/line_style_layer';

import type {PropertyTable} from '../style/properties';

export type PolylineAnnotationProperties = Pick<LineStyleProperties,
    'lineJoin' |
    'lineSortKey' |
    'lineColor' | 'lineColorTransition' |
    'lineOpacity' | 'lineOpacityTransition' |
    'lineBlur' | 'lineBlurTransition' |
    'lineWidth' | 'lineWidthTransition' |
    'lineOffset' | 'lineOffsetTransition' |
    'lineGapWidth' | 'lineGapWidthTransition' |
    'linePattern' | 'linePatternTransition'
>;

export const polylineAnnotationProperties: PropertyTable<PolylineAnnotationProperties> = {
    lineJoin: lineProperties.lineJoin,
    lineSortKey: lineProperties.lineSortKey,
    lineColor: lineProperties.lineColor,
    lineOpacity: lineProperties.lineOpacity,
    lineBlur: lineProperties.lineBlur,
    lineWidth: lineProperties.lineWidth,
    lineOffset: lineProperties.lineOffset,
    lineGapWidth: lineProperties.lineGapWidth,
    linePattern: lineProperties.linePattern
};

export class PolylineAnnotation extends Annotation<PolylineAnnotationProperties> {
    readonly points: Array<LatLng>;

    constructor(points: Array<LatLngLike>, properties: PolylineAnnotationProperties = {}, options: AnnotationOptions = {}) {
        super('polyline', properties, polylineAnnotationProperties, options);
        if (points.length < 2) {
            throw new Error('A polyline annotation needs at least two positions');
        }
        this.points = points.map(LatLng.convert);
    }

    _geometry(): Pick<AnnotationArgs, 'points'> {
        return {points: this.points.map(position => position.toArgs())};
    }
}
