import {Annotation, type AnnotationArgs, type AnnotationOptions} from './annotation';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {circleProperties, type CircleStyleProperties} from '../style/style_layer/circle_style_layer';

import type {PropertyTable} from '../style/properties';

export type CircleAnnotationProperties = Pick<CircleStyleProperties,
    'circleColor' | 'circleColorTransition' |
    'circleRadius' | 'circleRadiusTransition' |
    'circleBlur' | 'circleBlurTransition' |
    'circleOpacity' | 'circleOpacityTransition' |
    'circleStrokeColor' | 'circleStrokeColorTransition' |
    'circleStrokeWidth' | 'circleStrokeWidthTransition' |
    'circleStrokeOpacity' | 'circleStrokeOpacityTransition' |
    'circleSortKey'
>;

export const circleAnnotationProperties: PropertyTable<CircleAnnotationProperties> = {
    circleColor: circleProperties.circleColor,
    circleRadius: circleProperties.circleRadius,
    circleBlur: circleProperties.circleBlur,
    circleOpacity: circleProperties.circleOpacity,
    circleStrokeColor: circleProperties.circleStrokeColor,
    circleStrokeWidth: circleProperties.circleStrokeWidth,
    circleStrokeOpacity: circleProperties.circleStrokeOpacity,
    circleSortKey: circleProperties.circleSortKey
};

/**
 * A circle drawn at one position.
 *
 * @example
 * ```ts
 * const annotation = new CircleAnnotation([27.7172, 85.3240], {circleColor: 'red', circleRadius: 12});
 * ```
 */
export class CircleAnnotation extends Annotation<CircleAnnotationProperties> {
    readonly point: LatLng;

    constructor(point: LatLngLike, properties: CircleAnnotationProperties = {}, options: AnnotationOptions = {}) {
        super('circle', properties, circleAnnotationProperties, options);
        this.point = LatLng.convert(point);
    }

    _geometry(): Pick<AnnotationArgs, 'point'> {
        return {point: this.point.toArgs()};
    }
}
