import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {layoutProperty, paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

export type CircleStyleProperties = {
    circleSortKey?: StyleValue<number>;
    circleRadius?: StyleValue<number>;
    circleRadiusTransition?: StyleTransition;
    circleColor?: ColorValue;
    circleColorTransition?: StyleTransition;
    circleBlur?: StyleValue<number>;
    circleBlurTransition?: StyleTransition;
    circleOpacity?: StyleValue<number>;
    circleOpacityTransition?: StyleTransition;
    circleTranslate?: StyleValue<[number, number]>;
    circleTranslateTransition?: StyleTransition;
    circleTranslateAnchor?: StyleValue<'map' | 'viewport'>;
    circlePitchScale?: StyleValue<'map' | 'viewport'>;
    circlePitchAlignment?: StyleValue<'map' | 'viewport'>;
    circleStrokeWidth?: StyleValue<number>;
    circleStrokeWidthTransition?: StyleTransition;
    circleStrokeColor?: ColorValue;
    circleStrokeColorTransition?: StyleTransition;
    circleStrokeOpacity?: StyleValue<number>;
    circleStrokeOpacityTransition?: StyleTransition;
};

export type CircleLayerProperties = LayerCommonProperties & CircleStyleProperties;

const mapOrViewport = ['map', 'viewport'];

export const circleProperties: PropertyTable<CircleStyleProperties> = {
    circleSortKey: layoutProperty('circle-sort-key', 'number'),
    circleRadius: paintProperty('circle-radius', 'number', {transition: true}),
    circleColor: paintProperty('circle-color', 'color', {transition: true}),
    circleBlur: paintProperty('circle-blur', 'number', {transition: true}),
    circleOpacity: paintProperty('circle-opacity', 'number', {transition: true}),
    circleTranslate: paintProperty('circle-translate', 'numberArray', {transition: true}),
    circleTranslateAnchor: paintProperty('circle-translate-anchor', 'enum', {values: mapOrViewport}),
    circlePitchScale: paintProperty('circle-pitch-scale', 'enum', {values: mapOrViewport}),
    circlePitchAlignment: paintProperty('circle-pitch-alignment', 'enum', {values: mapOrViewport}),
    circleStrokeWidth: paintProperty('circle-stroke-width', 'number', {transition: true}),
    circleStrokeColor: paintProperty('circle-stroke-color', 'color', {transition: true}),
    circleStrokeOpacity: paintProperty('circle-stroke-opacity', 'number', {transition: true})
};

export class CircleStyleLayer extends StyleLayer<CircleLayerProperties> {
    constructor(id: string, source: string, properties: CircleLayerProperties = CircleStyleLayer.defaultProperties()) {
        super('circle', id, source, properties, circleProperties);
    }

    static defaultProperties(): CircleLayerProperties {
        return {
            circleColor: 'blue',
            circleColorTransition: StyleTransition.build({delay: 300, duration: 500}),
            circleRadius: 10,
            circleStrokeWidth: 2,
            circleStrokeColor: '#fff'
        };
    }
}
