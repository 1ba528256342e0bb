import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

export type FillExtrusionStyleProperties = {
    fillExtrusionOpacity?: StyleValue<number>;
    fillExtrusionOpacityTransition?: StyleTransition;
    fillExtrusionColor?: ColorValue;
    fillExtrusionColorTransition?: StyleTransition;
    fillExtrusionTranslate?: StyleValue<[number, number]>;
    fillExtrusionTranslateTransition?: StyleTransition;
    fillExtrusionTranslateAnchor?: StyleValue<'map' | 'viewport'>;
    fillExtrusionPattern?: StyleValue<string>;
    fillExtrusionPatternTransition?: StyleTransition;
    fillExtrusionHeight?: StyleValue<number>;
    fillExtrusionHeightTransition?: StyleTransition;
    fillExtrusionBase?: StyleValue<number>;
    fillExtrusionBaseTransition?: StyleTransition;
    fillExtrusionVerticalGradient?: StyleValue<boolean>;
};

export type FillExtrusionLayerProperties = LayerCommonProperties & FillExtrusionStyleProperties;

export const fillExtrusionProperties: PropertyTable<FillExtrusionStyleProperties> = {
    fillExtrusionOpacity: paintProperty('fill-extrusion-opacity', 'number', {transition: true}),
    fillExtrusionColor: paintProperty('fill-extrusion-color', 'color', {transition: true}),
    fillExtrusionTranslate: paintProperty('fill-extrusion-translate', 'numberArray', {transition: true}),
    fillExtrusionTranslateAnchor: paintProperty('fill-extrusion-translate-anchor', 'enum', {values: ['map', 'viewport']}),
    fillExtrusionPattern: paintProperty('fill-extrusion-pattern', 'string', {transition: true}),
    fillExtrusionHeight: paintProperty('fill-extrusion-height', 'number', {transition: true}),
    fillExtrusionBase: paintProperty('fill-extrusion-base', 'number', {transition: true}),
    fillExtrusionVerticalGradient: paintProperty('fill-extrusion-vertical-gradient', 'boolean')
};

export class FillExtrusionStyleLayer extends StyleLayer<FillExtrusionLayerProperties> {
    constructor(id: string, source: string, properties: FillExtrusionLayerProperties = FillExtrusionStyleLayer.defaultProperties()) {
        super('fill-extrusion', id, source, properties, fillExtrusionProperties);
    }

    static defaultProperties(): FillExtrusionLayerProperties {
        return {
            fillExtrusionColor: 'blue',
            fillExtrusionOpacity: 0.6,
            fillExtrusionHeight: ['get', 'height'],
            fillExtrusionBase: ['get', 'min_height']
        };
    }
}
