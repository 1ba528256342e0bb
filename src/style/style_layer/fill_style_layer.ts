import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {layoutProperty, paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

export type FillStyleProperties = {
    fillSortKey?: StyleValue<number>;
    fillAntialias?: StyleValue<boolean>;
    fillOpacity?: StyleValue<number>;
    fillOpacityTransition?: StyleTransition;
    fillColor?: ColorValue;
    fillColorTransition?: StyleTransition;
    fillOutlineColor?: ColorValue;
    fillOutlineColorTransition?: StyleTransition;
    fillTranslate?: StyleValue<[number, number]>;
    fillTranslateTransition?: StyleTransition;
    fillTranslateAnchor?: StyleValue<'map' | 'viewport'>;
    fillPattern?: StyleValue<string>;
    fillPatternTransition?: StyleTransition;
};

export type FillLayerProperties = LayerCommonProperties & FillStyleProperties;

export const fillProperties: PropertyTable<FillStyleProperties> = {
    fillSortKey: layoutProperty('fill-sort-key', 'number'),
    fillAntialias: paintProperty('fill-antialias', 'boolean'),
    fillOpacity: paintProperty('fill-opacity', 'number', {transition: true}),
    fillColor: paintProperty('fill-color', 'color', {transition: true}),
    fillOutlineColor: paintProperty('fill-outline-color', 'color', {transition: true}),
    fillTranslate: paintProperty('fill-translate', 'numberArray', {transition: true}),
    fillTranslateAnchor: paintProperty('fill-translate-anchor', 'enum', {values: ['map', 'viewport']}),
    fillPattern: paintProperty('fill-pattern', 'string', {transition: true})
};

export class FillStyleLayer extends StyleLayer<FillLayerProperties> {
    constructor(id: string, source: string, properties: FillLayerProperties = FillStyleLayer.defaultProperties()) {
        super('fill', id, source, properties, fillProperties);
    }

    static defaultProperties(): FillLayerProperties {
        return {
            fillColor: 'blue',
            fillColorTransition: StyleTransition.build({delay: 300, duration: 500})
        };
    }
}
