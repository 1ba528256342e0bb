import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

export type BackgroundStyleProperties = {
    backgroundColor?: ColorValue;
    backgroundColorTransition?: StyleTransition;
    backgroundPattern?: StyleValue<string>;
    backgroundPatternTransition?: StyleTransition;
    backgroundOpacity?: StyleValue<number>;
    backgroundOpacityTransition?: StyleTransition;
};

// background layers draw no features, so they take neither a source nor a filter
export type BackgroundLayerProperties = Omit<LayerCommonProperties, 'sourceLayer' | 'filter'> & BackgroundStyleProperties;

export const backgroundProperties: PropertyTable<BackgroundStyleProperties> = {
    backgroundColor: paintProperty('background-color', 'color', {transition: true}),
    backgroundPattern: paintProperty('background-pattern', 'string', {transition: true}),
    backgroundOpacity: paintProperty('background-opacity', 'number', {transition: true})
};

export class BackgroundStyleLayer extends StyleLayer<BackgroundLayerProperties> {
    constructor(id: string, properties: BackgroundLayerProperties = BackgroundStyleLayer.defaultProperties()) {
        super('background', id, undefined, properties, backgroundProperties);
    }

    static defaultProperties(): BackgroundLayerProperties {
        return {
            backgroundColor: '#000000',
            backgroundColorTransition: StyleTransition.build({delay: 275, duration: 500})
        };
    }
}
