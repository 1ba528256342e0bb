import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

export type HillshadeStyleProperties = {
    hillshadeIlluminationDirection?: StyleValue<number>;
    hillshadeIlluminationAnchor?: StyleValue<'map' | 'viewport'>;
    hillshadeExaggeration?: StyleValue<number>;
    hillshadeExaggerationTransition?: StyleTransition;
    hillshadeShadowColor?: ColorValue;
    hillshadeShadowColorTransition?: StyleTransition;
    hillshadeHighlightColor?: ColorValue;
    hillshadeHighlightColorTransition?: StyleTransition;
    hillshadeAccentColor?: ColorValue;
    hillshadeAccentColorTransition?: StyleTransition;
};

// hillshade layers read elevation tiles, not vector features
export type HillshadeLayerProperties = Omit<LayerCommonProperties, 'filter'> & HillshadeStyleProperties;

export const hillshadeProperties: PropertyTable<HillshadeStyleProperties> = {
    hillshadeIlluminationDirection: paintProperty('hillshade-illumination-direction', 'number'),
    hillshadeIlluminationAnchor: paintProperty('hillshade-illumination-anchor', 'enum', {values: ['map', 'viewport']}),
    hillshadeExaggeration: paintProperty('hillshade-exaggeration', 'number', {transition: true}),
    hillshadeShadowColor: paintProperty('hillshade-shadow-color', 'color', {transition: true}),
    hillshadeHighlightColor: paintProperty('hillshade-highlight-color', 'color', {transition: true}),
    hillshadeAccentColor: paintProperty('hillshade-accent-color', 'color', {transition: true})
};

export class HillshadeStyleLayer extends StyleLayer<HillshadeLayerProperties> {
    constructor(id: string, source: string, properties: HillshadeLayerProperties = HillshadeStyleLayer.defaultProperties()) {
        super('hillshade', id, source, properties, hillshadeProperties);
    }

    static defaultProperties(): HillshadeLayerProperties {
        return {
            hillshadeAccentColor: '#000000',
            hillshadeAccentColorTransition: StyleTransition.build({delay: 275, duration: 500})
        };
    }
}
