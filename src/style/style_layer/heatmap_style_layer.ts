import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {StyleValue} from '../property_value';
import type {ExpressionJson, ExpressionNode} from '../expression';

export type HeatmapStyleProperties = {
    heatmapRadius?: StyleValue<number>;
    heatmapRadiusTransition?: StyleTransition;
    heatmapWeight?: StyleValue<number>;
    heatmapIntensity?: StyleValue<number>;
    heatmapIntensityTransition?: StyleTransition;
    /**
     * Color ramp over `['heatmap-density']`; only accepts an expression.
     */
    heatmapColor?: ExpressionNode | ExpressionJson | string;
    heatmapOpacity?: StyleValue<number>;
    heatmapOpacityTransition?: StyleTransition;
};

export type HeatmapLayerProperties = LayerCommonProperties & HeatmapStyleProperties;

export const heatmapProperties: PropertyTable<HeatmapStyleProperties> = {
    heatmapRadius: paintProperty('heatmap-radius', 'number', {transition: true}),
    heatmapWeight: paintProperty('heatmap-weight', 'number'),
    heatmapIntensity: paintProperty('heatmap-intensity', 'number', {transition: true}),
    heatmapColor: paintProperty('heatmap-color', 'colorRamp'),
    heatmapOpacity: paintProperty('heatmap-opacity', 'number', {transition: true})
};

export class HeatmapStyleLayer extends StyleLayer<HeatmapLayerProperties> {
    constructor(id: string, source: string, properties: HeatmapLayerProperties = HeatmapStyleLayer.defaultProperties()) {
        super('heatmap', id, source, properties, heatmapProperties);
    }

    static defaultProperties(): HeatmapLayerProperties {
        return {
            heatmapIntensity: 1,
            heatmapIntensityTransition: StyleTransition.build({delay: 275, duration: 500})
        };
    }
}
