import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {layoutProperty, paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';
import type {ExpressionJson, ExpressionNode} from '../expression';

export type LineStyleProperties = {
    lineCap?: StyleValue<'butt' | 'round' | 'square'>;
    lineJoin?: StyleValue<'bevel' | 'round' | 'miter'>;
    lineMiterLimit?: StyleValue<number>;
    lineRoundLimit?: StyleValue<number>;
    lineSortKey?: StyleValue<number>;
    lineOpacity?: StyleValue<number>;
    lineOpacityTransition?: StyleTransition;
    lineColor?: ColorValue;
    lineColorTransition?: StyleTransition;
    lineTranslate?: StyleValue<[number, number]>;
    lineTranslateTransition?: StyleTransition;
    lineTranslateAnchor?: StyleValue<'map' | 'viewport'>;
    lineWidth?: StyleValue<number>;
    lineWidthTransition?: StyleTransition;
    lineGapWidth?: StyleValue<number>;
    lineGapWidthTransition?: StyleTransition;
    lineOffset?: StyleValue<number>;
    lineOffsetTransition?: StyleTransition;
    lineBlur?: StyleValue<number>;
    lineBlurTransition?: StyleTransition;
    lineDasharray?: StyleValue<Array<number>>;
    lineDasharrayTransition?: StyleTransition;
    linePattern?: StyleValue<string>;
    linePatternTransition?: StyleTransition;
    /**
     * Color ramp over `['line-progress']`; needs a geojson source with `lineMetrics`.
     */
    lineGradient?: ExpressionNode | ExpressionJson | string;
};

export type LineLayerProperties = LayerCommonProperties & LineStyleProperties;

export const lineProperties: PropertyTable<LineStyleProperties> = {
    lineCap: layoutProperty('line-cap', 'enum', {values: ['butt', 'round', 'square']}),
    lineJoin: layoutProperty('line-join', 'enum', {values: ['bevel', 'round', 'miter']}),
    lineMiterLimit: layoutProperty('line-miter-limit', 'number'),
    lineRoundLimit: layoutProperty('line-round-limit', 'number'),
    lineSortKey: layoutProperty('line-sort-key', 'number'),
    lineOpacity: paintProperty('line-opacity', 'number', {transition: true}),
    lineColor: paintProperty('line-color', 'color', {transition: true}),
    lineTranslate: paintProperty('line-translate', 'numberArray', {transition: true}),
    lineTranslateAnchor: paintProperty('line-translate-anchor', 'enum', {values: ['map', 'viewport']}),
    lineWidth: paintProperty('line-width', 'number', {transition: true}),
    lineGapWidth: paintProperty('line-gap-width', 'number', {transition: true}),
    lineOffset: paintProperty('line-offset', 'number', {transition: true}),
    lineBlur: paintProperty('line-blur', 'number', {transition: true}),
    lineDasharray: paintProperty('line-dasharray', 'numberArray', {transition: true}),
    linePattern: paintProperty('line-pattern', 'string', {transition: true}),
    lineGradient: paintProperty('line-gradient', 'colorRamp')
};

export class LineStyleLayer extends StyleLayer<LineLayerProperties> {
    constructor(id: string, source: string, properties: LineLayerProperties = LineStyleLayer.defaultProperties()) {
        super('line', id, source, properties, lineProperties);
    }

    static defaultProperties(): LineLayerProperties {
        return {
            lineWidth: 2,
            lineColor: 'blue',
            lineCap: 'round',
            lineJoin: 'round'
        };
    }
}
