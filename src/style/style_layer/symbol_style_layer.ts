import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {layoutProperty, paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {ColorValue, StyleValue} from '../property_value';

type Alignment = 'map' | 'viewport' | 'auto';
type Anchor = 'center' | 'left' | 'right' | 'top' | 'bottom' | 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

export type SymbolStyleProperties = {
    symbolPlacement?: StyleValue<'point' | 'line' | 'line-center'>;
    symbolSpacing?: StyleValue<number>;
    symbolAvoidEdges?: StyleValue<boolean>;
    symbolSortKey?: StyleValue<number>;
    symbolZOrder?: StyleValue<'auto' | 'viewport-y' | 'source'>;
    iconAllowOverlap?: StyleValue<boolean>;
    iconIgnorePlacement?: StyleValue<boolean>;
    iconOptional?: StyleValue<boolean>;
    iconRotationAlignment?: StyleValue<Alignment>;
    iconSize?: StyleValue<number>;
    iconTextFit?: StyleValue<'none' | 'width' | 'height' | 'both'>;
    iconTextFitPadding?: StyleValue<[number, number, number, number]>;
    iconImage?: StyleValue<string>;
    iconRotate?: StyleValue<number>;
    iconPadding?: StyleValue<number>;
    iconKeepUpright?: StyleValue<boolean>;
    iconOffset?: StyleValue<[number, number]>;
    iconAnchor?: StyleValue<Anchor>;
    iconPitchAlignment?: StyleValue<Alignment>;
    textPitchAlignment?: StyleValue<Alignment>;
    textRotationAlignment?: StyleValue<Alignment>;
    textField?: StyleValue<string>;
    textFont?: StyleValue<Array<string>>;
    textSize?: StyleValue<number>;
    textMaxWidth?: StyleValue<number>;
    textLineHeight?: StyleValue<number>;
    textLetterSpacing?: StyleValue<number>;
    textJustify?: StyleValue<'auto' | 'left' | 'center' | 'right'>;
    textRadialOffset?: StyleValue<number>;
    textVariableAnchor?: StyleValue<Array<Anchor>>;
    textAnchor?: StyleValue<Anchor>;
    textMaxAngle?: StyleValue<number>;
    textRotate?: StyleValue<number>;
    textPadding?: StyleValue<number>;
    textKeepUpright?: StyleValue<boolean>;
    textTransform?: StyleValue<'none' | 'uppercase' | 'lowercase'>;
    textOffset?: StyleValue<[number, number]>;
    textWritingMode?: StyleValue<Array<'horizontal' | 'vertical'>>;
    textAllowOverlap?: StyleValue<boolean>;
    textIgnorePlacement?: StyleValue<boolean>;
    textOptional?: StyleValue<boolean>;
    iconOpacity?: StyleValue<number>;
    iconOpacityTransition?: StyleTransition;
    iconColor?: ColorValue;
    iconColorTransition?: StyleTransition;
    iconHaloColor?: ColorValue;
    iconHaloColorTransition?: StyleTransition;
    iconHaloWidth?: StyleValue<number>;
    iconHaloWidthTransition?: StyleTransition;
    iconHaloBlur?: StyleValue<number>;
    iconHaloBlurTransition?: StyleTransition;
    iconTranslate?: StyleValue<[number, number]>;
    iconTranslateTransition?: StyleTransition;
    iconTranslateAnchor?: StyleValue<'map' | 'viewport'>;
    textOpacity?: StyleValue<number>;
    textOpacityTransition?: StyleTransition;
    textColor?: ColorValue;
    textColorTransition?: StyleTransition;
    textHaloColor?: ColorValue;
    textHaloColorTransition?: StyleTransition;
    textHaloWidth?: StyleValue<number>;
    textHaloWidthTransition?: StyleTransition;
    textHaloBlur?: StyleValue<number>;
    textHaloBlurTransition?: StyleTransition;
    textTranslate?: StyleValue<[number, number]>;
    textTranslateTransition?: StyleTransition;
    textTranslateAnchor?: StyleValue<'map' | 'viewport'>;
};

export type SymbolLayerProperties = LayerCommonProperties & SymbolStyleProperties;

const alignments = ['map', 'viewport', 'auto'];
const anchors = ['center', 'left', 'right', 'top', 'bottom', 'top-left', 'top-right', 'bottom-left', 'bottom-right'];
const mapOrViewport = ['map', 'viewport'];

export const symbolProperties: PropertyTable<SymbolStyleProperties> = {
    symbolPlacement: layoutProperty('symbol-placement', 'enum', {values: ['point', 'line', 'line-center']}),
    symbolSpacing: layoutProperty('symbol-spacing', 'number'),
    symbolAvoidEdges: layoutProperty('symbol-avoid-edges', 'boolean'),
    symbolSortKey: layoutProperty('symbol-sort-key', 'number'),
    symbolZOrder: layoutProperty('symbol-z-order', 'enum', {values: ['auto', 'viewport-y', 'source']}),
    iconAllowOverlap: layoutProperty('icon-allow-overlap', 'boolean'),
    iconIgnorePlacement: layoutProperty('icon-ignore-placement', 'boolean'),
    iconOptional: layoutProperty('icon-optional', 'boolean'),
    iconRotationAlignment: layoutProperty('icon-rotation-alignment', 'enum', {values: alignments}),
    iconSize: layoutProperty('icon-size', 'number'),
    iconTextFit: layoutProperty('icon-text-fit', 'enum', {values: ['none', 'width', 'height', 'both']}),
    iconTextFitPadding: layoutProperty('icon-text-fit-padding', 'numberArray'),
    iconImage: layoutProperty('icon-image', 'string'),
    iconRotate: layoutProperty('icon-rotate', 'number'),
    iconPadding: layoutProperty('icon-padding', 'number'),
    iconKeepUpright: layoutProperty('icon-keep-upright', 'boolean'),
    iconOffset: layoutProperty('icon-offset', 'numberArray'),
    iconAnchor: layoutProperty('icon-anchor', 'enum', {values: anchors}),
    iconPitchAlignment: layoutProperty('icon-pitch-alignment', 'enum', {values: alignments}),
    textPitchAlignment: layoutProperty('text-pitch-alignment', 'enum', {values: alignments}),
    textRotationAlignment: layoutProperty('text-rotation-alignment', 'enum', {values: alignments}),
    textField: layoutProperty('text-field', 'string'),
    textFont: layoutProperty('text-font', 'stringArray', {wire: 'json'}),
    textSize: layoutProperty('text-size', 'number'),
    textMaxWidth: layoutProperty('text-max-width', 'number'),
    textLineHeight: layoutProperty('text-line-height', 'number'),
    textLetterSpacing: layoutProperty('text-letter-spacing', 'number'),
    textJustify: layoutProperty('text-justify', 'enum', {values: ['auto', 'left', 'center', 'right']}),
    textRadialOffset: layoutProperty('text-radial-offset', 'number'),
    textVariableAnchor: layoutProperty('text-variable-anchor', 'stringArray'),
    textAnchor: layoutProperty('text-anchor', 'enum', {values: anchors}),
    textMaxAngle: layoutProperty('text-max-angle', 'number'),
    textRotate: layoutProperty('text-rotate', 'number'),
    textPadding: layoutProperty('text-padding', 'number'),
    textKeepUpright: layoutProperty('text-keep-upright', 'boolean'),
    textTransform: layoutProperty('text-transform', 'enum', {values: ['none', 'uppercase', 'lowercase']}),
    textOffset: layoutProperty('text-offset', 'numberArray'),
    textWritingMode: layoutProperty('text-writing-mode', 'stringArray'),
    textAllowOverlap: layoutProperty('text-allow-overlap', 'boolean'),
    textIgnorePlacement: layoutProperty('text-ignore-placement', 'boolean'),
    textOptional: layoutProperty('text-optional', 'boolean'),
    iconOpacity: paintProperty('icon-opacity', 'number', {transition: true}),
    iconColor: paintProperty('icon-color', 'color', {transition: true}),
    iconHaloColor: paintProperty('icon-halo-color', 'color', {transition: true}),
    iconHaloWidth: paintProperty('icon-halo-width', 'number', {transition: true}),
    iconHaloBlur: paintProperty('icon-halo-blur', 'number', {transition: true}),
    iconTranslate: paintProperty('icon-translate', 'numberArray', {transition: true}),
    iconTranslateAnchor: paintProperty('icon-translate-anchor', 'enum', {values: mapOrViewport}),
    textOpacity: paintProperty('text-opacity', 'number', {transition: true}),
    textColor: paintProperty('text-color', 'color', {transition: true}),
    textHaloColor: paintProperty('text-halo-color', 'color', {transition: true}),
    textHaloWidth: paintProperty('text-halo-width', 'number', {transition: true}),
    textHaloBlur: paintProperty('text-halo-blur', 'number', {transition: true}),
    textTranslate: paintProperty('text-translate', 'numberArray', {transition: true}),
    textTranslateAnchor: paintProperty('text-translate-anchor', 'enum', {values: mapOrViewport})
};

export class SymbolStyleLayer extends StyleLayer<SymbolLayerProperties> {
    constructor(id: string, source: string, properties: SymbolLayerProperties = SymbolStyleLayer.defaultProperties()) {
        super('symbol', id, source, properties, symbolProperties);
    }

    static defaultProperties(): SymbolLayerProperties {
        return {
            textField: ['get', 'point_count_abbreviated'],
            textSize: 12,
            textColor: '#fff'
        };
    }
}
