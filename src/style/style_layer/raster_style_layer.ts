import {StyleLayer, type LayerCommonProperties} from '../style_layer';
import {paintProperty, type PropertyTable} from '../properties';
import {StyleTransition} from '../style_transition';

import type {StyleValue} from '../property_value';

export type RasterStyleProperties = {
    rasterOpacity?: StyleValue<number>;
    rasterOpacityTransition?: StyleTransition;
    rasterHueRotate?: StyleValue<number>;
    rasterHueRotateTransition?: StyleTransition;
    rasterBrightnessMin?: StyleValue<number>;
    rasterBrightnessMinTransition?: StyleTransition;
    rasterBrightnessMax?: StyleValue<number>;
    rasterBrightnessMaxTransition?: StyleTransition;
    rasterSaturation?: StyleValue<number>;
    rasterSaturationTransition?: StyleTransition;
    rasterContrast?: StyleValue<number>;
    rasterContrastTransition?: StyleTransition;
    rasterResampling?: StyleValue<'linear' | 'nearest'>;
    rasterFadeDuration?: StyleValue<number>;
};

export type RasterLayerProperties = Omit<LayerCommonProperties, 'filter'> & RasterStyleProperties;

export const rasterProperties: PropertyTable<RasterStyleProperties> = {
    rasterOpacity: paintProperty('raster-opacity', 'number', {transition: true}),
    rasterHueRotate: paintProperty('raster-hue-rotate', 'number', {transition: true}),
    rasterBrightnessMin: paintProperty('raster-brightness-min', 'number', {transition: true}),
    rasterBrightnessMax: paintProperty('raster-brightness-max', 'number', {transition: true}),
    rasterSaturation: paintProperty('raster-saturation', 'number', {transition: true}),
    rasterContrast: paintProperty('raster-contrast', 'number', {transition: true}),
    rasterResampling: paintProperty('raster-resampling', 'enum', {values: ['linear', 'nearest']}),
    rasterFadeDuration: paintProperty('raster-fade-duration', 'number')
};

export class RasterStyleLayer extends StyleLayer<RasterLayerProperties> {
    constructor(id: string, source: string, properties: RasterLayerProperties = RasterStyleLayer.defaultProperties()) {
        super('raster', id, source, properties, rasterProperties);
    }

    static defaultProperties(): RasterLayerProperties {
        return {
            rasterBrightnessMax: 1,
            rasterBrightnessMaxTransition: StyleTransition.build({delay: 300, duration: 500})
        };
    }
}
