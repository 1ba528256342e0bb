import {describe, test, expect, vi} from 'vitest';
import {serializeFilter} from './style_layer';
import {CircleStyleLayer} from './style_layer/circle_style_layer';
import {FillStyleLayer} from './style_layer/fill_style_layer';
import {BackgroundStyleLayer} from './style_layer/background_style_layer';
import {FillExtrusionStyleLayer} from './style_layer/fill_extrusion_style_layer';
import {RasterStyleLayer} from './style_layer/raster_style_layer';
import {expressionFromJson} from './expression';

describe('StyleLayer#serialize', () => {
    test('writes the common fields', () => {
        const args = new FillStyleLayer('countries', 'world', {
            sourceLayer: 'admin',
            minZoom: 2,
            maxZoom: 10,
            visibility: 'none',
            fillColor: 'green'
        }).serialize();
        expect(args).toEqual({
            type: 'fill',
            layerId: 'countries',
            sourceId: 'world',
            'source-layer': 'admin',
            minzoom: 2,
            maxzoom: 10,
            layout: {visibility: 'none'},
            paint: {'fill-color': 'rgba(0,128,0,1)'},
            transition: {}
        });
    });

    test('defaults visibility to visible', () => {
        expect(new FillStyleLayer('a', 'b', {}).serialize().layout).toEqual({visibility: 'visible'});
    });

    test('leaves out the source of a background layer', () => {
        const args = new BackgroundStyleLayer('bg', {backgroundColor: '#000'}).serialize();
        expect(args).not.toHaveProperty('sourceId');
        expect(args.paint).toEqual({'background-color': 'rgba(0,0,0,1)'});
    });

    test('writes the filter as a JSON string', () => {
        const args = new CircleStyleLayer('places', 'points', {
            filter: ['==', ['get', 'name'], 'Nepal']
        }).serialize();
        expect(args.filter).toBe('["==",["get","name"],"Nepal"]');
        expect(JSON.parse(args.filter ?? '')).toEqual(['==', ['get', 'name'], 'Nepal']);
    });

    test('accepts filters as strings and trees', () => {
        expect(new CircleStyleLayer('a', 'b', {filter: '["has", "name"]'}).serialize().filter).toBe('["has","name"]');
        expect(new CircleStyleLayer('a', 'b', {filter: expressionFromJson(['has', 'name'])}).serialize().filter).toBe('["has","name"]');
    });

    test('drops a malformed filter with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const args = new CircleStyleLayer('bad-filter', 'points', {filter: 'name is Nepal'}).serialize();
        expect(args).not.toHaveProperty('filter');
        expect(warn).toHaveBeenCalledWith('layers.bad-filter: ignoring "filter". Expected expression but received string "name is Nepal"');
    });

    test('drops zoom levels out of range', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const args = new CircleStyleLayer('bad-zoom', 'points', {minZoom: -1, maxZoom: 30}).serialize();
        expect(args).not.toHaveProperty('minzoom');
        expect(args).not.toHaveProperty('maxzoom');
        expect(warn).toHaveBeenCalledWith('layers.bad-zoom: ignoring "maxzoom". Expected a zoom level between 0 and 24 but received number 30');
    });
});

describe('default properties', () => {
    test('fill', () => {
        const args = new FillStyleLayer('water', 'ocean').serialize();
        expect(args.paint).toEqual({'fill-color': 'rgba(0,0,255,1)'});
        expect(args.transition).toEqual({'fill-color-transition': {delay: 300, duration: 500}});
    });

    test('fill-extrusion', () => {
        expect(new FillExtrusionStyleLayer('buildings', 'city').serialize().paint).toEqual({
            'fill-extrusion-color': 'rgba(0,0,255,1)',
            'fill-extrusion-opacity': 0.6,
            'fill-extrusion-height': '["get","height"]',
            'fill-extrusion-base': '["get","min_height"]'
        });
    });

    test('raster', () => {
        const args = new RasterStyleLayer('imagery', 'satellite').serialize();
        expect(args.type).toBe('raster');
        expect(args.paint).toEqual({'raster-brightness-max': 1});
        expect(args.transition).toEqual({'raster-brightness-max-transition': {delay: 300, duration: 500}});
    });

    test('background', () => {
        const args = new BackgroundStyleLayer('bg').serialize();
        expect(args.paint).toEqual({'background-color': 'rgba(0,0,0,1)'});
        expect(args.transition).toEqual({'background-color-transition': {delay: 275, duration: 500}});
    });
});

describe('serializeFilter', () => {
    test('returns undefined for values that are not expressions', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(serializeFilter(42, 'filter-test')).toBeUndefined();
        expect(serializeFilter(['==', 'a'], 'filter-test')).toBe('["==","a"]');
    });
});
