import {describe, test, expect, vi} from 'vitest';
import Point from '@mapbox/point-geometry';
import {geometryFromArgs, queriedFeaturesFromArgs, queryRenderedFeaturesArgs} from './query_features';
import {UnsupportedShapeError} from '../util/bridge_error';

describe('queryRenderedFeaturesArgs', () => {
    test('converts a screen point', () => {
        expect(queryRenderedFeaturesArgs({point: new Point(20, 35)})).toEqual({point: [20, 35], layerIds: []});
        expect(queryRenderedFeaturesArgs({point: [20, 35]}, {layerIds: ['places']})).toEqual({point: [20, 35], layerIds: ['places']});
    });

    test('normalizes rectangle corners', () => {
        expect(queryRenderedFeaturesArgs({rect: [[50, 10], new Point(10, 40)]}).rect).toEqual([10, 10, 50, 40]);
    });

    test('converts a geographic position', () => {
        expect(queryRenderedFeaturesArgs({latLng: {latitude: 27.7172, longitude: 85.3240}}).latLng).toEqual([27.7172, 85.3240]);
    });

    test('serializes the filter', () => {
        const args = queryRenderedFeaturesArgs({point: [0, 0]}, {filter: ['==', ['get', 'name'], 'Nepal']});
        expect(args.filter).toBe('["==",["get","name"],"Nepal"]');
    });

    test('leaves out a malformed filter', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(queryRenderedFeaturesArgs({point: [0, 0]}, {filter: 'not a filter'})).not.toHaveProperty('filter');
    });
});

describe('queriedFeaturesFromArgs', () => {
    const feature = {
        type: 'Feature',
        id: 7,
        properties: {name: 'Kathmandu'},
        geometry: {type: 'Point', coordinates: [85.3240, 27.7172]}
    };

    test('reads bare features and their JSON text', () => {
        expect(queriedFeaturesFromArgs([feature, JSON.stringify(feature)])).toEqual([
            {feature, state: {}},
            {feature, state: {}}
        ]);
    });

    test('reads wrapped features with source and state', () => {
        expect(queriedFeaturesFromArgs([
            {feature, source: 'cities', 'source-layer': 'places', state: {hover: true}}
        ])).toEqual([
            {feature, source: 'cities', sourceLayer: 'places', state: {hover: true}}
        ]);
    });

    test('keeps null geometries and properties', () => {
        expect(queriedFeaturesFromArgs([{type: 'Feature', geometry: null, properties: null}])).toEqual([
            {feature: {type: 'Feature', geometry: null, properties: null}, state: {}}
        ]);
    });

    test('rejects malformed features', () => {
        expect(() => queriedFeaturesFromArgs({})).toThrow('Expected a list of features but received object');
        expect(() => queriedFeaturesFromArgs([{type: 'Point', coordinates: [0, 0]}])).toThrow(UnsupportedShapeError);
        expect(() => queriedFeaturesFromArgs(['{not json'])).toThrow(UnsupportedShapeError);
        expect(() => queriedFeaturesFromArgs([{feature, source: 3}])).toThrow('Expected a string for "source" but received number 3');
    });
});

describe('geometryFromArgs', () => {
    test('reads every geometry type', () => {
        expect(geometryFromArgs({type: 'LineString', coordinates: [[0, 0], [1, 1]]})).toEqual({type: 'LineString', coordinates: [[0, 0], [1, 1]]});
        expect(geometryFromArgs('{"type":"Polygon","coordinates":[[[0,0],[1,0],[1,1],[0,0]]]}')).toEqual({
            type: 'Polygon',
            coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]]
        });
        expect(geometryFromArgs({type: 'MultiPolygon', coordinates: [[[[0, 0], [1, 0], [0, 1], [0, 0]]]]}).type).toBe('MultiPolygon');
        expect(geometryFromArgs({
            type: 'GeometryCollection',
            geometries: [{type: 'Point', coordinates: [1, 2]}, {type: 'MultiPoint', coordinates: [[3, 4]]}]
        })).toEqual({
            type: 'GeometryCollection',
            geometries: [{type: 'Point', coordinates: [1, 2]}, {type: 'MultiPoint', coordinates: [[3, 4]]}]
        });
    });

    test('rejects malformed coordinates', () => {
        expect(() => geometryFromArgs({type: 'Point', coordinates: [1]})).toThrow('Expected a GeoJSON position but received array [1]');
        expect(() => geometryFromArgs({type: 'Circle', coordinates: [1, 2]})).toThrow('Expected a GeoJSON geometry type but received string "Circle"');
        expect(() => geometryFromArgs(42)).toThrow(UnsupportedShapeError);
    });
});
