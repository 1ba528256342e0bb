import {describe, test, expect} from 'vitest';
import {LatLng} from './lat_lng';
import {LatLngBounds} from './lat_lng_bounds';
import {LatLngQuad} from './lat_lng_quad';
import {UnsupportedShapeError} from '../util/bridge_error';

describe('LatLngBounds', () => {
    test('#fromBBox and #toBBox', () => {
        const bounds = LatLngBounds.fromBBox([80, 26, 88, 30]);
        expect(bounds.southwest).toEqual(new LatLng(26, 80));
        expect(bounds.northeast).toEqual(new LatLng(30, 88));
        expect(bounds.toBBox()).toEqual([80, 26, 88, 30]);
    });

    test('#getCenter', () => {
        expect(LatLngBounds.fromBBox([80, 26, 88, 30]).getCenter()).toEqual(new LatLng(28, 84));
    });

    test('#contains', () => {
        const bounds = LatLngBounds.fromBBox([80, 26, 88, 30]);
        expect(bounds.contains([27.7172, 85.3240])).toBe(true);
        expect(bounds.contains([27.7172, 90])).toBe(false);
        expect(bounds.contains([31, 85])).toBe(false);
    });

    test('#contains across the antimeridian', () => {
        const bounds = LatLngBounds.fromBBox([170, -10, -170, 10]);
        expect(bounds.contains([0, 175])).toBe(true);
        expect(bounds.contains([0, -175])).toBe(true);
        expect(bounds.contains([0, 0])).toBe(false);
    });

    test('#toArgs', () => {
        expect(LatLngBounds.fromBBox([80, 26, 88, 30]).toArgs()).toEqual({southwest: [26, 80], northeast: [30, 88]});
    });

    test('.fromArgs reads both wire shapes', () => {
        expect(LatLngBounds.fromArgs([80, 26, 88, 30]).toBBox()).toEqual([80, 26, 88, 30]);
        expect(LatLngBounds.fromArgs({southwest: [26, 80], northeast: [30, 88]}).toBBox()).toEqual([80, 26, 88, 30]);
        expect(() => LatLngBounds.fromArgs([1, 2, 3])).toThrow(UnsupportedShapeError);
        expect(() => LatLngBounds.fromArgs('bounds')).toThrow(UnsupportedShapeError);
    });
});

describe('LatLngQuad', () => {
    const quad = new LatLngQuad([10, 0], [10, 20], [0, 20], [0, 0]);

    test('#toArgs', () => {
        expect(quad.toArgs()).toEqual({
            top_left: [10, 0],
            top_right: [10, 20],
            bottom_right: [0, 20],
            bottom_left: [0, 0]
        });
    });

    test('.fromArgs reads arrays and maps', () => {
        expect(LatLngQuad.fromArgs([[10, 0], [10, 20], [0, 20], [0, 0]])).toEqual(quad);
        expect(LatLngQuad.fromArgs(quad.toArgs())).toEqual(quad);
        expect(() => LatLngQuad.fromArgs([[10, 0]])).toThrow(UnsupportedShapeError);
    });
});
