import {describe, test, expect} from 'vitest';
import {LatLng} from './lat_lng';
import {UnsupportedShapeError} from '../util/bridge_error';

describe('LatLng', () => {
    test('#constructor', () => {
        expect(new LatLng(0, 0) instanceof LatLng).toBeTruthy();
        expect(() => {
            new LatLng(NaN, 0);
        }).toThrow('Invalid LatLng object: (NaN, 0)');
        expect(() => {
            new LatLng(91, 0);
        }).toThrow('Invalid LatLng latitude value: must be between -90 and 90');
        expect(() => {
            new LatLng(-91, 0);
        }).toThrow('Invalid LatLng latitude value: must be between -90 and 90');
    });

    test('#convert', () => {
        const latLng = new LatLng(27.7172, 85.3240);
        expect(LatLng.convert(latLng)).toBe(latLng);
        expect(LatLng.convert([27.7172, 85.3240])).toEqual(new LatLng(27.7172, 85.3240));
        expect(LatLng.convert([27.7172, 85.3240, 1400])).toEqual(new LatLng(27.7172, 85.3240, 1400));
        expect(LatLng.convert({latitude: 10, longitude: 20})).toEqual(new LatLng(10, 20));
    });

    test('#wrap', () => {
        expect(new LatLng(0, 0).wrap()).toEqual(new LatLng(0, 0));
        expect(new LatLng(0, 10).wrap()).toEqual(new LatLng(0, 10));
        expect(new LatLng(0, 360).wrap()).toEqual(new LatLng(0, 0));
        expect(new LatLng(0, 190).wrap()).toEqual(new LatLng(0, -170));
    });

    test('#toArgs keeps latitude first', () => {
        expect(new LatLng(27.7172, 85.3240).toArgs()).toEqual([27.7172, 85.3240]);
        expect(new LatLng(27.7172, 85.3240, 1400).toArgs()).toEqual([27.7172, 85.3240, 1400]);
    });

    test('#toString', () => {
        expect(new LatLng(20, 10).toString()).toBe('LatLng(20, 10)');
    });

    describe('#fromArgs', () => {
        test('reads two and three element positions', () => {
            expect(LatLng.fromArgs([27.7172, 85.3240])).toEqual(new LatLng(27.7172, 85.3240));
            expect(LatLng.fromArgs([1, 2, 3]).altitude).toBe(3);
        });

        test('rejects other shapes', () => {
            expect(() => LatLng.fromArgs([1])).toThrow(UnsupportedShapeError);
            expect(() => LatLng.fromArgs(['1', '2'])).toThrow(UnsupportedShapeError);
            expect(() => LatLng.fromArgs({latitude: 1, longitude: 2})).toThrow(UnsupportedShapeError);
            expect(() => LatLng.fromArgs([95, 0])).toThrow('Expected a latitude between -90 and 90 but received number 95');
        });
    });
});
