import {describe, test, expect} from 'vitest';
import {EdgeInsets} from '../geo/edge_insets';
import {UnsupportedShapeError} from '../util/bridge_error';

describe('EdgeInsets', () => {
    describe('#constructor', () => {
        test('creates an object with default values', () => {
            expect(new EdgeInsets().toJSON()).toEqual({top: 0, bottom: 0, left: 0, right: 0});
        });

        test('invalid initialization', () => {
            expect(() => {
                new EdgeInsets(NaN, 10);
            }).toThrow('Invalid value for edge-insets, top, bottom, left and right must all be numbers');

            expect(() => {
                new EdgeInsets(-10, 10, 20, 10);
            }).toThrow('Invalid value for edge-insets, top, bottom, left and right must all be numbers');
        });
    });

    test('#equals', () => {
        const insets = new EdgeInsets(1, 2, 3, 4);
        expect(insets.equals({top: 1, bottom: 2, left: 3, right: 4})).toBe(true);
        expect(insets.equals(insets.clone())).toBe(true);
        expect(insets.equals({top: 1, bottom: 2, left: 3, right: 5})).toBe(false);
    });

    describe('wire form', () => {
        test('is ordered left, top, right, bottom', () => {
            expect(new EdgeInsets(10, 20, 30, 40).toArgs()).toEqual([30, 10, 40, 20]);
        });

        test('fromArgs reads the same order', () => {
            expect(EdgeInsets.fromArgs([30, 10, 40, 20]).toJSON()).toEqual({top: 10, bottom: 20, left: 30, right: 40});
        });

        test('fromArgs rejects other shapes', () => {
            expect(() => EdgeInsets.fromArgs([1, 2, 3])).toThrow(UnsupportedShapeError);
            expect(() => EdgeInsets.fromArgs([1, 2, 3, -4])).toThrow(UnsupportedShapeError);
            expect(() => EdgeInsets.fromArgs({top: 1})).toThrow(UnsupportedShapeError);
        });
    });
});
