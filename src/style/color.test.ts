import {describe, test, expect} from 'vitest';
import {RgbaColor, closestColorName, isColorLiteral, parseColor, parseColorOrThrow} from './color';
import {namedColors} from './named_colors';
import {InvalidColorError} from '../util/bridge_error';

describe('parseColor', () => {
    test('expands short hex', () => {
        expect(parseColor('#f00')).toEqual(new RgbaColor(1, 0, 0, 1));
        expect(parseColor('#f008')).toEqual(new RgbaColor(1, 0, 0, 0x88 / 255));
    });

    test('reads long hex with and without #', () => {
        expect(parseColor('#0000ff')).toEqual(new RgbaColor(0, 0, 1, 1));
        expect(parseColor('00ff00')).toEqual(new RgbaColor(0, 1, 0, 1));
        expect(parseColor('#ff000080')).toEqual(new RgbaColor(1, 0, 0, 128 / 255));
    });

    test('ignores case and surrounding whitespace', () => {
        expect(parseColor('  #FFFFFF ')).toEqual(RgbaColor.white);
        expect(parseColor(' Red ')).toEqual(new RgbaColor(1, 0, 0, 1));
    });

    test('reads rgb() and rgba() strings', () => {
        expect(parseColor('rgba(255,0,0,1)')).toEqual(new RgbaColor(1, 0, 0, 1));
        expect(parseColor('rgb(0, 0, 255)')).toEqual(new RgbaColor(0, 0, 1, 1));
        expect(parseColor('rgba(0,0,0,0.5)')).toEqual(new RgbaColor(0, 0, 0, 0.5));
        expect(parseColor('rgba(300,0,0,1)')).toBeUndefined();
        expect(parseColor('rgba(0,0,0,1e-7)')).toEqual(new RgbaColor(0, 0, 0, 1e-7));
    });

    test('reads packed integers', () => {
        expect(parseColor(0xFF0000)).toEqual(new RgbaColor(1, 0, 0, 1));
        expect(parseColor(0x80FF0000)).toEqual(new RgbaColor(1, 0, 0, 128 / 255));
        // signed form of 0xFF000000
        expect(parseColor(-16777216)).toEqual(RgbaColor.black);
        expect(parseColor(1.5)).toBeUndefined();
    });

    test('rejects invalid input', () => {
        expect(parseColor('notacolor')).toBeUndefined();
        expect(parseColor('#12345')).toBeUndefined();
        expect(parseColor('#ggg')).toBeUndefined();
        expect(parseColor(null)).toBeUndefined();
        expect(parseColor(['red'])).toBeUndefined();
    });

    test('returns the fallback for invalid input', () => {
        expect(parseColor('notacolor', RgbaColor.black)).toBe(RgbaColor.black);
        expect(parseColor('red', RgbaColor.black)).toEqual(new RgbaColor(1, 0, 0, 1));
    });

    test('resolves every named color to its hex value', () => {
        for (const name of Object.keys(namedColors)) {
            expect(parseColor(name)).toEqual(parseColor(namedColors[name]));
        }
    });

    test('hex colors survive the wire form', () => {
        for (const hex of ['#abc', 'abcd', '#a1b2c3', 'a1b2c3d4']) {
            const color = parseColorOrThrow(hex);
            expect(parseColor(color.toString())).toEqual(color);
        }
    });
});

describe('parseColorOrThrow', () => {
    test('throws InvalidColorError', () => {
        expect(() => parseColorOrThrow('nope')).toThrow(InvalidColorError);
        expect(() => parseColorOrThrow('nope')).toThrow('Invalid color: "nope"');
    });
});

describe('RgbaColor', () => {
    test('toString', () => {
        expect(new RgbaColor(1, 0.5, 0, 0.25).toString()).toBe('rgba(255,128,0,0.25)');
        expect(RgbaColor.transparent.toString()).toBe('rgba(0,0,0,0)');
        const faint = parseColor('rgba(0,0,0,0.0000001)');
        expect(faint && parseColor(faint.toString())).toEqual(new RgbaColor(0, 0, 0, 1e-7));
    });

    test('toHexString', () => {
        expect(new RgbaColor(1, 0.5, 0).toHexString()).toBe('#ff8000');
        expect(new RgbaColor(1, 0.5, 0, 0.25).toHexString()).toBe('#ff800040');
    });

    test('is frozen', () => {
        expect(Object.isFrozen(RgbaColor.white)).toBe(true);
    });
});

describe('isColorLiteral', () => {
    test('accepts names and # hex', () => {
        expect(isColorLiteral('Red')).toBe(true);
        expect(isColorLiteral('#add')).toBe(true);
    });

    test('rejects bare hex digits and other words', () => {
        expect(isColorLiteral('add')).toBe(false);
        expect(isColorLiteral('get')).toBe(false);
        expect(isColorLiteral('#12345')).toBe(false);
    });
});

describe('closestColorName', () => {
    test('finds a near color', () => {
        expect(closestColorName(parseColorOrThrow('#fe0000'))).toBe('red');
        expect(closestColorName(parseColorOrThrow('#7f7f7f'))).toBe('gray');
    });

    test('reports the first of two equal names', () => {
        expect(closestColorName(parseColorOrThrow('#00ffff'))).toBe('cyan');
    });

    test('ignores colors outside the threshold', () => {
        expect(closestColorName(new RgbaColor(0.3, 0.6, 0.3))).toBeUndefined();
    });
});
