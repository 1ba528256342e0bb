import {namedColors} from './named_colors';
import {InvalidColorError} from '../util/bridge_error';

/**
 * Nearest-name lookups farther than this (Euclidean distance in unit RGB space) report no name.
 */
const CLOSEST_COLOR_THRESHOLD = 0.15;

/**
 * A color described by four channels in the range [0, 1], alpha not premultiplied.
 *
 * @example
 * ```ts
 * const red = parseColor('#f00');
 * red.toString(); // = 'rgba(255,0,0,1)'
 * ```
 */
export class RgbaColor {
    readonly r: number;
    readonly g: number;
    readonly b: number;
    readonly a: number;

    constructor(r: number, g: number, b: number, a: number = 1) {
        this.r = r;
        this.g = g;
        this.b = b;
        this.a = a;
        Object.freeze(this);
    }

    static black = new RgbaColor(0, 0, 0, 1);
    static white = new RgbaColor(1, 1, 1, 1);
    static transparent = new RgbaColor(0, 0, 0, 0);

    /**
     * Returns the wire form of the color, `rgba(r,g,b,a)` with 0-255 color channels.
     *
     * @example
     * ```ts
     * new RgbaColor(1, 0.5, 0, 0.25).toString(); // = 'rgba(255,128,0,0.25)'
     * ```
     */
    toString(): string {
        return `rgba(${toByte(this.r)},${toByte(this.g)},${toByte(this.b)},${this.a})`;
    }

    /**
     * Returns `#rrggbb`, or `#rrggbbaa` when the color is not fully opaque.
     */
    toHexString(): string {
        const channels = [this.r, this.g, this.b];
        if (this.a < 1) channels.push(this.a);
        return `#${channels.map(c => toByte(c).toString(16).padStart(2, '0')).join('')}`;
    }

    equals(other: RgbaColor): boolean {
        return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
    }
}

function toByte(channel: number): number {
    return Math.round(Math.min(Math.max(channel, 0), 1) * 255);
}

function parseHex(text: string): RgbaColor | undefined {
    let hex = text.startsWith('#') ? text.slice(1) : text;
    if (!/^[0-9a-f]+$/.test(hex)) return undefined;
    if (hex.length === 3 || hex.length === 4) {
        hex = hex.split('').map(digit => digit + digit).join('');
    }
    if (hex.length !== 6 && hex.length !== 8) return undefined;

    const channel = (index: number) => parseInt(hex.slice(index * 2, index * 2 + 2), 16) / 255;
    return new RgbaColor(channel(0), channel(1), channel(2), hex.length === 8 ? channel(3) : 1);
}

const channelPattern = String.raw`([\d.]+(?:e[-+]?\d+)?)`;
const functionalPattern = new RegExp(String.raw`^rgba?\(\s*${channelPattern}\s*,\s*${channelPattern}\s*,\s*${channelPattern}\s*(?:,\s*${channelPattern}\s*)?\)$`);

function parseFunctional(text: string): RgbaColor | undefined {
    const match = functionalPattern.exec(text);
    if (!match) return undefined;
    const [r, g, b] = [match[1], match[2], match[3]].map(Number);
    const a = match[4] === undefined ? 1 : Number(match[4]);
    if ([r, g, b].some(c => !(c >= 0 && c <= 255)) || !(a >= 0 && a <= 1)) return undefined;
    return new RgbaColor(r / 255, g / 255, b / 255, a);
}

function parsePacked(value: number): RgbaColor | undefined {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0xFFFFFFFF) return undefined;
    // signed 32-bit ARGB values coming from native code wrap around to their unsigned form
    const packed = value >>> 0;
    const a = packed > 0xFFFFFF ? (packed >>> 24) / 255 : 1;
    return new RgbaColor(
        ((packed >>> 16) & 0xff) / 255,
        ((packed >>> 8) & 0xff) / 255,
        (packed & 0xff) / 255,
        a
    );
}

function namedColor(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(namedColors, name) ? namedColors[name] : undefined;
}

/**
 * Whether `text` is a color name or a `#`-prefixed hex color. Bare hex digits such as
 * `'add'` or `'fade'` are valid colors for {@link parseColor} but not color literals.
 */
export function isColorLiteral(text: string): boolean {
    const normalized = text.trim().toLowerCase();
    if (namedColor(normalized) !== undefined) return true;
    return normalized.startsWith('#') && parseHex(normalized) !== undefined;
}

/**
 * Resolves a color name, a hex string (`#RGB`, `#RGBA`, `#RRGGBB` or `#RRGGBBAA`, the `#`
 * being optional), an `rgb()`/`rgba()` string or a packed integer to an {@link RgbaColor}.
 *
 * Packed integers are read as `0xRRGGBB` with full opacity when they fit in 24 bits,
 * and as `0xAARRGGBB` otherwise.
 *
 * @param input - the color to parse
 * @param fallback - returned instead of `undefined` when the input is not a color
 */
export function parseColor(input: unknown): RgbaColor | undefined;
export function parseColor(input: unknown, fallback: RgbaColor): RgbaColor;
export function parseColor(input: unknown, fallback?: RgbaColor): RgbaColor | undefined {
    if (input instanceof RgbaColor) return input;
    if (typeof input === 'number') return parsePacked(input) ?? fallback;
    if (typeof input !== 'string') return fallback;

    const text = input.trim().toLowerCase();
    const named = namedColor(text);
    if (named !== undefined) return parseHex(named.toLowerCase()) ?? fallback;
    return parseHex(text) ?? parseFunctional(text) ?? fallback;
}

/**
 * Same as {@link parseColor} but throws an `InvalidColorError` when the input is not a color.
 */
export function parseColorOrThrow(input: unknown): RgbaColor {
    const color = parseColor(input);
    if (!color) throw new InvalidColorError(input);
    return color;
}

const palette: Array<[string, RgbaColor]> = Object.keys(namedColors).map(name => [name, parseColorOrThrow(name)]);

/**
 * Returns the name of the dictionary color nearest to `color`, or `undefined` when even
 * the nearest one is not within the lookup threshold. Alpha is ignored.
 */
export function closestColorName(color: RgbaColor): string | undefined {
    let closest: string | undefined;
    let closestDistance = Infinity;
    for (const [name, candidate] of palette) {
        const distance = Math.hypot(color.r - candidate.r, color.g - candidate.g, color.b - candidate.b);
        if (distance < closestDistance) {
            closest = name;
            closestDistance = distance;
        }
    }
    return closestDistance < CLOSEST_COLOR_THRESHOLD ? closest : undefined;
}
