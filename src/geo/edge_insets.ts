import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber} from '../util/util';

/**
 * An `EdgeInsets` object represents screen space padding applied to the edges of the viewport.
 * This shifts the apparent center or the vanishing point of the map.
 */
export class EdgeInsets {
    /**
     * @defaultValue 0
     */
    top: number;
    /**
     * @defaultValue 0
     */
    bottom: number;
    /**
     * @defaultValue 0
     */
    left: number;
    /**
     * @defaultValue 0
     */
    right: number;

    constructor(top: number = 0, bottom: number = 0, left: number = 0, right: number = 0) {
        if (isNaN(top) || top < 0 ||
            isNaN(bottom) || bottom < 0 ||
            isNaN(left) || left < 0 ||
            isNaN(right) || right < 0
        ) {
            throw new Error('Invalid value for edge-insets, top, bottom, left and right must all be numbers');
        }

        this.top = top;
        this.bottom = bottom;
        this.left = left;
        this.right = right;
    }

    equals(other: PaddingOptions): boolean {
        return this.top === other.top &&
            this.bottom === other.bottom &&
            this.left === other.left &&
            this.right === other.right;
    }

    clone(): EdgeInsets {
        return new EdgeInsets(this.top, this.bottom, this.left, this.right);
    }

    toJSON(): PaddingOptions {
        return {
            top: this.top,
            bottom: this.bottom,
            left: this.left,
            right: this.right
        };
    }

    /**
     * Returns the wire form, `[left, top, right, bottom]`.
     */
    toArgs(): [number, number, number, number] {
        return [this.left, this.top, this.right, this.bottom];
    }

    /**
     * Reads `[left, top, right, bottom]` padding sent by the renderer.
     *
     * @throws UnsupportedShapeError when `wire` is not four non-negative numbers
     */
    static fromArgs(wire: unknown): EdgeInsets {
        if (!Array.isArray(wire) || wire.length !== 4 || !wire.every(value => isFiniteNumber(value) && value >= 0)) {
            throw new UnsupportedShapeError('[left, top, right, bottom]', wire);
        }
        const [left, top, right, bottom] = wire;
        return new EdgeInsets(top, bottom, left, right);
    }
}

/**
 * Options for setting padding on calls to camera methods.
 */
export type PaddingOptions = {
    /**
     * Padding in pixels from the top of the map canvas.
     */
    top: number;
    /**
     * Padding in pixels from the bottom of the map canvas.
     */
    bottom: number;
    /**
     * Padding in pixels from the right of the map canvas.
     */
    right: number;
    /**
     * Padding in pixels from the left of the map canvas.
     */
    left: number;
};
