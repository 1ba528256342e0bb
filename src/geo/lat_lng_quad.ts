import {LatLng, type LatLngLike} from './lat_lng';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isPlainObject} from '../util/util';

export type LatLngQuadArgs = {
    top_left: [number, number] | [number, number, number];
    top_right: [number, number] | [number, number, number];
    bottom_right: [number, number] | [number, number, number];
    bottom_left: [number, number] | [number, number, number];
};

/**
 * Four corners of a possibly non-rectangular area, listed clockwise from the top left.
 * Used to place image sources.
 */
export class LatLngQuad {
    readonly topLeft: LatLng;
    readonly topRight: LatLng;
    readonly bottomRight: LatLng;
    readonly bottomLeft: LatLng;

    constructor(topLeft: LatLngLike, topRight: LatLngLike, bottomRight: LatLngLike, bottomLeft: LatLngLike) {
        this.topLeft = LatLng.convert(topLeft);
        this.topRight = LatLng.convert(topRight);
        this.bottomRight = LatLng.convert(bottomRight);
        this.bottomLeft = LatLng.convert(bottomLeft);
    }

    toArgs(): LatLngQuadArgs {
        return {
            top_left: this.topLeft.toArgs(),
            top_right: this.topRight.toArgs(),
            bottom_right: this.bottomRight.toArgs(),
            bottom_left: this.bottomLeft.toArgs()
        };
    }

    /**
     * Reads a quad from `[topLeft, topRight, bottomRight, bottomLeft]` or from the map produced by {@link LatLngQuad#toArgs}.
     *
     * @throws UnsupportedShapeError when `wire` has neither shape
     */
    static fromArgs(wire: unknown): LatLngQuad {
        if (Array.isArray(wire) && wire.length === 4) {
            const [topLeft, topRight, bottomRight, bottomLeft] = wire.map(corner => LatLng.fromArgs(corner));
            return new LatLngQuad(topLeft, topRight, bottomRight, bottomLeft);
        }
        if (isPlainObject(wire)) {
            return new LatLngQuad(
                LatLng.fromArgs(wire.top_left),
                LatLng.fromArgs(wire.top_right),
                LatLng.fromArgs(wire.bottom_right),
                LatLng.fromArgs(wire.bottom_left)
            );
        }
        throw new UnsupportedShapeError('four corner positions', wire);
    }
}
