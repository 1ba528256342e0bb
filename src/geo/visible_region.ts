import {LatLng} from './lat_lng';
import {LatLngBounds} from './lat_lng_bounds';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isPlainObject} from '../util/util';

/**
 * The area of the map currently on screen. With a tilted camera the four corners
 * form a trapezoid; `bounds` is the smallest box around them.
 */
export type VisibleRegion = {
    farLeft?: LatLng;
    farRight?: LatLng;
    nearLeft?: LatLng;
    nearRight?: LatLng;
    bounds: LatLngBounds;
};

function corner(wire: {[key: string]: unknown}, snakeKey: string, camelKey: string): LatLng | undefined {
    const value = wire[snakeKey] ?? wire[camelKey];
    return value === undefined || value === null ? undefined : LatLng.fromArgs(value);
}

/**
 * Reads a visible region reported by the renderer. Corners are accepted under both
 * `far_left` and `farLeft` style keys.
 *
 * @throws UnsupportedShapeError when `wire` is not a map, has no bounds, or holds a malformed position
 */
export function visibleRegionFromArgs(wire: unknown): VisibleRegion {
    if (!isPlainObject(wire)) throw new UnsupportedShapeError('a visible region map', wire);
    return {
        farLeft: corner(wire, 'far_left', 'farLeft'),
        farRight: corner(wire, 'far_right', 'farRight'),
        nearLeft: corner(wire, 'near_left', 'nearLeft'),
        nearRight: corner(wire, 'near_right', 'nearRight'),
        bounds: LatLngBounds.fromArgs(wire.bounds)
    };
}
