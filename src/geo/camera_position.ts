import {LatLng} from './lat_lng';
import {EdgeInsets} from './edge_insets';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber, isPlainObject} from '../util/util';

export type CameraPositionArgs = {
    target?: [number, number] | [number, number, number];
    zoom?: number;
    bearing?: number;
    tilt?: number;
    padding: [number, number, number, number];
};

export type CameraPositionOptions = {
    target?: LatLng;
    zoom?: number;
    /**
     * Rotation in degrees, counter-clockwise from north.
     */
    bearing?: number;
    /**
     * Pitch in degrees away from the nadir.
     */
    tilt?: number;
    padding?: EdgeInsets;
};

function optionalNumber(wire: {[key: string]: unknown}, key: string): number | undefined {
    const value = wire[key];
    if (value === undefined || value === null) return undefined;
    if (!isFiniteNumber(value)) throw new UnsupportedShapeError(`a number for "${key}"`, value);
    return value;
}

/**
 * Where the camera is and how it looks at the map.
 */
export class CameraPosition {
    readonly target: LatLng | undefined;
    readonly zoom: number | undefined;
    readonly bearing: number | undefined;
    readonly tilt: number | undefined;
    readonly padding: EdgeInsets;

    constructor(options: CameraPositionOptions = {}) {
        this.target = options.target;
        this.zoom = options.zoom;
        this.bearing = options.bearing;
        this.tilt = options.tilt;
        this.padding = options.padding ?? new EdgeInsets();
    }

    toArgs(): CameraPositionArgs {
        const args: CameraPositionArgs = {padding: this.padding.toArgs()};
        if (this.target) args.target = this.target.toArgs();
        if (this.zoom !== undefined) args.zoom = this.zoom;
        if (this.bearing !== undefined) args.bearing = this.bearing;
        if (this.tilt !== undefined) args.tilt = this.tilt;
        return args;
    }

    /**
     * Reads a camera position reported by the renderer. Missing fields stay undefined and
     * a missing or malformed padding becomes zero padding.
     *
     * @throws UnsupportedShapeError when `wire` is not a map or holds a malformed target or number
     */
    static fromArgs(wire: unknown): CameraPosition {
        if (!isPlainObject(wire)) throw new UnsupportedShapeError('a camera position map', wire);
        return new CameraPosition({
            target: Array.isArray(wire.target) ? LatLng.fromArgs(wire.target) : undefined,
            zoom: optionalNumber(wire, 'zoom'),
            bearing: optionalNumber(wire, 'bearing'),
            tilt: optionalNumber(wire, 'tilt'),
            padding: isPaddingArgs(wire.padding) ? EdgeInsets.fromArgs(wire.padding) : undefined
        });
    }
}

function isPaddingArgs(wire: unknown): boolean {
    return Array.isArray(wire) && wire.length === 4 && wire.every(value => isFiniteNumber(value) && value >= 0);
}
