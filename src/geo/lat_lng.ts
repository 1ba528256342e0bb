import {isFiniteNumber, wrap} from '../util/util';
import {UnsupportedShapeError} from '../util/bridge_error';

/**
 * A {@link LatLng} object, an array of latitude, longitude and optional altitude,
 * or an object with `latitude` and `longitude` properties.
 *
 * @example
 * ```ts
 * let v1 = new LatLng(27.7172, 85.3240);
 * let v2 = [27.7172, 85.3240];
 * let v3 = {latitude: 27.7172, longitude: 85.3240};
 * ```
 */
export type LatLngLike = LatLng | {
    latitude: number;
    longitude: number;
    altitude?: number;
} | [number, number] | [number, number, number];

/**
 * A geographic position in degrees, with an optional altitude in meters.
 *
 * The renderer exchanges positions as `[latitude, longitude]` or
 * `[latitude, longitude, altitude]` arrays, in that order.
 *
 * @example
 * ```ts
 * let ll = new LatLng(27.7172, 85.3240);
 * ll.toArgs(); // = [27.7172, 85.3240]
 * ```
 */
export class LatLng {
    /**
     * Latitude, measured in degrees.
     */
    latitude: number;

    /**
     * Longitude, measured in degrees.
     */
    longitude: number;

    /**
     * Altitude, measured in meters.
     */
    altitude: number | undefined;

    constructor(latitude: number, longitude: number, altitude?: number) {
        if (isNaN(latitude) || isNaN(longitude)) {
            throw new Error(`Invalid LatLng object: (${latitude}, ${longitude})`);
        }
        this.latitude = +latitude;
        this.longitude = +longitude;
        this.altitude = altitude;
        if (this.latitude > 90 || this.latitude < -90) {
            throw new Error('Invalid LatLng latitude value: must be between -90 and 90');
        }
    }

    /**
     * Returns a new `LatLng` object whose longitude is wrapped to the range (-180, 180).
     *
     * @example
     * ```ts
     * let ll = new LatLng(40.7736, 286.0251);
     * ll.wrap().longitude; // = -73.9749
     * ```
     */
    wrap(): LatLng {
        return new LatLng(this.latitude, wrap(this.longitude, -180, 180), this.altitude);
    }

    /**
     * Returns the wire form, `[latitude, longitude]` or `[latitude, longitude, altitude]`.
     */
    toArgs(): [number, number] | [number, number, number] {
        return this.altitude === undefined ?
            [this.latitude, this.longitude] :
            [this.latitude, this.longitude, this.altitude];
    }

    /**
     * @returns The coordinates represented as a string of the format `'LatLng(lat, lng)'`.
     */
    toString(): string {
        return `LatLng(${this.latitude}, ${this.longitude})`;
    }

    /**
     * Converts a {@link LatLngLike} to a `LatLng` object. A `LatLng` is returned unchanged.
     */
    static convert(input: LatLngLike): LatLng {
        if (input instanceof LatLng) {
            return input;
        }
        if (Array.isArray(input)) {
            return new LatLng(input[0], input[1], input.length === 3 ? input[2] : undefined);
        }
        return new LatLng(input.latitude, input.longitude, input.altitude);
    }

    /**
     * Reads a position sent by the renderer.
     *
     * @throws UnsupportedShapeError when `wire` is not an array of two or three numbers or the latitude is out of range
     */
    static fromArgs(wire: unknown): LatLng {
        if (!Array.isArray(wire) || (wire.length !== 2 && wire.length !== 3) || !wire.every(isFiniteNumber)) {
            throw new UnsupportedShapeError('[latitude, longitude, altitude?]', wire);
        }
        const [latitude, longitude, altitude] = wire;
        if (latitude > 90 || latitude < -90) {
            throw new UnsupportedShapeError('a latitude between -90 and 90', latitude);
        }
        return new LatLng(latitude, longitude, altitude);
    }
}
