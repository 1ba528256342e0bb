import {LatLng, type LatLngLike} from './lat_lng';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber, isPlainObject} from '../util/util';

/**
 * The wire form of {@link LatLngBounds}.
 */
export type LatLngBoundsArgs = {
    southwest: [number, number] | [number, number, number];
    northeast: [number, number] | [number, number, number];
};

/**
 * A geographical bounding box defined by its southwest and northeast corners.
 *
 * @example
 * ```ts
 * let bounds = LatLngBounds.fromBBox([80.0, 26.3, 88.2, 30.5]);
 * bounds.contains(new LatLng(27.7172, 85.3240)); // = true
 * ```
 */
export class LatLngBounds {
    readonly southwest: LatLng;
    readonly northeast: LatLng;

    constructor(southwest: LatLngLike, northeast: LatLngLike) {
        this.southwest = LatLng.convert(southwest);
        this.northeast = LatLng.convert(northeast);
    }

    /**
     * Builds bounds from a `[west, south, east, north]` bounding box.
     */
    static fromBBox(bbox: [number, number, number, number]): LatLngBounds {
        const [west, south, east, north] = bbox;
        return new LatLngBounds(new LatLng(south, west), new LatLng(north, east));
    }

    getCenter(): LatLng {
        return new LatLng(
            (this.southwest.latitude + this.northeast.latitude) / 2,
            (this.southwest.longitude + this.northeast.longitude) / 2
        );
    }

    /**
     * Whether the point lies within the bounds. Bounds crossing the antimeridian
     * (west greater than east) are supported.
     */
    contains(latLng: LatLngLike): boolean {
        const {latitude, longitude} = LatLng.convert(latLng);
        const containsLatitude = this.southwest.latitude <= latitude && latitude <= this.northeast.latitude;
        const west = this.southwest.longitude;
        const east = this.northeast.longitude;
        const containsLongitude = west <= east ?
            west <= longitude && longitude <= east :
            west <= longitude || longitude <= east;
        return containsLatitude && containsLongitude;
    }

    toBBox(): [number, number, number, number] {
        return [this.southwest.longitude, this.southwest.latitude, this.northeast.longitude, this.northeast.latitude];
    }

    toArgs(): LatLngBoundsArgs {
        return {southwest: this.southwest.toArgs(), northeast: this.northeast.toArgs()};
    }

    /**
     * Reads bounds sent by the renderer, either as a `[west, south, east, north]` array
     * or as a `{southwest, northeast}` map of positions.
     *
     * @throws UnsupportedShapeError when `wire` has neither shape
     */
    static fromArgs(wire: unknown): LatLngBounds {
        if (Array.isArray(wire)) {
            if (wire.length !== 4 || !wire.every(isFiniteNumber)) {
                throw new UnsupportedShapeError('[west, south, east, north]', wire);
            }
            const [west, south, east, north] = wire;
            return LatLngBounds.fromBBox([west, south, east, north]);
        }
        if (isPlainObject(wire)) {
            return new LatLngBounds(LatLng.fromArgs(wire.southwest), LatLng.fromArgs(wire.northeast));
        }
        throw new UnsupportedShapeError('lat/lng bounds', wire);
    }
}
