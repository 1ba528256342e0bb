import Point from '@mapbox/point-geometry';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {serializeFilter} from '../style/style_layer';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber, isPlainObject} from '../util/util';

import type {Feature, Geometry, Position} from 'geojson';
import type {FilterSpecification} from '@maplibre/maplibre-gl-style-spec';
import type {ExpressionNode} from '../style/expression';

/**
 * A [Point](https://github.com/mapbox/point-geometry) or an array of two numbers representing `x` and `y` screen coordinates in pixels.
 *
 * @example
 * ```ts
 * let p1 = new Point(-77, 38); // a PointLike which is a Point
 * let p2 = [-77, 38]; // a PointLike which is an array of two numbers
 * ```
 */
export type PointLike = Point | [number, number];

/**
 * What to query: a screen point, a screen rectangle given by two opposite corners,
 * or a geographic position that the renderer projects to the screen first.
 */
export type QueryGeometry =
    {point: PointLike} |
    {rect: [PointLike, PointLike]} |
    {latLng: LatLngLike};

/**
 * Options to pass to query the map for the rendered features
 */
export type QueryRenderedFeaturesOptions = {
    /**
     * Ids of the layers to inspect. All layers are checked when empty or undefined.
     */
    layerIds?: Array<string>;
    /**
     * A filter to limit query results.
     */
    filter?: FilterSpecification | ExpressionNode | string;
};

export type QueryRenderedFeaturesArgs = {
    point?: [number, number];
    rect?: [number, number, number, number];
    latLng?: [number, number] | [number, number, number];
    layerIds: Array<string>;
    filter?: string;
};

/**
 * A feature returned by a rendered-features query.
 */
export type QueriedFeature = {
    /**
     * Id of the source the feature comes from, when the renderer reports it.
     */
    source?: string;
    sourceLayer?: string;
    feature: Feature<Geometry | null>;
    /**
     * The feature state the renderer holds for this feature.
     */
    state: {[key: string]: unknown};
};

/**
 * Builds the query arguments the renderer receives. A filter that is not an expression
 * is left out, with a warning.
 */
export function queryRenderedFeaturesArgs(geometry: QueryGeometry, options: QueryRenderedFeaturesOptions = {}): QueryRenderedFeaturesArgs {
    const args: QueryRenderedFeaturesArgs = {layerIds: options.layerIds ? options.layerIds.slice() : []};
    if ('point' in geometry) {
        const point = Point.convert(geometry.point);
        args.point = [point.x, point.y];
    } else if ('rect' in geometry) {
        const a = Point.convert(geometry.rect[0]);
        const b = Point.convert(geometry.rect[1]);
        args.rect = [Math.min(a.x, b.x), Math.min(a.y, b.y), Math.max(a.x, b.x), Math.max(a.y, b.y)];
    } else {
        args.latLng = LatLng.convert(geometry.latLng).toArgs();
    }
    if (options.filter !== undefined && options.filter !== null) {
        const filter = serializeFilter(options.filter, 'queryRenderedFeatures');
        if (filter !== undefined) args.filter = filter;
    }
    return args;
}

function decodeFeature(wire: unknown): Feature<Geometry | null> {
    let feature = wire;
    if (typeof wire === 'string') {
        try {
            feature = JSON.parse(wire);
        } catch {
            throw new UnsupportedShapeError('a GeoJSON feature', wire);
        }
    }
    if (!isPlainObject(feature) || feature.type !== 'Feature') {
        throw new UnsupportedShapeError('a GeoJSON feature', wire);
    }
    const geometry = feature.geometry;
    if (geometry !== null && !isPlainObject(geometry)) throw new UnsupportedShapeError('a GeoJSON geometry', geometry);
    let properties: {[key: string]: unknown} | null = null;
    if (isPlainObject(feature.properties)) {
        properties = feature.properties;
    } else if (feature.properties !== undefined && feature.properties !== null) {
        throw new UnsupportedShapeError('a map of feature properties', feature.properties);
    }

    const decoded: Feature<Geometry | null> = {
        type: 'Feature',
        geometry: geometry === null ? null : decodeGeometry(geometry),
        properties
    };
    if (typeof feature.id === 'string' || typeof feature.id === 'number') decoded.id = feature.id;
    return decoded;
}

function position(wire: unknown): Position {
    if (!Array.isArray(wire) || wire.length < 2 || !wire.every(isFiniteNumber)) {
        throw new UnsupportedShapeError('a GeoJSON position', wire);
    }
    return wire.slice();
}

function positionList<T>(wire: unknown, item: (value: unknown) => T): Array<T> {
    if (!Array.isArray(wire)) throw new UnsupportedShapeError('a list of positions', wire);
    return wire.map(item);
}

const line = (wire: unknown) => positionList(wire, position);
const lines = (wire: unknown) => positionList(wire, line);

/**
 * Reads a GeoJSON geometry sent by the renderer, as a map or its JSON text.
 *
 * @throws UnsupportedShapeError when `wire` is not a geometry or its coordinates are malformed
 */
export function geometryFromArgs(wire: unknown): Geometry {
    let geometry = wire;
    if (typeof wire === 'string') {
        try {
            geometry = JSON.parse(wire);
        } catch {
            throw new UnsupportedShapeError('a GeoJSON geometry', wire);
        }
    }
    if (!isPlainObject(geometry)) throw new UnsupportedShapeError('a GeoJSON geometry', wire);
    return decodeGeometry(geometry);
}

function decodeGeometry(wire: {[key: string]: unknown}): Geometry {
    const coordinates = wire.coordinates;
    switch (wire.type) {
        case 'Point':
            return {type: 'Point', coordinates: position(coordinates)};
        case 'MultiPoint':
            return {type: 'MultiPoint', coordinates: line(coordinates)};
        case 'LineString':
            return {type: 'LineString', coordinates: line(coordinates)};
        case 'MultiLineString':
            return {type: 'MultiLineString', coordinates: lines(coordinates)};
        case 'Polygon':
            return {type: 'Polygon', coordinates: lines(coordinates)};
        case 'MultiPolygon':
            return {type: 'MultiPolygon', coordinates: positionList(coordinates, lines)};
        case 'GeometryCollection':
            if (!Array.isArray(wire.geometries)) throw new UnsupportedShapeError('a list of geometries', wire.geometries);
            return {
                type: 'GeometryCollection',
                geometries: wire.geometries.map(geometry => {
                    if (!isPlainObject(geometry)) throw new UnsupportedShapeError('a GeoJSON geometry', geometry);
                    return decodeGeometry(geometry);
                })
            };
        default:
            throw new UnsupportedShapeError('a GeoJSON geometry type', wire.type);
    }
}

function optionalString(wire: {[key: string]: unknown}, key: string): string | undefined {
    const value = wire[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new UnsupportedShapeError(`a string for "${key}"`, value);
    return value;
}

/**
 * Reads the features reported by the renderer. Each item is either a GeoJSON feature
 * (as a map or its JSON text) or a map holding it under `feature` together with its
 * `source`, `sourceLayer` and `state`.
 *
 * @throws UnsupportedShapeError when `wire` is not a list or an item is malformed
 */
export function queriedFeaturesFromArgs(wire: unknown): Array<QueriedFeature> {
    if (!Array.isArray(wire)) throw new UnsupportedShapeError('a list of features', wire);
    return wire.map((item): QueriedFeature => {
        if (!isPlainObject(item) || item.feature === undefined) {
            return {feature: decodeFeature(item), state: {}};
        }
        const state = item.state ?? {};
        if (!isPlainObject(state)) throw new UnsupportedShapeError('a feature state map', state);
        const result: QueriedFeature = {feature: decodeFeature(item.feature), state: {...state}};
        const source = optionalString(item, 'source');
        if (source !== undefined) result.source = source;
        const sourceLayer = optionalString(item, 'sourceLayer') ?? optionalString(item, 'source-layer');
        if (sourceLayer !== undefined) result.sourceLayer = sourceLayer;
        return result;
    });
}
