import {LatLngBounds} from '../geo/lat_lng_bounds';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber} from '../util/util';
import {warnDropped} from '../style/properties';

import type {LatLngBoundsArgs} from '../geo/lat_lng_bounds';
import type {LatLngQuadArgs} from '../geo/lat_lng_quad';

export type SourceType = 'geojson' | 'vector' | 'raster' | 'raster-dem' | 'image';

type SourceOptionDefinition = {
    key: string;
    type: 'integer' | 'number' | 'boolean' | 'string' | 'enum' | 'bounds';
    values?: ReadonlyArray<string>;
};

/**
 * One definition per option of a source kind, keyed by the option's name.
 */
export type SourceOptionTable<O> = {
    readonly [K in keyof O & string]-?: SourceOptionDefinition;
};

export type SourceOptionValue = number | boolean | string | LatLngBoundsArgs;

/**
 * The wire form of a source.
 */
export type SourceArgs = {
    type: SourceType;
    sourceId: string;
    url?: string;
    data?: string;
    tiles?: Array<string>;
    coordinates?: LatLngQuadArgs;
    properties: {[key: string]: SourceOptionValue};
};

function encodeOption(value: unknown, definition: SourceOptionDefinition): SourceOptionValue | undefined {
    switch (definition.type) {
        case 'integer':
            return Number.isInteger(value) && isFiniteNumber(value) ? value : undefined;
        case 'number':
            return isFiniteNumber(value) ? value : undefined;
        case 'boolean':
            return typeof value === 'boolean' ? value : undefined;
        case 'string':
            return typeof value === 'string' ? value : undefined;
        case 'enum':
            return typeof value === 'string' && (definition.values || []).includes(value) ? value : undefined;
        case 'bounds':
            return value instanceof LatLngBounds ? value.toArgs() : undefined;
    }
}

/**
 * Converts source options into the `properties` map of the wire format. Absent options are
 * omitted and so are options of the wrong type, after a warning.
 */
export function serializeSourceOptions(
    options: {readonly [name: string]: unknown},
    table: {readonly [name: string]: SourceOptionDefinition},
    context: string
): {[key: string]: SourceOptionValue} {
    const properties: {[key: string]: SourceOptionValue} = {};
    for (const name of Object.keys(table)) {
        const definition = table[name];
        const value = options[name];
        if (value === undefined || value === null) continue;
        const encoded = encodeOption(value, definition);
        if (encoded === undefined) {
            warnDropped(context, definition.key, new UnsupportedShapeError(definition.type, value));
        } else {
            properties[definition.key] = encoded;
        }
    }
    return properties;
}

/**
 * Options shared by tiled sources.
 */
export type TileSourceOptions = {
    bounds?: LatLngBounds;
    minZoom?: number;
    maxZoom?: number;
    scheme?: 'xyz' | 'tms';
    attribution?: string;
    /**
     * Whether tiles are dropped from the cache when the renderer is recreated.
     */
    volatile?: boolean;
    prefetchZoomDelta?: number;
    minimumTileUpdateInterval?: number;
    maxOverScaleFactorForParentTiles?: number;
};

export const tileSourceOptions: SourceOptionTable<TileSourceOptions> = {
    bounds: {key: 'bounds', type: 'bounds'},
    minZoom: {key: 'minzoom', type: 'integer'},
    maxZoom: {key: 'maxzoom', type: 'integer'},
    scheme: {key: 'scheme', type: 'enum', values: ['xyz', 'tms']},
    attribution: {key: 'attribution', type: 'string'},
    volatile: {key: 'volatile', type: 'boolean'},
    prefetchZoomDelta: {key: 'prefetchZoomDelta', type: 'integer'},
    minimumTileUpdateInterval: {key: 'minimumTileUpdateInterval', type: 'number'},
    maxOverScaleFactorForParentTiles: {key: 'maxOverScaleFactorForParentTiles', type: 'integer'}
};

/**
 * Where a tiled source loads its tiles from: a TileJSON url, or a list of tile url templates.
 */
export type TileLocation = {url: string; tiles?: undefined} | {url?: undefined; tiles: Array<string>};

/**
 * A base class for sources
 */
export abstract class Source<O extends {readonly [name: string]: unknown} = {readonly [name: string]: unknown}> {
    readonly type: SourceType;
    /**
     * The id for the source. Must not be used by any existing source.
     */
    readonly id: string;
    readonly options: O;
    readonly _table: {readonly [name: string]: SourceOptionDefinition};

    constructor(type: SourceType, id: string, options: O, table: {readonly [name: string]: SourceOptionDefinition}) {
        this.type = type;
        this.id = id;
        this.options = options;
        this._table = table;
    }

    /**
     * Converts the source into the map the renderer receives.
     */
    serialize(): SourceArgs {
        return {
            type: this.type,
            sourceId: this.id,
            ...this._location(),
            properties: serializeSourceOptions(this.options, this._table, `sources.${this.id}`)
        };
    }

    abstract _location(): Pick<SourceArgs, 'url' | 'data' | 'tiles' | 'coordinates'>;
}

/**
 * Returns the url or tiles of a tiled source, checking that exactly one is given.
 */
export function tileLocation(id: string, location: TileLocation): Pick<SourceArgs, 'url' | 'tiles'> {
    if (location.url !== undefined) return {url: location.url};
    if (location.tiles.length === 0) {
        throw new Error(`Source "${id}" needs a url or at least one tile url template`);
    }
    return {tiles: location.tiles.slice()};
}
