import {Source, type SourceArgs, type SourceOptionTable} from './source';

import type {GeoJSON} from 'geojson';

export type GeoJSONSourceOptions = {
    minZoom?: number;
    maxZoom?: number;
    /**
     * Size of the tile buffer on each side, in pixels at tile extent 512.
     */
    buffer?: number;
    lineMetrics?: boolean;
    /**
     * Douglas-Peucker simplification tolerance.
     */
    tolerance?: number;
    cluster?: boolean;
    clusterRadius?: number;
    clusterMaxZoom?: number;
};

export const geoJSONSourceOptions: SourceOptionTable<GeoJSONSourceOptions> = {
    minZoom: {key: 'minzoom', type: 'integer'},
    maxZoom: {key: 'maxzoom', type: 'integer'},
    buffer: {key: 'buffer', type: 'integer'},
    lineMetrics: {key: 'lineMetrics', type: 'boolean'},
    tolerance: {key: 'tolerance', type: 'number'},
    cluster: {key: 'cluster', type: 'boolean'},
    clusterRadius: {key: 'clusterRadius', type: 'integer'},
    clusterMaxZoom: {key: 'clusterMaxZoom', type: 'integer'}
};

/**
 * Where a GeoJSON source reads its data: inline GeoJSON (an object or its JSON text) or a url.
 */
export type GeoJSONSourceData = {data: GeoJSON | string; url?: undefined} | {url: string; data?: undefined};

/**
 * A source holding GeoJSON features.
 *
 * @example
 * ```ts
 * const source = new GeoJSONSource('earthquakes', {url: 'https://example.com/earthquakes.geojson'}, {cluster: true});
 * ```
 */
export class GeoJSONSource extends Source<GeoJSONSourceOptions> {
    readonly data: GeoJSONSourceData;

    constructor(id: string, data: GeoJSONSourceData, options: GeoJSONSourceOptions = GeoJSONSource.defaultOptions()) {
        super('geojson', id, options, geoJSONSourceOptions);
        if (data.url === undefined && data.data === undefined) {
            throw new Error(`Source "${id}" needs data or a url`);
        }
        this.data = data;
    }

    static defaultOptions(): GeoJSONSourceOptions {
        return {
            cluster: false,
            clusterMaxZoom: 14,
            clusterRadius: 50
        };
    }

    _location(): Pick<SourceArgs, 'url' | 'data'> {
        if (this.data.url !== undefined) return {url: this.data.url};
        const data = this.data.data;
        return {data: typeof data === 'string' ? data : JSON.stringify(data)};
    }
}
