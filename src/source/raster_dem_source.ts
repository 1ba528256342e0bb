import {Source, tileLocation, type SourceArgs, type SourceOptionTable, type TileLocation} from './source';
import {rasterSourceOptions, type RasterSourceOptions} from './raster_source';

export type RasterDEMSourceOptions = RasterSourceOptions & {
    /**
     * The encoding used by the elevation tiles.
     */
    encoding?: 'terrarium' | 'mapbox';
    /**
     * Delay in seconds before tiles are requested while the camera moves.
     */
    tileRequestsDelay?: number;
    tileNetworkRequestsDelay?: number;
};

export const rasterDEMSourceOptions: SourceOptionTable<RasterDEMSourceOptions> = {
    ...rasterSourceOptions,
    encoding: {key: 'encoding', type: 'enum', values: ['terrarium', 'mapbox']},
    tileRequestsDelay: {key: 'tileRequestsDelay', type: 'number'},
    tileNetworkRequestsDelay: {key: 'tileNetworkRequestsDelay', type: 'number'}
};

/**
 * A source of elevation tiles, used by hillshade layers.
 */
export class RasterDEMSource extends Source<RasterDEMSourceOptions> {
    readonly location: TileLocation;

    constructor(id: string, location: TileLocation, options: RasterDEMSourceOptions = RasterDEMSource.defaultOptions()) {
        super('raster-dem', id, options, rasterDEMSourceOptions);
        this.location = location;
    }

    static defaultOptions(): RasterDEMSourceOptions {
        return {
            minZoom: 0,
            maxZoom: 22,
            tileSize: 512,
            volatile: false
        };
    }

    _location(): Pick<SourceArgs, 'url' | 'tiles'> {
        return tileLocation(this.id, this.location);
    }
}
