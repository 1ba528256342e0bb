import {Source, tileLocation, tileSourceOptions, type SourceArgs, type SourceOptionTable, type TileLocation, type TileSourceOptions} from './source';

export type RasterSourceOptions = TileSourceOptions & {
    /**
     * Size of a tile in pixels.
     */
    tileSize?: number;
};

export const rasterSourceOptions: SourceOptionTable<RasterSourceOptions> = {
    ...tileSourceOptions,
    tileSize: {key: 'tileSize', type: 'integer'}
};

export class RasterSource extends Source<RasterSourceOptions> {
    readonly location: TileLocation;

    constructor(id: string, location: TileLocation, options: RasterSourceOptions = RasterSource.defaultOptions()) {
        super('raster', id, options, rasterSourceOptions);
        this.location = location;
    }

    static defaultOptions(): RasterSourceOptions {
        return {
            scheme: 'xyz',
            maxZoom: 22,
            volatile: false,
            tileSize: 512
        };
    }

    _location(): Pick<SourceArgs, 'url' | 'tiles'> {
        return tileLocation(this.id, this.location);
    }
}
