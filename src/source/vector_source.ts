import {Source, tileLocation, tileSourceOptions, type SourceArgs, type TileLocation, type TileSourceOptions} from './source';

export type VectorSourceOptions = TileSourceOptions;

/**
 * A source of vector tiles, described by a TileJSON url or a list of tile url templates.
 */
export class VectorSource extends Source<VectorSourceOptions> {
    readonly location: TileLocation;

    constructor(id: string, location: TileLocation, options: VectorSourceOptions = VectorSource.defaultOptions()) {
        super('vector', id, options, tileSourceOptions);
        this.location = location;
    }

    static defaultOptions(): VectorSourceOptions {
        return {
            scheme: 'xyz',
            maxZoom: 22,
            volatile: false
        };
    }

    _location(): Pick<SourceArgs, 'url' | 'tiles'> {
        return tileLocation(this.id, this.location);
    }
}
