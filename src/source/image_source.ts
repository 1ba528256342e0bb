import {Source, type SourceArgs, type SourceOptionTable} from './source';

import type {LatLngQuad} from '../geo/lat_lng_quad';

export type ImageSourceOptions = {
    prefetchZoomDelta?: number;
};

export const imageSourceOptions: SourceOptionTable<ImageSourceOptions> = {
    prefetchZoomDelta: {key: 'prefetchZoomDelta', type: 'integer'}
};

/**
 * A source holding one image, pinned to the map by its four corners.
 *
 * @example
 * ```ts
 * const source = new ImageSource('radar', 'https://example.com/radar.gif', new LatLngQuad(
 *     [46.437, -80.425],
 *     [46.437, -71.516],
 *     [37.936, -71.516],
 *     [37.936, -80.425]
 * ));
 * ```
 */
export class ImageSource extends Source<ImageSourceOptions> {
    readonly url: string;
    readonly coordinates: LatLngQuad;

    constructor(id: string, url: string, coordinates: LatLngQuad, options: ImageSourceOptions = ImageSource.defaultOptions()) {
        super('image', id, options, imageSourceOptions);
        this.url = url;
        this.coordinates = coordinates;
    }

    static defaultOptions(): ImageSourceOptions {
        return {prefetchZoomDelta: 4};
    }

    _location(): Pick<SourceArgs, 'url' | 'coordinates'> {
        return {url: this.url, coordinates: this.coordinates.toArgs()};
    }
}
