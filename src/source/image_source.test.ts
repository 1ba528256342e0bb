import {describe, test, expect} from 'vitest';
import {ImageSource} from './image_source';
import {LatLngQuad} from '../geo/lat_lng_quad';

describe('ImageSource', () => {
    test('serializes the url and corners', () => {
        const source = new ImageSource('radar', 'https://example.com/radar.gif', new LatLngQuad(
            [46.437, -80.425],
            [46.437, -71.516],
            [37.936, -71.516],
            [37.936, -80.425]
        ));
        expect(source.serialize()).toEqual({
            type: 'image',
            sourceId: 'radar',
            url: 'https://example.com/radar.gif',
            coordinates: {
                top_left: [46.437, -80.425],
                top_right: [46.437, -71.516],
                bottom_right: [37.936, -71.516],
                bottom_left: [37.936, -80.425]
            },
            properties: {prefetchZoomDelta: 4}
        });
    });
});
