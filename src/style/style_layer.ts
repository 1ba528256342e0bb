import {isExpressionNode, decodeValue, type PropertyDefinition} from './property_value';
import {serializeExpression, type ExpressionNode} from './expression';
import {serializeProperties, warnDropped, type SerializedProperties} from './properties';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber} from '../util/util';

import type {FilterSpecification} from '@maplibre/maplibre-gl-style-spec';

export type LayerType = 'background' | 'circle' | 'fill' | 'fill-extrusion' | 'heatmap' | 'hillshade' | 'line' | 'raster' | 'symbol';

/**
 * Options shared by every layer kind, next to its styling properties.
 */
export type LayerCommonProperties = {
    /**
     * Layer of a vector source to draw.
     */
    sourceLayer?: string;
    /**
     * Expression selecting the features to draw, as a tree, JSON array or JSON string.
     */
    filter?: FilterSpecification | ExpressionNode | string;
    minZoom?: number;
    maxZoom?: number;
    /**
     * @defaultValue 'visible'
     */
    visibility?: 'visible' | 'none';
};

export type LayerProperties = LayerCommonProperties & {readonly [name: string]: unknown};

/**
 * The wire form of a layer.
 */
export type LayerArgs = SerializedProperties & {
    type: LayerType;
    layerId: string;
    sourceId?: string;
    'source-layer'?: string;
    filter?: string;
    minzoom?: number;
    maxzoom?: number;
};

/**
 * Serializes a filter to its JSON string, or returns `undefined` (after a warning) when it
 * is not an expression.
 */
export function serializeFilter(filter: unknown, context: string): string | undefined {
    if (isExpressionNode(filter)) return serializeExpression(filter);
    try {
        return serializeExpression(decodeValue(filter, 'expression'));
    } catch (e) {
        if (!(e instanceof UnsupportedShapeError)) throw e;
        warnDropped(context, 'filter', e);
        return undefined;
    }
}

function checkZoom(value: unknown, key: string, context: string): number | undefined {
    if (value === undefined || value === null) return undefined;
    if (isFiniteNumber(value) && value >= 0 && value <= 24) return value;
    warnDropped(context, key, new UnsupportedShapeError('a zoom level between 0 and 24', value));
    return undefined;
}

/**
 * A base class for style layers
 */
export abstract class StyleLayer<P extends LayerProperties = LayerProperties> {
    readonly id: string;
    readonly type: LayerType;
    readonly source: string | undefined;
    readonly properties: P;
    readonly _table: {readonly [name: string]: PropertyDefinition};

    constructor(type: LayerType, id: string, source: string | undefined, properties: P, table: {readonly [name: string]: PropertyDefinition}) {
        this.id = id;
        this.type = type;
        this.source = source;
        this.properties = properties;
        this._table = table;
    }

    /**
     * Converts the layer into the map the renderer receives.
     */
    serialize(): LayerArgs {
        const context = `layers.${this.id}`;
        const {layout, paint, transition} = serializeProperties(this.properties, this._table, context);
        layout.visibility = this.properties.visibility ?? 'visible';

        const args: LayerArgs = {
            type: this.type,
            layerId: this.id,
            layout,
            paint,
            transition
        };
        if (this.source !== undefined) args.sourceId = this.source;
        if (this.properties.sourceLayer) args['source-layer'] = this.properties.sourceLayer;

        if (this.properties.filter !== undefined && this.properties.filter !== null) {
            const filter = serializeFilter(this.properties.filter, context);
            if (filter !== undefined) args.filter = filter;
        }

        const minzoom = checkZoom(this.properties.minZoom, 'minzoom', context);
        if (minzoom !== undefined) args.minzoom = minzoom;
        const maxzoom = checkZoom(this.properties.maxZoom, 'maxzoom', context);
        if (maxzoom !== undefined) args.maxzoom = maxzoom;

        return args;
    }
}
