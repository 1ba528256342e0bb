import {serializeProperties, type SerializedProperties} from '../style/properties';
import {uniqueId} from '../util/util';

import type {JsonValue} from '../style/expression';
import type {PropertyDefinition} from '../style/property_value';

export type AnnotationType = 'circle' | 'symbol' | 'polygon' | 'polyline';

type PositionArgs = [number, number] | [number, number, number];

/**
 * Options shared by every annotation kind.
 */
export type AnnotationOptions = {
    /**
     * Identifies the annotation in click and drag events. Generated when left out.
     */
    id?: number;
    /**
     * Whether the annotation can be dragged across the map.
     * @defaultValue false
     */
    draggable?: boolean;
    /**
     * Application data carried with the annotation and handed back in its events.
     */
    data?: {[key: string]: JsonValue};
};

/**
 * The wire form of an annotation.
 */
export type AnnotationArgs = SerializedProperties & {
    type: AnnotationType;
    annotationId: number;
    draggable: boolean;
    data?: {[key: string]: JsonValue};
    point?: PositionArgs;
    points?: Array<PositionArgs> | Array<Array<PositionArgs>>;
};

/**
 * A base class for annotations: shapes drawn above the style, owned by the application
 * rather than a source.
 */
export abstract class Annotation<P extends {readonly [name: string]: unknown} = {readonly [name: string]: unknown}> {
    readonly type: AnnotationType;
    readonly id: number;
    readonly draggable: boolean;
    readonly data: {[key: string]: JsonValue} | undefined;
    readonly properties: P;
    readonly _table: {readonly [name: string]: PropertyDefinition};

    constructor(type: AnnotationType, properties: P, table: {readonly [name: string]: PropertyDefinition}, options: AnnotationOptions) {
        this.type = type;
        this.id = options.id ?? uniqueId();
        this.draggable = options.draggable ?? false;
        this.data = options.data;
        this.properties = properties;
        this._table = table;
    }

    /**
     * Converts the annotation into the map the renderer receives.
     */
    serialize(): AnnotationArgs {
        const args: AnnotationArgs = {
            type: this.type,
            annotationId: this.id,
            draggable: this.draggable,
            ...this._geometry(),
            ...serializeProperties(this.properties, this._table, `annotations.${this.id}`)
        };
        if (this.data !== undefined) args.data = this.data;
        return args;
    }

    abstract _geometry(): Pick<AnnotationArgs, 'point' | 'points'>;
}
