import {RgbaColor, parseColor} from './color';
import {
    expressionFromJson,
    isExpressionJson,
    isKnownOperator,
    parseExpression,
    replaceColors,
    serializeExpression,
    expressionToJson,
    toJsonValue,
    type ExpressionJson,
    type ExpressionNode,
    type JsonValue
} from './expression';
import {config} from '../util/config';
import {UnsupportedShapeError} from '../util/bridge_error';
import {isFiniteNumber} from '../util/util';

export type Scalar = number | string | boolean | Array<number> | Array<string>;

/**
 * A property value after its runtime shape has been sniffed. Exactly one variant applies.
 */
export type PropertyValue = {
    kind: 'literal';
    value: Scalar;
} | {
    kind: 'color';
    value: RgbaColor;
} | {
    kind: 'expression';
    value: ExpressionNode;
};

/**
 * The value types a property accepts.
 *
 * - `enum` accepts one of the definition's `values`
 * - `colorRamp` only accepts expressions (`heatmap-color`, `line-gradient`)
 */
export type PropertyType = 'number' | 'string' | 'boolean' | 'enum' | 'color' | 'colorRamp' | 'numberArray' | 'stringArray';

export type PropertyDefinition = {
    /**
     * The renderer's name for the property, e.g. `circle-color`.
     */
    key: string;
    group: 'layout' | 'paint';
    type: PropertyType;
    values?: ReadonlyArray<string>;
    /**
     * Whether the property accepts a `<key>-transition` entry.
     */
    transition?: boolean;
    /**
     * Carry list literals as JSON strings instead of native arrays.
     */
    wire?: 'json';
};

export type WireValue = number | string | boolean | Array<number> | Array<string>;

/**
 * Anything the application may pass for a data-driven property: the plain value,
 * an expression tree, or an expression in its JSON or string form.
 */
export type StyleValue<T> = T | ExpressionNode | ExpressionJson;

export type ColorValue = StyleValue<string | number | RgbaColor>;

export function isExpressionNode(input: unknown): input is ExpressionNode {
    if (typeof input !== 'object' || input === null || !('kind' in input)) return false;
    if (input.kind === 'literal') return 'value' in input;
    return input.kind === 'call' && 'operator' in input && typeof input.operator === 'string' &&
        'args' in input && Array.isArray(input.args);
}

function isNumberArray(input: unknown): input is Array<number> {
    return Array.isArray(input) && input.every(isFiniteNumber);
}

function isStringArray(input: unknown): input is Array<string> {
    return Array.isArray(input) && input.every(item => typeof item === 'string');
}

function sniffExpression(input: unknown, definition: PropertyDefinition): ExpressionNode | undefined {
    if (isExpressionNode(input)) return input;
    if (typeof input === 'string') return parseExpression(input);
    if (!isExpressionJson(input)) return undefined;
    // a list of plain strings is a literal unless it starts with an operator name
    if (definition.type === 'stringArray' && !isKnownOperator(input[0])) {
        return undefined;
    }
    const json = toJsonValue(input);
    return json === undefined ? undefined : expressionFromJson(json);
}

function sniffLiteral(input: unknown, definition: PropertyDefinition): Scalar | undefined {
    switch (definition.type) {
        case 'number':
            return isFiniteNumber(input) ? input : undefined;
        case 'boolean':
            return typeof input === 'boolean' ? input : undefined;
        case 'string':
            return typeof input === 'string' ? input : undefined;
        case 'enum':
            return typeof input === 'string' && (definition.values || []).includes(input) ? input : undefined;
        case 'numberArray':
            return isNumberArray(input) ? input.slice() : undefined;
        case 'stringArray':
            return isStringArray(input) ? input.slice() : undefined;
        case 'color':
        case 'colorRamp':
            return undefined;
    }
}

/**
 * Sniffs the runtime shape of `input` once, trying in order: expression, literal of the
 * property's type, color. Returns `undefined` when none applies.
 */
export function toPropertyValue(input: unknown, definition: PropertyDefinition): PropertyValue | undefined {
    if (input === undefined || input === null) return undefined;

    const expression = sniffExpression(input, definition);
    if (expression) return {kind: 'expression', value: expression};

    const literal = sniffLiteral(input, definition);
    if (literal !== undefined) return {kind: 'literal', value: literal};

    if (definition.type === 'color') {
        const color = parseColor(input);
        if (color) return {kind: 'color', value: color};
    }
    return undefined;
}

/**
 * Converts a sniffed value to the form the renderer expects under `definition.key`.
 */
export function encodePropertyValue(value: PropertyValue, definition: PropertyDefinition): WireValue {
    switch (value.kind) {
        case 'literal':
            if (Array.isArray(value.value)) {
                return definition.wire === 'json' ? JSON.stringify(value.value) : value.value.slice();
            }
            return value.value;
        case 'color':
            return value.value.toString();
        case 'expression':
            if (config.RESOLVE_EXPRESSION_COLORS && (definition.type === 'color' || definition.type === 'colorRamp')) {
                return JSON.stringify(replaceColors(expressionToJson(value.value)));
            }
            return serializeExpression(value.value);
    }
}

/**
 * Resolves a color to its wire form, `rgba(r,g,b,a)`.
 */
export function encodeColor(input: unknown): string | undefined {
    return parseColor(input)?.toString();
}

export type ValueShapes = {
    number: number;
    string: string;
    boolean: boolean;
    numberArray: Array<number>;
    stringArray: Array<string>;
    color: RgbaColor;
    expression: ExpressionNode;
};

export type ValueShape = keyof ValueShapes;

const decoders: {[S in ValueShape]: (wire: unknown) => ValueShapes[S] | undefined} = {
    number: wire => isFiniteNumber(wire) ? wire : undefined,
    string: wire => typeof wire === 'string' ? wire : undefined,
    boolean: wire => typeof wire === 'boolean' ? wire : undefined,
    numberArray: wire => isNumberArray(wire) ? wire.slice() : undefined,
    stringArray: wire => isStringArray(wire) ? wire.slice() : undefined,
    color: wire => parseColor(wire),
    expression: wire => {
        if (typeof wire === 'string') return parseExpression(wire);
        const json = toJsonValue(wire);
        return isExpressionJson(json) ? expressionFromJson(json) : undefined;
    }
};

/**
 * Reads a value coming back from the renderer.
 *
 * @throws UnsupportedShapeError when `wire` does not have the expected shape
 */
export function decodeValue<S extends ValueShape>(wire: unknown, shape: S): ValueShapes[S] {
    const decoded = decoders[shape](wire);
    if (decoded === undefined) throw new UnsupportedShapeError(shape, wire);
    return decoded;
}

/**
 * Decodes an `rgba(...)` wire string or packed integer back to a color.
 */
export function decodeColor(wire: unknown): RgbaColor {
    return decodeValue(wire, 'color');
}

/**
 * Reads a JSON-typed value: JSON strings are parsed, anything else is validated as-is.
 */
export function decodeJson(wire: unknown): JsonValue {
    let value: unknown = wire;
    if (typeof wire === 'string') {
        try {
            value = JSON.parse(wire);
        } catch {
            throw new UnsupportedShapeError('JSON', wire);
        }
    }
    const json = toJsonValue(value);
    if (json === undefined) throw new UnsupportedShapeError('JSON', wire);
    return json;
}
