import {expressions} from '@maplibre/maplibre-gl-style-spec';
import {isColorLiteral, parseColor} from './color';
import {ExpressionParseError} from '../util/bridge_error';
import {isPlainObject} from '../util/util';

export type JsonValue = null | boolean | number | string | JsonValue[] | {[key: string]: JsonValue};

/**
 * A node of the expression language: either a bare JSON value or an operator call.
 */
export type ExpressionNode = {
    kind: 'literal';
    value: JsonValue;
} | {
    kind: 'call';
    operator: string;
    args: Array<ExpressionNode>;
};

/**
 * The JSON form of an operator call, `[operator, ...args]`.
 */
export type ExpressionJson = [string, ...Array<JsonValue>];

export type ExpressionParseResult = {
    result: 'success';
    value: ExpressionNode;
} | {
    result: 'error';
    value: ExpressionParseError;
};

const operatorNames = new Set(Object.keys(expressions));

/**
 * Whether `name` is an operator known to the renderer's expression language.
 * The codec itself accepts unknown operators; this is only used to tell
 * string lists apart from expressions.
 */
export function isKnownOperator(name: string): boolean {
    return operatorNames.has(name);
}

/**
 * Validates that `value` only consists of JSON data, returning it typed as such.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (Array.isArray(value)) {
        const items: Array<JsonValue> = [];
        for (const item of value) {
            const json = toJsonValue(item);
            if (json === undefined) return undefined;
            items.push(json);
        }
        return items;
    }
    if (isPlainObject(value)) {
        const result: {[key: string]: JsonValue} = {};
        for (const key of Object.keys(value)) {
            const json = toJsonValue(value[key]);
            if (json === undefined) return undefined;
            result[key] = json;
        }
        return result;
    }
    return undefined;
}

export function isExpressionJson(value: unknown): value is ExpressionJson {
    return Array.isArray(value) && value.length > 0 && typeof value[0] === 'string';
}

/**
 * Builds an expression tree from its JSON form. Arrays whose first element is a string
 * become calls; every other value, including arrays starting with a number and objects,
 * becomes a literal.
 */
export function expressionFromJson(json: JsonValue): ExpressionNode {
    if (isExpressionJson(json)) {
        const [operator, ...args] = json;
        return {kind: 'call', operator, args: args.map(expressionFromJson)};
    }
    return {kind: 'literal', value: json};
}

export function expressionToJson(node: ExpressionNode): JsonValue {
    if (node.kind === 'literal') return node.value;
    return [node.operator, ...node.args.map(expressionToJson)];
}

/**
 * Parses the string form of an expression.
 *
 * Only strings that start with `[` and end with `]` once trimmed are considered.
 * The operator itself is not validated.
 */
export function parseExpressionResult(text: string): ExpressionParseResult {
    const trimmed = text.trim();
    if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
        return {result: 'error', value: new ExpressionParseError(text, 'not enclosed in brackets')};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch (e) {
        return {result: 'error', value: new ExpressionParseError(text, e instanceof Error ? e.message : String(e))};
    }

    const json = toJsonValue(parsed);
    if (!isExpressionJson(json)) {
        return {result: 'error', value: new ExpressionParseError(text, 'the first element must be an operator name')};
    }
    return {result: 'success', value: expressionFromJson(json)};
}

/**
 * Same as {@link parseExpressionResult}, returning `undefined` for anything that is not an expression.
 *
 * @example
 * ```ts
 * parseExpression('["get", "name"]'); // = {kind: 'call', operator: 'get', args: [{kind: 'literal', value: 'name'}]}
 * parseExpression('red'); // = undefined
 * ```
 */
export function parseExpression(text: string): ExpressionNode | undefined {
    const parsed = parseExpressionResult(text);
    return parsed.result === 'success' ? parsed.value : undefined;
}

export function serializeExpression(node: ExpressionNode): string {
    return JSON.stringify(expressionToJson(node));
}

/**
 * Replaces the color names and `#`-prefixed hex strings inside an expression with their
 * `rgba(...)` form. Operator names, numbers, booleans and objects are left untouched.
 */
export function replaceColors(json: JsonValue): JsonValue {
    if (isExpressionJson(json)) {
        const [operator, ...args] = json;
        return [operator, ...args.map(replaceColors)];
    }
    if (Array.isArray(json)) return json.map(replaceColors);
    if (typeof json === 'string' && isColorLiteral(json)) {
        return parseColor(json)?.toString() ?? json;
    }
    return json;
}
