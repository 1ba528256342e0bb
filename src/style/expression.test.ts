import {describe, test, expect} from 'vitest';
import {
    expressionFromJson,
    expressionToJson,
    isKnownOperator,
    parseExpression,
    parseExpressionResult,
    replaceColors,
    serializeExpression
} from './expression';
import {ExpressionParseError} from '../util/bridge_error';

describe('parseExpression', () => {
    test('parses a call', () => {
        expect(parseExpression('["get", "name"]')).toEqual({
            kind: 'call',
            operator: 'get',
            args: [{kind: 'literal', value: 'name'}]
        });
    });

    test('parses nested calls and literal arrays', () => {
        expect(parseExpression(' ["literal", [0, 1]] ')).toEqual({
            kind: 'call',
            operator: 'literal',
            args: [{kind: 'literal', value: [0, 1]}]
        });
    });

    test('returns undefined for strings without brackets', () => {
        expect(parseExpression('red')).toBeUndefined();
        expect(parseExpression('["get", "name"')).toBeUndefined();
        expect(parseExpression('')).toBeUndefined();
    });

    test('returns undefined for malformed bracketed strings', () => {
        expect(parseExpression('[get, name]')).toBeUndefined();
        expect(parseExpression('[1, 2]')).toBeUndefined();
        expect(parseExpression('[]')).toBeUndefined();
    });

    test('passes unknown operators through', () => {
        expect(parseExpression('["not-an-operator", 1]')).toEqual({
            kind: 'call',
            operator: 'not-an-operator',
            args: [{kind: 'literal', value: 1}]
        });
    });
});

describe('parseExpressionResult', () => {
    test('reports why a string is not an expression', () => {
        const result = parseExpressionResult('[1, 2]');
        expect(result.result).toBe('error');
        expect(result.value).toBeInstanceOf(ExpressionParseError);
        expect(result.value).toHaveProperty('message', 'Cannot parse expression [1, 2]: the first element must be an operator name');
    });

    test('reports strings without brackets', () => {
        const result = parseExpressionResult('red');
        expect(result.value).toHaveProperty('message', 'Cannot parse expression red: not enclosed in brackets');
    });
});

describe('serializeExpression', () => {
    test('is the inverse of parseExpression', () => {
        for (const text of [
            '["==", ["get", "name"], "Nepal"]',
            '["interpolate", ["linear"], ["zoom"], 0, 1, 10, ["*", 2, ["get", "size"]]]',
            '["match", ["get", "type"], ["a", "b"], true, false]',
            '["literal", {"x": [1, null]}]'
        ]) {
            const node = parseExpression(text);
            expect(node).toBeDefined();
            if (!node) continue;
            expect(JSON.parse(serializeExpression(node))).toEqual(JSON.parse(text));
        }
    });

    test('writes compact JSON', () => {
        expect(serializeExpression(expressionFromJson(['get', 'name']))).toBe('["get","name"]');
    });
});

describe('expressionFromJson', () => {
    test('turns arrays without a string head into literals', () => {
        expect(expressionFromJson([0, 1])).toEqual({kind: 'literal', value: [0, 1]});
        expect(expressionFromJson({a: 1})).toEqual({kind: 'literal', value: {a: 1}});
    });

    test('round trips through expressionToJson', () => {
        const json = ['case', ['has', 'x'], ['get', 'x'], 0];
        expect(expressionToJson(expressionFromJson(json))).toEqual(json);
    });
});

describe('isKnownOperator', () => {
    test('knows the renderer operators', () => {
        expect(isKnownOperator('get')).toBe(true);
        expect(isKnownOperator('interpolate')).toBe(true);
        expect(isKnownOperator('literal')).toBe(true);
        expect(isKnownOperator('+')).toBe(true);
        expect(isKnownOperator('Open Sans Regular')).toBe(false);
    });
});

describe('replaceColors', () => {
    test('replaces color leaves and keeps the structure', () => {
        expect(replaceColors(['interpolate', ['linear'], ['zoom'], 0, 'red', 10, '#00f'])).toEqual(
            ['interpolate', ['linear'], ['zoom'], 0, 'rgba(255,0,0,1)', 10, 'rgba(0,0,255,1)']
        );
    });

    test('keeps operator heads and other strings', () => {
        expect(replaceColors(['tan', 'add', 'tan', true, null])).toEqual(['tan', 'add', 'rgba(210,180,140,1)', true, null]);
    });
});
