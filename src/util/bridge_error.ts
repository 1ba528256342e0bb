/**
 * Thrown when a color string or integer cannot be resolved to RGBA.
 */
export class InvalidColorError extends Error {
    readonly input: unknown;

    constructor(input: unknown) {
        super(`Invalid color: ${JSON.stringify(input)}`);
        this.name = 'InvalidColorError';
        this.input = input;
    }
}

/**
 * Describes why a bracket-shaped string is not a valid expression.
 */
export class ExpressionParseError extends Error {
    readonly text: string;

    constructor(text: string, reason: string) {
        super(`Cannot parse expression ${text}: ${reason}`);
        this.name = 'ExpressionParseError';
        this.text = text;
    }
}

/**
 * A dynamic value whose runtime type matches none of the shapes expected at that position.
 */
export class UnsupportedShapeError extends Error {
    readonly expected: string;
    readonly value: unknown;

    constructor(expected: string, value: unknown) {
        super(`Expected ${expected} but received ${describeValue(value)}`);
        this.name = 'UnsupportedShapeError';
        this.expected = expected;
        this.value = value;
    }
}

/**
 * Reported by a renderer host when an entity id is already in use.
 */
export class DuplicateEntityIdError extends Error {
    readonly kind: 'layer' | 'source' | 'annotation' | 'image';
    readonly id: string;

    constructor(kind: 'layer' | 'source' | 'annotation' | 'image', id: string) {
        super(`A ${kind} with id "${id}" already exists`);
        this.name = 'DuplicateEntityIdError';
        this.kind = kind;
        this.id = id;
    }
}

/**
 * Wraps an exception thrown by an application listener.
 */
export class ListenerCallbackError extends Error {
    readonly eventType: string;
    readonly listenerError: unknown;

    constructor(eventType: string, listenerError: unknown) {
        super(`Listener for "${eventType}" threw: ${listenerError instanceof Error ? listenerError.message : String(listenerError)}`);
        this.name = 'ListenerCallbackError';
        this.eventType = eventType;
        this.listenerError = listenerError;
    }
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'object' && !Array.isArray(value)) return 'object';
    let json: string | undefined;
    try {
        json = JSON.stringify(value);
    } catch {
        json = undefined;
    }
    const description = Array.isArray(value) ? 'array' : typeof value;
    return json === undefined ? description : `${description} ${json}`;
}
