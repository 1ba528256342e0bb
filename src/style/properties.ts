import {encodePropertyValue, toPropertyValue, type PropertyDefinition, type PropertyType, type WireValue} from './property_value';
import {StyleTransition, type TransitionArgs} from './style_transition';
import {UnsupportedShapeError} from '../util/bridge_error';
import {config} from '../util/config';
import {warnOnce} from '../util/util';

export const TRANSITION_SUFFIX = '-transition';

/**
 * Names of the styling properties declared by a property bag, leaving out the
 * `<name>Transition` companions.
 */
export type PropertyName<P> = Exclude<keyof P & string, `${string}Transition`>;

/**
 * The allow-list of an entity kind: one definition for every styling property it declares.
 * Properties missing from the table are never sent to the renderer.
 */
export type PropertyTable<P> = {
    readonly [K in PropertyName<P>]-?: PropertyDefinition;
};

export type WireProperties = {[key: string]: WireValue};

export type SerializedProperties = {
    layout: WireProperties;
    paint: WireProperties;
    transition: {[key: string]: TransitionArgs};
};

type DefinitionOptions = Pick<PropertyDefinition, 'values' | 'transition' | 'wire'>;

export function layoutProperty(key: string, type: PropertyType, options: DefinitionOptions = {}): PropertyDefinition {
    return {key, group: 'layout', type, ...options};
}

export function paintProperty(key: string, type: PropertyType, options: DefinitionOptions = {}): PropertyDefinition {
    return {key, group: 'paint', type, ...options};
}

export function warnDropped(context: string, key: string, error: Error) {
    if (config.WARN_ON_DROPPED_PROPERTIES) {
        warnOnce(`${context}: ignoring "${key}". ${error.message}`);
    }
}

/**
 * Converts a property bag into the `layout`, `paint` and `transition` maps of the wire
 * format, following `table`. Absent values are omitted, and so are values whose shape
 * does not fit the property.
 *
 * @param context - prefix of the warnings printed for dropped values, e.g. the layer id
 */
export function serializeProperties(
    properties: {readonly [name: string]: unknown},
    table: {readonly [name: string]: PropertyDefinition},
    context: string
): SerializedProperties {
    const result: SerializedProperties = {layout: {}, paint: {}, transition: {}};

    for (const name of Object.keys(table)) {
        const definition = table[name];
        const input = properties[name];
        if (input !== undefined && input !== null) {
            const value = toPropertyValue(input, definition);
            if (value) {
                result[definition.group][definition.key] = encodePropertyValue(value, definition);
            } else {
                warnDropped(context, definition.key, new UnsupportedShapeError(definition.type, input));
            }
        }

        const transition = properties[`${name}Transition`];
        if (!definition.transition || transition === undefined || transition === null) continue;
        if (transition instanceof StyleTransition) {
            result.transition[`${definition.key}${TRANSITION_SUFFIX}`] = transition.toArgs();
        } else {
            warnDropped(context, `${definition.key}${TRANSITION_SUFFIX}`, new UnsupportedShapeError('StyleTransition', transition));
        }
    }

    return result;
}
