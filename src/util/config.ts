/**
 * This is a global config object used to store the configuration
 * shared by the codecs and serializers.
 * Only serializable data should be stored in it.
 */
type Config = {
    /**
     * Duration in milliseconds used by `StyleTransition.build` when none is given.
     */
    DEFAULT_TRANSITION_DURATION: number;
    /**
     * When enabled, named and `#`-prefixed hex colors inside expressions given for
     * color properties are replaced by their `rgba(...)` form before serialization.
     */
    RESOLVE_EXPRESSION_COLORS: boolean;
    /**
     * Print a one-time warning whenever a property value is dropped because its
     * shape does not match the property.
     */
    WARN_ON_DROPPED_PROPERTIES: boolean;
};

export const config: Config = {
    DEFAULT_TRANSITION_DURATION: 300,
    RESOLVE_EXPRESSION_COLORS: false,
    WARN_ON_DROPPED_PROPERTIES: true
};
