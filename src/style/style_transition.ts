import {config} from '../util/config';

export type TransitionOptions = {
    /**
     * Delay before the transition starts, in milliseconds.
     * @defaultValue 0
     */
    delay?: number;
    /**
     * Length of the transition, in milliseconds.
     * @defaultValue `config.DEFAULT_TRANSITION_DURATION`
     */
    duration?: number;
};

export type TransitionArgs = {
    delay: number;
    duration: number;
};

function checkMillis(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`Transition ${name} must be a non-negative integer number of milliseconds, got ${value}`);
    }
    return value;
}

/**
 * Timing of the animation applied when a paint property changes. Immutable once built.
 *
 * @example
 * ```ts
 * const transition = StyleTransition.build({delay: 100, duration: 500});
 * transition.toArgs(); // = {delay: 100, duration: 500}
 * ```
 */
export class StyleTransition {
    readonly delay: number;
    readonly duration: number;

    private constructor(delay: number, duration: number) {
        this.delay = checkMillis('delay', delay);
        this.duration = checkMillis('duration', duration);
        Object.freeze(this);
    }

    static build(options: TransitionOptions = {}): StyleTransition {
        return new StyleTransition(options.delay ?? 0, options.duration ?? config.DEFAULT_TRANSITION_DURATION);
    }

    toArgs(): TransitionArgs {
        return {delay: this.delay, duration: this.duration};
    }
}
