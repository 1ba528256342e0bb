import {describe, test, expect, afterEach} from 'vitest';
import {StyleTransition} from './style_transition';
import {config} from '../util/config';

describe('StyleTransition', () => {
    afterEach(() => {
        config.DEFAULT_TRANSITION_DURATION = 300;
    });

    test('build uses the defaults', () => {
        expect(StyleTransition.build().toArgs()).toEqual({delay: 0, duration: 300});
        expect(StyleTransition.build({delay: 50}).toArgs()).toEqual({delay: 50, duration: 300});
    });

    test('the default duration follows config', () => {
        config.DEFAULT_TRANSITION_DURATION = 1000;
        expect(StyleTransition.build().duration).toBe(1000);
    });

    test('rejects negative and fractional values', () => {
        expect(() => StyleTransition.build({delay: -1})).toThrow(RangeError);
        expect(() => StyleTransition.build({duration: 1.5})).toThrow(
            'Transition duration must be a non-negative integer number of milliseconds, got 1.5'
        );
    });

    test('is immutable', () => {
        const transition = StyleTransition.build({delay: 100, duration: 500});
        expect(Object.isFrozen(transition)).toBe(true);
        expect(transition.toArgs()).toEqual({delay: 100, duration: 500});
    });
});
