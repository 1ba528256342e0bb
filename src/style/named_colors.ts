/**
 * Color names understood by the color parser, in lookup order.
 * `closestColorName` walks this table top to bottom, so when two names share a
 * value (gray/grey, cyan/aqua) the first one is reported.
 */
export const namedColors: Readonly<{[name: string]: string}> = Object.freeze({
    black: '#000000',
    white: '#FFFFFF',
    red: '#FF0000',
    green: '#008000',
    blue: '#0000FF',
    yellow: '#FFFF00',
    purple: '#800080',
    orange: '#FFA500',
    gray: '#808080',
    grey: '#808080',
    pink: '#FFC0CB',
    brown: '#A52A2A',
    cyan: '#00FFFF',
    magenta: '#FF00FF',
    lime: '#00FF00',
    navy: '#000080',
    teal: '#008080',
    olive: '#808000',
    maroon: '#800000',
    silver: '#C0C0C0',
    indigo: '#4B0082',
    violet: '#EE82EE',
    tan: '#D2B48C',
    aqua: '#00FFFF',
    gold: '#FFD700',
    coral: '#FF7F50',
    salmon: '#FA8072',
    khaki: '#F0E68C',
    turquoise: '#40E0D0'
});
