import {Annotation, type AnnotationArgs, type AnnotationOptions} from './annotation';
import {LatLng, type LatLngLike} from '../geo/lat_lng';
import {symbolProperties, type SymbolStyleProperties} from '../style/style_layer/symbol_style_layer';

import type {PropertyDefinition} from '../style/property_value';
import type {StyleImage} from '../style/style_image';

type SymbolAnnotationLayout =
    'iconAnchor' | 'iconKeepUpright' | 'iconOffset' | 'iconOptional' | 'iconPadding' |
    'iconRotate' | 'iconSize' | 'iconTextFit' | 'iconTextFitPadding' |
    'symbolAvoidEdges' | 'symbolSortKey' |
    'textAnchor' | 'textField' | 'textFont' | 'textIgnorePlacement' | 'textJustify' |
    'textKeepUpright' | 'textLetterSpacing' | 'textLineHeight' | 'textMaxAngle' |
    'textMaxWidth' | 'textOffset' | 'textOptional' | 'textPadding' | 'textRadialOffset' |
    'textRotate' | 'textSize' | 'textTransform' | 'textWritingMode';

type SymbolAnnotationPaint =
    'iconColor' | 'iconHaloBlur' | 'iconHaloColor' | 'iconHaloWidth' | 'iconOpacity' | 'iconTranslate' |
    'textColor' | 'textHaloBlur' | 'textHaloColor' | 'textHaloWidth' | 'textOpacity' | 'textTranslate';

export type SymbolAnnotationProperties = Pick<SymbolStyleProperties,
    SymbolAnnotationLayout | SymbolAnnotationPaint | `${SymbolAnnotationPaint}Transition`
>;

const layoutNames: Array<SymbolAnnotationLayout> = [
    'iconAnchor', 'iconKeepUpright', 'iconOffset', 'iconOptional', 'iconPadding',
    'iconRotate', 'iconSize', 'iconTextFit', 'iconTextFitPadding',
    'symbolAvoidEdges', 'symbolSortKey',
    'textAnchor', 'textField', 'textFont', 'textIgnorePlacement', 'textJustify',
    'textKeepUpright', 'textLetterSpacing', 'textLineHeight', 'textMaxAngle',
    'textMaxWidth', 'textOffset', 'textOptional', 'textPadding', 'textRadialOffset',
    'textRotate', 'textSize', 'textTransform', 'textWritingMode'
];

const paintNames: Array<SymbolAnnotationPaint> = [
    'iconColor', 'iconHaloBlur', 'iconHaloColor', 'iconHaloWidth', 'iconOpacity', 'iconTranslate',
    'textColor', 'textHaloBlur', 'textHaloColor', 'textHaloWidth', 'textOpacity', 'textTranslate'
];

export const symbolAnnotationProperties: {readonly [name: string]: PropertyDefinition} =
    Object.fromEntries([...layoutNames, ...paintNames].map(name => [name, symbolProperties[name]]));

/**
 * An icon and/or a label drawn at one position.
 *
 * @example
 * ```ts
 * const pin = new NetworkStyleImage('pin', 'https://example.com/pin.png');
 * const annotation = new SymbolAnnotation([27.7172, 85.3240], {textField: 'Kathmandu'}, {image: pin});
 * ```
 */
export class SymbolAnnotation extends Annotation<SymbolAnnotationProperties> {
    readonly point: LatLng;
    /**
     * Image drawn as the icon. It must be added to the style for the icon to show.
     */
    readonly image: StyleImage | undefined;

    constructor(point: LatLngLike, properties: SymbolAnnotationProperties = {}, options: AnnotationOptions & {image?: StyleImage} = {}) {
        super('symbol', properties, symbolAnnotationProperties, options);
        this.point = LatLng.convert(point);
        this.image = options.image;
    }

    serialize(): AnnotationArgs {
        const args = super.serialize();
        if (this.image) args.layout['icon-image'] = this.image.id;
        return args;
    }

    _geometry(): Pick<AnnotationArgs, 'point'> {
        return {point: this.point.toArgs()};
    }
}
