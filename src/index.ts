import packageJSON from '../package.json' with {type: 'json'};
import Point from '@mapbox/point-geometry';
import {MapController, type MapControllerOptions} from './ui/map_controller';
import {ListenerHub, annotationFromArgs} from './ui/listener_hub';
import {
    AnnotationDragEvent,
    AnnotationEvent,
    CameraMoveEvent,
    FpsChangedEvent,
    MapClickEvent,
    MapEvent,
    RotateEvent,
    type AnnotationDescriptor,
    type CameraMoveReason,
    type InteractionPhase,
    type MapEventName,
    type MapEventType
} from './ui/events';
import type {LayerPosition, RendererHost} from './ui/renderer_host';
import {Evented, Event, ErrorEvent, type Listener} from './util/evented';
import {config} from './util/config';
import type {Subscription} from './util/util';
import {
    DuplicateEntityIdError,
    ExpressionParseError,
    InvalidColorError,
    ListenerCallbackError,
    UnsupportedShapeError
} from './util/bridge_error';
import {RgbaColor, closestColorName, isColorLiteral, parseColor, parseColorOrThrow} from './style/color';
import {
    expressionFromJson,
    expressionToJson,
    parseExpression,
    parseExpressionResult,
    replaceColors,
    serializeExpression,
    type ExpressionJson,
    type ExpressionNode,
    type ExpressionParseResult,
    type JsonValue
} from './style/expression';
import {
    decodeColor,
    decodeJson,
    decodeValue,
    encodeColor,
    encodePropertyValue,
    toPropertyValue,
    type ColorValue,
    type PropertyDefinition,
    type PropertyType,
    type PropertyValue,
    type Scalar,
    type StyleValue,
    type ValueShape,
    type WireValue
} from './style/property_value';
import {StyleTransition, type TransitionArgs, type TransitionOptions} from './style/style_transition';
import {serializeProperties, type PropertyTable, type SerializedProperties} from './style/properties';
import {StyleLayer, type LayerArgs, type LayerCommonProperties, type LayerType} from './style/style_layer';
import {BackgroundStyleLayer, type BackgroundLayerProperties} from './style/style_layer/background_style_layer';
import {CircleStyleLayer, type CircleLayerProperties} from './style/style_layer/circle_style_layer';
import {FillStyleLayer, type FillLayerProperties} from './style/style_layer/fill_style_layer';
import {FillExtrusionStyleLayer, type FillExtrusionLayerProperties} from './style/style_layer/fill_extrusion_style_layer';
import {HeatmapStyleLayer, type HeatmapLayerProperties} from './style/style_layer/heatmap_style_layer';
import {HillshadeStyleLayer, type HillshadeLayerProperties} from './style/style_layer/hillshade_style_layer';
import {LineStyleLayer, type LineLayerProperties} from './style/style_layer/line_style_layer';
import {RasterStyleLayer, type RasterLayerProperties} from './style/style_layer/raster_style_layer';
import {SymbolStyleLayer, type SymbolLayerProperties} from './style/style_layer/symbol_style_layer';
import {
    AssetStyleImage,
    BytesStyleImage,
    NetworkStyleImage,
    StyleImage,
    type ImageLoader,
    type StyleImageArgs
} from './style/style_image';
import {Source, type SourceArgs, type SourceType, type TileLocation} from './source/source';
import {GeoJSONSource, type GeoJSONSourceData, type GeoJSONSourceOptions} from './source/geojson_source';
import {VectorSource, type VectorSourceOptions} from './source/vector_source';
import {RasterSource, type RasterSourceOptions} from './source/raster_source';
import {RasterDEMSource, type RasterDEMSourceOptions} from './source/raster_dem_source';
import {ImageSource, type ImageSourceOptions} from './source/image_source';
import {
    geometryFromArgs,
    queriedFeaturesFromArgs,
    type PointLike,
    type QueriedFeature,
    type QueryGeometry,
    type QueryRenderedFeaturesOptions
} from './source/query_features';
import {Annotation, type AnnotationArgs, type AnnotationOptions, type AnnotationType} from './annotation/annotation';
import {CircleAnnotation, type CircleAnnotationProperties} from './annotation/circle_annotation';
import {SymbolAnnotation, type SymbolAnnotationProperties} from './annotation/symbol_annotation';
import {PolygonAnnotation, type PolygonAnnotationProperties} from './annotation/polygon_annotation';
import {PolylineAnnotation, type PolylineAnnotationProperties} from './annotation/polyline_annotation';
import {LatLng, type LatLngLike} from './geo/lat_lng';
import {LatLngBounds} from './geo/lat_lng_bounds';
import {LatLngQuad} from './geo/lat_lng_quad';
import {EdgeInsets, type PaddingOptions} from './geo/edge_insets';
import {CameraPosition, type CameraPositionOptions} from './geo/camera_position';
import {visibleRegionFromArgs, type VisibleRegion} from './geo/visible_region';

const version = packageJSON.version;

/**
 * Returns the package version of the library
 * @returns Package version of the library
 */
function getVersion() { return version; }

export {
    MapController,
    ListenerHub,
    Evented,
    Event,
    ErrorEvent,
    MapEvent,
    MapClickEvent,
    CameraMoveEvent,
    RotateEvent,
    FpsChangedEvent,
    AnnotationEvent,
    AnnotationDragEvent,
    config,
    DuplicateEntityIdError,
    ExpressionParseError,
    InvalidColorError,
    ListenerCallbackError,
    UnsupportedShapeError,
    RgbaColor,
    StyleTransition,
    StyleLayer,
    BackgroundStyleLayer,
    CircleStyleLayer,
    FillStyleLayer,
    FillExtrusionStyleLayer,
    HeatmapStyleLayer,
    HillshadeStyleLayer,
    LineStyleLayer,
    RasterStyleLayer,
    SymbolStyleLayer,
    StyleImage,
    NetworkStyleImage,
    AssetStyleImage,
    BytesStyleImage,
    Source,
    GeoJSONSource,
    VectorSource,
    RasterSource,
    RasterDEMSource,
    ImageSource,
    Annotation,
    CircleAnnotation,
    SymbolAnnotation,
    PolygonAnnotation,
    PolylineAnnotation,
    LatLng,
    LatLngBounds,
    LatLngQuad,
    EdgeInsets,
    CameraPosition,
    Point,
    type MapControllerOptions,
    type RendererHost,
    type LayerPosition,
    type Listener,
    type Subscription,
    type MapEventType,
    type MapEventName,
    type AnnotationDescriptor,
    type CameraMoveReason,
    type InteractionPhase,
    type ExpressionJson,
    type ExpressionNode,
    type ExpressionParseResult,
    type JsonValue,
    type ColorValue,
    type PropertyDefinition,
    type PropertyType,
    type PropertyValue,
    type PropertyTable,
    type Scalar,
    type StyleValue,
    type ValueShape,
    type WireValue,
    type SerializedProperties,
    type TransitionArgs,
    type TransitionOptions,
    type LayerArgs,
    type LayerCommonProperties,
    type LayerType,
    type BackgroundLayerProperties,
    type CircleLayerProperties,
    type FillLayerProperties,
    type FillExtrusionLayerProperties,
    type HeatmapLayerProperties,
    type HillshadeLayerProperties,
    type LineLayerProperties,
    type RasterLayerProperties,
    type SymbolLayerProperties,
    type ImageLoader,
    type StyleImageArgs,
    type SourceArgs,
    type SourceType,
    type TileLocation,
    type GeoJSONSourceData,
    type GeoJSONSourceOptions,
    type VectorSourceOptions,
    type RasterSourceOptions,
    type RasterDEMSourceOptions,
    type ImageSourceOptions,
    type PointLike,
    type QueriedFeature,
    type QueryGeometry,
    type QueryRenderedFeaturesOptions,
    type AnnotationArgs,
    type AnnotationOptions,
    type AnnotationType,
    type CircleAnnotationProperties,
    type SymbolAnnotationProperties,
    type PolygonAnnotationProperties,
    type PolylineAnnotationProperties,
    type LatLngLike,
    type PaddingOptions,
    type CameraPositionOptions,
    type VisibleRegion,
    annotationFromArgs,
    closestColorName,
    isColorLiteral,
    parseColor,
    parseColorOrThrow,
    expressionFromJson,
    expressionToJson,
    parseExpression,
    parseExpressionResult,
    replaceColors,
    serializeExpression,
    decodeColor,
    decodeJson,
    decodeValue,
    encodeColor,
    encodePropertyValue,
    toPropertyValue,
    serializeProperties,
    geometryFromArgs,
    queriedFeaturesFromArgs,
    visibleRegionFromArgs,
    getVersion
};
