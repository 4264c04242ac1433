import packageJSON from '../package.json' with {type: 'json'};
import {WorldTileCoords, compareByQuadkey, getQuadkey, type Tile} from './tile/tile_id';
import {isInBoundsForTileZoomXY} from './util/world_bounds';
import {MAX_TILE_ZOOM, MIN_TILE_ZOOM} from './util/util';
import {EXTENT} from './data/extent';
import {config} from './util/config';
import {Evented, Event, type Listener} from './util/evented';
import {Diagnostics, DiagnosticEvent, diagnostics, formatDiagnostic, type DiagnosticFields, type DiagnosticLevel} from './util/diagnostics';
import {
    TilePipelineError,
    TileDecodeError,
    TessellationError,
    UnsupportedOperationError,
    FilterParseError,
    StyleParseError,
    ComponentBorrowError,
    TileNotFoundError,
    SinkSendError
} from './util/errors';
import {
    evaluateFilter,
    filterToSpecification,
    parseFilter,
    toComparisonLiteral,
    type ComparisonLiteral,
    type FeatureProperties,
    type LegacyFilterArray,
    type LegacyFilterExpression
} from './style-spec/feature_filter';
import {interpolate, interpolateWith, interpolationFactor, parseInterpolatedQuantity, type InterpolatedQuantity, type Stop} from './style-spec/function';
import {Style, type StyleOptions} from './style/style';
import {StyleLayer, type RGBAColor, type StyleLayerType} from './style/style_layer';
import {Tessellator, VERTEX_SIZE, type GeometryProcessor, type TessellationResult, type VertexBuffers} from './data/tessellator';
import {emitFeature} from './data/feature_events';
import {FeatureIndex, type IndexedGeometry} from './data/feature_index';
import {processVectorTile, tessellateLayer, type VectorTileRequest} from './source/worker_tile';
import {type TileMessage, type TileMessageSink} from './source/tile_messages';
import {TileComponentStore, TileSpawnResult, read, write, type ComponentRequest, type LoadedLayerIndex} from './tile/tile_store';
import {QuerySession} from './tile/query_session';
import {TileStoreSink} from './tile/tile_store_sink';
import {
    TileIndexComponent,
    VectorLayersDataComponent,
    type AvailableVectorLayerData,
    type ComponentClass,
    type VectorLayerData
} from './tile/tile_components';
import {VectorBufferPool, type FeatureStyle, type PooledLayer} from './render/buffer_pool';
import {buildFeatureStyles, uploadTessellatedLayers} from './render/upload';

const version = packageJSON.version;

/**
 * Returns the package version of the library
 * @returns Package version of the library
 */
function getVersion() { return version; }
/**
 * Gets the distance below which consecutive path points are merged before tessellation.
 *
 * @returns Tolerance in tile units.
 */
function getTessellationTolerance() { return config.TESSELLATION_TOLERANCE; }
/**
 * Sets the distance below which consecutive path points are merged before tessellation.
 * Takes effect for tessellators created afterwards.
 *
 * @example
 * ```ts
 * setTessellationTolerance(0.5);
 * ```
 */
function setTessellationTolerance(tolerance: number) { config.TESSELLATION_TOLERANCE = tolerance; }
/**
 * Gets the maximum number of rings kept per polygon.
 */
function getMaxPolygonRings() { return config.EARCUT_MAX_RINGS; }
/**
 * Sets the maximum number of rings kept per polygon. Polygons with more rings keep their largest ones.
 */
function setMaxPolygonRings(rings: number) { config.EARCUT_MAX_RINGS = rings; }

export {
    WorldTileCoords,
    type Tile,
    getQuadkey,
    compareByQuadkey,
    isInBoundsForTileZoomXY,
    MAX_TILE_ZOOM,
    MIN_TILE_ZOOM,
    EXTENT,
    Evented,
    Event,
    type Listener,
    Diagnostics,
    DiagnosticEvent,
    diagnostics,
    formatDiagnostic,
    type DiagnosticFields,
    type DiagnosticLevel,
    TilePipelineError,
    TileDecodeError,
    TessellationError,
    UnsupportedOperationError,
    FilterParseError,
    StyleParseError,
    ComponentBorrowError,
    TileNotFoundError,
    SinkSendError,
    parseFilter,
    evaluateFilter,
    filterToSpecification,
    toComparisonLiteral,
    type ComparisonLiteral,
    type FeatureProperties,
    type LegacyFilterArray,
    type LegacyFilterExpression,
    interpolate,
    interpolateWith,
    interpolationFactor,
    parseInterpolatedQuantity,
    type InterpolatedQuantity,
    type Stop,
    Style,
    type StyleOptions,
    StyleLayer,
    type StyleLayerType,
    type RGBAColor,
    Tessellator,
    VERTEX_SIZE,
    type GeometryProcessor,
    type TessellationResult,
    type VertexBuffers,
    emitFeature,
    FeatureIndex,
    type IndexedGeometry,
    processVectorTile,
    tessellateLayer,
    type VectorTileRequest,
    type TileMessage,
    type TileMessageSink,
    TileComponentStore,
    TileSpawnResult,
    QuerySession,
    read,
    write,
    type ComponentRequest,
    type ComponentClass,
    type LoadedLayerIndex,
    TileStoreSink,
    VectorLayersDataComponent,
    TileIndexComponent,
    type AvailableVectorLayerData,
    type VectorLayerData,
    VectorBufferPool,
    type FeatureStyle,
    type PooledLayer,
    buildFeatureStyles,
    uploadTessellatedLayers,
    getVersion,
    getTessellationTolerance,
    setTessellationTolerance,
    getMaxPolygonRings,
    setMaxPolygonRings
};
