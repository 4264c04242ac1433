import Protobuf from 'pbf';
import {VectorTile, type VectorTileLayer} from '@mapbox/vector-tile';
import {Tessellator, type TessellationResult} from '../data/tessellator';
import {emitFeature} from '../data/feature_events';
import {FeatureIndex} from '../data/feature_index';
import {diagnostics as defaultDiagnostics, type Diagnostics} from '../util/diagnostics';
import {
    SinkSendError,
    TileDecodeError,
    UnsupportedOperationError,
    errorMessage
} from '../util/errors';

import type {LegacyFilterExpression} from '../style-spec/feature_filter';
import type {Style} from '../style/style';
import type {WorldTileCoords} from '../tile/tile_id';
import type {TileMessage, TileMessageSink} from './tile_messages';

/**
 * A request for a tile at the given coordinates and in the given layers.
 */
export type VectorTileRequest = {
    coords: WorldTileCoords;
    /**
     * Names of the source layers to process.
     */
    layers: ReadonlySet<string>;
    style: Style;
    /**
     * If true, a feature index of the requested layers is sent before the tile finishes.
     */
    indexGeometries?: boolean;
};

/**
 * Tessellates every feature of a tile layer with a fresh tessellator.
 */
export function tessellateLayer(layer: VectorTileLayer, filter?: LegacyFilterExpression, diagnostics?: Diagnostics): TessellationResult {
    const tessellator = new Tessellator(filter, diagnostics);
    for (let index = 0; index < layer.length; index++) {
        emitFeature(layer.feature(index), index, tessellator);
    }
    return tessellator.finish();
}

/**
 * Decodes a vector tile and tessellates its requested layers once per style layer
 * drawing them, reporting the results to `sink`.
 *
 * Messages are sent in order: results per style layer, then one missing report per
 * requested layer the tile lacks, then the optional feature index and finally
 * `tileFinished`. A style layer that fails to tessellate is reported missing and
 * does not stop its siblings.
 *
 * @throws {TileDecodeError} if the bytes are not a vector tile; nothing is sent
 * @throws {UnsupportedOperationError} if a filter meets a value it cannot compare
 * @throws {SinkSendError} if the sink fails; the tile is not finished
 *
 * Any failure after decoding is reported to `sink.tileFailed` before it propagates.
 */
export async function processVectorTile(
    data: Uint8Array,
    request: VectorTileRequest,
    sink: TileMessageSink,
    diagnostics: Diagnostics = defaultDiagnostics
): Promise<void> {
    const coords = request.coords;
    const tile = coords.toString();

    let layers: Map<string, VectorTileLayer>;
    try {
        layers = new Map(Object.entries(new VectorTile(new Protobuf(data)).layers));
    } catch (e) {
        diagnostics.error('tile.decode-failed', {tile, reason: errorMessage(e)});
        throw new TileDecodeError(`decoding tile ${tile} failed: ${errorMessage(e)}`, e);
    }

    const send = async (message: TileMessage) => {
        try {
            await sink.send(message);
        } catch (e) {
            throw new SinkSendError(`sending ${message.type} for tile ${tile} failed: ${errorMessage(e)}`, e);
        }
    };

    try {
        for (const [layerName, layer] of layers) {
            if (!request.layers.has(layerName)) continue;

            if (layer.version === 1) {
                diagnostics.warn('tile.layer-version-1', {layer: layerName});
            }

            for (const styleLayer of request.style.layersForSourceLayer(layerName)) {
                let result: TessellationResult;
                try {
                    result = tessellateLayer(layer, styleLayer.filter, diagnostics);
                } catch (e) {
                    if (e instanceof UnsupportedOperationError) {
                        diagnostics.error('layer.unsupported-operation', {tile, layer: styleLayer.id, reason: e.message});
                        throw e;
                    }
                    diagnostics.error('layer.tessellation-failed', {tile, layer: styleLayer.id, reason: errorMessage(e)});
                    await send({type: 'layerMissing', coords, layerName: styleLayer.id});
                    continue;
                }

                await send({
                    type: 'layerTessellated',
                    coords,
                    buffer: result.buffer,
                    featureIndices: result.featureIndices,
                    layerData: layer,
                    styleLayerId: styleLayer.id
                });
            }
        }

        for (const layerName of request.layers) {
            if (layers.has(layerName)) continue;
            diagnostics.info('tile.layer-missing', {tile, layer: layerName});
            await send({type: 'layerMissing', coords, layerName});
        }

        if (request.indexGeometries) {
            await send({type: 'layerIndexed', coords, index: indexLayers(layers, request.layers, diagnostics)});
        }

        diagnostics.debug('tile.finished', {tile});
        await send({type: 'tileFinished', coords});
    } catch (e) {
        sink.tileFailed?.(coords, e);
        throw e;
    }
}

function indexLayers(layers: Map<string, VectorTileLayer>, requested: ReadonlySet<string>, diagnostics: Diagnostics): FeatureIndex {
    const index = new FeatureIndex();
    for (const [layerName, layer] of layers) {
        if (!requested.has(layerName)) continue;
        for (let i = 0; i < layer.length; i++) {
            try {
                index.insert(layerName, layer.feature(i), i);
            } catch (e) {
                diagnostics.warn('index.feature-skipped', {layer: layerName, feature: i, reason: errorMessage(e)});
            }
        }
    }
    return index;
}
