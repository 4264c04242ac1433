import {diagnostics as defaultDiagnostics, type Diagnostics} from '../util/diagnostics';
import {TileNotFoundError, errorMessage} from '../util/errors';
import {sum} from '../util/util';
import {TileIndexComponent, VectorLayersDataComponent, type VectorLayerData} from './tile_components';

import type {FeatureIndex} from '../data/feature_index';
import type {TileComponentStore} from './tile_store';
import type {WorldTileCoords} from './tile_id';
import type {TileMessage, TileMessageSink} from '../source/tile_messages';

type PendingTile = {
    layers: Array<VectorLayerData>;
    index?: FeatureIndex;
};

/**
 * A sink that collects the results of each tile and attaches them to the store
 * once the tile is finished. Results of a tile that never finishes stay invisible.
 */
export class TileStoreSink implements TileMessageSink {
    store: TileComponentStore;
    diagnostics: Diagnostics;
    _pending: Record<string, PendingTile> = {};

    constructor(store: TileComponentStore, diagnostics: Diagnostics = defaultDiagnostics) {
        this.store = store;
        this.diagnostics = diagnostics;
    }

    /**
     * @throws {TileNotFoundError} if a finished tile is outside the pyramid
     */
    send(message: TileMessage) {
        const pending = this._getPending(message.coords);
        switch (message.type) {
            case 'layerTessellated':
                if (sum(message.featureIndices) !== message.buffer.indices.length) {
                    this.diagnostics.warn('store.feature-indices-mismatch', {
                        tile: message.coords.toString(),
                        layer: message.styleLayerId,
                        indices: message.buffer.indices.length
                    });
                }
                pending.layers.push({
                    kind: 'available',
                    coords: message.coords,
                    buffer: message.buffer,
                    featureIndices: message.featureIndices,
                    styleLayerId: message.styleLayerId
                });
                break;
            case 'layerMissing':
                pending.layers.push({kind: 'missing', layerName: message.layerName});
                break;
            case 'layerIndexed':
                pending.index = message.index;
                break;
            case 'tileFinished':
                this._finish(message.coords, pending);
                break;
        }
    }

    /**
     * Drops the collected results of a tile whose processing failed.
     *
     * @returns whether anything was pending for the tile
     */
    discard(coords: WorldTileCoords): boolean {
        const key = coords.toString();
        const existed = key in this._pending;
        delete this._pending[key];
        return existed;
    }

    /**
     * Drops what a failed run collected, so a later run of the tile starts empty.
     */
    tileFailed(coords: WorldTileCoords, error: unknown) {
        if (this.discard(coords)) {
            this.diagnostics.debug('store.tile-discarded', {tile: coords.toString(), reason: errorMessage(error)});
        }
    }

    hasPending(coords: WorldTileCoords): boolean {
        return coords.toString() in this._pending;
    }

    _getPending(coords: WorldTileCoords): PendingTile {
        const key = coords.toString();
        let pending = this._pending[key];
        if (!pending) {
            pending = {layers: []};
            this._pending[key] = pending;
        }
        return pending;
    }

    _finish(coords: WorldTileCoords, pending: PendingTile) {
        delete this._pending[coords.toString()];

        const handle = this.store.spawn(coords);
        if (!handle) {
            throw new TileNotFoundError(`cannot store tile ${coords}: outside the tile pyramid`);
        }

        this.store.detach(coords, VectorLayersDataComponent);
        this.store.detach(coords, TileIndexComponent);
        handle.insert(new VectorLayersDataComponent(pending.layers));
        if (pending.index) {
            handle.insert(new TileIndexComponent(pending.index));
        }

        this.diagnostics.debug('store.tile-attached', {tile: coords.toString(), layers: pending.layers.length});
    }
}
