import type {VectorTileLayer} from '@mapbox/vector-tile';
import type {WorldTileCoords} from '../tile/tile_id';
import type {VertexBuffers} from '../data/tessellator';
import type {FeatureIndex} from '../data/feature_index';

/**
 * All layers of the tile have been reported.
 */
export type TileFinishedMessage = {
    type: 'tileFinished';
    coords: WorldTileCoords;
};

/**
 * A requested layer is absent from the tile, or a style layer failed to tessellate.
 * `layerName` is the source layer name or the style layer id respectively.
 */
export type LayerMissingMessage = {
    type: 'layerMissing';
    coords: WorldTileCoords;
    layerName: string;
};

export type LayerTessellatedMessage = {
    type: 'layerTessellated';
    coords: WorldTileCoords;
    buffer: VertexBuffers;
    featureIndices: Array<number>;
    layerData: VectorTileLayer;
    styleLayerId: string;
};

export type LayerIndexedMessage = {
    type: 'layerIndexed';
    coords: WorldTileCoords;
    index: FeatureIndex;
};

export type TileMessage =
    TileFinishedMessage |
    LayerMissingMessage |
    LayerTessellatedMessage |
    LayerIndexedMessage;

/**
 * Receives the results of tile processing. A rejected or thrown `send` aborts the
 * processing of the current tile.
 */
export interface TileMessageSink {
    send(message: TileMessage): void | Promise<void>;
    /**
     * Called once when processing of a tile aborts after decoding, before the error
     * propagates. No `tileFinished` follows for that run.
     */
    tileFailed?(coords: WorldTileCoords, error: unknown): void;
}
