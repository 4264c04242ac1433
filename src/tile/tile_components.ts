import type {WorldTileCoords} from './tile_id';
import type {VertexBuffers} from '../data/tessellator';
import type {FeatureIndex} from '../data/feature_index';

/**
 * A class whose instances can be attached to a tile. Lookups match with `instanceof`.
 */
export type ComponentClass<T extends object> = new (...args: never[]) => T;

/**
 * Geometry of one style layer of a tile, ready for upload.
 */
export type AvailableVectorLayerData = {
    coords: WorldTileCoords;
    buffer: VertexBuffers;
    /**
     * Index count contributed by each drawn feature; sums to `buffer.indices.length`.
     */
    featureIndices: Array<number>;
    styleLayerId: string;
};

export type VectorLayerData =
    { kind: 'available' } & AvailableVectorLayerData |
    { kind: 'missing'; layerName: string };

/**
 * The processed layers of a tile.
 */
export class VectorLayersDataComponent {
    readonly layers: Array<VectorLayerData>;

    constructor(layers: Array<VectorLayerData> = []) {
        this.layers = layers;
    }

    /**
     * The available entry drawn by the given style layer, if any.
     */
    getAvailable(styleLayerId: string): AvailableVectorLayerData | undefined {
        for (const layer of this.layers) {
            if (layer.kind === 'available' && layer.styleLayerId === styleLayerId) return layer;
        }
        return undefined;
    }

    /**
     * Names reported missing, either source layers or style layer ids.
     */
    getMissing(): Array<string> {
        const missing: Array<string> = [];
        for (const layer of this.layers) {
            if (layer.kind === 'missing') missing.push(layer.layerName);
        }
        return missing;
    }
}

/**
 * The feature bounding box index of a tile.
 */
export class TileIndexComponent {
    readonly index: FeatureIndex;

    constructor(index: FeatureIndex) {
        this.index = index;
    }
}
