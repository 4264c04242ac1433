import {VERTEX_SIZE, type VertexBuffers} from '../data/tessellator';

import type {RGBAColor, StyleLayer} from '../style/style_layer';
import type {LoadedLayerIndex} from '../tile/tile_store';
import type {WorldTileCoords} from '../tile/tile_id';

/**
 * Paint values of one index of a layer.
 */
export type FeatureStyle = {
    color: RGBAColor;
    width: number;
};

/**
 * A layer held by the pool, as offsets into its arrays.
 */
export type PooledLayer = {
    coords: WorldTileCoords;
    styleLayer: StyleLayer;
    /**
     * Draw order of the layer, its position in the style.
     */
    zIndex: number;
    vertexOffset: number;
    vertexLength: number;
    primitiveOffset: number;
    primitiveLength: number;
    featureStyleOffset: number;
};

/**
 * Staging storage for tessellated layers. Vertices, indices and feature styles of
 * every layer are appended to shared arrays; indices stay relative to the layer's
 * `vertexOffset`.
 */
export class VectorBufferPool implements LoadedLayerIndex {
    vertices: Array<number> = [];
    indices: Array<number> = [];
    featureStyles: Array<FeatureStyle> = [];
    _layers: Record<string, Array<PooledLayer>> = {};

    allocateLayerGeometry(
        coords: WorldTileCoords,
        styleLayer: StyleLayer,
        buffer: VertexBuffers,
        featureStyles: ReadonlyArray<FeatureStyle>
    ): PooledLayer {
        const layer: PooledLayer = {
            coords,
            styleLayer,
            zIndex: styleLayer.index,
            vertexOffset: this.vertices.length / VERTEX_SIZE,
            vertexLength: buffer.vertices.length / VERTEX_SIZE,
            primitiveOffset: this.indices.length,
            primitiveLength: buffer.indices.length,
            featureStyleOffset: this.featureStyles.length
        };

        for (const value of buffer.vertices) this.vertices.push(value);
        for (const index of buffer.indices) this.indices.push(index);
        for (const style of featureStyles) this.featureStyles.push(style);

        const key = coords.toString();
        (this._layers[key] = this._layers[key] || []).push(layer);
        return layer;
    }

    /**
     * Ids of the style layers held for a tile.
     */
    getLoadedLayersAt(coords: WorldTileCoords): Set<string> | undefined {
        const layers = this._layers[coords.toString()];
        if (!layers) return undefined;
        return new Set(layers.map(layer => layer.styleLayer.id));
    }

    /**
     * Layers held for a tile, in draw order.
     */
    getLayers(coords: WorldTileCoords): Array<PooledLayer> {
        const layers = this._layers[coords.toString()] || [];
        return layers.slice().sort((a, b) => a.zIndex - b.zIndex);
    }

    clear() {
        this.vertices = [];
        this.indices = [];
        this.featureStyles = [];
        this._layers = {};
    }
}
