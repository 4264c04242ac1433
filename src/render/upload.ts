import {diagnostics as defaultDiagnostics, type Diagnostics} from '../util/diagnostics';

import type {RGBAColor} from '../style/style_layer';
import type {Style} from '../style/style';
import type {TileComponentStore} from '../tile/tile_store';
import type {WorldTileCoords} from '../tile/tile_id';
import type {FeatureStyle, VectorBufferPool} from './buffer_pool';

/**
 * Repeats the layer style once per index of every feature.
 */
export function buildFeatureStyles(featureIndices: ReadonlyArray<number>, color: RGBAColor, width: number): Array<FeatureStyle> {
    const styles: Array<FeatureStyle> = [];
    for (const count of featureIndices) {
        for (let i = 0; i < count; i++) {
            styles.push({color, width});
        }
    }
    return styles;
}

/**
 * Moves the tessellated layers of the given tiles from the store into the pool,
 * resolving their paint at the tile zoom. Layers already in the pool are skipped.
 *
 * @returns the number of allocated layers
 */
export function uploadTessellatedLayers(
    store: TileComponentStore,
    style: Style,
    coordsList: Iterable<WorldTileCoords>,
    pool: VectorBufferPool,
    diagnostics: Diagnostics = defaultDiagnostics
): number {
    let allocated = 0;
    for (const coords of coordsList) {
        const zoom = coords.z;
        for (const styleLayer of style.layers) {
            if (styleLayer.isHidden(zoom)) continue;

            const data = store.findLayer(coords, styleLayer.sourceLayer, styleLayer.id, pool);
            if (!data) continue;

            const color = styleLayer.getColor(zoom, diagnostics);
            if (!color) {
                diagnostics.warn('upload.layer-without-color', {layer: styleLayer.id, source: styleLayer.sourceLayer});
                continue;
            }
            const width = styleLayer.getLineWidth(zoom, diagnostics) ?? 0;

            const featureStyles = buildFeatureStyles(data.featureIndices, color, width);
            if (featureStyles.length === 0) continue;

            pool.allocateLayerGeometry(coords, styleLayer, data.buffer, featureStyles);
            allocated++;
            diagnostics.debug('upload.layer-allocated', {
                tile: coords.toString(),
                layer: styleLayer.id,
                width,
                zIndex: styleLayer.index,
                indices: featureStyles.length
            });
        }
    }
    return allocated;
}
