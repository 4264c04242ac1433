import {StyleLayer, readNumberProperty, readPropertyObject, type LayerJSON} from '../style_layer';
import type {InterpolatedQuantity} from '../../style-spec/function';

export type RasterPaint = {
    type: 'raster';
    rasterOpacity?: InterpolatedQuantity<number>;
};

/**
 * Raster layers carry no color; their tiles are not tessellated.
 */
export class RasterStyleLayer extends StyleLayer {
    readonly paint: RasterPaint;

    constructor(layer: LayerJSON, index: number) {
        super(layer, 'raster', index);
        const paint = readPropertyObject(layer, 'paint');
        this.paint = {
            type: 'raster',
            rasterOpacity: readNumberProperty(paint, 'raster-opacity')
        };
    }
}
