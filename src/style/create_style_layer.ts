import {BackgroundStyleLayer} from './style_layer/background_style_layer';
import {FillStyleLayer} from './style_layer/fill_style_layer';
import {LineStyleLayer} from './style_layer/line_style_layer';
import {RasterStyleLayer} from './style_layer/raster_style_layer';

import type {LayerJSON, StyleLayer} from './style_layer';

/**
 * Builds the style layer for a layer object of a style document.
 *
 * @returns the layer, or `undefined` for a layer type the pipeline does not draw
 */
export function createStyleLayer(layer: LayerJSON, index: number): StyleLayer | undefined {
    switch (layer.type) {
        case 'background':
            return new BackgroundStyleLayer(layer, index);
        case 'fill':
            return new FillStyleLayer(layer, index);
        case 'line':
            return new LineStyleLayer(layer, index);
        case 'raster':
            return new RasterStyleLayer(layer, index);
        default:
            return undefined;
    }
}
