import {StyleLayer, readColorProperty, readNumberProperty, readPropertyObject, resolveColor, type LayerJSON, type RGBAColor} from '../style_layer';
import type {Color} from '@maplibre/maplibre-gl-style-spec';
import type {InterpolatedQuantity} from '../../style-spec/function';
import type {Diagnostics} from '../../util/diagnostics';

export type FillPaint = {
    type: 'fill';
    fillColor?: InterpolatedQuantity<Color>;
    fillOpacity?: InterpolatedQuantity<number>;
};

export const isFillStyleLayer = (layer: StyleLayer): layer is FillStyleLayer => layer.type === 'fill';

export class FillStyleLayer extends StyleLayer {
    readonly paint: FillPaint;

    constructor(layer: LayerJSON, index: number) {
        super(layer, 'fill', index);
        const paint = readPropertyObject(layer, 'paint');
        this.paint = {
            type: 'fill',
            fillColor: readColorProperty(paint, 'fill-color'),
            fillOpacity: readNumberProperty(paint, 'fill-opacity')
        };
    }

    getColor(zoom: number, diagnostics?: Diagnostics): RGBAColor | undefined {
        return resolveColor(this.paint.fillColor, this.paint.fillOpacity, zoom, diagnostics);
    }
}
