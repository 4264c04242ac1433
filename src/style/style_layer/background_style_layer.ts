import {StyleLayer, readColorProperty, readNumberProperty, readPropertyObject, resolveColor, type LayerJSON, type RGBAColor} from '../style_layer';
import type {Color} from '@maplibre/maplibre-gl-style-spec';
import type {InterpolatedQuantity} from '../../style-spec/function';
import type {Diagnostics} from '../../util/diagnostics';

export type BackgroundPaint = {
    type: 'background';
    backgroundColor?: InterpolatedQuantity<Color>;
    backgroundOpacity?: InterpolatedQuantity<number>;
};

export const isBackgroundStyleLayer = (layer: StyleLayer): layer is BackgroundStyleLayer => layer.type === 'background';

export class BackgroundStyleLayer extends StyleLayer {
    readonly paint: BackgroundPaint;

    constructor(layer: LayerJSON, index: number) {
        super(layer, 'background', index);
        const paint = readPropertyObject(layer, 'paint');
        this.paint = {
            type: 'background',
            backgroundColor: readColorProperty(paint, 'background-color'),
            backgroundOpacity: readNumberProperty(paint, 'background-opacity')
        };
    }

    getColor(zoom: number, diagnostics?: Diagnostics): RGBAColor | undefined {
        return resolveColor(this.paint.backgroundColor, this.paint.backgroundOpacity, zoom, diagnostics);
    }
}
