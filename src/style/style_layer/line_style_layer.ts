import {StyleLayer, readColorProperty, readNumberProperty, readPropertyObject, resolveColor, type LayerJSON, type RGBAColor} from '../style_layer';
import {interpolate, type InterpolatedQuantity} from '../../style-spec/function';
import type {Color} from '@maplibre/maplibre-gl-style-spec';
import type {Diagnostics} from '../../util/diagnostics';

export type LinePaint = {
    type: 'line';
    lineColor?: InterpolatedQuantity<Color>;
    lineOpacity?: InterpolatedQuantity<number>;
    lineWidth?: InterpolatedQuantity<number>;
};

export const isLineStyleLayer = (layer: StyleLayer): layer is LineStyleLayer => layer.type === 'line';

export class LineStyleLayer extends StyleLayer {
    readonly paint: LinePaint;

    constructor(layer: LayerJSON, index: number) {
        super(layer, 'line', index);
        const paint = readPropertyObject(layer, 'paint');
        this.paint = {
            type: 'line',
            lineColor: readColorProperty(paint, 'line-color'),
            lineOpacity: readNumberProperty(paint, 'line-opacity'),
            lineWidth: readNumberProperty(paint, 'line-width')
        };
    }

    getColor(zoom: number, diagnostics?: Diagnostics): RGBAColor | undefined {
        return resolveColor(this.paint.lineColor, this.paint.lineOpacity, zoom, diagnostics);
    }

    getLineWidth(zoom: number, diagnostics?: Diagnostics): number | undefined {
        if (this.paint.lineWidth === undefined) return undefined;
        return interpolate(this.paint.lineWidth, zoom, diagnostics);
    }
}
