import {Color, interpolates} from '@maplibre/maplibre-gl-style-spec';
import {parseFilter, type LegacyFilterExpression} from '../style-spec/feature_filter';
import {
    interpolate,
    interpolateWith,
    parseInterpolatedQuantity,
    parseQuantity,
    type InterpolatedQuantity
} from '../style-spec/function';
import {StyleParseError} from '../util/errors';
import {type Diagnostics} from '../util/diagnostics';

import type {BackgroundPaint} from './style_layer/background_style_layer';
import type {FillPaint} from './style_layer/fill_style_layer';
import type {LinePaint} from './style_layer/line_style_layer';
import type {RasterPaint} from './style_layer/raster_style_layer';

export type StyleLayerType = 'background' | 'fill' | 'line' | 'raster';

/**
 * Paint properties of a layer, tagged by layer type.
 */
export type StyleLayerPaint = BackgroundPaint | FillPaint | LinePaint | RasterPaint;

/**
 * A layer object as read from a style document.
 */
export type LayerJSON = {[key: string]: unknown};

/**
 * Non-premultiplied `[r, g, b, a]` with components in 0..1.
 */
export type RGBAColor = [number, number, number, number];

function optionalString(layer: LayerJSON, key: string): string | undefined {
    const value = layer[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new StyleParseError(`layer ${String(layer.id)}: "${key}" must be a string`);
    }
    return value;
}

function optionalNumber(layer: LayerJSON, key: string): number | undefined {
    const value = layer[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') {
        throw new StyleParseError(`layer ${String(layer.id)}: "${key}" must be a number`);
    }
    return value;
}

function parseColor(value: unknown): Color | undefined {
    return typeof value === 'string' ? Color.parse(value) : undefined;
}

/**
 * Reads the `paint` (or `layout`) object of a layer, empty when absent.
 */
export function readPropertyObject(layer: LayerJSON, key: 'paint' | 'layout'): LayerJSON {
    const value = layer[key];
    if (value === undefined) return {};
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new StyleParseError(`layer ${String(layer.id)}: "${key}" must be an object`);
    }
    const result: LayerJSON = {};
    for (const [name, property] of Object.entries(value)) {
        result[name] = property;
    }
    return result;
}

export function readColorProperty(paint: LayerJSON, name: string): InterpolatedQuantity<Color> | undefined {
    if (paint[name] === undefined) return undefined;
    return parseQuantity(paint[name], name, parseColor);
}

export function readNumberProperty(paint: LayerJSON, name: string): InterpolatedQuantity<number> | undefined {
    if (paint[name] === undefined) return undefined;
    return parseInterpolatedQuantity(paint[name], name);
}

/**
 * Resolves a color and an optional opacity at `zoom`. A present opacity replaces
 * the alpha channel of the color.
 */
export function resolveColor(
    color: InterpolatedQuantity<Color> | undefined,
    opacity: InterpolatedQuantity<number> | undefined,
    zoom: number,
    diagnostics?: Diagnostics
): RGBAColor | undefined {
    if (color === undefined) return undefined;
    const resolved = interpolateWith(color, zoom, interpolates.color, diagnostics);
    if (resolved === undefined) return undefined;

    const {r, g, b, a} = resolved;
    const rgba: RGBAColor = a === 0 ? [0, 0, 0, 0] : [r / a, g / a, b / a, a];
    if (opacity !== undefined) {
        const alpha = interpolate(opacity, zoom, diagnostics);
        if (alpha !== undefined) rgba[3] = alpha;
    }
    return rgba;
}

/**
 * A base class for style layers
 */
export abstract class StyleLayer {
    readonly id: string;
    readonly type: StyleLayerType;
    /**
     * Position of the layer in the style, used as its z-order.
     */
    readonly index: number;
    readonly metadata: unknown;
    readonly source?: string;
    readonly sourceLayer?: string;
    readonly minzoom?: number;
    readonly maxzoom?: number;
    readonly visibility: 'visible' | 'none';
    readonly filter?: LegacyFilterExpression;

    abstract readonly paint: StyleLayerPaint;

    constructor(layer: LayerJSON, type: StyleLayerType, index: number) {
        if (typeof layer.id !== 'string') {
            throw new StyleParseError(`layer at index ${index}: "id" must be a string`);
        }
        this.id = layer.id;
        this.type = type;
        this.index = index;
        this.metadata = layer.metadata;
        this.minzoom = optionalNumber(layer, 'minzoom');
        this.maxzoom = optionalNumber(layer, 'maxzoom');

        const visibility = readPropertyObject(layer, 'layout').visibility;
        this.visibility = visibility === 'none' ? 'none' : 'visible';

        if (type !== 'background') {
            this.source = optionalString(layer, 'source');
            this.sourceLayer = optionalString(layer, 'source-layer');
            if (layer.filter !== undefined) {
                this.filter = parseFilter(layer.filter);
            }
        }
    }

    /**
     * The color of the layer at `zoom`, or `undefined` if it has none.
     */
    getColor(_zoom: number, _diagnostics?: Diagnostics): RGBAColor | undefined {
        return undefined;
    }

    /**
     * The stroke width of the layer at `zoom`, or `undefined` if it has none.
     */
    getLineWidth(_zoom: number, _diagnostics?: Diagnostics): number | undefined {
        return undefined;
    }

    isHidden(zoom: number = this.minzoom ?? 0) {
        if (this.minzoom && zoom < this.minzoom) return true;
        if (this.maxzoom && zoom >= this.maxzoom) return true;
        return this.visibility === 'none';
    }
}
