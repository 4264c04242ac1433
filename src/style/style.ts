import {createStyleLayer} from './create_style_layer';
import {validateStyle, throwValidationErrors} from './validate_style';
import {diagnostics as defaultDiagnostics, type Diagnostics} from '../util/diagnostics';
import {StyleParseError} from '../util/errors';

import type {LayerJSON, StyleLayer} from './style_layer';

/**
 * The options object related to reading a style document
 */
export type StyleOptions = {
    /**
     * If true, the document is checked against the style specification first.
     */
    validate?: boolean;
    diagnostics?: Diagnostics;
};

function isObject(value: unknown): value is LayerJSON {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The parsed style document: an ordered list of layers. Read-only once built,
 * so one instance can serve any number of tile pipelines.
 */
export class Style {
    readonly version: number;
    readonly name?: string;
    readonly layers: ReadonlyArray<StyleLayer>;
    private readonly _layersById: Map<string, StyleLayer>;

    constructor(layers: ReadonlyArray<StyleLayer>, version: number = 8, name?: string) {
        this.version = version;
        this.name = name;
        this.layers = layers;
        this._layersById = new Map(layers.map(layer => [layer.id, layer]));
    }

    /**
     * Reads a style document. Layers of a type the pipeline does not draw are
     * skipped with a warning.
     */
    static fromJSON(json: unknown, options: StyleOptions = {}): Style {
        if (options.validate) {
            throwValidationErrors(validateStyle(json));
        }
        if (!isObject(json)) {
            throw new StyleParseError('style must be an object');
        }
        const version = json.version === undefined ? 8 : json.version;
        if (typeof version !== 'number') {
            throw new StyleParseError('style version must be a number');
        }
        const name = json.name;
        if (name !== undefined && typeof name !== 'string') {
            throw new StyleParseError('style name must be a string');
        }
        if (!Array.isArray(json.layers)) {
            throw new StyleParseError('style layers must be an array');
        }

        const diagnostics = options.diagnostics ?? defaultDiagnostics;
        const layers: Array<StyleLayer> = [];
        json.layers.forEach((layerJSON: unknown, index: number) => {
            if (!isObject(layerJSON)) {
                throw new StyleParseError(`layer at index ${index} must be an object`);
            }
            const layer = createStyleLayer(layerJSON, index);
            if (!layer) {
                diagnostics.warn('style.layer-unsupported', {layer: String(layerJSON.id), type: String(layerJSON.type)});
                return;
            }
            layers.push(layer);
        });

        return new Style(layers, version, typeof name === 'string' ? name : undefined);
    }

    getLayer(id: string): StyleLayer | undefined {
        return this._layersById.get(id);
    }

    /**
     * The layers drawing features of the given source layer, in style order.
     */
    layersForSourceLayer(sourceLayer: string): Array<StyleLayer> {
        return this.layers.filter(layer => layer.sourceLayer === sourceLayer);
    }
}
