import {describe, test, expect} from 'vitest';
import {createStyleLayer} from './create_style_layer';
import {FillStyleLayer} from './style_layer/fill_style_layer';
import {LineStyleLayer} from './style_layer/line_style_layer';
import {StyleParseError, FilterParseError} from '../util/errors';

describe('createStyleLayer', () => {
    test('instantiates the drawable layer types', () => {
        expect(createStyleLayer({id: 'a', type: 'fill'}, 0)).toBeInstanceOf(FillStyleLayer);
        expect(createStyleLayer({id: 'b', type: 'line'}, 1)).toBeInstanceOf(LineStyleLayer);
        expect(createStyleLayer({id: 'c', type: 'background'}, 2)?.type).toBe('background');
        expect(createStyleLayer({id: 'd', type: 'raster'}, 3)?.type).toBe('raster');
        expect(createStyleLayer({id: 'e', type: 'symbol'}, 4)).toBeUndefined();
    });

    test('reads identity, source and filter', () => {
        const layer = createStyleLayer({
            id: 'water',
            type: 'fill',
            source: 'openmaptiles',
            'source-layer': 'water',
            minzoom: 2,
            metadata: {group: 'hydro'},
            filter: ['==', 'class', 'ocean']
        }, 7);
        expect(layer?.id).toBe('water');
        expect(layer?.index).toBe(7);
        expect(layer?.source).toBe('openmaptiles');
        expect(layer?.sourceLayer).toBe('water');
        expect(layer?.minzoom).toBe(2);
        expect(layer?.metadata).toEqual({group: 'hydro'});
        expect(layer?.filter).toEqual({type: 'comparison', op: '==', key: 'class', literal: {kind: 'string', value: 'ocean'}});
    });

    test('background layers ignore source fields', () => {
        const layer = createStyleLayer({id: 'bg', type: 'background', 'source-layer': 'water', filter: ['has', 'x']}, 0);
        expect(layer?.sourceLayer).toBeUndefined();
        expect(layer?.filter).toBeUndefined();
    });

    test('rejects malformed layers', () => {
        expect(() => createStyleLayer({type: 'fill'}, 0)).toThrow(StyleParseError);
        expect(() => createStyleLayer({id: 'a', type: 'fill', minzoom: 'low'}, 0)).toThrow(StyleParseError);
        expect(() => createStyleLayer({id: 'a', type: 'fill', paint: []}, 0)).toThrow(StyleParseError);
        expect(() => createStyleLayer({id: 'a', type: 'fill', filter: ['nope']}, 0)).toThrow(FilterParseError);
        expect(() => createStyleLayer({id: 'a', type: 'line', paint: {'line-width': 'wide'}}, 0)).toThrow('line-width: invalid value "wide"');
    });
});

describe('StyleLayer#getColor', () => {
    test('fill color with opacity', () => {
        const layer = createStyleLayer({id: 'a', type: 'fill', paint: {'fill-color': 'red', 'fill-opacity': 0.5}}, 0);
        expect(layer?.getColor(0)).toEqual([1, 0, 0, 0.5]);
    });

    test('returns non-premultiplied components', () => {
        const layer = createStyleLayer({id: 'a', type: 'background', paint: {'background-color': 'rgba(0, 0, 255, 0.5)'}}, 0);
        expect(layer?.getColor(0)).toEqual([0, 0, 1, 0.5]);
    });

    test('opacity follows zoom stops', () => {
        const layer = createStyleLayer({
            id: 'a',
            type: 'line',
            paint: {'line-color': '#00ff00', 'line-opacity': {stops: [[0, 0], [10, 1]]}}
        }, 0);
        expect(layer?.getColor(5)).toEqual([0, 1, 0, 0.5]);
    });

    test('no color', () => {
        expect(createStyleLayer({id: 'a', type: 'fill'}, 0)?.getColor(0)).toBeUndefined();
        expect(createStyleLayer({id: 'a', type: 'raster', paint: {'raster-opacity': 0.5}}, 0)?.getColor(0)).toBeUndefined();
    });
});

describe('StyleLayer#getLineWidth', () => {
    test('interpolates line-width', () => {
        const layer = createStyleLayer({id: 'a', type: 'line', paint: {'line-width': {base: 1, stops: [[10, 1], [20, 11]]}}}, 0);
        expect(layer?.getLineWidth(15)).toBe(6);
        expect(layer?.getLineWidth(30)).toBe(11);
    });

    test('is undefined for other layers', () => {
        expect(createStyleLayer({id: 'a', type: 'fill'}, 0)?.getLineWidth(0)).toBeUndefined();
        expect(createStyleLayer({id: 'a', type: 'line'}, 0)?.getLineWidth(0)).toBeUndefined();
    });
});

describe('StyleLayer#isHidden', () => {
    test('zoom range', () => {
        const layer = createStyleLayer({id: 'a', type: 'fill', minzoom: 5, maxzoom: 10}, 0);
        expect(layer?.isHidden(4)).toBe(true);
        expect(layer?.isHidden(5)).toBe(false);
        expect(layer?.isHidden(9.5)).toBe(false);
        expect(layer?.isHidden(10)).toBe(true);
    });

    test('visibility none', () => {
        const layer = createStyleLayer({id: 'a', type: 'fill', layout: {visibility: 'none'}}, 0);
        expect(layer?.isHidden(3)).toBe(true);
    });
});
