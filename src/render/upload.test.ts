import {describe, test, expect} from 'vitest';
import {buildFeatureStyles, uploadTessellatedLayers} from './upload';
import {VectorBufferPool} from './buffer_pool';
import {Style} from '../style/style';
import {TileComponentStore} from '../tile/tile_store';
import {VectorLayersDataComponent, type VectorLayerData} from '../tile/tile_components';
import {WorldTileCoords} from '../tile/tile_id';
import {DiagnosticEvent, Diagnostics} from '../util/diagnostics';
import {type Event} from '../util/evented';

import type {VertexBuffers} from '../data/tessellator';

const coords = new WorldTileCoords(0, 0, 0);

function quad(): VertexBuffers {
    return {
        vertices: new Float32Array([0, 0, 0, 0, 1, 0, 0, 0, 1, 1, 0, 0, 0, 1, 0, 0]),
        indices: new Uint32Array([0, 1, 2, 0, 2, 3])
    };
}

function storeWith(layers: Array<VectorLayerData>): TileComponentStore {
    const store = new TileComponentStore();
    store.spawn(coords)?.insert(new VectorLayersDataComponent(layers));
    return store;
}

function recordDiagnostics(): {diagnostics: Diagnostics; events: Array<DiagnosticEvent>} {
    const diagnostics = new Diagnostics();
    const events: Array<DiagnosticEvent> = [];
    diagnostics.on('diagnostic', (event: Event) => {
        if (event instanceof DiagnosticEvent) events.push(event);
    });
    return {diagnostics, events};
}

describe('buildFeatureStyles', () => {
    test('repeats the style per feature index count', () => {
        const styles = buildFeatureStyles([2, 0, 1], [1, 0, 0, 1], 3);
        expect(styles).toEqual([
            {color: [1, 0, 0, 1], width: 3},
            {color: [1, 0, 0, 1], width: 3},
            {color: [1, 0, 0, 1], width: 3}
        ]);
        expect(buildFeatureStyles([], [1, 0, 0, 1], 3)).toEqual([]);
    });
});

describe('uploadTessellatedLayers', () => {
    const style = Style.fromJSON({
        layers: [
            {id: 'bg', type: 'background', paint: {'background-color': '#ff0000'}},
            {id: 'water', type: 'fill', source: 'tiles', 'source-layer': 'water', paint: {'fill-color': '#0000ff', 'fill-opacity': 0.5}},
            {id: 'roads', type: 'line', source: 'tiles', 'source-layer': 'roads', paint: {'line-color': '#000000', 'line-width': 3}},
            {id: 'imagery', type: 'raster', source: 'satellite'},
            {id: 'parks', type: 'fill', source: 'tiles', 'source-layer': 'parks', paint: {'fill-color': '#00ff00'}}
        ]
    });

    test('allocates every drawable layer once', () => {
        const store = storeWith([
            {kind: 'available', coords, buffer: quad(), featureIndices: [6], styleLayerId: 'water'},
            {kind: 'available', coords, buffer: {vertices: new Float32Array(0), indices: new Uint32Array(0)}, featureIndices: [], styleLayerId: 'roads'},
            {kind: 'missing', layerName: 'parks'}
        ]);
        const pool = new VectorBufferPool();
        const {diagnostics, events} = recordDiagnostics();

        expect(uploadTessellatedLayers(store, style, [coords], pool, diagnostics)).toBe(2);
        expect(pool.getLayers(coords).map(layer => layer.styleLayer.id)).toEqual(['bg', 'water']);
        expect(pool.featureStyles).toHaveLength(12);
        expect(pool.featureStyles[0]).toEqual({color: [1, 0, 0, 1], width: 0});
        expect(pool.featureStyles[6]).toEqual({color: [0, 0, 1, 0.5], width: 0});

        const warnings = events.filter(event => event.level === 'warn');
        expect(warnings.map(event => event.name)).toEqual(['upload.layer-without-color']);
        expect(warnings[0].fields).toEqual({layer: 'imagery', source: undefined});

        expect(uploadTessellatedLayers(store, style, [coords], pool, diagnostics)).toBe(0);
        expect(pool.featureStyles).toHaveLength(12);
    });

    test('resolves the line width at the tile zoom', () => {
        const roadStyle = Style.fromJSON({
            layers: [{
                id: 'roads',
                type: 'line',
                'source-layer': 'roads',
                paint: {'line-color': '#000000', 'line-width': {base: 1, stops: [[0, 2], [4, 10]]}}
            }]
        });
        const tile = new WorldTileCoords(1, 1, 2);
        const store = new TileComponentStore();
        store.spawn(tile)?.insert(new VectorLayersDataComponent([
            {kind: 'available', coords: tile, buffer: quad(), featureIndices: [6], styleLayerId: 'roads'}
        ]));
        const pool = new VectorBufferPool();

        expect(uploadTessellatedLayers(store, roadStyle, [tile], pool, new Diagnostics())).toBe(1);
        expect(pool.featureStyles[0]).toEqual({color: [0, 0, 0, 1], width: 6});
    });

    test('skips hidden layers', () => {
        const hidden = Style.fromJSON({
            layers: [{id: 'bg', type: 'background', minzoom: 5, paint: {'background-color': '#ff0000'}}]
        });
        const pool = new VectorBufferPool();
        expect(uploadTessellatedLayers(new TileComponentStore(), hidden, [coords], pool, new Diagnostics())).toBe(0);
        expect(pool.getLoadedLayersAt(coords)).toBeUndefined();
    });
});
