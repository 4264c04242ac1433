import {Tessellator} from '../data/tessellator';
import {EXTENT} from '../data/extent';
import {TileNotFoundError} from '../util/errors';
import {compareByQuadkey, WorldTileCoords, type Tile} from './tile_id';
import {QuerySession} from './query_session';
import {
    VectorLayersDataComponent,
    type AvailableVectorLayerData,
    type ComponentClass
} from './tile_components';

/**
 * Tells which style layers have already been loaded for a tile.
 */
export interface LoadedLayerIndex {
    getLoadedLayersAt(coords: WorldTileCoords): ReadonlySet<string> | undefined;
}

/**
 * A request for one component of a composite query.
 */
export type ComponentRequest<T extends object> = {
    component: ComponentClass<T>;
    exclusive: boolean;
};

/**
 * Requests a shared view of a component.
 */
export function read<T extends object>(component: ComponentClass<T>): ComponentRequest<T> {
    return {component, exclusive: false};
}

/**
 * Requests exclusive access to a component.
 */
export function write<T extends object>(component: ComponentClass<T>): ComponentRequest<T> {
    return {component, exclusive: true};
}

/**
 * Handle of a spawned tile, used to attach components.
 */
export class TileSpawnResult {
    readonly tile: Tile;
    readonly quadkey: string;
    _store: TileComponentStore;

    constructor(store: TileComponentStore, tile: Tile, quadkey: string) {
        this._store = store;
        this.tile = tile;
        this.quadkey = quadkey;
    }

    insert(component: object): this {
        this._store.attach(this, component);
        return this;
    }
}

function tessellateBackground(): AvailableVectorLayerData {
    const tessellator = new Tessellator();
    tessellator.featureBegin(1);
    tessellator.polygonBegin(true, 4);
    tessellator.xy(0, 0);
    tessellator.xy(0, EXTENT);
    tessellator.xy(EXTENT, EXTENT);
    tessellator.xy(EXTENT, 0);
    tessellator.polygonEnd(true);
    tessellator.featureEnd(1);

    const {buffer, featureIndices} = tessellator.finish();
    return {coords: new WorldTileCoords(0, 0, 0), buffer, featureIndices, styleLayerId: 'background'};
}

/**
 * Holds the tiles known to the pipeline and the components attached to each, keyed
 * by quadkey.
 */
export class TileComponentStore {
    _tiles: Record<string, Tile> = {};
    _components: Record<string, Array<object>> = {};
    /**
     * A quad covering the full tile extent, drawn for layers without a source layer.
     */
    readonly background: AvailableVectorLayerData;

    constructor() {
        this.background = tessellateBackground();
    }

    /**
     * Adds a tile, or returns the handle of the existing one.
     *
     * @returns the handle, or `undefined` if the coordinates are outside the pyramid
     */
    spawn(coords: WorldTileCoords): TileSpawnResult | undefined {
        const quadkey = coords.buildQuadkey();
        if (quadkey === undefined) return undefined;
        let tile = this._tiles[quadkey];
        if (!tile) {
            tile = {coords};
            this._tiles[quadkey] = tile;
            this._components[quadkey] = [];
        }
        return new TileSpawnResult(this, tile, quadkey);
    }

    /**
     * @throws {TileNotFoundError} if the tile has been removed since it was spawned
     */
    attach(handle: TileSpawnResult, component: object) {
        const components = this._components[handle.quadkey];
        if (!components || this._tiles[handle.quadkey] !== handle.tile) {
            throw new TileNotFoundError(`cannot attach ${component.constructor.name} to ${handle.tile.coords}: tile does not exist`);
        }
        components.push(component);
    }

    /**
     * Removes every component of the given class from a tile.
     *
     * @returns the number of removed components
     */
    detach(coords: WorldTileCoords, component: ComponentClass<object>): number {
        const quadkey = coords.buildQuadkey();
        if (quadkey === undefined) return 0;
        const components = this._components[quadkey];
        if (!components) return 0;
        const kept = components.filter(value => !(value instanceof component));
        this._components[quadkey] = kept;
        return components.length - kept.length;
    }

    exists(coords: WorldTileCoords): boolean {
        const quadkey = coords.buildQuadkey();
        return quadkey !== undefined && quadkey in this._tiles;
    }

    getTile(coords: WorldTileCoords): Tile | undefined {
        const quadkey = coords.buildQuadkey();
        return quadkey === undefined ? undefined : this._tiles[quadkey];
    }

    /**
     * All tiles, ancestors before their descendants.
     */
    getTilesSorted(): Array<Tile> {
        return Object.keys(this._tiles)
            .map(quadkey => this._tiles[quadkey])
            .sort((a, b) => compareByQuadkey(a.coords, b.coords));
    }

    /**
     * The first component of the tile that is an instance of `component`.
     */
    query<T extends object>(coords: WorldTileCoords, component: ComponentClass<T>): Readonly<T> | undefined {
        return this._find(coords, component);
    }

    queryMut<T extends object>(coords: WorldTileCoords, component: ComponentClass<T>): T | undefined {
        const session = this.session();
        try {
            return session.queryMut(coords, component);
        } finally {
            session.end();
        }
    }

    /**
     * Looks up several components of one tile at once. Either every requested
     * component is found or the result is `undefined`.
     *
     * @throws {ComponentBorrowError} if the same class is requested for writing twice
     */
    queryMany<A extends object>(coords: WorldTileCoords, requests: [ComponentRequest<A>]): [A] | undefined;
    queryMany<A extends object, B extends object>(coords: WorldTileCoords, requests: [ComponentRequest<A>, ComponentRequest<B>]): [A, B] | undefined;
    queryMany<A extends object, B extends object, C extends object>(coords: WorldTileCoords, requests: [ComponentRequest<A>, ComponentRequest<B>, ComponentRequest<C>]): [A, B, C] | undefined;
    queryMany(coords: WorldTileCoords, requests: ReadonlyArray<ComponentRequest<object>>): Array<object> | undefined {
        const session = this.session();
        try {
            const result: Array<object> = [];
            for (const request of requests) {
                if (request.exclusive) session.borrow(request.component);
                const value = this._find(coords, request.component);
                if (value === undefined) return undefined;
                result.push(value);
            }
            return result;
        } finally {
            session.end();
        }
    }

    /**
     * Opens a session whose exclusive borrows are held until `end()`.
     */
    session(): QuerySession {
        return new QuerySession(this);
    }

    /**
     * Finds the data to upload for a style layer of a tile, skipping layers the
     * pool already holds. A style layer without a source layer gets the shared
     * background quad.
     */
    findLayer(
        coords: WorldTileCoords,
        sourceLayer: string | undefined,
        styleLayerId: string,
        loadedLayers: LoadedLayerIndex
    ): AvailableVectorLayerData | undefined {
        const loaded = loadedLayers.getLoadedLayersAt(coords);
        if (loaded && loaded.has(styleLayerId)) return undefined;

        if (sourceLayer !== undefined) {
            return this.query(coords, VectorLayersDataComponent)?.getAvailable(styleLayerId);
        }
        return {...this.background, styleLayerId};
    }

    clear() {
        this._tiles = {};
        this._components = {};
    }

    _find<T extends object>(coords: WorldTileCoords, component: ComponentClass<T>): T | undefined {
        const quadkey = coords.buildQuadkey();
        if (quadkey === undefined) return undefined;
        const components = this._components[quadkey];
        if (!components) return undefined;
        for (const value of components) {
            if (value instanceof component) return value;
        }
        return undefined;
    }
}
