import {ComponentBorrowError} from '../util/errors';

import type {ComponentClass} from './tile_components';
import type {TileComponentStore} from './tile_store';
import type {WorldTileCoords} from './tile_id';

/**
 * Scope of a multi-step query. While a session is open, each component class can
 * be borrowed exclusively at most once; shared reads are unrestricted.
 *
 * @example
 * ```ts
 * const session = store.session();
 * try {
 *     const layers = session.queryMut(coords, VectorLayersDataComponent);
 *     const index = session.query(coords, TileIndexComponent);
 * } finally {
 *     session.end();
 * }
 * ```
 */
export class QuerySession {
    _store: TileComponentStore;
    _exclusive: Set<ComponentClass<object>> = new Set();
    _ended: boolean = false;

    constructor(store: TileComponentStore) {
        this._store = store;
    }

    query<T extends object>(coords: WorldTileCoords, component: ComponentClass<T>): Readonly<T> | undefined {
        this._checkOpen();
        return this._store._find(coords, component);
    }

    /**
     * @throws {ComponentBorrowError} if the class is already borrowed exclusively in this session
     */
    queryMut<T extends object>(coords: WorldTileCoords, component: ComponentClass<T>): T | undefined {
        this._checkOpen();
        this.borrow(component);
        return this._store._find(coords, component);
    }

    borrow(component: ComponentClass<object>) {
        if (this._exclusive.has(component)) {
            throw new ComponentBorrowError(`${component.name} is already borrowed mutably`);
        }
        this._exclusive.add(component);
    }

    get ended(): boolean {
        return this._ended;
    }

    /**
     * Releases every borrow. The session cannot be used afterwards.
     */
    end() {
        this._exclusive.clear();
        this._ended = true;
    }

    _checkOpen() {
        if (this._ended) {
            throw new ComponentBorrowError('query session has ended');
        }
    }
}
