import {isInBoundsForTileZoomXY} from '../util/world_bounds';

/**
 * A tile address in the global tile pyramid.
 *
 * Construction never fails; coordinates outside the pyramid simply have no quadkey,
 * and a store refuses to hold them.
 */
export class WorldTileCoords {
    readonly x: number;
    readonly y: number;
    readonly z: number;

    constructor(x: number, y: number, z: number) {
        this.x = x;
        this.y = y;
        this.z = z;
    }

    /**
     * The quadkey of this tile: one base-4 digit per zoom level, the root tile being
     * the empty string. An ancestor's quadkey is a strict prefix of its descendants'.
     *
     * @returns the quadkey, or `undefined` if the coordinate is outside the pyramid
     */
    buildQuadkey(): string | undefined {
        if (!isInBoundsForTileZoomXY(this.z, this.x, this.y)) return undefined;
        return getQuadkey(this.z, this.x, this.y);
    }

    isValid(): boolean {
        return isInBoundsForTileZoomXY(this.z, this.x, this.y);
    }

    equals(coords: WorldTileCoords) {
        return this.z === coords.z && this.x === coords.x && this.y === coords.y;
    }

    isChildOf(parent: WorldTileCoords) {
        const dz = this.z - parent.z;
        if (dz <= 0) return false;
        // every tile descends from the root
        if (parent.z === 0) return true;
        return parent.x === Math.floor(this.x / Math.pow(2, dz)) && parent.y === Math.floor(this.y / Math.pow(2, dz));
    }

    parent(): WorldTileCoords | undefined {
        if (this.z === 0) return undefined;
        return new WorldTileCoords(Math.floor(this.x / 2), Math.floor(this.y / 2), this.z - 1);
    }

    children(): Array<WorldTileCoords> {
        const z = this.z + 1;
        const x = this.x * 2;
        const y = this.y * 2;
        return [
            new WorldTileCoords(x, y, z),
            new WorldTileCoords(x + 1, y, z),
            new WorldTileCoords(x, y + 1, z),
            new WorldTileCoords(x + 1, y + 1, z)
        ];
    }

    /**
     * Fills a tile URL template. Supports `{z}`, `{x}`, `{y}` and `{quadkey}`;
     * with the `tms` scheme the y axis is flipped.
     */
    url(template: string, scheme?: 'xyz' | 'tms') {
        return template
            .replace(/{z}/g, String(this.z))
            .replace(/{x}/g, String(this.x))
            .replace(/{y}/g, String(scheme === 'tms' ? (Math.pow(2, this.z) - this.y - 1) : this.y))
            .replace(/{quadkey}/g, getQuadkey(this.z, this.x, this.y));
    }

    toString() {
        return `${this.z}/${this.x}/${this.y}`;
    }
}

/**
 * Identity record of a tile held by the store.
 */
export type Tile = {
    readonly coords: WorldTileCoords;
};

export function getQuadkey(z: number, x: number, y: number): string {
    let quadkey = '';
    for (let i = z; i > 0; i--) {
        const mask = Math.pow(2, i - 1);
        const xBit = Math.floor(x / mask) % 2;
        const yBit = Math.floor(y / mask) % 2;
        quadkey += xBit + yBit * 2;
    }
    return quadkey;
}

/**
 * Orders coordinates by quadkey, placing ancestors before their descendants.
 * Coordinates without a quadkey sort last.
 */
export function compareByQuadkey(a: WorldTileCoords, b: WorldTileCoords): number {
    const ka = a.buildQuadkey();
    const kb = b.buildQuadkey();
    if (ka === undefined || kb === undefined) {
        return (ka === undefined ? 1 : 0) - (kb === undefined ? 1 : 0);
    }
    return ka < kb ? -1 : ka > kb ? 1 : 0;
}
