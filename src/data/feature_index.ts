import {EXTENT} from './extent';

import type Point from '@mapbox/point-geometry';
import type {VectorTileFeature} from '@mapbox/vector-tile';

export type BoundingBox = [number, number, number, number];

/**
 * A feature of a tile layer, reduced to its bounding box and properties.
 */
export type IndexedGeometry = {
    layerName: string;
    featureIndex: number;
    type: VectorTileFeature['type'];
    bbox: BoundingBox;
    properties: {[_: string]: string | number | boolean};
};

function boundingBox(geometry: ReadonlyArray<ReadonlyArray<Point>>): BoundingBox | undefined {
    const bbox: BoundingBox = [Infinity, Infinity, -Infinity, -Infinity];
    for (const ring of geometry) {
        for (const p of ring) {
            bbox[0] = Math.min(bbox[0], p.x);
            bbox[1] = Math.min(bbox[1], p.y);
            bbox[2] = Math.max(bbox[2], p.x);
            bbox[3] = Math.max(bbox[3], p.y);
        }
    }
    return bbox[0] <= bbox[2] ? bbox : undefined;
}

/**
 * An in memory index of the features of a tile, used to find the features under
 * a point in tile coordinates.
 */
export class FeatureIndex {
    readonly geometries: Array<IndexedGeometry> = [];

    /**
     * Adds a feature unless its bounding box lies entirely outside the tile.
     *
     * @returns whether the feature was indexed
     */
    insert(layerName: string, feature: VectorTileFeature, featureIndex: number, geometry: ReadonlyArray<ReadonlyArray<Point>> = feature.loadGeometry()): boolean {
        const bbox = boundingBox(geometry);
        if (!bbox ||
            bbox[0] >= EXTENT ||
            bbox[1] >= EXTENT ||
            bbox[2] < 0 ||
            bbox[3] < 0) {
            return false;
        }
        this.geometries.push({
            layerName,
            featureIndex,
            type: feature.type,
            bbox,
            properties: feature.properties
        });
        return true;
    }

    /**
     * Finds the indexed features whose bounding box contains the point.
     */
    query(x: number, y: number, layerName?: string): Array<IndexedGeometry> {
        return this.geometries.filter(geometry =>
            (layerName === undefined || geometry.layerName === layerName) &&
            geometry.bbox[0] <= x && x <= geometry.bbox[2] &&
            geometry.bbox[1] <= y && y <= geometry.bbox[3]);
    }

    get length(): number {
        return this.geometries.length;
    }
}
