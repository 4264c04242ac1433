import {classifyRings} from '@maplibre/maplibre-gl-style-spec';
import {config} from '../util/config';

import type Point from '@mapbox/point-geometry';
import type {VectorTileFeature} from '@mapbox/vector-tile';
import type {GeometryProcessor} from './tessellator';

function emitPath(processor: GeometryProcessor, path: ReadonlyArray<Point>) {
    for (const point of path) {
        processor.xy(point.x, point.y);
    }
}

function emitPolygon(processor: GeometryProcessor, polygon: ReadonlyArray<ReadonlyArray<Point>>, tagged: boolean) {
    processor.polygonBegin(tagged, polygon.length);
    for (const ring of polygon) {
        processor.lineStringBegin(false, ring.length);
        emitPath(processor, ring);
        processor.lineStringEnd(false);
    }
    processor.polygonEnd(tagged);
}

/**
 * Replays a decoded tile feature into a geometry processor: its properties first,
 * then its geometry. Polygon rings are grouped into polygons by winding order.
 *
 * @param index - position of the feature in its layer
 */
export function emitFeature(feature: VectorTileFeature, index: number, processor: GeometryProcessor) {
    processor.featureBegin(index);

    const properties = feature.properties;
    for (const name of Object.keys(properties)) {
        processor.property(name, properties[name]);
    }

    const geometry = feature.loadGeometry();

    switch (feature.type) {
        case 1: {
            const points: Array<Point> = [];
            for (const ring of geometry) points.push(...ring);
            if (points.length === 1) {
                processor.pointBegin();
                emitPath(processor, points);
                processor.pointEnd();
            } else if (points.length > 1) {
                processor.multiPointBegin(points.length);
                emitPath(processor, points);
                processor.multiPointEnd();
            }
            break;
        }
        case 2: {
            if (geometry.length === 1) {
                processor.lineStringBegin(true, geometry[0].length);
                emitPath(processor, geometry[0]);
                processor.lineStringEnd(true);
            } else if (geometry.length > 1) {
                processor.multiLineStringBegin(geometry.length);
                for (const line of geometry) {
                    processor.lineStringBegin(false, line.length);
                    emitPath(processor, line);
                    processor.lineStringEnd(false);
                }
                processor.multiLineStringEnd();
            }
            break;
        }
        case 3: {
            const polygons = classifyRings(geometry, config.EARCUT_MAX_RINGS);
            if (polygons.length === 1) {
                emitPolygon(processor, polygons[0], true);
            } else if (polygons.length > 1) {
                processor.multiPolygonBegin(polygons.length);
                for (const polygon of polygons) {
                    emitPolygon(processor, polygon, false);
                }
                processor.multiPolygonEnd();
            }
            break;
        }
    }

    processor.featureEnd(index);
}
