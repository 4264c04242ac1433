import earcut from 'earcut';
import {config} from '../util/config';
import {TessellationError} from '../util/errors';
import {diagnostics as defaultDiagnostics, type Diagnostics} from '../util/diagnostics';
import {
    evaluateFilter,
    toComparisonLiteral,
    type ComparisonLiteral,
    type LegacyFilterExpression
} from '../style-spec/feature_filter';

/**
 * Number of floats per vertex: position `x, y` and extrusion normal `nx, ny`.
 */
export const VERTEX_SIZE = 4;

/**
 * Vertex and index data of a tessellated layer. Indices form a triangle list.
 */
export type VertexBuffers = {
    vertices: Float32Array;
    indices: Uint32Array;
};

export type TessellationResult = {
    buffer: VertexBuffers;
    /**
     * Number of indices contributed by each feature that passed the filter, in
     * processing order.
     */
    featureIndices: Array<number>;
};

/**
 * Receives a feature as a stream of events: `featureBegin`, its properties, its
 * geometry, then `featureEnd`. Geometry coordinates arrive through `xy` between the
 * begin and end events of a point, line or polygon. Rings of a polygon arrive as
 * untagged line strings. A `tagged` line string or polygon is a geometry of its own
 * rather than a member of a multi-geometry.
 */
export interface GeometryProcessor {
    featureBegin(index: number): void;
    property(name: string, value: unknown): void;
    featureEnd(index: number): void;

    xy(x: number, y: number): void;

    pointBegin(): void;
    pointEnd(): void;
    multiPointBegin(size: number): void;
    multiPointEnd(): void;

    lineStringBegin(tagged: boolean, size: number): void;
    lineStringEnd(tagged: boolean): void;
    multiLineStringBegin(size: number): void;
    multiLineStringEnd(): void;

    polygonBegin(tagged: boolean, size: number): void;
    polygonEnd(tagged: boolean): void;
    multiPolygonBegin(size: number): void;
    multiPolygonEnd(): void;
}

type Vec2 = [number, number];
type Ring = Array<Vec2>;

function removeClosePoints(path: ReadonlyArray<Vec2>, tolerance: number): Ring {
    const result: Ring = [];
    for (const point of path) {
        const last = result[result.length - 1];
        if (last && Math.hypot(point[0] - last[0], point[1] - last[1]) < tolerance) continue;
        result.push(point);
    }
    return result;
}

/**
 * Turns the geometry of a layer's features into vertex and index buffers, skipping
 * features rejected by the layer filter.
 *
 * Lines are stroked into one quad per segment, each vertex carrying the segment
 * normal so the width can be applied at draw time. Polygons are triangulated with
 * earcut, each polygon of a multipolygon on its own: overlapping parts are filled
 * twice rather than merged under a non-zero fill rule.
 */
export class Tessellator implements GeometryProcessor {
    readonly filter?: LegacyFilterExpression;
    diagnostics: Diagnostics;

    _vertices: Array<number> = [];
    _indices: Array<number> = [];
    _featureIndices: Array<number> = [];
    _currentIndex: number = 0;

    _properties: Map<string, ComparisonLiteral> = new Map();
    _filtered: boolean = false;

    _path: Ring | null = null;
    _pointDepth: number = 0;
    _polygonDepth: number = 0;
    _lines: Array<Ring> = [];
    _rings: Array<Ring> = [];
    _polygons: Array<Array<Ring>> = [];

    constructor(filter?: LegacyFilterExpression, diagnostics: Diagnostics = defaultDiagnostics) {
        this.filter = filter;
        this.diagnostics = diagnostics;
    }

    featureBegin(_index: number) {
        this._properties.clear();
        this._filtered = false;
    }

    property(name: string, value: unknown) {
        this._properties.set(name, toComparisonLiteral(value));
    }

    featureEnd(_index: number) {
        if (!this._filtered) {
            const nextIndex = this._indices.length;
            this._featureIndices.push(nextIndex - this._currentIndex);
            this._currentIndex = nextIndex;
        }
    }

    xy(x: number, y: number) {
        if (this._pointDepth > 0) return;
        if (!isFinite(x) || !isFinite(y)) {
            throw new TessellationError(`invalid coordinate (${x}, ${y})`);
        }
        const point: Vec2 = [Math.fround(x), Math.fround(y)];
        if (this._path) {
            this._path.push(point);
        } else {
            this._path = [point];
        }
    }

    pointBegin() {
        this._pointDepth++;
    }

    pointEnd() {
        this._pointDepth--;
    }

    multiPointBegin(_size: number) {
        this._pointDepth++;
    }

    multiPointEnd() {
        this._pointDepth--;
    }

    lineStringBegin(_tagged: boolean, _size: number) {}

    lineStringEnd(tagged: boolean) {
        this._endPath();
        if (tagged) {
            this._tessellateStrokes();
        }
    }

    multiLineStringBegin(_size: number) {}

    multiLineStringEnd() {
        this._tessellateStrokes();
    }

    polygonBegin(_tagged: boolean, _size: number) {
        this._polygonDepth++;
    }

    polygonEnd(tagged: boolean) {
        this._endPath();
        this._polygonDepth--;
        if (this._rings.length > 0) {
            this._polygons.push(this._rings);
            this._rings = [];
        }
        if (tagged) {
            this._tessellateFill();
        }
    }

    multiPolygonBegin(_size: number) {}

    multiPolygonEnd() {
        this._tessellateFill();
    }

    /**
     * Returns the buffers and the feature index ledger built so far.
     */
    finish(): TessellationResult {
        return {
            buffer: {
                vertices: new Float32Array(this._vertices),
                indices: new Uint32Array(this._indices)
            },
            featureIndices: this._featureIndices.slice()
        };
    }

    // Closes the open sub-path: a ring inside a polygon, a line otherwise.
    _endPath() {
        const path = this._path;
        if (!path) return;
        this._path = null;
        if (this._polygonDepth > 0) {
            this._rings.push(path);
        } else {
            this._lines.push(path);
        }
    }

    _matchesFilter(geometryType: 'LineString' | 'Polygon'): boolean {
        this._properties.set('$type', {kind: 'string', value: geometryType});
        if (!this.filter || evaluateFilter(this.filter, this._properties)) return true;
        this._filtered = true;
        this.diagnostics.debug('tessellator.feature-filtered', {type: geometryType});
        return false;
    }

    _tessellateStrokes() {
        const lines = this._lines;
        this._lines = [];
        if (!this._matchesFilter('LineString')) return;

        const halfWidth = config.LINE_HALF_WIDTH;
        for (const line of lines) {
            const points = removeClosePoints(line, config.TESSELLATION_TOLERANCE);
            for (let i = 0; i < points.length - 1; i++) {
                const [ax, ay] = points[i];
                const [bx, by] = points[i + 1];
                const length = Math.hypot(bx - ax, by - ay);
                if (length === 0) continue;
                const nx = (ay - by) / length * halfWidth;
                const ny = (bx - ax) / length * halfWidth;

                const base = this._vertices.length / VERTEX_SIZE;
                this._vertices.push(
                    ax, ay, nx, ny,
                    ax, ay, -nx, -ny,
                    bx, by, nx, ny,
                    bx, by, -nx, -ny
                );
                this._indices.push(
                    base, base + 1, base + 2,
                    base + 1, base + 3, base + 2
                );
            }
        }
    }

    _tessellateFill() {
        const polygons = this._polygons;
        this._polygons = [];
        if (!this._matchesFilter('Polygon')) return;

        for (const polygon of polygons) {
            const flattened: Array<number> = [];
            const holeIndices: Array<number> = [];

            for (const ring of polygon) {
                const points = removeClosePoints(ring, config.TESSELLATION_TOLERANCE);
                const first = points[0];
                const last = points[points.length - 1];
                if (points.length > 1 && first[0] === last[0] && first[1] === last[1]) {
                    points.pop();
                }
                if (points.length < 3) {
                    // a degenerate outer ring drops the whole polygon
                    if (flattened.length === 0) break;
                    continue;
                }
                if (flattened.length > 0) {
                    holeIndices.push(flattened.length / 2);
                }
                for (const [x, y] of points) {
                    flattened.push(x, y);
                }
            }
            if (flattened.length === 0) continue;

            const base = this._vertices.length / VERTEX_SIZE;
            for (let i = 0; i < flattened.length; i += 2) {
                this._vertices.push(flattened[i], flattened[i + 1], 0, 0);
            }
            for (const index of earcut(flattened, holeIndices)) {
                this._indices.push(base + index);
            }
        }
    }
}
