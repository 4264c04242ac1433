import {interpolates} from '@maplibre/maplibre-gl-style-spec';
import {diagnostics as defaultDiagnostics, type Diagnostics} from '../../util/diagnostics';
import {StyleParseError} from '../../util/errors';

/**
 * A `[zoom, value]` anchor of a zoom function.
 */
export type Stop<T> = [number, T];

/**
 * A paint value that is either fixed or a function of zoom.
 */
export type InterpolatedQuantity<T> = T | {
    base: number;
    stops: Array<Stop<T>>;
};

export type Interpolator<T> = (from: T, to: T, t: number) => T;

/**
 * Returns the interpolation factor of `progress` across a zoom span of `span`.
 * With a base of 1 the curve is linear, otherwise exponential.
 *
 * @param base - the rate at which the output increases
 * @param progress - zoom distance from the lower stop
 * @param span - zoom distance between the two stops
 */
export function interpolationFactor(base: number, progress: number, span: number): number {
    if (span === 0) {
        return 0;
    } else if (base === 1) {
        return progress / span;
    } else {
        return (Math.pow(base, progress) - 1) / (Math.pow(base, span) - 1);
    }
}

function isZoomFunction<T>(quantity: InterpolatedQuantity<T>): quantity is {base: number; stops: Array<Stop<T>>} {
    return typeof quantity === 'object' && quantity !== null && 'stops' in quantity;
}

/**
 * Resolves a quantity at `zoom` with a custom interpolator, e.g. `interpolates.color`.
 * Stops are expected in ascending zoom order.
 *
 * @returns the resolved value, or `undefined` for a function without stops
 */
export function interpolateWith<T>(
    quantity: InterpolatedQuantity<T>,
    zoom: number,
    interpolator: Interpolator<T>,
    diagnostics: Diagnostics = defaultDiagnostics
): T | undefined {
    if (!isZoomFunction(quantity)) return quantity;

    const stops = quantity.stops;
    if (stops.length === 0) {
        diagnostics.warn('interpolate.empty-stops', {zoom});
        return undefined;
    }

    for (let i = 0; i < stops.length - 1; i++) {
        const [lowerZoom, lowerValue] = stops[i];
        const [upperZoom, upperValue] = stops[i + 1];
        if (lowerZoom <= zoom && zoom <= upperZoom) {
            const t = interpolationFactor(quantity.base, zoom - lowerZoom, upperZoom - lowerZoom);
            if (t === 0) return lowerValue;
            if (t === 1) return upperValue;
            return interpolator(lowerValue, upperValue, t);
        }
    }

    return zoom <= stops[0][0] ? stops[0][1] : stops[stops.length - 1][1];
}

/**
 * Resolves a numeric quantity at `zoom`.
 */
export function interpolate(quantity: InterpolatedQuantity<number>, zoom: number, diagnostics?: Diagnostics): number | undefined {
    return interpolateWith(quantity, zoom, interpolates.number, diagnostics);
}

/**
 * Reads a numeric quantity from a style document: either a number or
 * `{base?, stops}`, `base` defaulting to 1.
 */
export function parseInterpolatedQuantity(value: unknown, name: string = 'value'): InterpolatedQuantity<number> {
    return parseQuantity(value, name, (v) => typeof v === 'number' && isFinite(v) ? v : undefined);
}

/**
 * Reads a quantity whose values are parsed by `parseValue`, which returns `undefined`
 * for a value it does not accept.
 */
export function parseQuantity<T>(value: unknown, name: string, parseValue: (value: unknown) => T | undefined): InterpolatedQuantity<T> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        const parsed = parseValue(value);
        if (parsed === undefined) {
            throw new StyleParseError(`${name}: invalid value ${JSON.stringify(value)}`);
        }
        return parsed;
    }

    const base: unknown = 'base' in value ? value.base : 1;
    if (typeof base !== 'number' || !(base > 0)) {
        throw new StyleParseError(`${name}: base must be a positive number`);
    }
    const stops: unknown = 'stops' in value ? value.stops : undefined;
    if (!Array.isArray(stops)) {
        throw new StyleParseError(`${name}: expected a stops array`);
    }

    const parsedStops: Array<Stop<T>> = [];
    for (const stop of stops) {
        if (!Array.isArray(stop) || stop.length !== 2 || typeof stop[0] !== 'number') {
            throw new StyleParseError(`${name}: each stop must be a [zoom, value] pair`);
        }
        const stopValue = parseValue(stop[1]);
        if (stopValue === undefined) {
            throw new StyleParseError(`${name}: invalid stop value ${JSON.stringify(stop[1])}`);
        }
        parsedStops.push([stop[0], stopValue]);
    }
    return {base, stops: parsedStops};
}
