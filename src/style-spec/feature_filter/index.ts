import {FilterParseError, UnsupportedOperationError} from '../../util/errors';

/**
 * A typed literal a property is compared against.
 */
export type ComparisonLiteral =
    { kind: 'float'; value: number } |
    { kind: 'integer'; value: number } |
    { kind: 'bool'; value: boolean } |
    { kind: 'string'; value: string };

export type ComparisonOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export type CombiningOperator = 'all' | 'any' | 'none';

/**
 * Parsed form of the legacy array filter syntax, e.g. `['==', 'class', 'water']`.
 */
export type LegacyFilterExpression =
    { type: 'has'; key: string } |
    { type: '!has'; key: string } |
    { type: 'comparison'; op: ComparisonOperator; key: string; literal: ComparisonLiteral } |
    { type: 'in'; key: string; values: Array<string> } |
    { type: '!in'; key: string; values: Array<string> } |
    { type: CombiningOperator; filters: Array<LegacyFilterExpression> };

/**
 * Property bag of a feature, as seen by the filter.
 */
export type FeatureProperties = ReadonlyMap<string, ComparisonLiteral>;

const comparisonOperators: ReadonlyArray<string> = ['==', '!=', '>', '>=', '<', '<='];

function isComparisonOperator(op: string): op is ComparisonOperator {
    return comparisonOperators.indexOf(op) !== -1;
}

/**
 * Converts a property value decoded from a tile into a comparison literal.
 * Integral numbers become `integer`, every other number `float`.
 */
export function toComparisonLiteral(value: unknown): ComparisonLiteral {
    switch (typeof value) {
        case 'boolean':
            return {kind: 'bool', value};
        case 'string':
            return {kind: 'string', value};
        case 'number':
            return Number.isInteger(value) ? {kind: 'integer', value} : {kind: 'float', value};
        case 'bigint':
            return {kind: 'integer', value: Number(value)};
        default:
            throw new UnsupportedOperationError(`unsupported property value: ${describeValue(value)}`);
    }
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (value instanceof Date) return 'date';
    if (value instanceof Uint8Array || value instanceof ArrayBuffer) return 'binary';
    return typeof value;
}

function parseLiteral(value: unknown, filter: ReadonlyArray<unknown>): ComparisonLiteral {
    switch (typeof value) {
        case 'boolean':
        case 'string':
        case 'number':
            return toComparisonLiteral(value);
        default:
            throw new FilterParseError(`invalid comparison value in filter ${JSON.stringify(filter)}`);
    }
}

function parseKey(filter: ReadonlyArray<unknown>): string {
    const key = filter[1];
    if (typeof key !== 'string') {
        throw new FilterParseError(`expected a property name in filter ${JSON.stringify(filter)}`);
    }
    return key;
}

/**
 * Parses a legacy filter from its array form. Nesting under `all`, `any` and `none`
 * is unbounded.
 */
export function parseFilter(filter: unknown): LegacyFilterExpression {
    if (!Array.isArray(filter) || filter.length === 0) {
        throw new FilterParseError(`expected a non-empty array, found ${JSON.stringify(filter)}`);
    }
    const op: unknown = filter[0];
    if (typeof op !== 'string') {
        throw new FilterParseError(`expected a filter operator, found ${JSON.stringify(op)}`);
    }

    switch (op) {
        case 'has':
        case '!has':
            return {type: op, key: parseKey(filter)};
        case 'in':
        case '!in': {
            const key = parseKey(filter);
            const values: Array<string> = [];
            for (const value of filter.slice(2)) {
                if (typeof value !== 'string') {
                    throw new FilterParseError(`membership values must be strings in filter ${JSON.stringify(filter)}`);
                }
                values.push(value);
            }
            return {type: op, key, values};
        }
        case 'all':
        case 'any':
        case 'none':
            return {type: op, filters: filter.slice(1).map(parseFilter)};
        default:
            if (isComparisonOperator(op)) {
                const key = parseKey(filter);
                if (filter.length < 3) {
                    throw new FilterParseError(`missing comparison value in filter ${JSON.stringify(filter)}`);
                }
                return {type: 'comparison', op, key, literal: parseLiteral(filter[2], filter)};
            }
            throw new FilterParseError(`unknown filter operator "${op}"`);
    }
}

function literalsEqual(a: ComparisonLiteral, b: ComparisonLiteral): boolean {
    return a.kind === b.kind && a.value === b.value;
}

function compareOrdered(op: '>' | '>=' | '<' | '<=', a: ComparisonLiteral, b: ComparisonLiteral): boolean {
    if ((a.kind === 'integer' || a.kind === 'float') && (b.kind === 'integer' || b.kind === 'float')) {
        return compareValues(op, a.value, b.value);
    }
    if (a.kind === 'string' && b.kind === 'string') {
        return compareValues(op, a.value, b.value);
    }
    return false;
}

function compareValues<T extends number | string>(op: '>' | '>=' | '<' | '<=', left: T, right: T): boolean {
    switch (op) {
        case '>': return left > right;
        case '>=': return left >= right;
        case '<': return left < right;
        case '<=': return left <= right;
    }
}

function membership(key: string, values: ReadonlyArray<string>, properties: FeatureProperties): boolean | undefined {
    const value = properties.get(key);
    if (value === undefined) return undefined;
    if (value.kind !== 'string') {
        throw new UnsupportedOperationError(`membership test on ${value.kind} property "${key}"`);
    }
    return values.indexOf(value.value) !== -1;
}

/**
 * Evaluates a legacy filter against the properties of a feature.
 *
 * Comparisons and membership tests on an absent property are false. Ordering
 * operators only compare numbers with numbers and strings with strings.
 */
export function evaluateFilter(filter: LegacyFilterExpression, properties: FeatureProperties): boolean {
    switch (filter.type) {
        case 'has':
            return properties.has(filter.key);
        case '!has':
            return !properties.has(filter.key);
        case 'comparison': {
            const value = properties.get(filter.key);
            if (value === undefined) return false;
            switch (filter.op) {
                case '==': return literalsEqual(value, filter.literal);
                case '!=': return !literalsEqual(value, filter.literal);
                default: return compareOrdered(filter.op, value, filter.literal);
            }
        }
        case 'in':
            return membership(filter.key, filter.values, properties) === true;
        case '!in':
            return membership(filter.key, filter.values, properties) === false;
        case 'all':
            return filter.filters.every(f => evaluateFilter(f, properties));
        case 'any':
            return filter.filters.some(f => evaluateFilter(f, properties));
        case 'none':
            return !filter.filters.some(f => evaluateFilter(f, properties));
    }
}

export {filterToSpecification} from './convert';
export type {LegacyFilterArray} from './convert';
