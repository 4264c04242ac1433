import type {ComparisonOperator, LegacyFilterExpression} from '.';

/**
 * The array form of a legacy filter, as written in a style document.
 */
export type LegacyFilterArray =
    ['has' | '!has', string] |
    [ComparisonOperator, string, string | number | boolean] |
    ['in' | '!in', string, ...Array<string>] |
    ['all' | 'any' | 'none', ...LegacyFilterArray[]];

/**
 * Converts a parsed legacy filter back into its array form. Integer and float
 * literals both become plain numbers.
 *
 * @example
 * ```ts
 * filterToSpecification(parseFilter(['all', ['has', 'name'], ['==', 'class', 'water']]));
 * // ['all', ['has', 'name'], ['==', 'class', 'water']]
 * ```
 */
export function filterToSpecification(filter: LegacyFilterExpression): LegacyFilterArray {
    switch (filter.type) {
        case 'has':
        case '!has':
            return [filter.type, filter.key];
        case 'comparison':
            return [filter.op, filter.key, filter.literal.value];
        case 'in':
        case '!in':
            return [filter.type, filter.key, ...filter.values];
        case 'all':
        case 'any':
        case 'none':
            return [filter.type, ...filter.filters.map(filterToSpecification)];
    }
}
