import {validateStyleMin} from '@maplibre/maplibre-gl-style-spec';
import {StyleParseError} from '../util/errors';

type ValidationError = {
    message: string;
    line: number;
    identifier?: string;
};

type ValidateStyle = (style: unknown) => ReadonlyArray<ValidationError>;

export const validateStyle = (validateStyleMin as unknown as ValidateStyle);

/**
 * Throws a `StyleParseError` listing every validation message, if there are any.
 */
export function throwValidationErrors(errors?: ReadonlyArray<{message: string}> | null) {
    if (errors && errors.length) {
        throw new StyleParseError(errors.map(error => error.message).join('\n'));
    }
}
