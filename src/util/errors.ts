/**
 * Base class for the errors raised by the tile pipeline. Keeps the stack of a wrapped
 * error so the original failure site stays visible.
 */
export class TilePipelineError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message);
        if (cause instanceof Error && cause.stack) {
            this.stack = cause.stack;
        }
    }
}

/**
 * Raised when tile bytes cannot be decoded. Fatal for the whole tile request.
 */
export class TileDecodeError extends TilePipelineError {
    name = 'TileDecodeError';
}

/**
 * Raised when a geometry cannot be tessellated. Recovered per style layer.
 */
export class TessellationError extends TilePipelineError {
    name = 'TessellationError';
}

/**
 * Raised when a filter meets a property value it cannot handle, such as a
 * membership test on a non-string value or a binary property.
 */
export class UnsupportedOperationError extends TilePipelineError {
    name = 'UnsupportedOperationError';
}

/**
 * Raised when a legacy filter array is malformed.
 */
export class FilterParseError extends TilePipelineError {
    name = 'FilterParseError';
}

/**
 * Raised when a style document or one of its properties is malformed.
 */
export class StyleParseError extends TilePipelineError {
    name = 'StyleParseError';
}

/**
 * Raised when a query session would hand out a second exclusive reference
 * to the same component type.
 */
export class ComponentBorrowError extends TilePipelineError {
    name = 'ComponentBorrowError';
}

/**
 * Raised when a component is attached to a tile that is not in the store.
 */
export class TileNotFoundError extends TilePipelineError {
    name = 'TileNotFoundError';
}

/**
 * Raised when a result message could not be delivered to its sink.
 */
export class SinkSendError extends TilePipelineError {
    name = 'SinkSendError';
}

/**
 * Returns the message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
