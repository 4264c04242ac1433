import {Event, Evented} from './evented';
import {warnOnce} from './util';

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export type DiagnosticFields = {[_: string]: string | number | boolean | undefined};

/**
 * A structured event fired at the decision points of the tile pipeline.
 */
export class DiagnosticEvent extends Event {
    readonly level: DiagnosticLevel;
    readonly name: string;
    readonly fields: DiagnosticFields;

    constructor(level: DiagnosticLevel, name: string, fields: DiagnosticFields = {}) {
        super('diagnostic');
        this.level = level;
        this.name = name;
        this.fields = fields;
    }
}

/**
 * Formats a diagnostic as `name key=value key=value`, skipping undefined fields.
 */
export function formatDiagnostic(event: DiagnosticEvent): string {
    const parts = [event.name];
    for (const key of Object.keys(event.fields)) {
        const value = event.fields[key];
        if (value === undefined) continue;
        parts.push(`${key}=${value}`);
    }
    return parts.join(' ');
}

/**
 * Leveled observability hook. Consumers subscribe with `on('diagnostic', ...)`.
 *
 * When nobody listens, warnings are printed once through `warnOnce` and errors
 * through `console.error`; debug and info events are dropped.
 */
export class Diagnostics extends Evented {

    debug(name: string, fields?: DiagnosticFields) {
        this.emit('debug', name, fields);
    }

    info(name: string, fields?: DiagnosticFields) {
        this.emit('info', name, fields);
    }

    warn(name: string, fields?: DiagnosticFields) {
        this.emit('warn', name, fields);
    }

    error(name: string, fields?: DiagnosticFields) {
        this.emit('error', name, fields);
    }

    emit(level: DiagnosticLevel, name: string, fields?: DiagnosticFields) {
        const event = new DiagnosticEvent(level, name, fields);
        if (this.listens(event.type)) {
            this.fire(event);
        } else if (level === 'warn') {
            warnOnce(formatDiagnostic(event));
        } else if (level === 'error') {
            console.error(formatDiagnostic(event));
        }
    }
}

/**
 * Shared instance used when a caller does not pass its own.
 */
export const diagnostics = new Diagnostics();
