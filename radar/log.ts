/**
 * Radar Composite CDN — Logging
 *
 * Console output with bracketed component tags, e.g. `[ingest] Fetched 3 files`.
 */
/* eslint-disable no-console */

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

function debugEnabled(): boolean {
    const raw = typeof process !== 'undefined' ? process.env.RADAR_DEBUG : undefined;
    const value = (raw ?? '').trim().toLowerCase();
    return value === '1' || value === 'true' || value === 'yes';
}

export function createLogger(tag: string, sink: LogSink = console, debug = debugEnabled()): Logger {
    const prefix = `[${tag}]`;
    return {
        debug: (message, ...details) => {
            if (debug) sink.debug(`${prefix} ${message}`, ...details);
        },
        info: (message, ...details) => sink.info(`${prefix} ${message}`, ...details),
        warn: (message, ...details) => sink.warn(`${prefix} ${message}`, ...details),
        error: (message, ...details) => sink.error(`${prefix} ${message}`, ...details)
    };
}

/**
 * Logger that drops everything. Used by tests.
 */
export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
};
