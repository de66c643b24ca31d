/**
 * Radar Composite CDN — Error Taxonomy
 *
 * `permanent` errors are never retried for the same file within a cycle;
 * whether the file comes back later depends on the kind (cool-down for
 * NotFoundError, quarantine for FormatError/CorruptDataError).
 */

export type RadarErrorKind =
    | 'network'
    | 'not_found'
    | 'partial_write'
    | 'format'
    | 'corrupt_data'
    | 'render'
    | 'filesystem';

export abstract class RadarError extends Error {
    abstract readonly kind: RadarErrorKind;
    abstract readonly permanent: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Timeout, connection failure or 5xx. Retried with backoff. */
export class NetworkError extends RadarError {
    readonly kind = 'network';
    readonly permanent = false;

    constructor(
        message: string,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/** 404 (or another 4xx). Suppressed for a cool-down window. */
export class NotFoundError extends RadarError {
    readonly kind = 'not_found';
    readonly permanent = true;

    constructor(
        message: string,
        readonly status = 404
    ) {
        super(message);
    }
}

/** Content-length mismatch or truncated body. The partial file is discarded. */
export class PartialWriteError extends RadarError {
    readonly kind = 'partial_write';
    readonly permanent = false;

    constructor(
        message: string,
        readonly expectedBytes: number | null,
        readonly receivedBytes: number
    ) {
        super(message);
    }
}

/** Container is readable but does not match the product contract. */
export class FormatError extends RadarError {
    readonly kind = 'format';
    readonly permanent = true;
}

/** Container cannot be opened or read at all. */
export class CorruptDataError extends RadarError {
    readonly kind = 'corrupt_data';
    readonly permanent = true;
}

/** Rendering, encoding or the decoder itself failed; the source stays eligible. */
export class RenderError extends RadarError {
    readonly kind = 'render';
    readonly permanent = false;
}

/** Writing or promoting one artifact failed. */
export class FilesystemError extends RadarError {
    readonly kind = 'filesystem';
    readonly permanent = false;

    constructor(
        message: string,
        readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * Errors after which the source file is quarantined instead of retried.
 */
export function isQuarantineError(error: unknown): error is FormatError | CorruptDataError {
    return error instanceof FormatError || error instanceof CorruptDataError;
}

/**
 * Errors raised by the operating system (file access, descriptors), which
 * carry an errno `code`.
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Normalize an unknown throwable. Typed errors pass through unchanged.
 */
export function toRadarError(
    error: unknown,
    wrap: (message: string, cause: unknown) => RadarError
): RadarError {
    if (error instanceof RadarError) return error;
    return wrap(errorMessage(error), error);
}
