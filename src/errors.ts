/**
 * Error kinds raised by the generators.
 *
 * Config and input-data errors are fatal. Resolution errors are caught by the
 * coeff_diff generator and replaced by the default soil.
 */

export type GeneratorErrorKind = 'config' | 'input-data' | 'external-resolution'

export abstract class GeneratorError extends Error {
    abstract readonly kind: GeneratorErrorKind

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Missing or malformed configuration file */
export class ConfigError extends GeneratorError {
    readonly kind = 'config'
}

/** Empty or unreadable position file, empty model directory, missing DART input */
export class InputDataError extends GeneratorError {
    readonly kind = 'input-data'
}

/** Spectral-interval lookup failed */
export class ExternalResolutionError extends GeneratorError {
    readonly kind = 'external-resolution'
}

export function isGeneratorError(err: unknown): err is GeneratorError {
    return err instanceof GeneratorError
}

/** Message of any thrown value */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
