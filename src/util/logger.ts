/**
 * Context-tagged logger. Every line is prefixed with the module name
 * so a full prepare run can be followed step by step.
 */
export class Logger {
    readonly context: string

    constructor(context: string) {
        this.context = context
    }

    /** Only printed when DART_PREP_DEBUG is set */
    debug(message: string, data?: unknown): void {
        if (!process.env.DART_PREP_DEBUG) return
        this.write(console.debug, message, data)
    }

    info(message: string, data?: unknown): void {
        this.write(console.info, message, data)
    }

    warn(message: string, data?: unknown): void {
        this.write(console.warn, message, data)
    }

    error(message: string, error?: unknown): void {
        this.write(console.error, message, error)
    }

    private write(sink: (...args: unknown[]) => void, message: string, data?: unknown): void {
        if (data === undefined) {
            sink(`[${this.context}]`, message)
        } else {
            sink(`[${this.context}]`, message, data)
        }
    }
}

export function createLogger(context: string): Logger {
    return new Logger(context)
}
