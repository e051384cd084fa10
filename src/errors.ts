/**
 * Errors that end a track invocation early. Everything else is reported as a
 * plain line and processing continues.
 */

export class EnvironmentError extends Error {
    public readonly exitCode: number

    constructor(message: string, exitCode: number = 128) {
        super(message)
        this.name = 'EnvironmentError'
        this.exitCode = exitCode
    }
}

export class DiscoveryError extends Error {
    public readonly exitCode: number = 2
    public readonly directory: string
    public readonly originalCause?: unknown

    constructor(directory: string, cause?: unknown) {
        super(`Error walking ${directory}: ${describeError(cause)}`)
        this.name = 'DiscoveryError'
        this.directory = directory
        this.originalCause = cause
    }
}

export class EnumerationError extends Error {
    public readonly exitCode: number = 2
    public readonly pattern: string
    public readonly originalCause?: unknown

    constructor(pattern: string, cause?: unknown) {
        super(`Error getting tracked files for "${pattern}": ${describeError(cause)}`)
        this.name = 'EnumerationError'
        this.pattern = pattern
        this.originalCause = cause
    }
}

export type FatalError = EnvironmentError | DiscoveryError | EnumerationError

export function isFatalError(error: unknown): error is FatalError {
    return error instanceof EnvironmentError
        || error instanceof DiscoveryError
        || error instanceof EnumerationError
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
