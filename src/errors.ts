/**
 * Error types shared by the config loader, the walker and the CLI.
 * The CLI prints `Error: <message>` for any of these and exits with 1.
 */

export type ConfigErrorKind =
    | 'MissingBaseDir'
    | 'RelativeBaseDirNotAllowed'
    | 'BaseDirNotFound'
    | 'BaseDirNotDirectory'
    | 'NoIncludesSpecified'
    | 'InvalidHeadingStyle';

export class ConfigError extends Error {
    constructor(
        public readonly kind: ConfigErrorKind,
        message: string,
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/** Config file could not be read. */
export class InputFileError extends Error {
    constructor(
        public readonly path: string,
        public readonly cause: unknown,
    ) {
        super(`Failed to read config file: ${path} (${describeCause(cause)})`);
        this.name = 'InputFileError';
    }
}

/** A directory could not be listed while descending into it. */
export class TraversalError extends Error {
    constructor(
        public readonly path: string,
        public readonly cause: unknown,
    ) {
        super(`Failed to read directory: ${path} (${describeCause(cause)})`);
        this.name = 'TraversalError';
    }
}

export class OutputWriteError extends Error {
    constructor(
        public readonly path: string,
        public readonly cause: unknown,
    ) {
        super(`Failed to write output file: ${path} (${describeCause(cause)})`);
        this.name = 'OutputWriteError';
    }
}

export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
