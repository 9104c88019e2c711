/**
 * Error taxonomy for decoding and querying Grid Engine reports.
 * Every failure surfaces to the caller; nothing here is retried.
 */
export class GridEngineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed numeric or text content (bad integer, float, storage string or XML)
 */
export class ParseError extends GridEngineError {
    constructor(message: string, public readonly input: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Storage value whose scale suffix is not one of G, M or T
 */
export class UnsupportedUnitError extends ParseError {
    constructor(public readonly unit: string, input: string) {
        super(`Unsupported storage unit "${unit}" in "${input}"`, input);
    }
}

export class NotFoundError extends GridEngineError {
    constructor(public readonly key: string, what = 'resource') {
        super(`Could not locate the requested ${what}: ${key}`);
    }
}

/**
 * Operation invoked on data that does not satisfy its precondition
 */
export class DomainError extends GridEngineError {}

/**
 * The qstat invocation itself failed
 */
export class UpstreamError extends GridEngineError {
    constructor(
        message: string,
        public readonly command: string,
        public readonly exitCode: number,
        public readonly stderr: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}
