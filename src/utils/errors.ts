/**
 * Upstream quota or rate limit exhausted. Recoverable by waiting `retryAfterMs`.
 */
export class RateLimitError extends Error {
    constructor(
        message: string,
        public readonly retryAfterMs: number
    ) {
        super(message);
        this.name = 'RateLimitError';
    }
}

/**
 * Any other failure of an embedding or generation provider.
 * `detail` is for logs only and never shown to end users.
 */
export class ProviderError extends Error {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly detail?: unknown
    ) {
        super(message);
        this.name = 'ProviderError';
    }
}

/**
 * The paper exists but has neither indexed passages nor an abstract.
 */
export class NoContentError extends Error {
    constructor(public readonly paperId: string) {
        super(`No content available for paper '${paperId}'`);
        this.name = 'NoContentError';
    }
}

/**
 * Startup configuration does not match the providers or the stored data.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
