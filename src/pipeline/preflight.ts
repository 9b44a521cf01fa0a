import type { EmbeddingProvider } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Check that the configured embedding dimensionality matches the provider and
 * every passage already stored. Mixed dimensions would make similarity meaningless.
 */
export function checkEmbeddingDimensions(
    configured: number,
    provider: Pick<EmbeddingProvider, 'name' | 'model' | 'dimensions'>,
    storedDimensions: number[]
): void {
    if (provider.dimensions !== configured) {
        throw new ConfigurationError(
            `Embedding provider ${provider.name}/${provider.model} returns ${provider.dimensions}-dim vectors, config expects ${configured}`
        );
    }

    const mismatched = storedDimensions.filter((dims) => dims !== configured);
    if (mismatched.length > 0) {
        throw new ConfigurationError(
            `Stored passages have embedding dimensions [${mismatched.join(', ')}], config expects ${configured}; re-embed them or change embedding.dimensions`
        );
    }
}
