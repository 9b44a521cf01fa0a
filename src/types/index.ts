/**
 * Barrel export for all shared types.
 */
export type { Paper, PaperRow, PaperInput, PassageInput, ScoredPassage } from './paper.js';
export type { CacheEntry, CacheEntryRow, NewCacheEntry } from './cache.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PaperAskConfig,
    LogLevel,
    ProviderName,
    LlmConfig,
    EmbeddingConfig,
    RetrievalConfig,
    CacheConfig,
} from './config.js';
export type {
    EmbeddingProvider,
    PassageIndex,
    AnswerGenerator,
    GeneratedAnswer,
    CallOptions,
    LlmProviderOptions,
} from './llm-provider.js';
export type { PaperStore, CacheStore } from './store.js';
export type {
    AskRequest,
    AskResponse,
    AskResult,
    AskFailure,
    AskFailureKind,
    AnswerSource,
} from './pipeline.js';
