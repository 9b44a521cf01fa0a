/**
 * Input of the ask operation.
 */
export interface AskRequest {
    /** Internal paper id or arXiv-style id */
    paperId: string;

    /** Natural-language question, non-empty after trimming */
    question: string;
}

/** Where an answer came from */
export type AnswerSource = 'cache' | 'llm';

/**
 * Successful ask output.
 */
export interface AskResponse {
    answer: string;
    source: AnswerSource;

    /** Context shown to the user, already resolved to text */
    context_used: string[];
}

/**
 * Failure conditions surfaced to the caller.
 */
export type AskFailure =
    | { kind: 'invalid_request'; message: string }
    | { kind: 'paper_not_found'; paperId: string; message: string }
    | { kind: 'no_content'; paperId: string; message: string }
    | { kind: 'rate_limited'; retryAfterMs: number; message: string }
    | { kind: 'upstream_error'; message: string };

export type AskFailureKind = AskFailure['kind'];

export type AskResult =
    | { ok: true; response: AskResponse }
    | { ok: false; error: AskFailure };
