import type { AskFailureKind, AskResult } from '../types/index.js';

/**
 * Process exit codes for the ask command.
 */
export const EXIT_CODES = {
    ok: 0,
    failure: 1,
    notFound: 2,
    rateLimited: 3,
} as const;

const FAILURE_EXIT_CODES: Record<AskFailureKind, number> = {
    paper_not_found: EXIT_CODES.notFound,
    no_content: EXIT_CODES.notFound,
    invalid_request: EXIT_CODES.failure,
    rate_limited: EXIT_CODES.rateLimited,
    upstream_error: EXIT_CODES.failure,
};

/**
 * Render an ask result for the terminal and pick the exit code.
 */
export function formatAskResult(result: AskResult, json: boolean): { text: string; exitCode: number } {
    if (result.ok) {
        const { response } = result;
        if (json) {
            return { text: JSON.stringify(response, null, 2), exitCode: EXIT_CODES.ok };
        }
        const lines = [
            response.answer,
            '',
            `  source:  ${response.source}`,
            `  context: ${response.context_used.length} ${response.context_used.length === 1 ? 'block' : 'blocks'}`,
        ];
        return { text: lines.join('\n'), exitCode: EXIT_CODES.ok };
    }

    const { error } = result;
    const exitCode = FAILURE_EXIT_CODES[error.kind];

    if (json) {
        return { text: JSON.stringify({ error }, null, 2), exitCode };
    }
    return { text: `Error (${error.kind}): ${error.message}`, exitCode };
}
