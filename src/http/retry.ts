import { FreightError } from '../domain/errors';

export interface RetryPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    initialDelayMs: 2_000,
    backoffFactor: 2,
};

/**
 * What a single attempt produced. `terminal` stops the loop immediately
 * (e.g. "address not found", HTTP 4xx); `retryable` waits and tries again.
 */
export type AttemptOutcome<T> =
    | { kind: 'success'; value: T }
    | { kind: 'retryable'; reason: string; error?: FreightError }
    | { kind: 'terminal'; reason: string; error?: FreightError };

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; reason: string; attempts: number; error?: FreightError };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Maps a thrown error to an outcome. Only FreightErrors are expected from
 * the HTTP layer; anything else is a bug and propagates.
 */
export function classifyError(err: unknown): AttemptOutcome<never> {
    if (err instanceof FreightError) {
        return err.retryable
            ? { kind: 'retryable', reason: err.message, error: err }
            : { kind: 'terminal', reason: err.message, error: err };
    }
    throw err;
}

export async function retryWithBackoff<T>(
    label: string,
    attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    wait: Sleep = sleep,
): Promise<RetryResult<T>> {
    let delayMs = policy.initialDelayMs;

    for (let attemptNumber = 1; attemptNumber <= policy.maxAttempts; attemptNumber++) {
        const outcome = await attempt(attemptNumber);

        if (outcome.kind === 'success') {
            return { ok: true, value: outcome.value, attempts: attemptNumber };
        }
        if (outcome.kind === 'terminal') {
            return { ok: false, reason: outcome.reason, attempts: attemptNumber, error: outcome.error };
        }

        console.warn(`[${label}] attempt ${attemptNumber}/${policy.maxAttempts} failed: ${outcome.reason}`);
        if (attemptNumber === policy.maxAttempts) {
            return { ok: false, reason: outcome.reason, attempts: attemptNumber, error: outcome.error };
        }
        await wait(delayMs);
        delayMs *= policy.backoffFactor;
    }

    // maxAttempts < 1
    return { ok: false, reason: 'no attempts allowed', attempts: 0 };
}
