import { DisplayError } from "./DisplayError";
import { error } from "./error";
import { sleep } from "./sleep";
import type { RetryOptions } from "./RetryOptions";

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.attempts);
    const isRetryable = options.isRetryable ?? ((): boolean => true);
    const wait = options.sleep ?? sleep;

    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; ++attempt) {
        try {
            return await operation(attempt);
        } catch (err: unknown) {
            if (!isRetryable(err)) {
                throw err;
            }
            lastError = err;
            error(`${options.label} failed (attempt ${attempt}/${attempts}):`, err instanceof Error ? err.message : err);
            if (attempt < attempts) {
                await wait(options.delayMs);
            }
        }
    }

    throw new DisplayError({ kind: "max-attempts", attempts, label: options.label, lastError });
}
