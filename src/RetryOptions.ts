export interface RetryOptions {
    attempts: number;
    delayMs: number;
    /** Shown in log lines and in the max-attempts error, e.g. "applying monitor configuration" */
    label: string;
    /** Errors this rejects are rethrown at once. Defaults to retrying everything. */
    isRetryable?: (err: unknown) => boolean;
    sleep?: (ms: number) => Promise<void>;
}
