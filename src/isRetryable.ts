import { isDisplayError } from "./isDisplayError";

export function isRetryable(err: unknown): boolean {
    return (
        isDisplayError(err, "transport") || isDisplayError(err, "rejected") || isDisplayError(err, "failed-verification")
    );
}
