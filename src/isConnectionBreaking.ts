import { isDisplayError } from "./isDisplayError";

export function isConnectionBreaking(err: unknown): boolean {
    if (isDisplayError(err, "transport")) {
        return true;
    }
    if (isDisplayError(err) && err.detail.kind === "max-attempts") {
        return isDisplayError(err.detail.lastError, "transport");
    }
    return false;
}
