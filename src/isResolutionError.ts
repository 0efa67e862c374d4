import { isDisplayError } from "./isDisplayError";
import type { DisplayErrorKind } from "./DisplayErrorDetail";

const resolutionKinds: readonly DisplayErrorKind[] = [
    "no-monitors-available",
    "filter-mismatch",
    "insufficient-monitors",
    "no-monitors-match"
];

/** True for errors raised while choosing a mode, before any layout was built. */
export function isResolutionError(err: unknown): boolean {
    return isDisplayError(err) && resolutionKinds.includes(err.kind);
}
