import { DisplayError } from "./DisplayError";
import type { DisplayErrorKind } from "./DisplayErrorDetail";

export function isDisplayError(err: unknown, kind?: DisplayErrorKind): err is DisplayError {
    return err instanceof DisplayError && (kind === undefined || err.kind === kind);
}
