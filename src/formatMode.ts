import type { Mode } from "./Mode";

export function formatMode(mode: Mode): string {
    return `${mode.width}x${mode.height} @ ${mode.refreshRate.toFixed(2)}Hz`;
}
