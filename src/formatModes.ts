import { formatMode } from "./formatMode";
import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

const SCALE_EPSILON = 0.01;

function byResolutionThenRefresh(a: Mode, b: Mode): number {
    const pixels = b.width * b.height - a.width * a.height;
    if (pixels !== 0) {
        return pixels;
    }
    const refresh = b.refreshRate - a.refreshRate;
    return Number.isNaN(refresh) ? 0 : refresh;
}

function formatScales(mode: Mode): string | undefined {
    const trivial = mode.preferredScale === 1 && mode.supportedScales.every((scale: number) => scale === 1);
    if (mode.supportedScales.length === 0 || trivial) {
        return undefined;
    }
    const others = mode.supportedScales.filter(
        (scale: number) => Math.abs(scale - mode.preferredScale) > SCALE_EPSILON
    );
    return [mode.preferredScale, ...others].map((scale: number) => scale.toFixed(2)).join(", ");
}

export function formatModes(monitor: PhysicalMonitor): string[] {
    const lines = ["     Available Modes (* = current, P = preferred):"];
    const sorted = [...monitor.modes].sort(byResolutionThenRefresh);

    sorted.forEach((mode: Mode, index: number) => {
        const current = mode.isCurrent ? "*" : " ";
        const preferred = mode.isPreferred ? "P" : " ";
        lines.push(`     ${current} ${preferred} ${String(index + 1).padStart(2)}. ${formatMode(mode)}`);

        const scales = formatScales(mode);
        if (scales !== undefined) {
            lines.push(`             Scales: ${scales}`);
        }
    });

    return lines;
}
