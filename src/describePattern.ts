import type { MonitorPattern } from "./MonitorPattern";

export function describePattern(pattern: MonitorPattern): string[] {
    const lines: string[] = [];
    if (pattern.connector !== undefined) {
        lines.push(`Connector: ${pattern.connector}`);
    }
    if (pattern.vendor !== undefined) {
        lines.push(`Vendor: ${pattern.vendor}`);
    }
    if (pattern.product !== undefined) {
        lines.push(`Product: ${pattern.product}`);
    }
    if (pattern.serial !== undefined) {
        lines.push(`Serial: ${pattern.serial}`);
    }
    if (pattern.name !== undefined) {
        lines.push(`Display Name: ${pattern.name}`);
    }
    return lines;
}
