export interface Mode {
    /** Compositor-assigned id, e.g. "1920x1080@60.000". Only ever copied from a snapshot. */
    readonly id: string;
    readonly width: number;
    readonly height: number;
    readonly refreshRate: number;
    readonly isCurrent: boolean;
    readonly isPreferred: boolean;
    readonly preferredScale: number;
    readonly supportedScales: readonly number[];
}
