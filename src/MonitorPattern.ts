export interface MonitorPattern {
    /** Exact match by connector name (e.g. DP-6, HDMI-1) */
    connector?: string;
    /** Exact match by vendor code (e.g. ACR, DEL) */
    vendor?: string;
    /** Substring match by product name */
    product?: string;
    /** Substring match by serial number */
    serial?: string;
    /** Substring match by display name */
    name?: string;
}
