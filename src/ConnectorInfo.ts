export interface ConnectorInfo {
    readonly connector: string;
    readonly vendor: string;
    readonly product: string;
    readonly serial: string;
}
