export interface BusConfig {
    service: string;
    path: string;
    interface: string;
}
