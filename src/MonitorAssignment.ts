import type { PropertyMap } from "./PropertyMap";

export interface MonitorAssignment {
    readonly connector: string;
    readonly modeId: string;
    readonly properties: PropertyMap;
}
