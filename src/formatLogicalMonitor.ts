interface LogicalMonitorLike {
    x: number;
    y: number;
    scale: number;
    transform: number;
    primary: boolean;
}

export function formatLogicalMonitor(index: number, logical: LogicalMonitorLike, assigned: string[]): string[] {
    return [
        `  ${index + 1}. Position: (${logical.x}, ${logical.y})`,
        `     Scale: ${logical.scale}`,
        `     Primary: ${logical.primary}`,
        `     Transform: ${logical.transform}`,
        "     Assigned Monitors:",
        ...assigned
    ];
}
