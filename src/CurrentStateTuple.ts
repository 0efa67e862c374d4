import type {
    ConnectorTupleSchema,
    CurrentStateTupleSchema,
    LogicalMonitorTupleSchema,
    ModeTupleSchema,
    MonitorTupleSchema
} from "./CurrentStateTupleSchema";
import type { z } from "zod";

export type ConnectorTuple = z.infer<typeof ConnectorTupleSchema>;
export type ModeTuple = z.infer<typeof ModeTupleSchema>;
export type MonitorTuple = z.infer<typeof MonitorTupleSchema>;
export type LogicalMonitorTuple = z.infer<typeof LogicalMonitorTupleSchema>;
export type CurrentStateTuple = z.infer<typeof CurrentStateTupleSchema>;
