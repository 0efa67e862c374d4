import { z } from "zod";

// a{sv}: values stay wrapped in variants until propertyAs unwraps them
export const PropertyMapSchema = z.record(z.string(), z.unknown());

// (ssss): connector, vendor, product, serial
export const ConnectorTupleSchema = z.tuple([z.string(), z.string(), z.string(), z.string()]);

// (siiddada{sv}): id, width, height, refresh rate, preferred scale, supported scales, properties
export const ModeTupleSchema = z.tuple([
    z.string(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.array(z.number()),
    PropertyMapSchema
]);

export const MonitorTupleSchema = z.tuple([ConnectorTupleSchema, z.array(ModeTupleSchema), PropertyMapSchema]);

// (iiduba(ssss)a{sv}): x, y, scale, transform, primary, monitors, properties
export const LogicalMonitorTupleSchema = z.tuple([
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.boolean(),
    z.array(ConnectorTupleSchema),
    PropertyMapSchema
]);

export const CurrentStateTupleSchema = z.tuple([
    z.number(),
    z.array(MonitorTupleSchema),
    z.array(LogicalMonitorTupleSchema),
    PropertyMapSchema
]);
