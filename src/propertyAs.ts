import { VariantSchema } from "./VariantSchema";
import type { PropertyMap } from "./PropertyMap";
import type { z } from "zod";

export function propertyAs<T>(properties: PropertyMap, key: string, schema: z.ZodType<T>): T | undefined {
    const raw = properties[key];
    const variant = VariantSchema.safeParse(raw);
    const result = schema.safeParse(variant.success ? variant.data.value : raw);
    return result.success ? result.data : undefined;
}
