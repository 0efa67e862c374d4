import { z } from "zod";

// Structural match for dbus-next's Variant
export const VariantSchema = z.object({
    signature: z.string(),
    value: z.unknown()
});
