import type { DisplayModeSchema } from "./DisplayModeSchema";
import type { z } from "zod";

export type DisplayMode = z.infer<typeof DisplayModeSchema>;
