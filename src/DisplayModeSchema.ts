import { z } from "zod";

export const DisplayModeSchema = z.enum(["external", "internal", "join", "mirror"]);
