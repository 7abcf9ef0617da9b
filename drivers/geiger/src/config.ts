import { z } from "zod";

export const GeigerSourceConfigSchema = z.object({
  path: z.string().min(1),
  baudRate: z.number().int().positive().default(9600),
  /** The counter prints short decimal counts; anything longer is line noise */
  maxLineLength: z.number().int().positive().default(10),
  readTimeoutMs: z.number().int().nonnegative().default(0),
  measurement: z.string().min(1).default("geiger")
});

export type GeigerSourceConfig = z.infer<typeof GeigerSourceConfigSchema>;
