import { z } from "zod";

export const SerialLineSourceConfigSchema = z.object({
  path: z.string().min(1),
  baudRate: z.number().int().positive().default(9600),
  delimiter: z.string().min(1).default("\n"),
  /** Longest accepted line in bytes, delimiter excluded */
  maxLineLength: z.number().int().positive().default(1024),
  /** 0 waits forever */
  readTimeoutMs: z.number().int().nonnegative().default(0),
  /** The first line after opening may be the tail of a line sent earlier */
  discardFirstLine: z.boolean().default(true)
});

export type SerialLineSourceConfig = z.infer<typeof SerialLineSourceConfigSchema>;
