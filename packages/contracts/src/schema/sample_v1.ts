import { z } from "zod";

export const SampleSourceV1Schema = z.object({
  address: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  family: z.string().min(1),
});

/**
 * SampleV1Schema
 *
 * JSON view of one accepted sample. `ts` is unix ms and may carry a
 * sub-millisecond fraction; `iso` is the same instant truncated to ms.
 */
export const SampleV1Schema = z.object({
  ts: z.number().finite(),
  iso: z.string().min(1),
  x: z.number(),
  y: z.number(),
  z: z.number(),
  source: SampleSourceV1Schema.nullable(),
});

export type SampleSourceV1 = z.infer<typeof SampleSourceV1Schema>;
export type SampleV1 = z.infer<typeof SampleV1Schema>;
