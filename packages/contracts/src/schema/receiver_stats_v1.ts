import { z } from "zod";

export const RejectCountsV1Schema = z.object({
  TRUNCATED: z.number().int().nonnegative(),
  TRAILING_DATA: z.number().int().nonnegative(),
  UNSUPPORTED: z.number().int().nonnegative(),
  INVALID_TIME: z.number().int().nonnegative(),
});

export const ClockAnchorV1Schema = z.object({
  wall_ts: z.number().finite(), // unix ms at the first decoded sample
  sensor_time: z.number().finite(), // sensor seconds reported by that sample
});

/**
 * ReceiverStatsV1Schema
 *
 * Counters since the receiver was opened. `received` counts datagrams handed
 * to the decoder; `overflowed` counts datagrams dropped before that point.
 */
export const ReceiverStatsV1Schema = z.object({
  received: z.number().int().nonnegative(),
  accepted: z.number().int().nonnegative(),
  suppressed: z.number().int().nonnegative(),
  rejected: RejectCountsV1Schema,
  overflowed: z.number().int().nonnegative(),
  anchor: ClockAnchorV1Schema.nullable(),
  last_accepted_ts: z.number().finite().nullable(),
});

export type RejectCountsV1 = z.infer<typeof RejectCountsV1Schema>;
export type ClockAnchorV1 = z.infer<typeof ClockAnchorV1Schema>;
export type ReceiverStatsV1 = z.infer<typeof ReceiverStatsV1Schema>;
