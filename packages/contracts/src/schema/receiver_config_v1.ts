import { z } from "zod";

export const DEFAULT_RECEIVER_PORT = 5612;

/**
 * ReceiverConfigV1Schema
 *
 * Closed shape: unknown keys are rejected so a typo in a profile file fails
 * loudly instead of silently falling back to a default.
 */
export const ReceiverConfigV1Schema = z
  .object({
    ipv6: z.boolean().default(false),
    // Defaults to the wildcard address of the chosen family.
    bind: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).default(DEFAULT_RECEIVER_PORT),
    // Drop samples whose absolute time is earlier than the last accepted one.
    drop_on_backward: z.boolean().default(true),
    // Longer datagrams are cut to this length before decoding.
    recv_buffer_bytes: z.number().int().min(64).max(65535).default(4096),
    // Datagrams arriving while this many are queued are dropped and counted.
    max_pending: z.number().int().positive().default(1024),
  })
  .strict()
  .transform((c) => ({ ...c, bind: c.bind ?? (c.ipv6 ? "::" : "0.0.0.0") }));

export type ReceiverConfigV1Input = z.input<typeof ReceiverConfigV1Schema>;
export type ReceiverConfigV1 = z.output<typeof ReceiverConfigV1Schema>;

export function parseReceiverConfigV1(input: unknown): ReceiverConfigV1 {
  return ReceiverConfigV1Schema.parse(input);
}
