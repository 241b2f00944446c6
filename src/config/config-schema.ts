import { z } from "zod";

const positiveMs = z.number().int().positive();
const delayMs = z.number().int().min(0);

export const clientConfigSchema = z.object({
  // Handshake
  connectTimeoutMs: positiveMs.optional(),
  connectRetryScheduleMs: z.array(delayMs).max(16).optional(),

  // Channels
  channelOpenTimeoutMs: positiveMs.optional(),
  auxiliaryHelloTimeoutMs: delayMs.optional(),

  // Game DVR
  dvrRecordSeconds: z.number().int().positive().max(600).optional(),
});
