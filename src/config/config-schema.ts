import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

export const eventwireConfigSchema = z.object({
  // Server
  port: port.optional(),
  path: z
    .string()
    .startsWith("/", "must start with /")
    .optional(),
  strictProtocol: z.boolean().optional(),

  // Timeouts
  sendTimeoutMs: positiveMs.optional(),
  readTimeoutMs: positiveMs.optional(),
  connectTimeoutMs: positiveMs.optional(),
  heartbeatIntervalMs: z.number().int().min(0).optional(),

  // Protocol
  retryMs: z.number().int().min(0).optional(),
  maxBufferSize: z.number().int().min(1).optional(),

  // Event defaults
  autoEventId: z.boolean().optional(),
  defaultEventType: z
    .string()
    .min(1)
    .regex(/^[^\r\n]*$/, "must not contain a line break")
    .optional(),
});
