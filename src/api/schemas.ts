import { z } from 'zod';

export const sessionIdSchema = z.string().trim().min(8).max(128);

export const recalcRequestSchema = z.object({
  sessionId: sessionIdSchema,
  teams: z.record(z.string(), z.unknown()).default({}),
  resolutions: z.record(z.string(), z.string()).optional(),
});

export const sessionQuerySchema = z.object({
  sessionId: sessionIdSchema,
});
