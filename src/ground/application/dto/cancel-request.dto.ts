import { z } from 'zod';

export const CancelRequestSchema = z.object({
  text: z.string().trim().min(1).max(2000),
});

export type CancelRequest = z.infer<typeof CancelRequestSchema>;
