import { z } from 'zod';

// --- Create Engagement ---

export const CreateEngagementSchema = z.object({
  url: z.string().url().max(2048),
  message: z.object({
    subject: z.string().min(1).max(200),
    body: z.string().min(1).max(5000),
  }),
});

export type CreateEngagementInput = z.infer<typeof CreateEngagementSchema>;
