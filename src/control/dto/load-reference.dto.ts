import { z } from 'zod';

export const LoadReferenceBodySchema = z.object({
  path: z.string().min(1).max(1024),
  persist: z.boolean().optional().default(false),
});

export type LoadReferenceBody = z.infer<typeof LoadReferenceBodySchema>;
