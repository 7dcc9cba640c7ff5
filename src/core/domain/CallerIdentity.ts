/**
 * Identity of whoever asked for an acquisition batch
 * Only used for analytics attribution.
 */

import { z } from "zod";

export const CallerIdentitySchema = z.object({
  callerId: z.union([z.string().min(1), z.number().int()]).transform(String),
  username: z.string().min(1).optional(),
});

export type CallerIdentity = z.output<typeof CallerIdentitySchema>;
