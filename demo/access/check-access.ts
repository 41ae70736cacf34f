import { z } from 'zod';
import { nonBlank } from '../validation';

export const CheckAccessSchema = z.object({
  action: nonBlank('action'),
  resource: nonBlank('resource'),
});

export const PublicCheckAccessSchema = CheckAccessSchema.extend({
  user: nonBlank('user'),
});

export type CheckAccessBody = z.infer<typeof CheckAccessSchema>;
export type PublicCheckAccessBody = z.infer<typeof PublicCheckAccessSchema>;

export interface AccessResponse {
  allowed: boolean;
}
