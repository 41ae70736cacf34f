import { z } from 'zod';
import { nonBlank } from '../validation';

/** `?action=` is a single value; repeating it is rejected. */
export const DocumentQuerySchema = z.object({
  action: nonBlank('action').default('read'),
});

export type DocumentQuery = z.infer<typeof DocumentQuerySchema>;
