import { z } from 'zod';
import { CHARACTER_ROLES, FACT_CATEGORIES, THREAD_STATUSES } from '../types/narrative';

export const characterCreateSchema = z.object({
  name: z.string().trim().min(1).max(120),
  role: z.enum(CHARACTER_ROLES),
  arc: z.string().trim().max(2000).optional(),
  currentState: z.string().trim().max(2000).optional(),
  firstAppearance: z.number().int().min(1).optional(),
});

export const worldFactCreateSchema = z
  .object({
    category: z.enum(FACT_CATEGORIES),
    subject: z.string().trim().min(1).max(120).optional(),
    statement: z.string().trim().min(1).max(2000),
    establishedIn: z.number().int().min(0).optional(),
    override: z.boolean().optional(),
    reason: z.string().trim().min(1).max(1000).optional(),
  })
  .refine((value) => !value.override || Boolean(value.reason), {
    message: 'reason is required when override is set',
    path: ['reason'],
  });

export const threadUpdateSchema = z.object({
  status: z.enum(THREAD_STATUSES).exclude(['open']),
  resolvingChapter: z.number().int().min(1).optional(),
});

export type CharacterCreateInput = z.infer<typeof characterCreateSchema>;
export type WorldFactCreateInput = z.infer<typeof worldFactCreateSchema>;
export type ThreadUpdateInput = z.infer<typeof threadUpdateSchema>;
