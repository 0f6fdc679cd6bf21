import { z } from 'zod';
import { STORY_TYPES } from '../types/narrative';

const projectNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(120)
  .regex(/^[\w][\w .'-]*$/, 'name may contain letters, digits, spaces, dots, apostrophes, hyphens and underscores');

export const projectCreateSchema = z.object({
  name: projectNameSchema,
  storyType: z.enum(STORY_TYPES),
  genre: z.string().trim().min(1).max(80),
  targetLength: z.number().int().min(100).max(1_000_000),
  premise: z.string().trim().min(1).max(8000),
  styleNotes: z.string().trim().min(1).max(2000).optional(),
  analyse: z.boolean().optional(),
});

export const answersSchema = z.object({
  answers: z
    .record(z.string().trim().min(1).max(4000))
    .refine((value) => Object.keys(value).length > 0, { message: 'answers must contain at least one entry' }),
});

export const outlineReviseSchema = z.object({
  feedback: z.string().trim().min(1).max(4000).optional(),
});

export const reopenSchema = z.object({
  phase: z.enum(['questioning', 'outlining']),
  reason: z.string().trim().min(1).max(1000),
});

export const critiqueRequestSchema = z.object({
  chapter: z.number().int().min(1).optional(),
});

export const summaryQuerySchema = z.object({
  upto: z.coerce.number().int().min(0).optional(),
});

export const logQuerySchema = z.object({
  after: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type ProjectCreateInput = z.infer<typeof projectCreateSchema>;
export type AnswersInput = z.infer<typeof answersSchema>;
export type ReopenInput = z.infer<typeof reopenSchema>;
