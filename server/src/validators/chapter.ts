import { z } from 'zod';

export const chapterApproveSchema = z.object({
  override: z.boolean().optional(),
});

export const chapterNextSchema = z.object({
  instructions: z.string().trim().max(4000).optional(),
});

export const chapterRevisionSchema = z.object({
  feedback: z.string().trim().min(1).max(4000),
});

export const exportQuerySchema = z.object({
  format: z.enum(['markdown', 'md', 'text', 'txt', 'zip']).default('markdown'),
  chapters: z
    .string()
    .trim()
    .regex(/^\d+(\s*,\s*\d+)*$/, 'chapters must be a comma-separated list of chapter numbers')
    .optional(),
});

export type ChapterApproveInput = z.infer<typeof chapterApproveSchema>;
export type ExportQueryInput = z.infer<typeof exportQuerySchema>;
