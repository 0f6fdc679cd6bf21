import { z } from 'zod';
import { CHARACTER_ROLES, FACT_CATEGORIES } from '../types/narrative';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

const text = () => z.string().nullish().transform((value) => value?.trim() ?? '');

const optionalText = () =>
  z
    .string()
    .nullish()
    .transform((value) => value?.trim() || null);

const textList = () =>
  z
    .array(z.string())
    .nullish()
    .transform((values) => (values ?? []).map((value) => value.trim()).filter(Boolean));

const score = (min: number, max: number) =>
  z.coerce
    .number()
    .finite()
    .transform((value) => clamp(Math.round(value), min, max));

const questionSchema = z.object({
  id: optionalText(),
  question: z.string().trim().min(1),
  category: text().transform((value) => value || 'general'),
  importance: score(1, 5).catch(3),
  suggestedAnswer: optionalText(),
});

export const analysisResponseSchema = z.object({
  strengths: textList(),
  gaps: z
    .array(
      z.object({
        description: z.string().trim().min(1),
        category: text().transform((value) => value || 'general'),
        severity: score(1, 5).catch(3),
      })
    )
    .nullish()
    .transform((gaps) => gaps ?? []),
  genreAnalysis: optionalText(),
  complexityScore: score(1, 10),
  questions: z
    .array(questionSchema)
    .nullish()
    .transform((questions) => questions ?? []),
});

export const followUpResponseSchema = z.object({
  questions: z.array(questionSchema),
});

export const outlineResponseSchema = z.object({
  chapters: z
    .array(
      z.object({
        title: z.string().trim().min(1),
        summary: z.string().trim().min(1),
        keyEvents: textList(),
        targetWords: z.coerce.number().finite().positive().nullish().catch(null),
        characters: textList(),
        threads: textList(),
      })
    )
    .min(1),
  characters: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        role: z.enum(CHARACTER_ROLES).catch('supporting'),
        arc: text(),
        motivation: text(),
      })
    )
    .nullish()
    .transform((characters) => characters ?? []),
  threads: z
    .array(z.object({ title: z.string().trim().min(1), description: text() }))
    .nullish()
    .transform((threads) => threads ?? []),
  worldFacts: z
    .array(
      z.object({
        category: z.enum(FACT_CATEGORIES).catch('other'),
        subject: text(),
        statement: z.string().trim().min(1),
      })
    )
    .nullish()
    .transform((facts) => facts ?? []),
});

export const chapterExtractionSchema = z.object({
  characters: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        role: z.enum(CHARACTER_ROLES).nullable().catch(null),
        state: optionalText(),
      })
    )
    .nullish()
    .transform((characters) => characters ?? []),
  threads: z
    .array(
      z.object({
        title: z.string().trim().min(1),
        description: text(),
        status: z.enum(['open', 'advanced', 'resolved', 'abandoned']).catch('advanced'),
      })
    )
    .nullish()
    .transform((threads) => threads ?? []),
  facts: z
    .array(
      z.object({
        category: z.enum(FACT_CATEGORIES).catch('other'),
        subject: text(),
        statement: z.string().trim().min(1),
      })
    )
    .nullish()
    .transform((facts) => facts ?? []),
});

export const critiqueResponseSchema = z.object({
  overallScore: score(1, 10),
  strengths: textList(),
  weaknesses: textList(),
  suggestions: textList(),
  continuityIssues: textList(),
  characterConsistency: score(1, 10).catch(5),
  plotCoherence: score(1, 10).catch(5),
});

export const continuityResponseSchema = z.object({
  issues: textList(),
});

export type AnalysisResponse = z.infer<typeof analysisResponseSchema>;
export type OutlineResponse = z.infer<typeof outlineResponseSchema>;
export type ChapterExtractionResponse = z.infer<typeof chapterExtractionSchema>;
export type CritiqueResponse = z.infer<typeof critiqueResponseSchema>;
