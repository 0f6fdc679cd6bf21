import { z } from 'zod';

export const conceptSchema = z.object({
  concept: z.string().min(1),
  aliases: z.array(z.string().min(1)).min(1),
  indicators: z.array(z.string().min(1)).min(1),
});

export const conceptLexiconSchema = z.object({
  concepts: z.array(conceptSchema),
});

export type Concept = z.infer<typeof conceptSchema>;
export type ConceptLexicon = z.infer<typeof conceptLexiconSchema>;
