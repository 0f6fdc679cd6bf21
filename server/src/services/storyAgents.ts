import type { ZodTypeAny, z } from 'zod';
import type {
  Chapter,
  ChapterExtraction,
  ChapterPlan,
  Character,
  CharacterRole,
  CritiqueResult,
  PlotThread,
  StoryAnalysis,
  StoryQuestion,
  WorldFactCategory,
} from '../types/narrative';
import type { ContextPayload, DigestSource } from './contextBuilder';
import type { GenerationPurpose, ModelTransport } from './modelTransport';
import RetryPolicy from '../utils/retryPolicy';
import { TransportError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { parseModelJson } from '../utils/modelJson';
import {
  buildAnalysisPrompt,
  buildChapterPrompt,
  buildContinuityPrompt,
  buildCritiquePrompt,
  buildDigestPrompt,
  buildExtractionPrompt,
  buildFollowUpQuestionsPrompt,
  buildOutlinePrompt,
  buildStoryCritiquePrompt,
  type OutlineRequestShape,
  type PromptPayload,
  type SessionWordBounds,
} from '../utils/promptTemplates';
import { clampNumber } from '../utils/storyDefaults';
import { countWords, normaliseNewlines, normaliseWhitespace, truncateBySentences, truncateWords } from '../utils/text';
import {
  analysisResponseSchema,
  chapterExtractionSchema,
  continuityResponseSchema,
  critiqueResponseSchema,
  followUpResponseSchema,
  outlineResponseSchema,
} from '../validators/modelResponses';

export interface AgentCallOptions {
  signal?: AbortSignal;
  project?: string;
}

export interface OutlineDraft {
  plans: ChapterPlan[];
  characters: Array<{ name: string; role: CharacterRole; arc: string; motivation: string }>;
  threads: Array<{ title: string; description: string }>;
  worldFacts: Array<{ category: WorldFactCategory; subject: string; statement: string }>;
}

export interface StoryAgentsOptions {
  transport: ModelTransport;
  retryPolicy?: RetryPolicy;
  model?: string;
}

const REQUIRED_IMPORTANCE = 3;
const DIGEST_MAX_CHARS = 700;
const LEADING_HEADING = /^(?:#{1,6}\s*)?(?:chapter|section|sequence)\s+[\w.-]+[^\n]*\n+/i;

type RawQuestion = z.infer<typeof followUpResponseSchema>['questions'][number];

function toQuestions(raw: RawQuestion[], prefix: string, taken: Iterable<string>): StoryQuestion[] {
  const used = new Set(taken);
  let counter = 1;
  const nextId = () => {
    while (used.has(`${prefix}${counter}`)) {
      counter += 1;
    }
    return `${prefix}${counter}`;
  };

  return raw.map((question) => {
    const id = question.id && !used.has(question.id) ? question.id : nextId();
    used.add(id);
    return {
      id,
      question: question.question,
      category: question.category,
      importance: question.importance,
      required: question.importance >= REQUIRED_IMPORTANCE,
      suggestedAnswer: question.suggestedAnswer,
    };
  });
}

/**
 * Model-backed steps of the workflow. Every call goes through the retry policy, and the raw output is
 * parsed inside the retried operation so a malformed answer is retried with the same prompt.
 */
export default class StoryAgents {
  private transport: ModelTransport;

  private retryPolicy: RetryPolicy;

  private model?: string;

  private logger = getLogger({ module: 'story-agents' });

  constructor({ transport, retryPolicy, model }: StoryAgentsOptions) {
    this.transport = transport;
    this.retryPolicy = retryPolicy ?? new RetryPolicy();
    this.model = model;
  }

  async analyse(
    context: ContextPayload,
    options: AgentCallOptions = {}
  ): Promise<{ analysis: StoryAnalysis; questions: StoryQuestion[] }> {
    const parsed = await this.callJson('analysis', buildAnalysisPrompt(context), analysisResponseSchema, options);
    return {
      analysis: {
        strengths: parsed.strengths,
        gaps: parsed.gaps,
        genreAnalysis: parsed.genreAnalysis,
        complexityScore: parsed.complexityScore,
      },
      questions: toQuestions(parsed.questions, 'q', []),
    };
  }

  async followUpQuestions(
    context: ContextPayload,
    answered: Array<{ question: string; answer: string }>,
    existingIds: string[],
    options: AgentCallOptions = {}
  ): Promise<StoryQuestion[]> {
    const parsed = await this.callJson(
      'questions',
      buildFollowUpQuestionsPrompt(context, answered),
      followUpResponseSchema,
      options
    );
    return toQuestions(parsed.questions, 'f', existingIds);
  }

  async outline(context: ContextPayload, shape: OutlineRequestShape, options: AgentCallOptions = {}): Promise<OutlineDraft> {
    return this.call('outline', buildOutlinePrompt(context, shape), options, (raw) => {
      const parsed = parseModelJson(raw, outlineResponseSchema, 'Outline');
      if (parsed.chapters.length < shape.minEntries) {
        throw new TransportError(
          'malformed',
          `Outline has ${parsed.chapters.length} entries; at least ${shape.minEntries} are required`
        );
      }
      const fallbackWords = Math.round((shape.minWords + shape.maxWords) / 2);
      const plans = parsed.chapters.slice(0, shape.maxEntries).map((entry, position) => ({
        index: shape.firstIndex + position,
        title: entry.title,
        summary: entry.summary,
        keyEvents: entry.keyEvents,
        targetWords: clampNumber(Math.round(entry.targetWords ?? fallbackWords), shape.minWords, shape.maxWords),
        characters: entry.characters,
        threads: entry.threads,
      }));
      return {
        plans,
        characters: parsed.characters,
        threads: parsed.threads,
        worldFacts: parsed.worldFacts,
      };
    });
  }

  async writeChapter(
    context: ContextPayload,
    plan: ChapterPlan,
    bounds: SessionWordBounds,
    options: AgentCallOptions = {}
  ): Promise<string> {
    return this.call('chapter', buildChapterPrompt(context, plan, bounds), options, (raw) => {
      const text = normaliseNewlines(raw).trim().replace(LEADING_HEADING, '').trim();
      const words = countWords(text);
      if (words < bounds.minWords) {
        throw new TransportError('malformed', `Chapter draft has ${words} words; at least ${bounds.minWords} are required`);
      }
      return words > bounds.maxWords ? truncateWords(text, bounds.maxWords) : text;
    });
  }

  async critique(context: ContextPayload, title: string, text: string, options: AgentCallOptions = {}): Promise<CritiqueResult> {
    return this.callJson('critique', buildCritiquePrompt(context, title, text), critiqueResponseSchema, options);
  }

  async critiqueStory(context: ContextPayload, chapterDigests: string[], options: AgentCallOptions = {}): Promise<CritiqueResult> {
    return this.callJson('critique', buildStoryCritiquePrompt(context, chapterDigests), critiqueResponseSchema, options);
  }

  async extract(
    text: string,
    known: { characters: Character[]; threads: PlotThread[] },
    options: AgentCallOptions = {}
  ): Promise<ChapterExtraction> {
    return this.callJson('extraction', buildExtractionPrompt(text, known), chapterExtractionSchema, options);
  }

  async digest(chapter: Chapter, options: AgentCallOptions = {}): Promise<string> {
    return this.call('digest', buildDigestPrompt(chapter), options, (raw) => {
      const digest = truncateBySentences(normaliseWhitespace(raw), DIGEST_MAX_CHARS);
      if (!digest) {
        throw new TransportError('empty', `Digest of chapter ${chapter.index + 1} was empty`);
      }
      return digest;
    });
  }

  async continuity(context: ContextPayload, options: AgentCallOptions = {}): Promise<string[]> {
    const parsed = await this.callJson('continuity', buildContinuityPrompt(context), continuityResponseSchema, options);
    return parsed.issues;
  }

  private callJson<S extends ZodTypeAny>(
    purpose: GenerationPurpose,
    payload: PromptPayload,
    schema: S,
    options: AgentCallOptions
  ): Promise<z.infer<S>> {
    const label = purpose.charAt(0).toUpperCase() + purpose.slice(1);
    return this.call(purpose, payload, options, (raw) => parseModelJson(raw, schema, label));
  }

  private call<T>(
    purpose: GenerationPurpose,
    payload: PromptPayload,
    { signal, project }: AgentCallOptions,
    parse: (raw: string) => T
  ): Promise<T> {
    return this.retryPolicy.run(
      async () => {
        const raw = await this.transport.generate({
          purpose,
          prompt: payload.prompt,
          system: payload.system,
          temperature: payload.temperature,
          maxTokens: payload.maxTokens,
          json: payload.json,
          model: this.model,
          signal,
        });
        return parse(raw);
      },
      {
        signal,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            {
              project,
              purpose,
              attempt,
              delayMs,
              reason: error instanceof TransportError ? error.reason : undefined,
              err: error instanceof Error ? error.message : String(error),
            },
            'Model call failed, retrying'
          );
        },
      }
    );
  }
}

export interface DigestCache {
  digestFor(chapterIndex: number): string | undefined;
  cacheDigest(chapterIndex: number, digest: string): void;
}

/** Model digests, computed once per chapter and kept in the project. */
export class CachingDigestSource implements DigestSource {
  constructor(
    private cache: DigestCache,
    private agents: StoryAgents,
    private options: AgentCallOptions = {}
  ) {}

  async digest(chapter: Chapter): Promise<string> {
    const cached = this.cache.digestFor(chapter.index);
    if (cached !== undefined) {
      return cached;
    }
    const digest = await this.agents.digest(chapter, this.options);
    this.cache.cacheDigest(chapter.index, digest);
    return digest;
  }
}
