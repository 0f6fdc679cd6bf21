import type { ContextPayload } from '../services/contextBuilder';
import type { Chapter, ChapterPlan, Character, PlotThread, StoryType } from '../types/narrative';
import { STORY_TYPE_DEFAULTS } from './storyDefaults';
import { wordsToTokens } from './tokenEstimate';

export interface PromptPayload {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens?: number;
  json: boolean;
}

export interface OutlineRequestShape {
  storyType: StoryType;
  firstIndex: number;
  minEntries: number;
  maxEntries: number;
  suggestedEntries: number;
  minWords: number;
  maxWords: number;
}

export interface SessionWordBounds {
  minWords: number;
  maxWords: number;
}

const JSON_ONLY = 'Respond with a single JSON object and nothing else: no markdown fences, no commentary.';

function indentLines(lines: string[], indent = '  '): string {
  return lines.map((line) => `${indent}${line}`).join('\n');
}

export function buildAnalysisPrompt(context: ContextPayload): PromptPayload {
  const prompt = [
    context.text,
    '',
    '## Task',
    'Assess this story idea before any outline is written.',
    '- List its strengths.',
    '- List gaps that would weaken a full draft, each with a category and a severity from 1 to 5.',
    '- Describe how the idea fits its genre.',
    '- Score its complexity from 1 (simple) to 10 (intricate).',
    '- Ask clarifying questions the author must answer. Importance runs from 1 to 5; questions of importance 3 or more block outlining until answered.',
    '',
    JSON_ONLY,
    'Shape:',
    '{',
    indentLines([
      '"strengths": ["..."],',
      '"gaps": [{ "description": "...", "category": "plot|character|world|theme|structure", "severity": 3 }],',
      '"genreAnalysis": "...",',
      '"complexityScore": 6,',
      '"questions": [{ "id": "q1", "question": "...", "category": "...", "importance": 4, "suggestedAnswer": "..." }]',
    ]),
    '}',
  ].join('\n');

  return {
    system: 'You are a developmental editor who studies story premises and asks the questions an author must settle before drafting.',
    prompt,
    temperature: 0.4,
    json: true,
  };
}

export function buildFollowUpQuestionsPrompt(
  context: ContextPayload,
  answered: Array<{ question: string; answer: string }>
): PromptPayload {
  const history = answered.length
    ? answered.map((entry) => `Q: ${entry.question}\nA: ${entry.answer}`).join('\n\n')
    : 'No questions have been answered yet.';
  const prompt = [
    context.text,
    '',
    '## Answers so far',
    history,
    '',
    '## Task',
    'The author has reopened the questioning phase. Ask up to five new questions that follow from these answers and that the outline still needs settled. Do not repeat answered questions.',
    '',
    JSON_ONLY,
    '{ "questions": [{ "id": "f1", "question": "...", "category": "...", "importance": 3, "suggestedAnswer": "..." }] }',
  ].join('\n');

  return {
    system: 'You are a developmental editor helping an author refine a story before outlining.',
    prompt,
    temperature: 0.5,
    json: true,
  };
}

export function buildOutlinePrompt(context: ContextPayload, shape: OutlineRequestShape): PromptPayload {
  const { unit } = STORY_TYPE_DEFAULTS[shape.storyType];
  const continuing = shape.firstIndex > 0
    ? `The first ${shape.firstIndex} ${unit}s are already written and stay as they are; plan only what follows them, numbering from ${shape.firstIndex + 1}.`
    : `Plan the whole work from its first ${unit}.`;
  const prompt = [
    context.text,
    '',
    '## Task',
    `Write an outline of about ${shape.suggestedEntries} ${unit}s (no fewer than ${shape.minEntries}, no more than ${shape.maxEntries}).`,
    continuing,
    `Each ${unit} needs a title, a summary, ordered key events, a target of ${shape.minWords}-${shape.maxWords} words, and the characters and plot threads it features.`,
    'Also list the main characters (role: protagonist, antagonist or supporting), the plot threads, and the world facts the story depends on (category: setting, rule, history or other).',
    '',
    JSON_ONLY,
    '{',
    indentLines([
      `"chapters": [{ "title": "...", "summary": "...", "keyEvents": ["..."], "targetWords": ${shape.minWords}, "characters": ["Name"], "threads": ["Thread title"] }],`,
      '"characters": [{ "name": "...", "role": "protagonist", "arc": "...", "motivation": "..." }],',
      '"threads": [{ "title": "...", "description": "..." }],',
      '"worldFacts": [{ "category": "rule", "subject": "...", "statement": "..." }]',
    ]),
    '}',
  ].join('\n');

  return {
    system: 'You are a story architect who turns a premise and the author\'s answers into a paced, coherent outline.',
    prompt,
    temperature: 0.6,
    json: true,
  };
}

export function buildChapterPrompt(context: ContextPayload, plan: ChapterPlan, bounds: SessionWordBounds): PromptPayload {
  const target = Math.min(Math.max(plan.targetWords, bounds.minWords), bounds.maxWords);
  const prompt = [
    context.text,
    '',
    '## Task',
    `Write chapter ${plan.index + 1}, "${plan.title}", as finished prose of about ${target} words (at least ${bounds.minWords}, never more than ${bounds.maxWords}).`,
    'Cover every key event in order. Keep every world rule and setting fact true. Do not reopen resolved plot threads. Keep each character consistent with their current state.',
    'Output only the chapter text: no title line, no notes, no summary.',
  ].join('\n');

  return {
    system: 'You are a novelist drafting one chapter of a long work. Continuity with what came before matters more than flourish.',
    prompt,
    temperature: 0.8,
    maxTokens: wordsToTokens(bounds.maxWords) + 256,
    json: false,
  };
}

const CRITIQUE_SHAPE = [
  '{',
  indentLines([
    '"overallScore": 7,',
    '"strengths": ["..."],',
    '"weaknesses": ["..."],',
    '"suggestions": ["..."],',
    '"continuityIssues": ["..."],',
    '"characterConsistency": 8,',
    '"plotCoherence": 7',
  ]),
  '}',
].join('\n');

export function buildCritiquePrompt(context: ContextPayload, title: string, text: string): PromptPayload {
  const prompt = [
    context.text,
    '',
    `## Draft: ${title}`,
    text,
    '',
    '## Task',
    'Critique this draft against its outline entry and the established story. Scores run from 1 to 10. Name continuity problems concretely.',
    '',
    JSON_ONLY,
    CRITIQUE_SHAPE,
  ].join('\n');

  return {
    system: 'You are a demanding but fair editor reviewing a chapter of a long work in progress.',
    prompt,
    temperature: 0.3,
    json: true,
  };
}

export function buildStoryCritiquePrompt(context: ContextPayload, chapterDigests: string[]): PromptPayload {
  const prompt = [
    context.text,
    '',
    '## Complete story, chapter by chapter',
    chapterDigests.join('\n'),
    '',
    '## Task',
    'Critique the finished story as a whole: pacing, arcs, resolution of plot threads and consistency. Scores run from 1 to 10.',
    '',
    JSON_ONLY,
    CRITIQUE_SHAPE,
  ].join('\n');

  return {
    system: 'You are an editor giving a structural review of a completed manuscript.',
    prompt,
    temperature: 0.3,
    json: true,
  };
}

export function buildExtractionPrompt(
  text: string,
  known: { characters: Character[]; threads: PlotThread[] }
): PromptPayload {
  const characters = known.characters.length
    ? known.characters.map((character) => `- ${character.name} (${character.role})`).join('\n')
    : '- none yet';
  const threads = known.threads.length
    ? known.threads.map((thread) => `- ${thread.title} [${thread.status}]`).join('\n')
    : '- none yet';
  const prompt = [
    '## Known characters',
    characters,
    '',
    '## Known plot threads',
    threads,
    '',
    '## Chapter',
    text,
    '',
    '## Task',
    'List what this chapter mentions.',
    '- characters: everyone who appears or acts, with their role if the text makes it clear (otherwise null) and their state at the end of the chapter.',
    '- threads: plot threads the chapter touches, using the known titles where they apply; status is "open" for new threads, "advanced" for progress, "resolved" or "abandoned" when the chapter closes one.',
    '- facts: statements about the world the chapter asserts (category setting, rule, history or other), each with a short subject.',
    '',
    JSON_ONLY,
    '{',
    indentLines([
      '"characters": [{ "name": "...", "role": "supporting", "state": "..." }],',
      '"threads": [{ "title": "...", "description": "...", "status": "advanced" }],',
      '"facts": [{ "category": "setting", "subject": "...", "statement": "..." }]',
    ]),
    '}',
  ].join('\n');

  return {
    system: 'You extract structured continuity data from fiction. Report only what the text states.',
    prompt,
    temperature: 0.1,
    json: true,
  };
}

export function buildDigestPrompt(chapter: Chapter): PromptPayload {
  return {
    system: 'You write compact continuity digests of fiction chapters.',
    prompt: [
      `## Chapter ${chapter.index + 1}: ${chapter.title}`,
      chapter.text,
      '',
      '## Task',
      'Summarise this chapter in one paragraph of at most 90 words: what happened, who changed and what remains unresolved. Output the paragraph only.',
    ].join('\n'),
    temperature: 0.2,
    maxTokens: 200,
    json: false,
  };
}

export function buildContinuityPrompt(context: ContextPayload): PromptPayload {
  const prompt = [
    context.text,
    '',
    '## Task',
    'Review the recent chapters against the established facts, characters and plot threads. List every continuity problem you find, one per entry. Return an empty list when there are none.',
    '',
    JSON_ONLY,
    '{ "issues": ["..."] }',
  ].join('\n');

  return {
    system: 'You are a continuity editor for a long work of fiction.',
    prompt,
    temperature: 0.2,
    json: true,
  };
}
