import type { Chapter, ChapterPlan, CritiqueResult, ProjectState } from '../../src/types/narrative';
import ScriptedTransport from './scriptedTransport';

export const FIXED_NOW = new Date('2026-03-01T09:00:00.000Z');

export const fixedClock = (): Date => FIXED_NOW;

export const MYSTERY_TALE = {
  name: 'mystery-tale',
  storyType: 'short_story' as const,
  genre: 'mystery',
  targetLength: 5000,
  premise: 'A harbour inspector hunts for a stolen shipping ledger before the town council meets.',
};

export function analysisJson(questions: Array<{ question: string; importance: number }> = []): string {
  return JSON.stringify({
    strengths: ['Tight premise'],
    gaps: [{ description: 'The thief has no motive yet', category: 'plot', severity: 3 }],
    genreAnalysis: 'A classic harbour whodunit.',
    complexityScore: 4,
    questions: questions.map((question, position) => ({
      id: `q${position + 1}`,
      question: question.question,
      category: 'plot',
      importance: question.importance,
      suggestedAnswer: null,
    })),
  });
}

export const SECTION_TITLES = ['The Empty Drawer', 'Salt and Ink', 'The Customs House', 'Low Tide', 'The Council Meets'];

export function outlineJson(titles: string[] = SECTION_TITLES): string {
  return JSON.stringify({
    chapters: titles.map((title, position) => ({
      title,
      summary: `Section ${position + 1} of the ledger hunt.`,
      keyEvents: [`Clue ${position + 1} is found`],
      targetWords: 1000,
      characters: position === 0 ? ['Inspector Vale'] : ['Inspector Vale', 'Mara Quill'],
      threads: ['The missing ledger'],
    })),
    characters: [
      { name: 'Inspector Vale', role: 'protagonist', arc: 'From doubt to resolve', motivation: 'Find the ledger' },
      { name: 'Mara Quill', role: 'antagonist', arc: 'Exposed', motivation: 'Hide the smuggling' },
    ],
    threads: [{ title: 'The missing ledger', description: 'Who took the shipping ledger?' }],
    worldFacts: [
      { category: 'setting', subject: 'brackwater', statement: 'The story takes place in the harbour town of Brackwater.' },
    ],
  });
}

/** A 51-word paragraph for the given section number that names both leads. */
export function sectionProse(sectionNumber: number): string {
  return [
    `Inspector Vale reached the quay before dawn on day ${sectionNumber} and counted the fishing boats twice.`,
    'Mara Quill watched him from the customs house window while the tide turned grey.',
    'The missing ledger was somewhere in Brackwater, and the harbour bells rang for the early shift as gulls circled the nets.',
  ].join(' ');
}

export function extractionJson(extraction: {
  characters?: Array<{ name: string; role?: string | null; state?: string | null }>;
  threads?: Array<{ title: string; description?: string; status: string }>;
  facts?: Array<{ category: string; subject?: string; statement: string }>;
} = {}): string {
  return JSON.stringify({
    characters: extraction.characters ?? [{ name: 'Inspector Vale', role: null, state: 'Searching the harbour' }],
    threads: extraction.threads ?? [{ title: 'The missing ledger', description: 'The hunt goes on', status: 'advanced' }],
    facts: extraction.facts ?? [],
  });
}

export function critiqueJson(overallScore = 7): string {
  return JSON.stringify({
    overallScore,
    strengths: ['Atmosphere'],
    weaknesses: ['Slow opening'],
    suggestions: ['Cut the first paragraph'],
    continuityIssues: [],
    characterConsistency: 8,
    plotCoherence: 7,
  });
}

export function createMysteryTransport(): ScriptedTransport {
  let section = 0;
  return new ScriptedTransport({
    analysis: analysisJson([
      { question: 'Who stole the ledger?', importance: 4 },
      { question: 'What season is it?', importance: 2 },
    ]),
    questions: JSON.stringify({ questions: [{ question: 'Does Vale have a partner?', importance: 3 }] }),
    outline: outlineJson(),
    chapter: () => {
      section += 1;
      return sectionProse(section);
    },
    extraction: extractionJson(),
    critique: critiqueJson(),
    digest: 'Vale searches the harbour and suspects the customs house.',
    continuity: JSON.stringify({ issues: [] }),
  });
}

export function makePlan(index: number, overrides: Partial<ChapterPlan> = {}): ChapterPlan {
  return {
    index,
    title: `Section ${index + 1}`,
    summary: `Plan for section ${index + 1}.`,
    keyEvents: [],
    targetWords: 1000,
    characters: [],
    threads: [],
    ...overrides,
  };
}

export function makeChapter(index: number, text: string, overrides: Partial<Chapter> = {}): Chapter {
  return {
    index,
    title: `Section ${index + 1}`,
    text,
    wordCount: text.split(/\s+/).filter(Boolean).length,
    critiqueNotes: [],
    revisionCount: 0,
    status: 'approved',
    characters: [],
    threads: [],
    committedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export const SAMPLE_CRITIQUE: CritiqueResult = {
  overallScore: 7,
  strengths: [],
  weaknesses: [],
  suggestions: [],
  continuityIssues: [],
  characterConsistency: 7,
  plotCoherence: 7,
};

export function makeProjectState(overrides: Partial<ProjectState> = {}): ProjectState {
  return {
    id: 'project-1',
    name: 'harbour',
    storyType: 'short_story',
    genre: 'mystery',
    targetLength: 5000,
    premise: 'A harbour inspector hunts for a stolen ledger.',
    styleNotes: null,
    phase: 'writing',
    resumePhase: null,
    analysis: null,
    questions: [],
    answers: {},
    outline: [],
    chapters: [],
    characters: [],
    plotThreads: [],
    worldFacts: [],
    pendingDraft: null,
    chapterDigests: [],
    reviews: [],
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}
