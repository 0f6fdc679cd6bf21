export const STORY_TYPES = ['novel', 'screenplay', 'short_story'] as const;
export type StoryType = (typeof STORY_TYPES)[number];

export const PHASES = ['analysis', 'questioning', 'outlining', 'writing', 'critique', 'complete'] as const;
export type Phase = (typeof PHASES)[number];

export const CHARACTER_ROLES = ['protagonist', 'antagonist', 'supporting'] as const;
export type CharacterRole = (typeof CHARACTER_ROLES)[number];

export const THREAD_STATUSES = ['open', 'resolved', 'abandoned'] as const;
export type PlotThreadStatus = (typeof THREAD_STATUSES)[number];

export const FACT_CATEGORIES = ['setting', 'rule', 'history', 'other'] as const;
export type WorldFactCategory = (typeof FACT_CATEGORIES)[number];

export type ChapterStatus = 'draft' | 'critiqued' | 'approved';

export interface ChapterPlan {
  index: number;
  title: string;
  summary: string;
  keyEvents: string[];
  targetWords: number;
  characters: string[];
  threads: string[];
}

export interface Chapter {
  index: number;
  title: string;
  text: string;
  wordCount: number;
  critiqueNotes: string[];
  revisionCount: number;
  status: ChapterStatus;
  characters: string[];
  threads: string[];
  committedAt: string;
}

export interface CharacterStateEntry {
  chapterIndex: number;
  state: string;
}

export interface Character {
  id: string;
  name: string;
  role: CharacterRole;
  arc: string;
  currentState: string;
  stateHistory: CharacterStateEntry[];
  firstAppearance: number;
}

export interface PlotThread {
  id: string;
  title: string;
  description: string;
  status: PlotThreadStatus;
  chapters: number[];
  resolutionChapter: number | null;
  closedAtChapter: number | null;
}

export interface WorldFactRevision {
  previousStatement: string;
  chapterIndex: number | null;
  reason: string;
  recordedAt: string;
}

export interface WorldFact {
  id: string;
  category: WorldFactCategory;
  subject: string;
  statement: string;
  establishedIn: number;
  revisions: WorldFactRevision[];
}

export interface StoryQuestion {
  id: string;
  question: string;
  category: string;
  importance: number;
  required: boolean;
  suggestedAnswer: string | null;
}

export interface StoryGap {
  description: string;
  category: string;
  severity: number;
}

export interface StoryAnalysis {
  strengths: string[];
  gaps: StoryGap[];
  genreAnalysis: string | null;
  complexityScore: number;
}

export type FlagSeverity = 'contradiction' | 'new-entity' | 'style';
export type FlagEntity = 'character' | 'plot-thread' | 'world-fact' | 'prose';

export interface Flag {
  severity: FlagSeverity;
  entity: FlagEntity;
  description: string;
  evidence?: string;
  ref?: string;
  suggestion?: string;
}

export interface ExtractedCharacter {
  name: string;
  role: CharacterRole | null;
  state: string | null;
}

export type ExtractedThreadStatus = 'open' | 'advanced' | 'resolved' | 'abandoned';

export interface ExtractedThread {
  title: string;
  description: string;
  status: ExtractedThreadStatus;
}

export interface ExtractedFact {
  category: WorldFactCategory;
  subject: string;
  statement: string;
}

/** Tagged representation of what a draft mentions, parsed from model output before it touches the store. */
export interface ChapterExtraction {
  characters: ExtractedCharacter[];
  threads: ExtractedThread[];
  facts: ExtractedFact[];
}

export interface CritiqueResult {
  overallScore: number;
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
  continuityIssues: string[];
  characterConsistency: number;
  plotCoherence: number;
}

export interface PendingDraft {
  index: number;
  title: string;
  text: string;
  wordCount: number;
  status: Exclude<ChapterStatus, 'approved'>;
  flags: Flag[];
  critique: CritiqueResult | null;
  extraction: ChapterExtraction;
  feedback: string[];
  /** Operator direction given with write_next; carried into every revision. */
  instructions?: string;
  revisionCount: number;
  generatedAt: string;
}

export interface ChapterDigest {
  chapterIndex: number;
  digest: string;
}

export type ReviewScope = 'chapter' | 'full_story';

export interface StoryReview {
  scope: ReviewScope;
  chapterIndex: number | null;
  critique: CritiqueResult;
  continuityIssues: string[];
  createdAt: string;
  trigger: 'operator' | 'interval';
}

export interface ProjectState {
  id: string;
  name: string;
  storyType: StoryType;
  genre: string;
  targetLength: number;
  premise: string;
  styleNotes: string | null;
  phase: Phase;
  resumePhase: Phase | null;
  analysis: StoryAnalysis | null;
  questions: StoryQuestion[];
  answers: Record<string, string>;
  outline: ChapterPlan[];
  chapters: Chapter[];
  characters: Character[];
  plotThreads: PlotThread[];
  worldFacts: WorldFact[];
  pendingDraft: PendingDraft | null;
  chapterDigests: ChapterDigest[];
  reviews: StoryReview[];
  createdAt: string;
  updatedAt: string;
}

export interface ChangeLogEntry {
  seq: number;
  at: string;
  op: string;
  payload: Record<string, unknown>;
}
