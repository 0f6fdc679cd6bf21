import type { Flag, PendingDraft, Phase, ProjectState, StoryQuestion, StoryType } from '../types/narrative';

export interface PendingDraftView {
  index: number;
  title: string;
  wordCount: number;
  status: PendingDraft['status'];
  revisionCount: number;
  flags: Flag[];
  blocked: boolean;
  critiqueScore: number | null;
  instructions: string | null;
  generatedAt: string;
}

export interface ProjectStatus {
  name: string;
  storyType: StoryType;
  genre: string;
  targetLength: number;
  phase: Phase;
  revision: number;
  cursor: number;
  chaptersWritten: number;
  plannedChapters: number;
  wordsWritten: number;
  nextChapter: { index: number; title: string } | null;
  pendingDraft: PendingDraftView | null;
  openQuestions: StoryQuestion[];
  counts: {
    characters: number;
    openThreads: number;
    closedThreads: number;
    worldFacts: number;
    reviews: number;
  };
  updatedAt: string;
}

export function toPendingDraftView(draft: PendingDraft): PendingDraftView {
  return {
    index: draft.index,
    title: draft.title,
    wordCount: draft.wordCount,
    status: draft.status,
    revisionCount: draft.revisionCount,
    flags: draft.flags,
    blocked: draft.flags.some((flag) => flag.severity === 'contradiction'),
    critiqueScore: draft.critique ? draft.critique.overallScore : null,
    instructions: draft.instructions ?? null,
    generatedAt: draft.generatedAt,
  };
}

export function unansweredQuestions(project: Readonly<ProjectState>): StoryQuestion[] {
  return project.questions.filter((question) => !project.answers[question.id]);
}

export function toProjectStatus(project: Readonly<ProjectState>, revision: number): ProjectStatus {
  const cursor = project.chapters.length;
  const nextPlan = project.outline[cursor];
  const openThreads = project.plotThreads.filter((thread) => thread.status === 'open').length;
  return {
    name: project.name,
    storyType: project.storyType,
    genre: project.genre,
    targetLength: project.targetLength,
    phase: project.phase,
    revision,
    cursor,
    chaptersWritten: cursor,
    plannedChapters: project.outline.length,
    wordsWritten: project.chapters.reduce((total, chapter) => total + chapter.wordCount, 0),
    nextChapter: nextPlan && project.phase !== 'complete' ? { index: nextPlan.index, title: nextPlan.title } : null,
    pendingDraft: project.pendingDraft ? toPendingDraftView(project.pendingDraft) : null,
    openQuestions: project.phase === 'questioning' ? unansweredQuestions(project) : [],
    counts: {
      characters: project.characters.length,
      openThreads,
      closedThreads: project.plotThreads.length - openThreads,
      worldFacts: project.worldFacts.length,
      reviews: project.reviews.length,
    },
    updatedAt: project.updatedAt,
  };
}
