import type { StoryType } from '../types/narrative';

export interface StoryTypeDefaults {
  unit: 'chapter' | 'sequence' | 'section';
  minChapters: number;
  maxChapters: number;
  minWords: number;
  maxWords: number;
}

export const STORY_TYPE_DEFAULTS: Record<StoryType, StoryTypeDefaults> = {
  novel: { unit: 'chapter', minChapters: 15, maxChapters: 25, minWords: 2000, maxWords: 4000 },
  screenplay: { unit: 'sequence', minChapters: 8, maxChapters: 15, minWords: 1000, maxWords: 2500 },
  short_story: { unit: 'section', minChapters: 3, maxChapters: 7, minWords: 500, maxWords: 1500 },
};

export function clampNumber(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Planned entry count for a target length, kept within the story type's range. */
export function suggestedChapterCount(storyType: StoryType, targetLength: number): number {
  const defaults = STORY_TYPE_DEFAULTS[storyType];
  const perChapter = (defaults.minWords + defaults.maxWords) / 2;
  return clampNumber(Math.round(targetLength / perChapter), defaults.minChapters, defaults.maxChapters);
}
