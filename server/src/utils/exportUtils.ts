import sanitizeFilename from 'sanitize-filename';
import type { StoryType } from '../types/narrative';
import { STORY_TYPE_DEFAULTS } from './storyDefaults';
import { normaliseNewlines } from './text';

export interface ChapterMeta {
  index: number;
  number: number;
  title: string;
  fileName: string;
  wordCount: number;
  revisionCount: number;
  committedAt: string;
}

export interface ChapterMarkdownOptions {
  storyType: StoryType;
  title: string;
  chapterNumber: number;
  content: string;
  committedAt?: string | null;
  revisionCount?: number;
}

export interface IndexMarkdownOptions {
  projectName: string;
  storyType: StoryType;
  genre: string;
  premise?: string | null;
  exportedAt: Date;
  chapters: ChapterMeta[];
  plannedChapters: number;
}

type FrontMatterValue = string | number | null | string[];

const MAX_FILENAME_LENGTH = 120;

function truncateFilename(value: string, maxLength = MAX_FILENAME_LENGTH): string {
  if (value.length <= maxLength) {
    return value;
  }
  const half = Math.floor((maxLength - 3) / 2);
  return `${value.slice(0, half)}...${value.slice(value.length - half)}`;
}

export function safeFileName(input: string, fallback: string, extension?: string): string {
  const cleaned = sanitizeFilename(input, { replacement: '_' }).trim();
  const base = cleaned || fallback;
  const truncated = truncateFilename(base.replace(/\s+/g, ' ').trim());
  if (!extension) {
    return truncated || fallback;
  }
  const withoutExtLimit = MAX_FILENAME_LENGTH - extension.length - 1;
  const limited = truncateFilename(truncated, withoutExtLimit > 0 ? withoutExtLimit : MAX_FILENAME_LENGTH);
  return `${limited || fallback}.${extension}`;
}

function formatFrontMatterValue(value: FrontMatterValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => JSON.stringify(item)).join(', ')}]`;
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'null';
  }
  return JSON.stringify(value);
}

export function buildFrontMatter(values: Record<string, FrontMatterValue>): string {
  const lines = Object.entries(values)
    .map(([key, value]) => `${key}: ${formatFrontMatterValue(value)}`)
    .join('\n');
  return `---\n${lines}\n---\n`;
}

export function buildChapterFileName(chapterNumber: number, title: string): string {
  const prefix = chapterNumber.toString().padStart(3, '0');
  return safeFileName(`${prefix}-${title}`, `chapter-${prefix}`, 'md');
}

/** "Chapter 3: The Ledger", "Sequence 3: …" or "Section 3: …" depending on the story type. */
export function formatChapterHeading(storyType: StoryType, chapterNumber: number, title: string): string {
  const unit = STORY_TYPE_DEFAULTS[storyType].unit;
  const label = `${unit.charAt(0).toUpperCase()}${unit.slice(1)} ${chapterNumber}`;
  const cleanedTitle = title.trim();
  return cleanedTitle ? `${label}: ${cleanedTitle}` : label;
}

export function createChapterMarkdown(options: ChapterMarkdownOptions): string {
  const frontMatter = buildFrontMatter({
    title: options.title,
    chapter: options.chapterNumber,
    committedAt: options.committedAt ?? null,
    revisions: options.revisionCount ?? 0,
  });
  const heading = formatChapterHeading(options.storyType, options.chapterNumber, options.title);
  const body = normaliseNewlines(options.content).trim();
  return `${frontMatter}\n# ${heading}\n\n${body}\n`;
}

export function createIndexMarkdown(options: IndexMarkdownOptions): string {
  const frontMatter = buildFrontMatter({
    title: options.projectName,
    storyType: options.storyType,
    genre: options.genre,
    chapterCount: options.chapters.length,
    plannedChapters: options.plannedChapters,
    exportedAt: options.exportedAt.toISOString(),
  });

  const premiseSection = options.premise?.trim() ? `${options.premise.trim()}\n\n` : '';
  const tocLines = options.chapters
    .map((chapter) => `${chapter.number}. [${chapter.title}](chapters/${chapter.fileName})`)
    .join('\n');

  const body = `# ${options.projectName}\n\n${premiseSection}## Contents\n\n${tocLines || 'No chapters written yet.'}\n`;
  return `${frontMatter}\n${body}`;
}
