import archiver from 'archiver';
import type { ProjectState } from '../types/narrative';
import type { ProjectRepository } from './projectRepository';
import { EntityNotFoundError, ProjectNotFoundError } from '../utils/errors';
import {
  buildChapterFileName,
  type ChapterMeta,
  createChapterMarkdown,
  createIndexMarkdown,
  formatChapterHeading,
  safeFileName,
} from '../utils/exportUtils';

export const EXPORT_FORMATS = ['markdown', 'text', 'zip'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface PreparedChapter extends ChapterMeta {
  content: string;
}

export interface PreparedData {
  project: Pick<ProjectState, 'id' | 'name' | 'storyType' | 'genre' | 'premise' | 'createdAt' | 'updatedAt'> & {
    plannedChapters: number;
  };
  chapters: PreparedChapter[];
  exportedAt: Date;
  range: 'all' | 'partial';
  exportStamp: string;
}

export interface PrepareOptions {
  chapters?: number[];
}

export interface MarkdownArchiveResult {
  archive: archiver.Archiver;
  fileName: string;
  metadata: Record<string, unknown>;
}

export interface RenderedDocument {
  body: string;
  fileName: string;
  contentType: string;
}

export interface ExportServiceOptions {
  repository: ProjectRepository;
  clock?: () => Date;
}

function uniqueIndices(indices?: number[]): number[] | undefined {
  if (!indices || !indices.length) {
    return undefined;
  }
  return Array.from(new Set(indices)).sort((a, b) => a - b);
}

export default class ExportService {
  private repository: ProjectRepository;

  private clock: () => Date;

  constructor({ repository, clock = () => new Date() }: ExportServiceOptions) {
    this.repository = repository;
    this.clock = clock;
  }

  /** Committed chapters only; a pending draft is never exported. */
  async prepareData(name: string, { chapters: selection }: PrepareOptions = {}): Promise<PreparedData> {
    const snapshot = await this.repository.load(name);
    if (!snapshot) {
      throw new ProjectNotFoundError(name);
    }
    const { state } = snapshot;
    const indices = uniqueIndices(selection);
    if (indices) {
      const missing = indices.filter((index) => !state.chapters[index]);
      if (missing.length) {
        throw new EntityNotFoundError('chapter', missing.join(', '));
      }
    }

    const chosen = indices ? indices.map((index) => state.chapters[index]) : state.chapters;
    const exportedAt = this.clock();
    const stamp = exportedAt.toISOString().replace(/[:]/g, '-').replace(/\..+?Z$/, 'Z');

    return {
      project: {
        id: state.id,
        name: state.name,
        storyType: state.storyType,
        genre: state.genre,
        premise: state.premise,
        createdAt: state.createdAt,
        updatedAt: state.updatedAt,
        plannedChapters: state.outline.length,
      },
      chapters: chosen.map((chapter) => {
        const number = chapter.index + 1;
        return {
          index: chapter.index,
          number,
          title: chapter.title,
          fileName: buildChapterFileName(number, chapter.title),
          wordCount: chapter.wordCount,
          revisionCount: chapter.revisionCount,
          committedAt: chapter.committedAt,
          content: chapter.text,
        };
      }),
      exportedAt,
      range: indices ? 'partial' : 'all',
      exportStamp: stamp,
    };
  }

  renderMarkdown(data: PreparedData): RenderedDocument {
    const { project } = data;
    const parts = [
      `# ${project.name}`,
      ...data.chapters.map(
        (chapter) =>
          `## ${formatChapterHeading(project.storyType, chapter.number, chapter.title)}\n\n${chapter.content.trim()}`
      ),
    ];
    return {
      body: `${parts.join('\n\n')}\n`,
      fileName: this.fileName(data, 'md'),
      contentType: 'text/markdown; charset=utf-8',
    };
  }

  renderText(data: PreparedData): RenderedDocument {
    const { project } = data;
    const parts = [
      project.name.toUpperCase(),
      ...data.chapters.map((chapter) => {
        const heading = formatChapterHeading(project.storyType, chapter.number, chapter.title);
        return `${heading}\n${'='.repeat(heading.length)}\n\n${chapter.content.trim()}`;
      }),
    ];
    return {
      body: `${parts.join('\n\n\n')}\n`,
      fileName: this.fileName(data, 'txt'),
      contentType: 'text/plain; charset=utf-8',
    };
  }

  createMarkdownArchive(data: PreparedData): MarkdownArchiveResult {
    const archive = archiver('zip', { zlib: { level: 9 } });

    archive.append(
      createIndexMarkdown({
        projectName: data.project.name,
        storyType: data.project.storyType,
        genre: data.project.genre,
        premise: data.project.premise,
        exportedAt: data.exportedAt,
        chapters: data.chapters,
        plannedChapters: data.project.plannedChapters,
      }),
      { name: 'index.md' }
    );

    const metadata = {
      format: 'markdown',
      exportedAt: data.exportedAt.toISOString(),
      range: data.range,
      project: {
        id: data.project.id,
        name: data.project.name,
        storyType: data.project.storyType,
        genre: data.project.genre,
        plannedChapters: data.project.plannedChapters,
        createdAt: data.project.createdAt,
        updatedAt: data.project.updatedAt,
      },
      chapters: data.chapters.map((chapter) => ({
        index: chapter.index,
        number: chapter.number,
        title: chapter.title,
        file: `chapters/${chapter.fileName}`,
        wordCount: chapter.wordCount,
        revisionCount: chapter.revisionCount,
        committedAt: chapter.committedAt,
      })),
    };
    archive.append(`${JSON.stringify(metadata, null, 2)}\n`, { name: 'meta.json' });

    if (!data.chapters.length) {
      archive.append('', { name: 'chapters/.keep' });
    } else {
      data.chapters.forEach((chapter) => {
        const markdown = createChapterMarkdown({
          storyType: data.project.storyType,
          title: chapter.title,
          chapterNumber: chapter.number,
          content: chapter.content,
          committedAt: chapter.committedAt,
          revisionCount: chapter.revisionCount,
        });
        archive.append(markdown, { name: `chapters/${chapter.fileName}` });
      });
    }

    return { archive, fileName: this.fileName(data, 'zip'), metadata };
  }

  private fileName(data: PreparedData, extension: string): string {
    return safeFileName(
      `${data.project.name}-${data.exportStamp}`,
      `project-${data.project.id}-${data.exportStamp}`,
      extension
    );
  }
}
