import { mongo } from 'mongoose';
import ProjectModel, { ProjectRecord } from '../models/Project';
import ChangeLogEntryModel from '../models/ChangeLogEntry';
import type { ChangeLogEntry, Phase, ProjectState, StoryType } from '../types/narrative';
import { ConcurrentModificationError, ProjectExistsError, ProjectNotFoundError } from '../utils/errors';
import { getLogger } from '../utils/logger';

export interface ProjectSnapshot {
  state: ProjectState;
  revision: number;
  logSeq: number;
}

export interface ProjectListItem {
  name: string;
  storyType: StoryType;
  genre: string;
  phase: Phase;
  chapterCount: number;
  plannedChapters: number;
  updatedAt: string;
}

export interface SnapshotHead {
  revision: number;
  logSeq: number;
}

export interface ReadLogOptions {
  afterSeq?: number;
  limit?: number;
}

/**
 * Durable home of the project aggregate. `commit` persists the snapshot and the change-log entries
 * produced since the last commit, and rejects a writer holding a stale revision.
 */
export interface ProjectRepository {
  create(state: ProjectState, entries: ChangeLogEntry[]): Promise<ProjectSnapshot>;
  load(name: string): Promise<ProjectSnapshot | null>;
  list(): Promise<ProjectListItem[]>;
  commit(state: ProjectState, expectedRevision: number, entries: ChangeLogEntry[]): Promise<number>;
  readLog(name: string, options?: ReadLogOptions): Promise<ChangeLogEntry[]>;
  delete(name: string): Promise<boolean>;
}

export function toListItem(state: ProjectState): ProjectListItem {
  return {
    name: state.name,
    storyType: state.storyType,
    genre: state.genre,
    phase: state.phase,
    chapterCount: state.chapters.length,
    plannedChapters: state.outline.length,
    updatedAt: state.updatedAt,
  };
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === 11000;
}

function toRecord(state: ProjectState, revision: number, logSeq: number): ProjectRecord {
  const { id, ...rest } = state;
  return { ...rest, projectId: id, revision, logSeq };
}

function toSnapshot(record: ProjectRecord): ProjectSnapshot {
  return {
    state: {
      id: record.projectId,
      name: record.name,
      storyType: record.storyType,
      genre: record.genre,
      targetLength: record.targetLength,
      premise: record.premise ?? '',
      styleNotes: record.styleNotes ?? null,
      phase: record.phase,
      resumePhase: record.resumePhase ?? null,
      analysis: record.analysis ?? null,
      questions: record.questions ?? [],
      answers: record.answers ?? {},
      outline: record.outline ?? [],
      chapters: record.chapters ?? [],
      characters: record.characters ?? [],
      plotThreads: record.plotThreads ?? [],
      worldFacts: record.worldFacts ?? [],
      pendingDraft: record.pendingDraft ?? null,
      chapterDigests: record.chapterDigests ?? [],
      reviews: record.reviews ?? [],
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    },
    revision: record.revision,
    logSeq: record.logSeq,
  };
}

const LIST_PROJECTION = {
  name: 1,
  storyType: 1,
  genre: 1,
  phase: 1,
  updatedAt: 1,
  chapters: 1,
  outline: 1,
};

export class MongoProjectRepository implements ProjectRepository {
  private logger = getLogger({ module: 'project-repository' });

  async create(state: ProjectState, entries: ChangeLogEntry[]): Promise<ProjectSnapshot> {
    const logSeq = entries.length ? entries[entries.length - 1].seq : 0;
    try {
      await ProjectModel.create(toRecord(state, 0, logSeq));
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ProjectExistsError(state.name);
      }
      throw error;
    }
    await this.insertLog(state.name, entries);
    return { state, revision: 0, logSeq };
  }

  async load(name: string): Promise<ProjectSnapshot | null> {
    const record = await ProjectModel.findOne({ name }).lean<ProjectRecord>().exec();
    return record ? toSnapshot(record) : null;
  }

  async list(): Promise<ProjectListItem[]> {
    const records = await ProjectModel.find({}, LIST_PROJECTION).sort({ updatedAt: -1 }).lean<ProjectRecord[]>().exec();
    return records.map((record) => ({
      name: record.name,
      storyType: record.storyType,
      genre: record.genre,
      phase: record.phase,
      chapterCount: record.chapters?.length ?? 0,
      plannedChapters: record.outline?.length ?? 0,
      updatedAt: record.updatedAt,
    }));
  }

  async commit(state: ProjectState, expectedRevision: number, entries: ChangeLogEntry[]): Promise<number> {
    if (!entries.length) {
      return expectedRevision;
    }

    const head = await this.readHead(state.name);
    if (!head) {
      throw new ProjectNotFoundError(state.name);
    }
    if (head.revision !== expectedRevision) {
      throw new ConcurrentModificationError(state.name, expectedRevision);
    }
    // Entries past the snapshot's logSeq belong to a commit whose snapshot write never landed.
    await this.deleteLogAfter(state.name, head.logSeq);

    try {
      await this.insertLog(state.name, entries);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConcurrentModificationError(state.name, expectedRevision);
      }
      throw error;
    }

    const seqs = entries.map((entry) => entry.seq);
    let revision: number | null;
    try {
      revision = await this.writeSnapshot(state, expectedRevision, seqs[seqs.length - 1]);
    } catch (error) {
      await this.deleteLogEntries(state.name, seqs).catch((cleanupError: unknown) => {
        this.logger.warn(
          { project: state.name, err: cleanupError },
          'Could not remove log entries of a failed commit; the next commit discards them'
        );
      });
      throw error;
    }

    if (revision === null) {
      await this.deleteLogEntries(state.name, seqs);
      if (!(await this.readHead(state.name))) {
        throw new ProjectNotFoundError(state.name);
      }
      throw new ConcurrentModificationError(state.name, expectedRevision);
    }

    this.logger.debug({ project: state.name, revision, entries: entries.length }, 'Project committed');
    return revision;
  }

  async readLog(name: string, { afterSeq = 0, limit = 200 }: ReadLogOptions = {}): Promise<ChangeLogEntry[]> {
    const head = await this.readHead(name);
    if (!head) {
      return [];
    }
    const records = await ChangeLogEntryModel.find({ project: name, seq: { $gt: afterSeq, $lte: head.logSeq } })
      .sort({ seq: 1 })
      .limit(limit)
      .lean()
      .exec();
    return records.map((record) => ({ seq: record.seq, at: record.at, op: record.op, payload: record.payload ?? {} }));
  }

  async delete(name: string): Promise<boolean> {
    const result = await ProjectModel.deleteOne({ name }).exec();
    if (!result.deletedCount) {
      return false;
    }
    await ChangeLogEntryModel.deleteMany({ project: name }).exec();
    return true;
  }

  protected async readHead(name: string): Promise<SnapshotHead | null> {
    return ProjectModel.findOne({ name }, { revision: 1, logSeq: 1 }).lean<SnapshotHead>().exec();
  }

  /** Conditional on the revision; resolves to null when another writer got there first. */
  protected async writeSnapshot(state: ProjectState, expectedRevision: number, logSeq: number): Promise<number | null> {
    const updated = await ProjectModel.findOneAndUpdate(
      { name: state.name, revision: expectedRevision },
      { $set: toRecord(state, expectedRevision + 1, logSeq) },
      { new: true, projection: { revision: 1 } }
    )
      .lean<Pick<ProjectRecord, 'revision'>>()
      .exec();
    return updated ? updated.revision : null;
  }

  protected async insertLog(name: string, entries: ChangeLogEntry[]): Promise<void> {
    if (!entries.length) {
      return;
    }
    await ChangeLogEntryModel.insertMany(
      entries.map((entry) => ({ project: name, ...entry })),
      { ordered: true }
    );
  }

  protected async deleteLogAfter(name: string, seq: number): Promise<void> {
    await ChangeLogEntryModel.deleteMany({ project: name, seq: { $gt: seq } }).exec();
  }

  protected async deleteLogEntries(name: string, seqs: number[]): Promise<void> {
    await ChangeLogEntryModel.deleteMany({ project: name, seq: { $in: seqs } }).exec();
  }
}
