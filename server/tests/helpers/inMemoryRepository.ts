import type { ChangeLogEntry, ProjectState } from '../../src/types/narrative';
import {
  toListItem,
  type ProjectListItem,
  type ProjectRepository,
  type ProjectSnapshot,
  type ReadLogOptions,
} from '../../src/services/projectRepository';
import { ConcurrentModificationError, ProjectExistsError, ProjectNotFoundError } from '../../src/utils/errors';

interface StoredProject {
  state: ProjectState;
  revision: number;
  logSeq: number;
  log: ChangeLogEntry[];
}

/** Stand-in for the Mongo repository with the same revision and log-sequence rules. */
export default class InMemoryProjectRepository implements ProjectRepository {
  private projects = new Map<string, StoredProject>();

  public commits = 0;

  public failNextCommit: Error | null = null;

  async create(state: ProjectState, entries: ChangeLogEntry[]): Promise<ProjectSnapshot> {
    if (this.projects.has(state.name)) {
      throw new ProjectExistsError(state.name);
    }
    const logSeq = entries.length ? entries[entries.length - 1].seq : 0;
    this.projects.set(state.name, {
      state: structuredClone(state),
      revision: 0,
      logSeq,
      log: structuredClone(entries),
    });
    return { state: structuredClone(state), revision: 0, logSeq };
  }

  async load(name: string): Promise<ProjectSnapshot | null> {
    const stored = this.projects.get(name);
    if (!stored) {
      return null;
    }
    return { state: structuredClone(stored.state), revision: stored.revision, logSeq: stored.logSeq };
  }

  async list(): Promise<ProjectListItem[]> {
    return Array.from(this.projects.values()).map((stored) => toListItem(stored.state));
  }

  async commit(state: ProjectState, expectedRevision: number, entries: ChangeLogEntry[]): Promise<number> {
    if (!entries.length) {
      return expectedRevision;
    }
    if (this.failNextCommit) {
      const failure = this.failNextCommit;
      this.failNextCommit = null;
      throw failure;
    }
    const stored = this.projects.get(state.name);
    if (!stored) {
      throw new ProjectNotFoundError(state.name);
    }
    if (stored.revision !== expectedRevision || entries[0].seq !== stored.logSeq + 1) {
      throw new ConcurrentModificationError(state.name, expectedRevision);
    }
    stored.state = structuredClone(state);
    stored.revision = expectedRevision + 1;
    stored.logSeq = entries[entries.length - 1].seq;
    stored.log.push(...structuredClone(entries));
    this.commits += 1;
    return stored.revision;
  }

  async readLog(name: string, { afterSeq = 0, limit = 200 }: ReadLogOptions = {}): Promise<ChangeLogEntry[]> {
    const stored = this.projects.get(name);
    if (!stored) {
      return [];
    }
    return structuredClone(stored.log.filter((entry) => entry.seq > afterSeq).slice(0, limit));
  }

  async delete(name: string): Promise<boolean> {
    return this.projects.delete(name);
  }

  /** Direct view of the persisted state, for assertions. */
  stored(name: string): ProjectState | undefined {
    const stored = this.projects.get(name);
    return stored ? structuredClone(stored.state) : undefined;
  }

  revisionOf(name: string): number | undefined {
    return this.projects.get(name)?.revision;
  }
}
