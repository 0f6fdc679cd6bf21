import { mongo } from 'mongoose';
import { MongoProjectRepository, type SnapshotHead } from '../../src/services/projectRepository';
import type { ChangeLogEntry, ProjectState } from '../../src/types/narrative';
import { ConcurrentModificationError } from '../../src/utils/errors';
import { FIXED_NOW, makeProjectState } from '../helpers/fixtures';

interface StoredEntry extends ChangeLogEntry {
  project: string;
}

/** Keeps the commit protocol of the Mongo repository but stores everything in memory. */
class MemoryBackedRepository extends MongoProjectRepository {
  public heads = new Map<string, SnapshotHead>();

  public states = new Map<string, ProjectState>();

  public entries: StoredEntry[] = [];

  public snapshotFailure: Error | null = null;

  seed(state: ProjectState, head: SnapshotHead, entries: ChangeLogEntry[]): void {
    this.heads.set(state.name, head);
    this.states.set(state.name, structuredClone(state));
    this.entries.push(...entries.map((entry) => ({ project: state.name, ...entry })));
  }

  seqs(name: string): number[] {
    return this.entries.filter((entry) => entry.project === name).map((entry) => entry.seq);
  }

  protected async readHead(name: string): Promise<SnapshotHead | null> {
    const head = this.heads.get(name);
    return head ? { ...head } : null;
  }

  protected async writeSnapshot(state: ProjectState, expectedRevision: number, logSeq: number): Promise<number | null> {
    if (this.snapshotFailure) {
      const failure = this.snapshotFailure;
      this.snapshotFailure = null;
      throw failure;
    }
    const head = this.heads.get(state.name);
    if (!head || head.revision !== expectedRevision) {
      return null;
    }
    this.heads.set(state.name, { revision: expectedRevision + 1, logSeq });
    this.states.set(state.name, structuredClone(state));
    return expectedRevision + 1;
  }

  protected async insertLog(name: string, entries: ChangeLogEntry[]): Promise<void> {
    for (const entry of entries) {
      if (this.entries.some((stored) => stored.project === name && stored.seq === entry.seq)) {
        throw new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 });
      }
    }
    this.entries.push(...entries.map((entry) => ({ project: name, ...entry })));
  }

  protected async deleteLogAfter(name: string, seq: number): Promise<void> {
    this.entries = this.entries.filter((entry) => entry.project !== name || entry.seq <= seq);
  }

  protected async deleteLogEntries(name: string, seqs: number[]): Promise<void> {
    this.entries = this.entries.filter((entry) => entry.project !== name || !seqs.includes(entry.seq));
  }
}

function logEntry(seq: number, op: string): ChangeLogEntry {
  return { seq, at: FIXED_NOW.toISOString(), op, payload: {} };
}

function seededRepository() {
  const repository = new MemoryBackedRepository();
  const state = makeProjectState();
  repository.seed(state, { revision: 3, logSeq: 4 }, [1, 2, 3, 4].map((seq) => logEntry(seq, 'phase.changed')));
  return { repository, state };
}

describe('MongoProjectRepository.commit', () => {
  it('removes the log entries of a commit whose snapshot write failed, so the retry succeeds', async () => {
    const { repository, state } = seededRepository();
    const pending = [logEntry(5, 'chapter.committed'), logEntry(6, 'character.added'), logEntry(7, 'thread.updated')];
    repository.snapshotFailure = new Error('connection reset');

    await expect(repository.commit(state, 3, pending)).rejects.toThrow('connection reset');
    expect(repository.seqs('harbour')).toEqual([1, 2, 3, 4]);
    expect(repository.heads.get('harbour')).toEqual({ revision: 3, logSeq: 4 });

    await expect(repository.commit(state, 3, pending)).resolves.toBe(4);
    expect(repository.seqs('harbour')).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(repository.heads.get('harbour')).toEqual({ revision: 4, logSeq: 7 });
  });

  it('discards entries a crashed commit left past the snapshot before writing new ones', async () => {
    const { repository, state } = seededRepository();
    repository.entries.push(
      { project: 'harbour', ...logEntry(5, 'orphaned.one') },
      { project: 'harbour', ...logEntry(6, 'orphaned.two') }
    );

    const revision = await repository.commit(state, 3, [logEntry(5, 'chapter.committed')]);

    expect(revision).toBe(4);
    expect(repository.entries.filter((entry) => entry.seq > 4)).toEqual([
      { project: 'harbour', ...logEntry(5, 'chapter.committed') },
    ]);
    expect(repository.heads.get('harbour')).toEqual({ revision: 4, logSeq: 5 });
  });

  it('rejects a stale revision without touching the log', async () => {
    const { repository, state } = seededRepository();

    await expect(repository.commit(state, 2, [logEntry(5, 'chapter.committed')])).rejects.toBeInstanceOf(
      ConcurrentModificationError
    );
    expect(repository.seqs('harbour')).toEqual([1, 2, 3, 4]);
  });

  it('leaves other projects alone when discarding uncommitted entries', async () => {
    const { repository, state } = seededRepository();
    const other = makeProjectState({ id: 'project-2', name: 'lighthouse' });
    repository.seed(other, { revision: 0, logSeq: 1 }, [logEntry(1, 'project.created'), logEntry(2, 'phase.changed')]);

    await repository.commit(state, 3, [logEntry(5, 'chapter.committed')]);

    expect(repository.seqs('lighthouse')).toEqual([1, 2]);
  });
});
