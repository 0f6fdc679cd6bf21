import NarrativeStore, { type ChapterInput } from '../../src/services/narrativeStore';
import {
  ConcurrentModificationError,
  ContradictionError,
  ProjectNotFoundError,
  SequenceError,
  StateTransitionError,
} from '../../src/utils/errors';
import InMemoryProjectRepository from '../helpers/inMemoryRepository';
import { FIXED_NOW, MYSTERY_TALE, fixedClock, makeChapter, makePlan, makeProjectState, sectionProse } from '../helpers/fixtures';

async function loadHarbour(overrides: Parameters<typeof makeProjectState>[0] = {}) {
  const repository = new InMemoryProjectRepository();
  await repository.create(makeProjectState(overrides), []);
  const store = await NarrativeStore.load(repository, 'harbour', { clock: fixedClock });
  return { repository, store };
}

function chapterInput(index: number): ChapterInput {
  const chapter = makeChapter(index, sectionProse(index + 1));
  return {
    index: chapter.index,
    title: chapter.title,
    text: chapter.text,
    wordCount: chapter.wordCount,
    critiqueNotes: [],
    revisionCount: 0,
    characters: [],
    threads: [],
  };
}

describe('NarrativeStore', () => {
  it('creates a project in analysis with an opening log entry', async () => {
    const repository = new InMemoryProjectRepository();
    const store = await NarrativeStore.create(repository, MYSTERY_TALE, { clock: fixedClock });

    expect(store.project.phase).toBe('analysis');
    expect(store.currentRevision).toBe(0);
    expect(store.project.createdAt).toBe(FIXED_NOW.toISOString());
    expect(await repository.readLog(MYSTERY_TALE.name)).toEqual([
      {
        seq: 1,
        at: FIXED_NOW.toISOString(),
        op: 'project.created',
        payload: { name: 'mystery-tale', storyType: 'short_story', genre: 'mystery', targetLength: 5000 },
      },
    ]);
  });

  it('fails to load an unknown project', async () => {
    await expect(NarrativeStore.load(new InMemoryProjectRepository(), 'missing')).rejects.toBeInstanceOf(ProjectNotFoundError);
  });

  it('appends chapters strictly in order and only against the outline', async () => {
    const { store } = await loadHarbour({ outline: [makePlan(0), makePlan(1)] });

    expect(() => store.appendChapter(chapterInput(1))).toThrow(SequenceError);

    const chapter = store.appendChapter(chapterInput(0));
    expect(chapter.status).toBe('approved');
    expect(chapter.committedAt).toBe(FIXED_NOW.toISOString());
    expect(store.cursor).toBe(1);

    store.appendChapter(chapterInput(1));
    expect(() => store.appendChapter(chapterInput(2))).toThrow('Chapter 2 has no outline entry');
  });

  it('returns the existing character for a same-role restatement and rejects a role change', async () => {
    const { store } = await loadHarbour();
    const vale = store.addCharacter({ name: 'Inspector  Vale', role: 'protagonist', firstAppearance: 0 });

    expect(vale.id).toBe('char-inspector-vale');
    expect(vale.name).toBe('Inspector Vale');
    expect(store.addCharacter({ name: 'inspector vale', role: 'protagonist', firstAppearance: 2 })).toBe(vale);
    expect(() => store.addCharacter({ name: 'Inspector Vale', role: 'antagonist', firstAppearance: 2 })).toThrow(
      ContradictionError
    );
    expect(store.project.characters).toHaveLength(1);
  });

  it('keeps a fact unless a conflicting statement is overridden', async () => {
    const { store } = await loadHarbour();
    const fact = store.addWorldFact({
      category: 'rule',
      subject: 'Harbour ice',
      statement: 'The harbour freezes every winter.',
      establishedIn: 0,
    });
    expect(fact.subject).toBe('harbour ice');

    const restated = store.addWorldFact({
      category: 'rule',
      subject: 'harbour ice',
      statement: 'The harbour freezes every winter',
      establishedIn: 1,
    });
    expect(restated).toBe(fact);

    const conflicting = { category: 'rule' as const, subject: 'harbour ice', statement: 'The harbour never freezes.', establishedIn: 2 };
    expect(() => store.addWorldFact(conflicting)).toThrow(ContradictionError);

    store.addWorldFact(conflicting, { override: true, reason: 'Warmer climate' });
    expect(store.project.worldFacts).toHaveLength(1);
    expect(store.project.worldFacts[0].statement).toBe('The harbour never freezes.');
    expect(store.project.worldFacts[0].revisions).toEqual([
      {
        previousStatement: 'The harbour freezes every winter.',
        chapterIndex: 2,
        reason: 'Warmer climate',
        recordedAt: FIXED_NOW.toISOString(),
      },
    ]);
  });

  it('closes a thread once and records where it closed', async () => {
    const { store } = await loadHarbour();
    const thread = store.addPlotThread({ title: 'The missing ledger', chapterIndex: 0 });

    store.updatePlotThreadStatus(thread.id, 'resolved', 1);

    expect(thread).toMatchObject({ status: 'resolved', resolutionChapter: 1, closedAtChapter: 1, chapters: [0, 1] });
    expect(() => store.updatePlotThreadStatus(thread.id, 'abandoned', 2)).toThrow(StateTransitionError);
  });

  it('summarises the story as it stood at an earlier chapter', async () => {
    const { store } = await loadHarbour({
      characters: [
        {
          id: 'char-vale',
          name: 'Inspector Vale',
          role: 'protagonist',
          arc: '',
          currentState: 'Suspects Mara',
          stateHistory: [
            { chapterIndex: 0, state: 'Arrives in Brackwater' },
            { chapterIndex: 2, state: 'Suspects Mara' },
          ],
          firstAppearance: 0,
        },
        {
          id: 'char-mara',
          name: 'Mara Quill',
          role: 'antagonist',
          arc: '',
          currentState: 'Hiding the ledger',
          stateHistory: [{ chapterIndex: 2, state: 'Hiding the ledger' }],
          firstAppearance: 2,
        },
      ],
      plotThreads: [
        {
          id: 'thread-1',
          title: 'The missing ledger',
          description: 'Who took it?',
          status: 'resolved',
          chapters: [0, 2],
          resolutionChapter: 2,
          closedAtChapter: 2,
        },
      ],
    });

    const early = store.getSummary(1);
    expect(early.characters.map((character) => [character.name, character.state])).toEqual([
      ['Inspector Vale', 'Arrives in Brackwater'],
    ]);
    expect(early.openThreads).toEqual([
      { id: 'thread-1', title: 'The missing ledger', description: 'Who took it?', chapters: [0] },
    ]);

    const late = store.getSummary(2);
    expect(late.characters.map((character) => [character.name, character.state])).toEqual([
      ['Inspector Vale', 'Suspects Mara'],
      ['Mara Quill', 'Hiding the ledger'],
    ]);
    expect(late.openThreads).toEqual([]);
  });

  it('remembers the phase to resume after a critique', async () => {
    const { store } = await loadHarbour();

    store.setPhase('critique');
    expect(store.project.resumePhase).toBe('writing');
    store.setPhase('writing');
    expect(store.project.resumePhase).toBeNull();
    expect(() => store.setPhase('analysis')).toThrow(StateTransitionError);
  });

  it('flushes mutations with consecutive log numbers and detects a stale writer', async () => {
    const { repository, store } = await loadHarbour();
    const stale = await NarrativeStore.load(repository, 'harbour', { clock: fixedClock });

    await store.save();
    expect(repository.commits).toBe(0);

    store.addPlotThread({ title: 'The missing ledger' });
    store.cacheDigest(0, 'Vale arrives.');
    await store.save();

    expect(store.currentRevision).toBe(1);
    expect(store.hasUnsavedChanges).toBe(false);
    expect((await repository.readLog('harbour')).map((entry) => [entry.seq, entry.op])).toEqual([
      [1, 'thread.added'],
      [2, 'digest.cached'],
    ]);

    stale.addPlotThread({ title: 'A second thread' });
    await expect(stale.save()).rejects.toBeInstanceOf(ConcurrentModificationError);
  });
});
