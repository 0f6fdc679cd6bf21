import ConsistencyChecker, { hasContradictions } from '../../src/services/consistencyChecker';
import type { ChapterExtraction, WorldFact } from '../../src/types/narrative';
import { makePlan, makeProjectState } from '../helpers/fixtures';

const NO_ELECTRICITY: WorldFact = {
  id: 'fact-1',
  category: 'setting',
  subject: 'city electricity',
  statement: 'The city has no electricity.',
  establishedIn: 0,
  revisions: [],
};

const EMPTY_EXTRACTION: ChapterExtraction = { characters: [], threads: [], facts: [] };

describe('ConsistencyChecker', () => {
  const checker = new ConsistencyChecker();

  it('flags an object that implies something the world has ruled out', () => {
    const project = makeProjectState({ worldFacts: [NO_ELECTRICITY] });

    const flags = checker.check('Mara waited in the archive. She switched on the lamp and read.', project, {
      chapterIndex: 4,
    });

    expect(flags).toEqual([
      {
        severity: 'contradiction',
        entity: 'world-fact',
        description: '"lamp" implies electricity, but the story establishes that The city has no electricity',
        evidence: 'She switched on the lamp and read.',
        ref: 'fact-1',
        suggestion: 'Revise the passage, or approve with override to record a deliberate exception',
      },
    ]);
    expect(hasContradictions(flags)).toBe(true);
  });

  it('ignores negated sentences and facts established after the chapter', () => {
    const negated = checker.check('There was no lamp anywhere in the archive.', makeProjectState({ worldFacts: [NO_ELECTRICITY] }), {
      chapterIndex: 4,
    });
    const later = checker.check(
      'She switched on the lamp.',
      makeProjectState({ worldFacts: [{ ...NO_ELECTRICITY, establishedIn: 6 }] }),
      { chapterIndex: 4 }
    );

    expect(negated).toEqual([]);
    expect(later).toEqual([]);
  });

  it('treats a known name with a different role as a contradiction and an unknown name as new', () => {
    const project = makeProjectState({
      characters: [
        {
          id: 'char-sam',
          name: 'Sam',
          role: 'protagonist',
          arc: '',
          currentState: '',
          stateHistory: [],
          firstAppearance: 0,
        },
      ],
    });
    const extraction: ChapterExtraction = {
      ...EMPTY_EXTRACTION,
      characters: [
        { name: 'Sam', role: 'antagonist', state: null },
        { name: 'Harbourmaster Okafor', role: 'supporting', state: null },
      ],
    };

    const flags = checker.check('Sam met the harbourmaster.', project, { chapterIndex: 1, extraction });

    expect(flags.map((flag) => [flag.severity, flag.entity, flag.description])).toEqual([
      ['contradiction', 'character', '"Sam" appears as antagonist but "Sam" is recorded as protagonist'],
      ['new-entity', 'character', 'New character "Harbourmaster Okafor" (supporting)'],
    ]);
  });

  it('refuses to carry on a thread that has already closed', () => {
    const project = makeProjectState({
      plotThreads: [
        {
          id: 'thread-1',
          title: 'The missing ledger',
          description: '',
          status: 'resolved',
          chapters: [0, 1],
          resolutionChapter: 1,
          closedAtChapter: 1,
        },
      ],
    });
    const extraction: ChapterExtraction = {
      ...EMPTY_EXTRACTION,
      threads: [{ title: 'the missing ledger', description: 'Vale keeps hunting', status: 'advanced' }],
    };

    const [flag] = checker.check('Vale kept hunting.', project, { chapterIndex: 2, extraction });

    expect(flag).toMatchObject({
      severity: 'contradiction',
      entity: 'plot-thread',
      ref: 'thread-1',
      description: 'Plot thread "The missing ledger" was resolved in chapter 2 but the draft treats it as ongoing',
    });
  });

  it('flags two statements in one draft that disagree about the same subject', () => {
    const extraction: ChapterExtraction = {
      ...EMPTY_EXTRACTION,
      facts: [
        { category: 'rule', subject: 'harbour gate', statement: 'The harbour gate opens at dawn.' },
        { category: 'rule', subject: 'Harbour Gate', statement: 'The harbour gate opens at dawn each day.' },
        { category: 'rule', subject: 'harbour gate', statement: 'The harbour gate never opens.' },
      ],
    };

    const flags = checker.check('The gate creaked.', makeProjectState(), { chapterIndex: 0, extraction });

    expect(flags).toEqual([
      {
        severity: 'new-entity',
        entity: 'world-fact',
        description: 'New rule fact: The harbour gate opens at dawn.',
        suggestion: 'Recorded as a world fact when the chapter is approved',
      },
      {
        severity: 'contradiction',
        entity: 'world-fact',
        description: 'The draft states both "The harbour gate opens at dawn." and "The harbour gate never opens." about harbour gate',
        evidence: 'The harbour gate never opens.',
        suggestion: 'Revise the chapter, or approve with override to keep the later statement',
      },
    ]);
  });

  it('raises style notes for an absent planned character and a repeated paragraph', () => {
    const paragraph = 'The fog rolled over the quay and swallowed the boats moored by the pier.';
    const plan = makePlan(0, { characters: ['Inspector Vale', 'Mara Quill'] });

    const flags = checker.check(`Inspector Vale watched.\n\n${paragraph}\n\n${paragraph}`, makeProjectState(), {
      chapterIndex: 0,
      plan,
      extraction: EMPTY_EXTRACTION,
    });

    expect(flags).toEqual([
      { severity: 'style', entity: 'character', description: '"Mara Quill" is planned for this chapter but never appears' },
      { severity: 'style', entity: 'prose', description: 'A paragraph is repeated 2 times', evidence: paragraph },
    ]);
    expect(hasContradictions(flags)).toBe(false);
  });
});
