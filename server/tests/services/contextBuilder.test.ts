import ContextWindowBuilder, { type DigestSource } from '../../src/services/contextBuilder';
import { BudgetExceededError, SequenceError } from '../../src/utils/errors';
import { estimateTokens } from '../../src/utils/tokenEstimate';
import { makeChapter, makePlan, makeProjectState } from '../helpers/fixtures';

function longText(words: number): string {
  return Array.from({ length: words }, (_value, position) => `word${position}`).join(' ');
}

function fiveChapterProject() {
  return makeProjectState({
    outline: Array.from({ length: 8 }, (_value, index) => makePlan(index)),
    chapters: Array.from({ length: 5 }, (_value, index) => makeChapter(index, longText(400))),
  });
}

class LabelDigests implements DigestSource {
  public requested: number[] = [];

  async digest(chapter: { index: number }): Promise<string> {
    this.requested.push(chapter.index);
    return `Digest ${chapter.index + 1}`;
  }
}

describe('ContextWindowBuilder', () => {
  it('digests chapters older than the trailing window and keeps the window as excerpts', async () => {
    const digests = new LabelDigests();
    const builder = new ContextWindowBuilder({ trailingWindow: 3, digestSource: digests });

    const context = await builder.build('chapter', fiveChapterProject(), 100_000);

    expect(context.targetChapter).toBe(5);
    expect(context.trimSteps).toEqual([]);
    expect(context.sections.map((section) => section.key)).toEqual([
      'project',
      'story-so-far',
      'trailing-window',
      'target',
      'upcoming',
    ]);
    expect(context.sections[1].body).toBe('Chapter 1: Digest 1\nChapter 2: Digest 2');
    expect(context.sections[4].body).toBe('Chapter 7: Section 7: Plan for section 7.\nChapter 8: Section 8: Plan for section 8.');
    expect(context.included.digestChapters).toEqual([0, 1]);
    expect(digests.requested).toEqual([0, 1]);
    expect(context.tokens).toBe(estimateTokens(context.text));
  });

  it('trims in order until the payload fits and never drops pinned sections', async () => {
    const builder = new ContextWindowBuilder({ trailingWindow: 3, digestSource: new LabelDigests() });

    const context = await builder.build('chapter', fiveChapterProject(), 300, { feedback: ['Tighter pacing'] });

    expect(context.trimSteps).toEqual(['drop-upcoming', 'condense-trailing-window']);
    expect(context.tokens).toBeLessThanOrEqual(300);
    expect(context.sections.filter((section) => section.pinned).map((section) => section.key)).toEqual([
      'project',
      'target',
      'feedback',
    ]);
    expect(context.included.digestChapters).toEqual([0, 1, 2, 3, 4]);
    expect(context.text).toContain('## Revision feedback\n1. Tighter pacing');
  });

  it('fails when the pinned material alone is over budget', async () => {
    const builder = new ContextWindowBuilder({ digestSource: new LabelDigests() });

    await expect(builder.build('chapter', fiveChapterProject(), 20)).rejects.toMatchObject({
      code: 'BUDGET_EXCEEDED',
      budget: 20,
      details: expect.objectContaining({ pinned: ['project', 'target'] }),
    });
    await expect(builder.build('chapter', fiveChapterProject(), 20)).rejects.toBeInstanceOf(BudgetExceededError);
  });

  it('refuses a chapter with no outline entry', async () => {
    const builder = new ContextWindowBuilder({ digestSource: new LabelDigests() });

    await expect(builder.build('chapter', makeProjectState(), 1000)).rejects.toBeInstanceOf(SequenceError);
  });

  it('gives outline tasks the analysis and the author answers', async () => {
    const builder = new ContextWindowBuilder({ digestSource: new LabelDigests() });
    const project = makeProjectState({
      phase: 'outlining',
      analysis: { strengths: ['Tight premise'], gaps: [], genreAnalysis: null, complexityScore: 4 },
      questions: [
        { id: 'q1', question: 'Who stole the ledger?', category: 'plot', importance: 4, required: true, suggestedAnswer: null },
      ],
      answers: { q1: 'The clerk' },
    });

    const context = await builder.build('outline', project, 1000);

    expect(context.targetChapter).toBeNull();
    expect(context.sections.map((section) => section.key)).toEqual(['project', 'analysis', 'answers']);
    expect(context.sections[2].body).toBe('Q: Who stole the ledger?\nA: The clerk');
  });

  it('leaves facts from later chapters out when critiquing an earlier one', async () => {
    const builder = new ContextWindowBuilder({ trailingWindow: 3, digestSource: new LabelDigests() });
    const project = makeProjectState({
      outline: Array.from({ length: 8 }, (_value, index) => makePlan(index)),
      chapters: Array.from({ length: 5 }, (_value, index) => makeChapter(index, longText(400))),
      worldFacts: [
        { id: 'fact-1', category: 'history', subject: 'old fire', statement: 'The old mill burned down.', establishedIn: 0, revisions: [] },
        { id: 'fact-2', category: 'history', subject: 'new mill', statement: 'A new mill rose on the river.', establishedIn: 3, revisions: [] },
      ],
    });

    const context = await builder.build('critique', project, 100_000, { chapterIndex: 1 });

    expect(context.sections.find((section) => section.key === 'chapter-facts')?.body).toBe(
      '- [history] The old mill burned down.'
    );
    expect(context.text).not.toContain('A new mill rose on the river.');
  });

  it('pins operator instructions between the target and the revision feedback', async () => {
    const builder = new ContextWindowBuilder({ trailingWindow: 3, digestSource: new LabelDigests() });

    const context = await builder.build('chapter', fiveChapterProject(), 100_000, {
      feedback: ['Tighter pacing'],
      instructions: '  Open in the rain.  ',
    });

    const keys = context.sections.map((section) => section.key);
    expect(keys.slice(keys.indexOf('target'), keys.indexOf('target') + 3)).toEqual(['target', 'instructions', 'feedback']);
    expect(context.sections.find((section) => section.key === 'instructions')).toEqual({
      key: 'instructions',
      title: 'Author instructions',
      body: 'Open in the rain.',
      pinned: true,
    });
  });
});
