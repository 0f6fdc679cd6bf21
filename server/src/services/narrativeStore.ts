import { nanoid } from 'nanoid';
import type {
  Chapter,
  ChapterPlan,
  ChangeLogEntry,
  Character,
  CharacterRole,
  Flag,
  Phase,
  PendingDraft,
  PlotThread,
  PlotThreadStatus,
  ProjectState,
  StoryAnalysis,
  StoryQuestion,
  StoryReview,
  StoryType,
  WorldFact,
  WorldFactCategory,
} from '../types/narrative';
import type { ProjectRepository } from './projectRepository';
import { assertTransition } from './phaseMachine';
import {
  ContradictionError,
  EntityNotFoundError,
  ProjectNotFoundError,
  SequenceError,
  StateTransitionError,
} from '../utils/errors';
import { deriveSubject, statementsConflict } from '../utils/statementMatch';
import { normaliseKey, normaliseWhitespace, slugify } from '../utils/text';

export interface NewProjectInput {
  name: string;
  storyType: StoryType;
  genre: string;
  targetLength: number;
  premise: string;
  styleNotes?: string | null;
}

export interface CharacterInput {
  name: string;
  role: CharacterRole;
  arc?: string;
  currentState?: string;
  firstAppearance: number;
}

export interface CharacterStateDelta {
  state: string;
  chapterIndex: number;
  arc?: string;
}

export interface PlotThreadInput {
  title: string;
  description?: string;
  chapterIndex?: number | null;
}

export interface WorldFactInput {
  category: WorldFactCategory;
  subject?: string;
  statement: string;
  establishedIn: number;
}

export interface FactOverrideOptions {
  override?: boolean;
  reason?: string;
}

export type ChapterInput = Omit<Chapter, 'status' | 'committedAt'>;

export interface NarrativeSummary {
  uptoChapter: number;
  characters: Array<{ id: string; name: string; role: CharacterRole; arc: string; state: string; firstAppearance: number }>;
  openThreads: Array<{ id: string; title: string; description: string; chapters: number[] }>;
  facts: Array<{ id: string; category: WorldFactCategory; subject: string; statement: string; establishedIn: number }>;
}

export interface NarrativeStoreOptions {
  clock?: () => Date;
}

function uniqueSorted(values: number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

/**
 * Canonical record of one project. Loaded per command, mutated in memory, and flushed with `save()`
 * together with the change-log entries produced by each mutation.
 */
export default class NarrativeStore {
  private state: ProjectState;

  private revision: number;

  private nextSeq: number;

  private unflushed: ChangeLogEntry[] = [];

  private repository: ProjectRepository;

  private clock: () => Date;

  private constructor(
    repository: ProjectRepository,
    state: ProjectState,
    revision: number,
    logSeq: number,
    { clock = () => new Date() }: NarrativeStoreOptions
  ) {
    this.repository = repository;
    this.state = state;
    this.revision = revision;
    this.nextSeq = logSeq + 1;
    this.clock = clock;
  }

  static async load(repository: ProjectRepository, name: string, options: NarrativeStoreOptions = {}): Promise<NarrativeStore> {
    const snapshot = await repository.load(name);
    if (!snapshot) {
      throw new ProjectNotFoundError(name);
    }
    return new NarrativeStore(repository, snapshot.state, snapshot.revision, snapshot.logSeq, options);
  }

  static async create(
    repository: ProjectRepository,
    input: NewProjectInput,
    options: NarrativeStoreOptions = {}
  ): Promise<NarrativeStore> {
    const now = (options.clock ?? (() => new Date()))().toISOString();
    const state: ProjectState = {
      id: nanoid(12),
      name: input.name,
      storyType: input.storyType,
      genre: input.genre,
      targetLength: input.targetLength,
      premise: input.premise,
      styleNotes: input.styleNotes ?? null,
      phase: 'analysis',
      resumePhase: null,
      analysis: null,
      questions: [],
      answers: {},
      outline: [],
      chapters: [],
      characters: [],
      plotThreads: [],
      worldFacts: [],
      pendingDraft: null,
      chapterDigests: [],
      reviews: [],
      createdAt: now,
      updatedAt: now,
    };
    const created: ChangeLogEntry = {
      seq: 1,
      at: now,
      op: 'project.created',
      payload: { name: input.name, storyType: input.storyType, genre: input.genre, targetLength: input.targetLength },
    };
    const snapshot = await repository.create(state, [created]);
    return new NarrativeStore(repository, snapshot.state, snapshot.revision, snapshot.logSeq, options);
  }

  get project(): Readonly<ProjectState> {
    return this.state;
  }

  get name(): string {
    return this.state.name;
  }

  get currentRevision(): number {
    return this.revision;
  }

  get cursor(): number {
    return this.state.chapters.length;
  }

  get hasUnsavedChanges(): boolean {
    return this.unflushed.length > 0;
  }

  snapshot(): ProjectState {
    return structuredClone(this.state);
  }

  changeLog(): readonly ChangeLogEntry[] {
    return this.unflushed;
  }

  async save(): Promise<void> {
    if (!this.unflushed.length) {
      return;
    }
    this.state.updatedAt = this.clock().toISOString();
    this.revision = await this.repository.commit(this.snapshot(), this.revision, this.unflushed);
    this.unflushed = [];
  }

  findCharacter(ref: string): Character | undefined {
    const key = normaliseKey(ref);
    return this.state.characters.find((character) => character.id === ref || normaliseKey(character.name) === key);
  }

  findPlotThread(ref: string): PlotThread | undefined {
    const key = normaliseKey(ref);
    return this.state.plotThreads.find((thread) => thread.id === ref || normaliseKey(thread.title) === key);
  }

  findFact(category: WorldFactCategory, subject: string): WorldFact | undefined {
    const key = normaliseKey(subject);
    return this.state.worldFacts.find((fact) => fact.category === category && fact.subject === key);
  }

  addCharacter(input: CharacterInput): Character {
    const name = normaliseWhitespace(input.name);
    const existing = this.findCharacter(name);
    if (existing) {
      if (existing.role === input.role) {
        return existing;
      }
      const flag: Flag = {
        severity: 'contradiction',
        entity: 'character',
        description: `"${existing.name}" is already a ${existing.role}; the new entry says ${input.role}`,
        ref: existing.id,
        suggestion: 'Rename one of the characters or correct the role',
      };
      throw new ContradictionError(`Character "${name}" already exists with a different role`, [flag]);
    }

    const character: Character = {
      id: this.uniqueId(`char-${slugify(name)}`, this.state.characters.map((entry) => entry.id)),
      name,
      role: input.role,
      arc: input.arc?.trim() ?? '',
      currentState: input.currentState?.trim() ?? '',
      stateHistory: input.currentState?.trim()
        ? [{ chapterIndex: input.firstAppearance, state: input.currentState.trim() }]
        : [],
      firstAppearance: input.firstAppearance,
    };
    this.state.characters.push(character);
    this.record('character.added', { id: character.id, name, role: character.role, firstAppearance: input.firstAppearance });
    return character;
  }

  updateCharacterState(id: string, delta: CharacterStateDelta): Character {
    const character = this.requireCharacter(id);
    const state = delta.state.trim();
    if (state) {
      character.currentState = state;
      character.stateHistory.push({ chapterIndex: delta.chapterIndex, state });
    }
    if (delta.arc?.trim()) {
      character.arc = delta.arc.trim();
    }
    this.record('character.state-updated', { id: character.id, chapterIndex: delta.chapterIndex, state });
    return character;
  }

  addPlotThread(input: PlotThreadInput): PlotThread {
    const title = normaliseWhitespace(input.title);
    const existing = this.findPlotThread(title);
    if (existing) {
      return existing;
    }
    const chapterIndex = input.chapterIndex ?? null;
    const thread: PlotThread = {
      id: `thread-${this.state.plotThreads.length + 1}`,
      title,
      description: input.description?.trim() ?? '',
      status: 'open',
      chapters: chapterIndex === null ? [] : [chapterIndex],
      resolutionChapter: null,
      closedAtChapter: null,
    };
    this.state.plotThreads.push(thread);
    this.record('thread.added', { id: thread.id, title, chapterIndex });
    return thread;
  }

  touchPlotThread(id: string, chapterIndex: number): PlotThread {
    const thread = this.requirePlotThread(id);
    if (!thread.chapters.includes(chapterIndex)) {
      thread.chapters = uniqueSorted([...thread.chapters, chapterIndex]);
      this.record('thread.touched', { id: thread.id, chapterIndex });
    }
    return thread;
  }

  updatePlotThreadStatus(id: string, status: PlotThreadStatus, resolvingChapter?: number): PlotThread {
    const thread = this.requirePlotThread(id);
    if (thread.status === status) {
      return thread;
    }
    if (thread.status !== 'open') {
      throw new StateTransitionError(`Plot thread "${thread.title}" is ${thread.status} and cannot become ${status}`, {
        thread: thread.id,
        from: thread.status,
        to: status,
      });
    }

    const closingChapter = resolvingChapter ?? (this.state.chapters.length ? this.state.chapters.length - 1 : null);
    thread.status = status;
    thread.closedAtChapter = closingChapter;
    if (status === 'resolved') {
      thread.resolutionChapter = closingChapter;
    }
    if (closingChapter !== null) {
      thread.chapters = uniqueSorted([...thread.chapters, closingChapter]);
    }
    this.record('thread.status-changed', { id: thread.id, status, chapterIndex: closingChapter });
    return thread;
  }

  /**
   * A restatement of a known fact is a no-op. A conflicting statement with the same category and
   * subject is rejected unless overridden; an override keeps the superseded statement in `revisions`.
   */
  addWorldFact(input: WorldFactInput, { override = false, reason }: FactOverrideOptions = {}): WorldFact {
    const statement = normaliseWhitespace(input.statement);
    const subject = normaliseKey(input.subject?.trim() ? input.subject : deriveSubject(statement));
    const existing = this.findFact(input.category, subject);

    if (existing) {
      if (!statementsConflict(existing.statement, statement)) {
        return existing;
      }
      if (!override) {
        const flag: Flag = {
          severity: 'contradiction',
          entity: 'world-fact',
          description: `Established ${existing.category} fact "${existing.statement}" conflicts with "${statement}"`,
          evidence: statement,
          ref: existing.id,
          suggestion: 'Confirm with an override to replace the established fact, or revise the text',
        };
        throw new ContradictionError(`World fact about "${subject}" conflicts with an established fact`, [flag]);
      }
      existing.revisions.push({
        previousStatement: existing.statement,
        chapterIndex: input.establishedIn,
        reason: reason ?? 'operator override',
        recordedAt: this.clock().toISOString(),
      });
      existing.statement = statement;
      this.record('fact.overridden', { id: existing.id, statement, chapterIndex: input.establishedIn });
      return existing;
    }

    const fact: WorldFact = {
      id: `fact-${this.state.worldFacts.length + 1}`,
      category: input.category,
      subject,
      statement,
      establishedIn: input.establishedIn,
      revisions: [],
    };
    this.state.worldFacts.push(fact);
    this.record('fact.added', { id: fact.id, category: fact.category, subject, establishedIn: fact.establishedIn });
    return fact;
  }

  /** Records that a chapter knowingly departs from a fact without changing its statement. */
  acknowledgeFact(id: string, chapterIndex: number, reason: string): WorldFact {
    const fact = this.state.worldFacts.find((entry) => entry.id === id);
    if (!fact) {
      throw new EntityNotFoundError('world-fact', id);
    }
    fact.revisions.push({
      previousStatement: fact.statement,
      chapterIndex,
      reason,
      recordedAt: this.clock().toISOString(),
    });
    this.record('fact.acknowledged', { id, chapterIndex, reason });
    return fact;
  }

  appendChapter(input: ChapterInput): Chapter {
    const expected = this.state.chapters.length;
    if (input.index !== expected) {
      throw new SequenceError(`Chapter ${input.index} cannot be committed; the next chapter is ${expected}`, {
        expected,
        received: input.index,
      });
    }
    if (!this.state.outline.some((plan) => plan.index === input.index)) {
      throw new SequenceError(`Chapter ${input.index} has no outline entry`, { index: input.index });
    }
    input.characters.forEach((id) => this.requireCharacter(id));
    input.threads.forEach((id) => this.requirePlotThread(id));

    const chapter: Chapter = {
      ...input,
      critiqueNotes: [...input.critiqueNotes],
      status: 'approved',
      committedAt: this.clock().toISOString(),
    };
    this.state.chapters.push(chapter);
    this.record('chapter.appended', {
      index: chapter.index,
      title: chapter.title,
      wordCount: chapter.wordCount,
      revisionCount: chapter.revisionCount,
    });
    return chapter;
  }

  annotateChapter(index: number, notes: string[]): Chapter {
    const chapter = this.state.chapters[index];
    if (!chapter) {
      throw new EntityNotFoundError('chapter', String(index));
    }
    const fresh = notes.map((note) => note.trim()).filter((note) => note && !chapter.critiqueNotes.includes(note));
    if (fresh.length) {
      chapter.critiqueNotes.push(...fresh);
      this.record('chapter.annotated', { index, notes: fresh.length });
    }
    return chapter;
  }

  /** Characters introduced, threads open and facts established as of the given chapter. */
  getSummary(uptoChapterIndex: number): NarrativeSummary {
    const upto = uptoChapterIndex;
    const characters = this.state.characters
      .filter((character) => character.firstAppearance <= upto)
      .map((character) => {
        const known = character.stateHistory.filter((entry) => entry.chapterIndex <= upto);
        return {
          id: character.id,
          name: character.name,
          role: character.role,
          arc: character.arc,
          state: known.length ? known[known.length - 1].state : '',
          firstAppearance: character.firstAppearance,
        };
      });

    const openThreads = this.state.plotThreads
      .filter((thread) => !thread.chapters.length || thread.chapters[0] <= upto)
      .filter((thread) => thread.closedAtChapter === null || thread.closedAtChapter > upto)
      .map((thread) => ({
        id: thread.id,
        title: thread.title,
        description: thread.description,
        chapters: thread.chapters.filter((index) => index <= upto),
      }));

    const facts = this.state.worldFacts
      .filter((fact) => fact.establishedIn <= upto)
      .map((fact) => {
        const later = fact.revisions.find((revision) => revision.chapterIndex !== null && revision.chapterIndex > upto);
        return {
          id: fact.id,
          category: fact.category,
          subject: fact.subject,
          statement: later ? later.previousStatement : fact.statement,
          establishedIn: fact.establishedIn,
        };
      });

    return { uptoChapter: upto, characters, openThreads, facts };
  }

  setPhase(next: Phase, { explicitRevision = false, reason }: { explicitRevision?: boolean; reason?: string } = {}): void {
    const current = this.state.phase;
    if (current === next) {
      return;
    }
    assertTransition(current, next, { explicitRevision });
    if (next === 'critique') {
      this.state.resumePhase = current;
    } else if (current === 'critique') {
      this.state.resumePhase = null;
    }
    if (explicitRevision) {
      this.state.resumePhase = null;
    }
    this.state.phase = next;
    this.record('phase.changed', reason ? { from: current, to: next, explicitRevision, reason } : { from: current, to: next, explicitRevision });
  }

  setAnalysis(analysis: StoryAnalysis, questions: StoryQuestion[]): void {
    this.state.analysis = analysis;
    this.state.questions = questions;
    this.record('analysis.recorded', {
      complexityScore: analysis.complexityScore,
      questions: questions.length,
      required: questions.filter((question) => question.required).length,
    });
  }

  addQuestions(questions: StoryQuestion[]): void {
    const known = new Set(this.state.questions.map((question) => question.id));
    const fresh = questions.filter((question) => !known.has(question.id));
    if (fresh.length) {
      this.state.questions.push(...fresh);
      this.record('questions.added', { ids: fresh.map((question) => question.id) });
    }
  }

  recordAnswers(answers: Record<string, string>): void {
    const accepted = Object.entries(answers).filter(([, answer]) => answer.trim());
    if (!accepted.length) {
      return;
    }
    accepted.forEach(([questionId, answer]) => {
      this.state.answers[questionId] = answer.trim();
    });
    this.record('answers.recorded', { ids: accepted.map(([questionId]) => questionId) });
  }

  setOutline(plans: ChapterPlan[]): void {
    plans.forEach((plan, position) => {
      if (plan.index !== position) {
        throw new SequenceError(`Outline entry ${position} carries index ${plan.index}`, { position, index: plan.index });
      }
    });
    if (plans.length < this.state.chapters.length) {
      throw new SequenceError('The outline cannot be shorter than the chapters already written', {
        plans: plans.length,
        chapters: this.state.chapters.length,
      });
    }
    this.state.outline = plans;
    this.record('outline.set', { chapters: plans.length });
  }

  setPendingDraft(draft: PendingDraft): void {
    if (draft.index !== this.state.chapters.length) {
      throw new SequenceError(`Draft for chapter ${draft.index} does not follow chapter ${this.state.chapters.length - 1}`, {
        expected: this.state.chapters.length,
        received: draft.index,
      });
    }
    this.state.pendingDraft = draft;
    this.record('draft.stored', {
      index: draft.index,
      wordCount: draft.wordCount,
      revisionCount: draft.revisionCount,
      flags: draft.flags.length,
    });
  }

  clearPendingDraft(reason: 'committed' | 'discarded'): void {
    const draft = this.state.pendingDraft;
    if (!draft) {
      return;
    }
    this.state.pendingDraft = null;
    this.record('draft.cleared', { index: draft.index, reason });
  }

  digestFor(chapterIndex: number): string | undefined {
    return this.state.chapterDigests.find((entry) => entry.chapterIndex === chapterIndex)?.digest;
  }

  cacheDigest(chapterIndex: number, digest: string): void {
    const existing = this.state.chapterDigests.find((entry) => entry.chapterIndex === chapterIndex);
    if (existing) {
      existing.digest = digest;
    } else {
      this.state.chapterDigests.push({ chapterIndex, digest });
      this.state.chapterDigests.sort((a, b) => a.chapterIndex - b.chapterIndex);
    }
    this.record('digest.cached', { chapterIndex });
  }

  recordReview(review: StoryReview): void {
    this.state.reviews.push(review);
    this.record('review.recorded', {
      scope: review.scope,
      chapterIndex: review.chapterIndex,
      overallScore: review.critique.overallScore,
      trigger: review.trigger,
    });
  }

  private requireCharacter(ref: string): Character {
    const character = this.findCharacter(ref);
    if (!character) {
      throw new EntityNotFoundError('character', ref);
    }
    return character;
  }

  private requirePlotThread(ref: string): PlotThread {
    const thread = this.findPlotThread(ref);
    if (!thread) {
      throw new EntityNotFoundError('plot-thread', ref);
    }
    return thread;
  }

  private uniqueId(base: string, taken: string[]): string {
    if (!taken.includes(base)) {
      return base;
    }
    let suffix = 2;
    while (taken.includes(`${base}-${suffix}`)) {
      suffix += 1;
    }
    return `${base}-${suffix}`;
  }

  private record(op: string, payload: Record<string, unknown>): void {
    this.unflushed.push({ seq: this.nextSeq, at: this.clock().toISOString(), op, payload });
    this.nextSeq += 1;
  }
}
