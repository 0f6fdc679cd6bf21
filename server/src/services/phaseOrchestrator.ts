import type {
  Chapter,
  ChapterPlan,
  ChangeLogEntry,
  CharacterRole,
  CritiqueResult,
  Flag,
  PendingDraft,
  PlotThreadStatus,
  StoryQuestion,
  StoryReview,
  WorldFactCategory,
} from '../types/narrative';
import NarrativeStore, { type NarrativeSummary, type NewProjectInput } from './narrativeStore';
import type { ProjectListItem, ProjectRepository, ReadLogOptions } from './projectRepository';
import ContextWindowBuilder, { type ContextPayload, type ContextTaskKind } from './contextBuilder';
import ConsistencyChecker, { hasContradictions } from './consistencyChecker';
import StoryAgents, { CachingDigestSource, type AgentCallOptions } from './storyAgents';
import { assertPhase, canTransition, type ReopenablePhase } from './phaseMachine';
import { toPendingDraftView, toProjectStatus, unansweredQuestions, type PendingDraftView, type ProjectStatus } from './projectViews';
import ApiError, { type ApiErrorPayload } from '../utils/ApiError';
import { ContradictionError, ProjectNotFoundError, SequenceError, StateTransitionError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import ProjectLocks from '../utils/projectLocks';
import type { SessionWordBounds } from '../utils/promptTemplates';
import { STORY_TYPE_DEFAULTS, clampNumber, suggestedChapterCount } from '../utils/storyDefaults';
import { deriveSubject, mentionsName, statementsConflict, toSearchKey } from '../utils/statementMatch';
import { countWords, normaliseKey } from '../utils/text';
import { wordsToTokens } from '../utils/tokenEstimate';
import { appConfig } from '../config/appConfig';

export interface OrchestratorSettings {
  maxContextTokens: number;
  session: SessionWordBounds;
  critiqueInterval: number;
  autoCommit: boolean;
}

export interface PhaseOrchestratorOptions {
  repository: ProjectRepository;
  agents: StoryAgents;
  builder?: ContextWindowBuilder;
  checker?: ConsistencyChecker;
  locks?: ProjectLocks;
  settings?: Partial<OrchestratorSettings>;
  clock?: () => Date;
}

export interface DraftResult {
  status: ProjectStatus;
  draft: PendingDraftView & { text: string; critique: CritiqueResult | null };
  committed: boolean;
  critique?: ReviewOutcome;
}

export interface CommitResult {
  status: ProjectStatus;
  chapter: Pick<Chapter, 'index' | 'title' | 'wordCount' | 'revisionCount' | 'characters' | 'threads'>;
  critique?: ReviewOutcome;
}

export interface ReviewOutcome {
  review: StoryReview | null;
  error?: ApiErrorPayload;
}

export interface AnswerResult {
  status: ProjectStatus;
  remaining: StoryQuestion[];
}

export interface CharacterEdit {
  name: string;
  role: CharacterRole;
  arc?: string;
  currentState?: string;
  firstAppearance?: number;
}

export interface WorldFactEdit {
  category: WorldFactCategory;
  subject?: string;
  statement: string;
  establishedIn?: number;
  override?: boolean;
  reason?: string;
}

export interface ThreadEdit {
  status: PlotThreadStatus;
  resolvingChapter?: number;
}

const RESPONSE_RESERVE_TOKENS = 1024;
const INSTRUCTION_RESERVE_TOKENS = 300;
const MIN_CONTEXT_BUDGET = 256;

function isReopenTarget(value: string): value is ReopenablePhase {
  return value === 'questioning' || value === 'outlining';
}

/**
 * Drives a project through analysis, questioning, outlining, writing and critique. Every mutating
 * command loads the project, runs inside the project's critical section and flushes the store before
 * it returns; a failure part-way leaves the last saved state untouched.
 */
export default class PhaseOrchestrator {
  private repository: ProjectRepository;

  private agents: StoryAgents;

  private builder: ContextWindowBuilder;

  private checker: ConsistencyChecker;

  private locks: ProjectLocks;

  private settings: OrchestratorSettings;

  private clock: () => Date;

  private inFlight = new Map<string, AbortController>();

  private logger = getLogger({ module: 'phase-orchestrator' });

  constructor({ repository, agents, builder, checker, locks, settings = {}, clock }: PhaseOrchestratorOptions) {
    this.repository = repository;
    this.agents = agents;
    this.settings = {
      maxContextTokens: settings.maxContextTokens ?? appConfig.story.maxContextTokens,
      session: settings.session ?? { ...appConfig.story.session },
      critiqueInterval: settings.critiqueInterval ?? appConfig.story.critiqueInterval,
      autoCommit: settings.autoCommit ?? appConfig.story.autoCommit,
    };
    this.builder = builder ?? new ContextWindowBuilder({ trailingWindow: appConfig.story.trailingWindow });
    this.checker = checker ?? new ConsistencyChecker();
    this.locks = locks ?? new ProjectLocks();
    this.clock = clock ?? (() => new Date());
  }

  async createProject(input: NewProjectInput): Promise<ProjectStatus> {
    return this.locks.runExclusive(input.name, async () => {
      const store = await NarrativeStore.create(this.repository, input, { clock: this.clock });
      this.logger.info({ project: input.name, storyType: input.storyType }, 'Project created');
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async listProjects(): Promise<ProjectListItem[]> {
    return this.repository.list();
  }

  async status(name: string): Promise<ProjectStatus> {
    const store = await this.open(name);
    return toProjectStatus(store.project, store.currentRevision);
  }

  async summary(name: string, uptoChapterIndex?: number): Promise<NarrativeSummary> {
    const store = await this.open(name);
    return store.getSummary(uptoChapterIndex ?? store.cursor - 1);
  }

  async changeLog(name: string, options: ReadLogOptions = {}): Promise<ChangeLogEntry[]> {
    await this.open(name);
    return this.repository.readLog(name, options);
  }

  async loadProject(name: string): Promise<NarrativeStore> {
    return this.open(name);
  }

  async deleteProject(name: string): Promise<void> {
    await this.locks.runExclusive(name, async () => {
      const deleted = await this.repository.delete(name);
      if (!deleted) {
        throw new ProjectNotFoundError(name);
      }
      this.logger.info({ project: name }, 'Project deleted');
    });
  }

  isBusy(name: string): boolean {
    return this.locks.isHeld(name);
  }

  cancel(name: string): boolean {
    const controller = this.inFlight.get(name);
    if (!controller) {
      return false;
    }
    controller.abort();
    this.logger.info({ project: name }, 'Generation cancelled');
    return true;
  }

  async analyse(name: string): Promise<ProjectStatus> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'analysis', 'analyse');
      const context = await this.buildContext(store, 'analysis', call);
      const { analysis, questions } = await this.agents.analyse(context, call);
      store.setAnalysis(analysis, questions);

      if (questions.length) {
        this.transition(store, 'questioning');
        await store.save();
        return toProjectStatus(store.project, store.currentRevision);
      }

      this.transition(store, 'outlining');
      await store.save();
      await this.generateOutline(store, [], call);
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async answerQuestions(name: string, answers: Record<string, string>): Promise<AnswerResult> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'questioning', 'answer_questions');
      store.recordAnswers(this.resolveAnswerKeys(store, answers));

      const remaining = unansweredQuestions(store.project).filter((question) => question.required);
      if (remaining.length) {
        await store.save();
        return { status: toProjectStatus(store.project, store.currentRevision), remaining };
      }

      this.transition(store, 'outlining');
      await store.save();
      await this.generateOutline(store, [], call);
      await store.save();
      return { status: toProjectStatus(store.project, store.currentRevision), remaining: [] };
    });
  }

  async reviseOutline(name: string, feedback?: string): Promise<ProjectStatus> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'outlining', 'revise_outline');
      await this.generateOutline(store, feedback?.trim() ? [feedback.trim()] : [], call);
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async approveOutline(name: string): Promise<ProjectStatus> {
    return this.exclusive(name, async (store) => {
      assertPhase(store.project.phase, 'outlining', 'approve_outline');
      const { outline, chapters } = store.project;
      if (!outline.length) {
        throw new StateTransitionError('There is no outline to approve yet; generate one with revise_outline');
      }
      this.transition(store, 'writing');
      if (chapters.length >= outline.length) {
        this.transition(store, 'complete');
      }
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async writeNext(name: string, instructions?: string): Promise<DraftResult> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'writing', 'write_next');
      const { pendingDraft } = store.project;
      if (pendingDraft) {
        throw new StateTransitionError(
          `Chapter ${pendingDraft.index + 1} is awaiting approval or revision`,
          { pendingChapter: pendingDraft.index }
        );
      }
      const plan = this.nextPlan(store);
      const draft = await this.generateDraft(store, plan, { feedback: [], instructions }, 0, call);
      return this.finishDraft(store, draft, call);
    });
  }

  async requestRevision(name: string, feedback: string): Promise<DraftResult> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'writing', 'request_revision');
      const current = this.requirePendingDraft(store);
      const plan = this.nextPlan(store);
      const notes = [...current.feedback, feedback.trim()].filter(Boolean);
      const draft = await this.generateDraft(
        store,
        plan,
        { feedback: notes, instructions: current.instructions },
        current.revisionCount + 1,
        call
      );
      return this.finishDraft(store, draft, call);
    });
  }

  async approveChapter(name: string, { override = false }: { override?: boolean } = {}): Promise<CommitResult> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, 'writing', 'approve_chapter');
      const draft = this.requirePendingDraft(store);
      const contradictions = draft.flags.filter((flag) => flag.severity === 'contradiction');
      if (contradictions.length && !override) {
        this.logger.warn(
          { project: name, chapter: draft.index, contradictions: contradictions.length },
          'Commit blocked by contradictions'
        );
        throw new ContradictionError(
          `Chapter ${draft.index + 1} contradicts established state; revise it or approve with override`,
          contradictions,
          { chapterIndex: draft.index }
        );
      }

      const chapter = this.commitDraft(store, draft, override);
      await store.save();
      const critique = await this.maybeIntervalCritique(store, call);
      return {
        status: toProjectStatus(store.project, store.currentRevision),
        chapter: {
          index: chapter.index,
          title: chapter.title,
          wordCount: chapter.wordCount,
          revisionCount: chapter.revisionCount,
          characters: chapter.characters,
          threads: chapter.threads,
        },
        ...(critique ? { critique } : {}),
      };
    });
  }

  async critique(name: string, { chapterIndex }: { chapterIndex?: number } = {}): Promise<{ status: ProjectStatus; review: StoryReview }> {
    return this.exclusive(name, async (store, call) => {
      assertPhase(store.project.phase, ['writing', 'complete'], 'critique');
      if (!store.project.chapters.length) {
        throw new StateTransitionError('There is no committed chapter to critique yet');
      }
      const fullStory = chapterIndex === undefined && store.project.phase === 'complete';
      const review = await this.runCritique(store, fullStory ? null : chapterIndex ?? store.cursor - 1, 'operator', call);
      await store.save();
      return { status: toProjectStatus(store.project, store.currentRevision), review };
    });
  }

  async reopen(name: string, phase: string, reason: string): Promise<ProjectStatus> {
    if (!isReopenTarget(phase)) {
      throw new ApiError(400, `Only "questioning" or "outlining" can be reopened, not "${phase}"`, { phase }, 'VALIDATION_FAILED');
    }
    return this.exclusive(name, async (store, call) => {
      const current = store.project.phase;
      if (!canTransition(current, phase, { explicitRevision: true }) || current === 'analysis') {
        throw new StateTransitionError(`Cannot reopen "${phase}" from "${current}"`, { from: current, to: phase });
      }
      let followUps: StoryQuestion[] = [];
      if (phase === 'questioning') {
        const context = await this.buildContext(store, 'outline', call);
        const answered = store.project.questions
          .filter((question) => store.project.answers[question.id])
          .map((question) => ({ question: question.question, answer: store.project.answers[question.id] }));
        followUps = await this.agents.followUpQuestions(
          context,
          answered,
          store.project.questions.map((question) => question.id),
          call
        );
      }

      store.clearPendingDraft('discarded');
      this.transition(store, phase, { explicitRevision: true, reason });
      store.addQuestions(followUps);
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async addCharacter(name: string, edit: CharacterEdit): Promise<ProjectStatus> {
    return this.exclusive(name, async (store) => {
      store.addCharacter({
        name: edit.name,
        role: edit.role,
        arc: edit.arc,
        currentState: edit.currentState,
        firstAppearance: edit.firstAppearance ?? Math.max(-1, store.cursor - 1),
      });
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async addWorldFact(name: string, edit: WorldFactEdit): Promise<ProjectStatus> {
    return this.exclusive(name, async (store) => {
      store.addWorldFact(
        {
          category: edit.category,
          subject: edit.subject,
          statement: edit.statement,
          establishedIn: edit.establishedIn ?? Math.max(-1, store.cursor - 1),
        },
        { override: edit.override ?? false, reason: edit.reason ?? 'operator edit' }
      );
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  async updateThread(name: string, threadId: string, edit: ThreadEdit): Promise<ProjectStatus> {
    return this.exclusive(name, async (store) => {
      const { resolvingChapter } = edit;
      if (resolvingChapter !== undefined && (resolvingChapter < 0 || resolvingChapter >= store.cursor)) {
        throw new SequenceError(`Chapter ${resolvingChapter + 1} has not been written yet`, {
          index: resolvingChapter,
          chaptersWritten: store.cursor,
        });
      }
      store.updatePlotThreadStatus(threadId, edit.status, resolvingChapter);
      await store.save();
      return toProjectStatus(store.project, store.currentRevision);
    });
  }

  private async open(name: string): Promise<NarrativeStore> {
    return NarrativeStore.load(this.repository, name, { clock: this.clock });
  }

  private async exclusive<T>(
    name: string,
    task: (store: NarrativeStore, call: AgentCallOptions) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(name, async () => {
      const store = await this.open(name);
      const controller = new AbortController();
      this.inFlight.set(name, controller);
      try {
        return await task(store, { signal: controller.signal, project: name });
      } finally {
        this.inFlight.delete(name);
      }
    });
  }

  private transition(
    store: NarrativeStore,
    next: Parameters<NarrativeStore['setPhase']>[0],
    options: Parameters<NarrativeStore['setPhase']>[1] = {}
  ): void {
    const from = store.project.phase;
    store.setPhase(next, options);
    if (from !== next) {
      this.logger.info({ project: store.name, from, to: next, chapter: store.cursor }, 'Phase changed');
    }
  }

  private budgetFor(taskKind: ContextTaskKind, plan?: ChapterPlan): number {
    const reserve =
      taskKind === 'chapter' && plan
        ? wordsToTokens(clampNumber(plan.targetWords, this.settings.session.minWords, this.settings.session.maxWords)) +
          INSTRUCTION_RESERVE_TOKENS
        : RESPONSE_RESERVE_TOKENS;
    return Math.max(MIN_CONTEXT_BUDGET, this.settings.maxContextTokens - reserve);
  }

  private async buildContext(
    store: NarrativeStore,
    taskKind: ContextTaskKind,
    call: AgentCallOptions,
    options: { chapterIndex?: number; feedback?: string[]; instructions?: string; plan?: ChapterPlan } = {}
  ): Promise<ContextPayload> {
    const builder = this.builder.withDigestSource(new CachingDigestSource(store, this.agents, call));
    const context = await builder.build(taskKind, store.project, this.budgetFor(taskKind, options.plan), {
      chapterIndex: options.chapterIndex,
      feedback: options.feedback,
      instructions: options.instructions,
    });
    if (context.trimSteps.length) {
      this.logger.debug(
        { project: store.name, taskKind, tokens: context.tokens, budget: context.budget, trimSteps: context.trimSteps },
        'Context trimmed to budget'
      );
    }
    // Digests produced while building are kept even if the generation that follows fails.
    if (store.hasUnsavedChanges) {
      await store.save();
    }
    return context;
  }

  private resolveAnswerKeys(store: NarrativeStore, answers: Record<string, string>): Record<string, string> {
    const { questions } = store.project;
    const resolved: Record<string, string> = {};
    const unknown: string[] = [];
    Object.entries(answers).forEach(([key, answer]) => {
      const question =
        questions.find((entry) => entry.id === key) ??
        questions.find((entry) => entry.question.trim() === key.trim());
      if (!question) {
        unknown.push(key);
        return;
      }
      resolved[question.id] = answer;
    });
    if (unknown.length) {
      throw new ApiError(400, 'Answers reference unknown questions', { unknown }, 'UNKNOWN_QUESTION');
    }
    return resolved;
  }

  private async generateOutline(store: NarrativeStore, feedback: string[], call: AgentCallOptions): Promise<void> {
    const { project } = store;
    const defaults = STORY_TYPE_DEFAULTS[project.storyType];
    const firstIndex = project.chapters.length;
    const minEntries = Math.max(1, defaults.minChapters - firstIndex);
    const maxEntries = Math.max(minEntries, defaults.maxChapters - firstIndex);
    const suggested = clampNumber(suggestedChapterCount(project.storyType, project.targetLength) - firstIndex, minEntries, maxEntries);

    const context = await this.buildContext(store, 'outline', call, { feedback });
    const draft = await this.agents.outline(
      context,
      {
        storyType: project.storyType,
        firstIndex,
        minEntries,
        maxEntries,
        suggestedEntries: suggested,
        minWords: defaults.minWords,
        maxWords: defaults.maxWords,
      },
      call
    );

    const plans = [...project.outline.slice(0, firstIndex), ...draft.plans];
    store.setOutline(plans);

    draft.characters.forEach((entry) => {
      if (store.findCharacter(entry.name)) {
        return;
      }
      const key = normaliseKey(entry.name);
      const firstPlan = draft.plans.find((plan) => plan.characters.some((name) => normaliseKey(name) === key));
      store.addCharacter({
        name: entry.name,
        role: entry.role,
        arc: entry.arc,
        currentState: entry.motivation,
        firstAppearance: firstPlan ? firstPlan.index : firstIndex,
      });
    });
    draft.threads.forEach((entry) => {
      store.addPlotThread({ title: entry.title, description: entry.description });
    });
    draft.worldFacts.forEach((entry) => {
      const subject = entry.subject || deriveSubject(entry.statement);
      if (store.findFact(entry.category, subject)) {
        return;
      }
      store.addWorldFact({ category: entry.category, subject, statement: entry.statement, establishedIn: firstIndex - 1 });
    });

    this.logger.info(
      { project: project.name, chapters: plans.length, regenerated: draft.plans.length, feedback: feedback.length },
      'Outline generated'
    );
  }

  private nextPlan(store: NarrativeStore): ChapterPlan {
    const plan = store.project.outline[store.cursor];
    if (!plan) {
      throw new StateTransitionError('Every planned chapter has been written', { cursor: store.cursor });
    }
    return plan;
  }

  private requirePendingDraft(store: NarrativeStore): PendingDraft {
    const draft = store.project.pendingDraft;
    if (!draft) {
      throw new StateTransitionError('There is no draft awaiting approval; call write_next first');
    }
    return draft;
  }

  private async generateDraft(
    store: NarrativeStore,
    plan: ChapterPlan,
    { feedback, instructions }: { feedback: string[]; instructions?: string },
    revisionCount: number,
    call: AgentCallOptions
  ): Promise<PendingDraft> {
    const direction = instructions?.trim() || undefined;
    const context = await this.buildContext(store, 'chapter', call, {
      chapterIndex: plan.index,
      feedback,
      instructions: direction,
      plan,
    });
    const text = await this.agents.writeChapter(context, plan, this.settings.session, call);
    const extraction = await this.agents.extract(
      text,
      { characters: store.project.characters, threads: store.project.plotThreads },
      call
    );
    const flags = this.checker.check(text, store.project, { chapterIndex: plan.index, extraction, plan });
    const critique = await this.agents.critique(context, plan.title, text, call);

    const draft: PendingDraft = {
      index: plan.index,
      title: plan.title,
      text,
      wordCount: countWords(text),
      status: 'critiqued',
      flags,
      critique,
      extraction,
      feedback,
      ...(direction ? { instructions: direction } : {}),
      revisionCount,
      generatedAt: this.clock().toISOString(),
    };
    store.setPendingDraft(draft);

    const contradictions = flags.filter((flag) => flag.severity === 'contradiction');
    if (contradictions.length) {
      this.logger.warn(
        { project: store.name, chapter: plan.index, contradictions: contradictions.map((flag) => flag.description) },
        'Draft contradicts established state'
      );
    }
    this.logger.info(
      { project: store.name, chapter: plan.index, words: draft.wordCount, revision: revisionCount, flags: flags.length },
      'Chapter drafted'
    );
    return draft;
  }

  private async finishDraft(store: NarrativeStore, draft: PendingDraft, call: AgentCallOptions): Promise<DraftResult> {
    const autoCommit = this.settings.autoCommit && !hasContradictions(draft.flags);
    if (autoCommit) {
      this.commitDraft(store, draft, false);
    }
    await store.save();
    const critique = autoCommit ? await this.maybeIntervalCritique(store, call) : undefined;
    return {
      status: toProjectStatus(store.project, store.currentRevision),
      draft: { ...toPendingDraftView(draft), text: draft.text, critique: draft.critique },
      committed: autoCommit,
      ...(critique ? { critique } : {}),
    };
  }

  /**
   * Applies a draft to the store: back-fills entities, records character states, thread progress and
   * facts, then appends the chapter. Runs entirely in memory; nothing is kept unless the caller saves.
   */
  private commitDraft(store: NarrativeStore, draft: PendingDraft, override: boolean): Chapter {
    const index = draft.index;
    const plan = store.project.outline[index];
    const { extraction } = draft;
    const characterIds = new Set<string>();
    const threadIds = new Set<string>();
    const overriddenFacts = new Set<string>();
    const reason = `Chapter ${index + 1} approved with override`;

    extraction.characters.forEach((mentioned) => {
      const existing = store.findCharacter(mentioned.name);
      if (!existing) {
        const added = store.addCharacter({
          name: mentioned.name,
          role: mentioned.role ?? 'supporting',
          currentState: mentioned.state ?? undefined,
          firstAppearance: index,
        });
        characterIds.add(added.id);
        return;
      }
      characterIds.add(existing.id);
      if (mentioned.state) {
        store.updateCharacterState(existing.id, { state: mentioned.state, chapterIndex: index });
      }
    });

    const searchKey = toSearchKey(draft.text);
    store.project.characters
      .filter((character) => mentionsName(searchKey, character.name))
      .forEach((character) => characterIds.add(character.id));

    extraction.threads.forEach((mentioned) => {
      const thread = store.findPlotThread(mentioned.title) ?? store.addPlotThread({
        title: mentioned.title,
        description: mentioned.description,
        chapterIndex: index,
      });
      store.touchPlotThread(thread.id, index);
      threadIds.add(thread.id);
      if (thread.status === 'open' && (mentioned.status === 'resolved' || mentioned.status === 'abandoned')) {
        store.updatePlotThreadStatus(thread.id, mentioned.status, index);
      }
    });
    (plan?.threads ?? []).forEach((title) => {
      const thread = store.findPlotThread(title);
      if (thread) {
        store.touchPlotThread(thread.id, index);
        threadIds.add(thread.id);
      }
    });

    extraction.facts.forEach((mentioned) => {
      const input = {
        category: mentioned.category,
        subject: mentioned.subject || deriveSubject(mentioned.statement),
        statement: mentioned.statement,
        establishedIn: index,
      };
      const existing = store.findFact(input.category, input.subject);
      if (existing && override && statementsConflict(existing.statement, input.statement)) {
        overriddenFacts.add(existing.id);
      }
      store.addWorldFact(input, { override, reason });
    });

    if (override) {
      draft.flags
        .filter((flag: Flag) => flag.severity === 'contradiction' && flag.entity === 'world-fact' && flag.ref)
        .forEach((flag) => {
          if (flag.ref && !overriddenFacts.has(flag.ref)) {
            store.acknowledgeFact(flag.ref, index, `${reason}: ${flag.description}`);
            overriddenFacts.add(flag.ref);
          }
        });
    }

    const critiqueNotes = [
      ...(draft.critique ? [...draft.critique.weaknesses, ...draft.critique.suggestions] : []),
      ...draft.flags.filter((flag) => flag.severity === 'style').map((flag) => `Style: ${flag.description}`),
    ];

    const chapter = store.appendChapter({
      index,
      title: draft.title,
      text: draft.text,
      wordCount: draft.wordCount,
      critiqueNotes,
      revisionCount: draft.revisionCount,
      characters: Array.from(characterIds),
      threads: Array.from(threadIds),
    });
    store.clearPendingDraft('committed');
    this.logger.info(
      { project: store.name, chapter: index, words: chapter.wordCount, override, revisionCount: chapter.revisionCount },
      'Chapter committed'
    );

    if (store.cursor >= store.project.outline.length) {
      this.transition(store, 'complete');
    }
    return chapter;
  }

  private async maybeIntervalCritique(store: NarrativeStore, call: AgentCallOptions): Promise<ReviewOutcome | undefined> {
    const interval = this.settings.critiqueInterval;
    if (interval <= 0 || store.cursor === 0 || store.cursor % interval !== 0) {
      return undefined;
    }
    try {
      const review = await this.runCritique(store, null, 'interval', call);
      await store.save();
      return { review };
    } catch (error) {
      // The chapter is already committed; a failed review is reported without undoing it.
      if (error instanceof ApiError) {
        this.logger.warn({ project: store.name, chapter: store.cursor - 1, code: error.code }, 'Interval critique failed');
        return { review: null, error: error.toPayload('CRITIQUE_FAILED') };
      }
      throw error;
    }
  }

  private async runCritique(
    store: NarrativeStore,
    chapterIndex: number | null,
    trigger: StoryReview['trigger'],
    call: AgentCallOptions
  ): Promise<StoryReview> {
    const resumeFrom = store.project.phase;
    const lastIndex = store.cursor - 1;
    const targetIndex = chapterIndex ?? lastIndex;
    const chapter = store.project.chapters[targetIndex];
    if (!chapter) {
      throw new ApiError(404, `Chapter ${targetIndex + 1} has not been written`, { chapterIndex: targetIndex }, 'ENTITY_NOT_FOUND');
    }

    const context = await this.buildContext(store, 'critique', call, { chapterIndex: targetIndex });

    let critique: CritiqueResult;
    if (chapterIndex === null) {
      const digestSource = new CachingDigestSource(store, this.agents, call);
      const digests: string[] = [];
      for (const entry of store.project.chapters) {
        digests.push(`Chapter ${entry.index + 1}: ${entry.title}: ${await digestSource.digest(entry)}`);
      }
      critique = await this.agents.critiqueStory(context, digests, call);
    } else {
      critique = await this.agents.critique(context, chapter.title, chapter.text, call);
    }
    const continuityIssues = await this.agents.continuity(context, call);

    // Model calls are done; the phase change and review land together or not at all.
    this.transition(store, 'critique');
    if (chapterIndex !== null) {
      store.annotateChapter(chapterIndex, [
        ...critique.weaknesses,
        ...critique.suggestions,
        ...[...critique.continuityIssues, ...continuityIssues].map((issue) => `Continuity: ${issue}`),
      ]);
    }

    const review: StoryReview = {
      scope: chapterIndex === null ? 'full_story' : 'chapter',
      chapterIndex,
      critique,
      continuityIssues,
      createdAt: this.clock().toISOString(),
      trigger,
    };
    store.recordReview(review);
    this.transition(store, resumeFrom);
    this.logger.info(
      { project: store.name, scope: review.scope, chapter: chapterIndex, score: critique.overallScore, trigger },
      'Critique recorded'
    );
    return review;
  }
}
