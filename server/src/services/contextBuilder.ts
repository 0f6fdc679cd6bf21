import type { Chapter, ChapterPlan, Character, PlotThread, ProjectState, WorldFact } from '../types/narrative';
import { BudgetExceededError, SequenceError } from '../utils/errors';
import { normaliseKey, splitSentences, tailWords, truncateBySentences } from '../utils/text';
import { estimateTokens } from '../utils/tokenEstimate';

export type ContextTaskKind = 'analysis' | 'outline' | 'chapter' | 'critique';

export type SectionKey =
  | 'project'
  | 'target'
  | 'feedback'
  | 'instructions'
  | 'foundational-facts'
  | 'analysis'
  | 'answers'
  | 'outline-overview'
  | 'story-so-far'
  | 'trailing-window'
  | 'characters'
  | 'threads'
  | 'chapter-facts'
  | 'upcoming';

export interface ContextSection {
  key: SectionKey;
  title: string;
  body: string;
  pinned: boolean;
}

export interface ContextPayload {
  taskKind: ContextTaskKind;
  targetChapter: number | null;
  budget: number;
  tokens: number;
  text: string;
  sections: ContextSection[];
  trimSteps: string[];
  included: {
    characters: string[];
    threads: string[];
    facts: string[];
    digestChapters: number[];
  };
}

export interface DigestSource {
  digest(chapter: Chapter): Promise<string>;
}

/** Deterministic fallback: the opening sentences of the chapter. */
export class ExtractiveDigestSource implements DigestSource {
  constructor(private maxChars = 480) {}

  async digest(chapter: Chapter): Promise<string> {
    return truncateBySentences(splitSentences(chapter.text).slice(0, 4).join(' '), this.maxChars);
  }
}

export interface BuildOptions {
  chapterIndex?: number;
  feedback?: string[];
  /** Operator direction for this chapter, pinned beside the target. */
  instructions?: string;
}

export interface ContextBuilderOptions {
  trailingWindow?: number;
  excerptWords?: number;
  digestSource?: DigestSource;
  upcomingPlans?: number;
}

interface TrailingEntry {
  chapter: Chapter;
  plan?: ChapterPlan;
  excerpt: string;
  digest: string | null;
}

interface SummaryBlock {
  from: number;
  to: number;
  text: string;
}

interface WorkingContext {
  upcoming: ChapterPlan[];
  trailing: TrailingEntry[];
  summary: SummaryBlock[];
  characters: Character[];
  threads: PlotThread[];
  condensedEntities: boolean;
  chapterFacts: WorldFact[];
  analysis: boolean;
  answers: boolean;
  outlineOverview: boolean;
}

interface TrimStep {
  name: string;
  repeatable?: boolean;
  apply(working: WorkingContext): Promise<boolean> | boolean;
}

const MIN_SUMMARY_CHARS = 160;
const PREMISE_CHARS_IN_CHAPTER_TASKS = 1200;

function chapterLabel(index: number): string {
  return `Chapter ${index + 1}`;
}

function rangeLabel(block: SummaryBlock): string {
  return block.from === block.to ? chapterLabel(block.from) : `Chapters ${block.from + 1}-${block.to + 1}`;
}

function renderSections(sections: ContextSection[]): string {
  return sections.map((section) => `## ${section.title}\n${section.body}`).join('\n\n');
}

function formatPlan(plan: ChapterPlan): string {
  const lines = [`${chapterLabel(plan.index)}: ${plan.title}`, `Summary: ${plan.summary}`];
  if (plan.keyEvents.length) {
    lines.push('Key events:', ...plan.keyEvents.map((event, position) => `${position + 1}. ${event}`));
  }
  lines.push(`Target length: about ${plan.targetWords} words`);
  if (plan.characters.length) {
    lines.push(`Characters: ${plan.characters.join(', ')}`);
  }
  if (plan.threads.length) {
    lines.push(`Threads: ${plan.threads.join(', ')}`);
  }
  return lines.join('\n');
}

function formatFact(fact: WorldFact): string {
  return `- [${fact.category}] ${fact.statement}`;
}

function formatCharacter(character: Character, condensed: boolean): string {
  if (condensed) {
    const state = character.currentState ? `: ${truncateBySentences(character.currentState, 120)}` : '';
    return `- ${character.name} (${character.role})${state}`;
  }
  const parts = [`- ${character.name} (${character.role})`];
  if (character.arc) {
    parts.push(`arc: ${character.arc}`);
  }
  if (character.currentState) {
    parts.push(`now: ${character.currentState}`);
  }
  return parts.join('; ');
}

function formatThread(thread: PlotThread, condensed: boolean): string {
  if (condensed || !thread.description) {
    return `- ${thread.title} [${thread.status}]`;
  }
  const touched = thread.chapters.length ? ` (chapters ${thread.chapters.map((index) => index + 1).join(', ')})` : '';
  return `- ${thread.title} [${thread.status}]: ${thread.description}${touched}`;
}

/**
 * Assembles the bounded prompt payload for one task. Pinned sections (project header, target outline
 * entry, revision feedback, rule and setting facts) are never trimmed; everything else degrades in a
 * fixed order until the estimate fits the budget.
 */
export default class ContextWindowBuilder {
  private trailingWindow: number;

  private excerptWords: number;

  private digestSource: DigestSource;

  private upcomingPlans: number;

  constructor({
    trailingWindow = 3,
    excerptWords = 350,
    digestSource = new ExtractiveDigestSource(),
    upcomingPlans = 2,
  }: ContextBuilderOptions = {}) {
    this.trailingWindow = Math.max(0, trailingWindow);
    this.excerptWords = Math.max(20, excerptWords);
    this.digestSource = digestSource;
    this.upcomingPlans = Math.max(0, upcomingPlans);
  }

  withDigestSource(digestSource: DigestSource): ContextWindowBuilder {
    return new ContextWindowBuilder({
      trailingWindow: this.trailingWindow,
      excerptWords: this.excerptWords,
      digestSource,
      upcomingPlans: this.upcomingPlans,
    });
  }

  async build(
    taskKind: ContextTaskKind,
    project: Readonly<ProjectState>,
    tokenBudget: number,
    options: BuildOptions = {}
  ): Promise<ContextPayload> {
    const target = this.resolveTarget(taskKind, project, options.chapterIndex);
    const plan = target === null ? undefined : project.outline[target];
    if (target !== null && !plan) {
      throw new SequenceError(`${chapterLabel(target)} has no outline entry`, { index: target });
    }

    const pinned = this.pinnedSections(taskKind, project, plan, options.feedback ?? [], options.instructions);
    const pinnedTokens = estimateTokens(renderSections(pinned));
    if (pinnedTokens > tokenBudget) {
      throw new BudgetExceededError(
        pinnedTokens,
        tokenBudget,
        pinned.map((section) => section.key)
      );
    }

    const cursor = target ?? project.chapters.length;
    const windowStart = Math.max(0, cursor - this.trailingWindow);
    const written = project.chapters.filter((chapter) => chapter.index < cursor);
    const olderChapters = written.filter((chapter) => chapter.index < windowStart);
    const windowChapters = written.filter((chapter) => chapter.index >= windowStart);

    const summary: SummaryBlock[] = [];
    for (const chapter of olderChapters) {
      summary.push({ from: chapter.index, to: chapter.index, text: await this.digestSource.digest(chapter) });
    }

    const working: WorkingContext = {
      upcoming: taskKind === 'chapter' && target !== null ? project.outline.slice(target + 1, target + 1 + this.upcomingPlans) : [],
      trailing: windowChapters.map((chapter, position) => ({
        chapter,
        plan: project.outline[chapter.index],
        excerpt: tailWords(
          chapter.text,
          position === windowChapters.length - 1 ? this.excerptWords : Math.floor(this.excerptWords / 2)
        ),
        digest: null,
      })),
      summary,
      characters: this.selectCharacters(taskKind, project, plan, windowChapters, windowStart, cursor),
      threads: this.selectThreads(taskKind, project, plan, windowChapters),
      condensedEntities: false,
      chapterFacts: project.worldFacts.filter(
        (fact) =>
          fact.category !== 'rule' &&
          fact.category !== 'setting' &&
          fact.establishedIn >= cursor - this.trailingWindow &&
          fact.establishedIn < cursor
      ),
      analysis: taskKind === 'outline' && project.analysis !== null,
      answers: taskKind === 'outline' && Object.keys(project.answers).length > 0,
      outlineOverview: taskKind === 'outline' && project.outline.length > 0,
    };

    const essentialCharacters = new Set((plan?.characters ?? []).map(normaliseKey));
    const essentialThreads = new Set((plan?.threads ?? []).map(normaliseKey));

    const steps: TrimStep[] = [
      {
        name: 'drop-upcoming',
        apply: (w) => {
          if (!w.upcoming.length) return false;
          w.upcoming = [];
          return true;
        },
      },
      {
        name: 'condense-trailing-window',
        apply: async (w) => {
          const pending = w.trailing.filter((entry) => entry.digest === null);
          if (!pending.length) return false;
          for (const entry of pending) {
            entry.digest = await this.digestSource.digest(entry.chapter);
          }
          return true;
        },
      },
      {
        name: 'merge-digests',
        repeatable: true,
        apply: (w) => {
          if (w.summary.length < 2) return false;
          const merged: SummaryBlock[] = [];
          for (let position = 0; position < w.summary.length; position += 2) {
            const left = w.summary[position];
            const right = w.summary[position + 1];
            if (!right) {
              merged.push(left);
              continue;
            }
            const limit = Math.max(left.text.length, right.text.length);
            merged.push({ from: left.from, to: right.to, text: truncateBySentences(`${left.text} ${right.text}`, limit) });
          }
          w.summary = merged;
          return true;
        },
      },
      {
        name: 'truncate-running-summary',
        repeatable: true,
        apply: (w) => {
          const [block] = w.summary;
          if (!block || block.text.length <= MIN_SUMMARY_CHARS) return false;
          w.summary = [{ ...block, text: truncateBySentences(block.text, Math.floor(block.text.length / 2)) }];
          return true;
        },
      },
      {
        name: 'condense-entities',
        apply: (w) => {
          if (w.condensedEntities || (!w.characters.length && !w.threads.length)) return false;
          w.condensedEntities = true;
          return true;
        },
      },
      {
        name: 'drop-chapter-facts',
        apply: (w) => {
          if (!w.chapterFacts.length) return false;
          w.chapterFacts = [];
          return true;
        },
      },
      {
        name: 'drop-non-essential-entities',
        apply: (w) => {
          const characters = w.characters.filter((character) => essentialCharacters.has(normaliseKey(character.name)));
          const threads = w.threads.filter((thread) => essentialThreads.has(normaliseKey(thread.title)));
          if (characters.length === w.characters.length && threads.length === w.threads.length) return false;
          w.characters = characters;
          w.threads = threads;
          return true;
        },
      },
      {
        name: 'drop-running-summary',
        apply: (w) => {
          if (!w.summary.length) return false;
          w.summary = [];
          return true;
        },
      },
      {
        name: 'drop-outline-overview',
        apply: (w) => {
          if (!w.outlineOverview) return false;
          w.outlineOverview = false;
          return true;
        },
      },
      {
        name: 'drop-analysis',
        apply: (w) => {
          if (!w.analysis) return false;
          w.analysis = false;
          return true;
        },
      },
      {
        name: 'drop-trailing-window',
        apply: (w) => {
          if (!w.trailing.length) return false;
          w.trailing = [];
          return true;
        },
      },
      {
        name: 'drop-answers',
        apply: (w) => {
          if (!w.answers) return false;
          w.answers = false;
          return true;
        },
      },
      {
        name: 'drop-entities',
        apply: (w) => {
          if (!w.characters.length && !w.threads.length) return false;
          w.characters = [];
          w.threads = [];
          return true;
        },
      },
    ];

    const trimSteps: string[] = [];
    let sections = this.assemble(pinned, working, project);
    let text = renderSections(sections);

    for (const step of steps) {
      while (estimateTokens(text) > tokenBudget) {
        const changed = await step.apply(working);
        if (!changed) {
          break;
        }
        trimSteps.push(step.name);
        sections = this.assemble(pinned, working, project);
        text = renderSections(sections);
        if (!step.repeatable) {
          break;
        }
      }
    }

    const tokens = estimateTokens(text);
    if (tokens > tokenBudget) {
      throw new BudgetExceededError(tokens, tokenBudget, pinned.map((section) => section.key));
    }

    return {
      taskKind,
      targetChapter: target,
      budget: tokenBudget,
      tokens,
      text,
      sections,
      trimSteps,
      included: {
        characters: working.characters.map((character) => character.id),
        threads: working.threads.map((thread) => thread.id),
        facts: [
          ...project.worldFacts.filter((fact) => fact.category === 'rule' || fact.category === 'setting'),
          ...working.chapterFacts,
        ].map((fact) => fact.id),
        digestChapters: [
          ...working.summary.flatMap((block) =>
            Array.from({ length: block.to - block.from + 1 }, (_value, offset) => block.from + offset)
          ),
          ...working.trailing.filter((entry) => entry.digest !== null).map((entry) => entry.chapter.index),
        ],
      },
    };
  }

  private resolveTarget(taskKind: ContextTaskKind, project: Readonly<ProjectState>, chapterIndex?: number): number | null {
    if (taskKind === 'analysis' || taskKind === 'outline') {
      return null;
    }
    if (chapterIndex !== undefined) {
      return chapterIndex;
    }
    if (taskKind === 'chapter') {
      return project.chapters.length;
    }
    if (!project.chapters.length) {
      throw new SequenceError('There is no written chapter to critique');
    }
    return project.chapters.length - 1;
  }

  private pinnedSections(
    taskKind: ContextTaskKind,
    project: Readonly<ProjectState>,
    plan: ChapterPlan | undefined,
    feedback: string[],
    instructions?: string
  ): ContextSection[] {
    const premise =
      taskKind === 'chapter' || taskKind === 'critique'
        ? truncateBySentences(project.premise, PREMISE_CHARS_IN_CHAPTER_TASKS)
        : project.premise;
    const header = [
      `Title: ${project.name}`,
      `Form: ${project.storyType.replace('_', ' ')}`,
      `Genre: ${project.genre}`,
      `Target length: about ${project.targetLength} words`,
    ];
    if (premise) {
      header.push(`Premise: ${premise}`);
    }
    if (project.styleNotes) {
      header.push(`Style notes: ${project.styleNotes}`);
    }

    const sections: ContextSection[] = [{ key: 'project', title: 'Project', body: header.join('\n'), pinned: true }];

    const foundational = project.worldFacts.filter((fact) => fact.category === 'rule' || fact.category === 'setting');
    if (foundational.length) {
      sections.push({
        key: 'foundational-facts',
        title: 'World rules and setting (always true)',
        body: foundational.map(formatFact).join('\n'),
        pinned: true,
      });
    }
    if (plan) {
      sections.push({
        key: 'target',
        title: taskKind === 'critique' ? 'Outline entry of the chapter under review' : 'Chapter to write',
        body: formatPlan(plan),
        pinned: true,
      });
    }
    if (instructions?.trim()) {
      sections.push({ key: 'instructions', title: 'Author instructions', body: instructions.trim(), pinned: true });
    }
    const notes = feedback.map((entry) => entry.trim()).filter(Boolean);
    if (notes.length) {
      sections.push({
        key: 'feedback',
        title: 'Revision feedback',
        body: notes.map((entry, position) => `${position + 1}. ${entry}`).join('\n'),
        pinned: true,
      });
    }
    return sections;
  }

  private assemble(pinned: ContextSection[], working: WorkingContext, project: Readonly<ProjectState>): ContextSection[] {
    const byKey = new Map(pinned.map((section) => [section.key, section]));
    const sections: ContextSection[] = [];
    const push = (key: SectionKey, title: string, lines: string[]) => {
      if (lines.length) {
        sections.push({ key, title, body: lines.join('\n'), pinned: false });
      }
    };
    const pushPinned = (key: SectionKey) => {
      const section = byKey.get(key);
      if (section) {
        sections.push(section);
      }
    };

    pushPinned('project');
    if (working.analysis && project.analysis) {
      const { analysis } = project;
      push('analysis', 'Analysis', [
        ...analysis.strengths.map((strength) => `+ ${strength}`),
        ...analysis.gaps.map((gap) => `- ${gap.description}`),
        ...(analysis.genreAnalysis ? [`Genre: ${analysis.genreAnalysis}`] : []),
      ]);
    }
    if (working.answers) {
      push(
        'answers',
        'Author answers',
        project.questions
          .filter((question) => project.answers[question.id])
          .map((question) => `Q: ${question.question}\nA: ${project.answers[question.id]}`)
      );
    }
    pushPinned('foundational-facts');
    push(
      'story-so-far',
      'Story so far',
      working.summary.map((block) => `${rangeLabel(block)}: ${block.text}`)
    );
    push(
      'trailing-window',
      'Recent chapters',
      working.trailing.map((entry) => {
        const heading = `### ${chapterLabel(entry.chapter.index)}: ${entry.chapter.title}`;
        if (entry.digest !== null) {
          return `${heading}\n${entry.digest}`;
        }
        const planLine = entry.plan ? `Plan: ${entry.plan.summary}\n` : '';
        return `${heading}\n${planLine}Ending: ${entry.excerpt}`;
      })
    );
    push('characters', 'Characters', working.characters.map((character) => formatCharacter(character, working.condensedEntities)));
    push('threads', 'Plot threads', working.threads.map((thread) => formatThread(thread, working.condensedEntities)));
    push('chapter-facts', 'Recently established facts', working.chapterFacts.map(formatFact));
    if (working.outlineOverview) {
      push(
        'outline-overview',
        'Current outline',
        project.outline.map((entry) => `${chapterLabel(entry.index)}: ${entry.title}: ${entry.summary}`)
      );
    }
    pushPinned('target');
    pushPinned('instructions');
    pushPinned('feedback');
    push(
      'upcoming',
      'Coming next',
      working.upcoming.map((entry) => `${chapterLabel(entry.index)}: ${entry.title}: ${entry.summary}`)
    );
    return sections;
  }

  private selectCharacters(
    taskKind: ContextTaskKind,
    project: Readonly<ProjectState>,
    plan: ChapterPlan | undefined,
    windowChapters: Chapter[],
    windowStart: number,
    cursor: number
  ): Character[] {
    if (taskKind === 'analysis' || taskKind === 'outline') {
      return [...project.characters];
    }
    const planned = new Set((plan?.characters ?? []).map(normaliseKey));
    const appeared = new Set(windowChapters.flatMap((chapter) => chapter.characters));
    return project.characters.filter(
      (character) =>
        planned.has(normaliseKey(character.name)) ||
        appeared.has(character.id) ||
        (character.firstAppearance >= windowStart && character.firstAppearance < cursor)
    );
  }

  private selectThreads(
    taskKind: ContextTaskKind,
    project: Readonly<ProjectState>,
    plan: ChapterPlan | undefined,
    windowChapters: Chapter[]
  ): PlotThread[] {
    if (taskKind === 'analysis' || taskKind === 'outline') {
      return [...project.plotThreads];
    }
    const planned = new Set((plan?.threads ?? []).map(normaliseKey));
    const windowIndices = new Set(windowChapters.map((chapter) => chapter.index));
    return project.plotThreads.filter(
      (thread) =>
        thread.status === 'open' ||
        planned.has(normaliseKey(thread.title)) ||
        thread.chapters.some((index) => windowIndices.has(index))
    );
  }
}
