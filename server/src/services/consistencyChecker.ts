import lexiconData from '../data/conceptLexicon.json';
import type { ChapterExtraction, ChapterPlan, Flag, ProjectState } from '../types/narrative';
import { conceptLexiconSchema, type Concept, type ConceptLexicon } from '../validators/lexicon';
import {
  containsPhrase,
  deriveSubject,
  isNegated,
  mentionsName,
  statementsConflict,
  toSearchKey,
} from '../utils/statementMatch';
import { normaliseKey, splitParagraphs, splitSentences, truncateBySentences } from '../utils/text';

export const defaultLexicon: ConceptLexicon = conceptLexiconSchema.parse(lexiconData);

export interface CheckOptions {
  chapterIndex: number;
  extraction?: ChapterExtraction;
  plan?: ChapterPlan;
}

export interface ConsistencyCheckerOptions {
  lexicon?: ConceptLexicon;
  minRepeatedParagraphChars?: number;
}

const EVIDENCE_CHARS = 200;

function flagKey(flag: Flag): string {
  return [flag.severity, flag.entity, flag.ref ?? '', flag.description].join('|');
}

export function hasContradictions(flags: readonly Flag[]): boolean {
  return flags.some((flag) => flag.severity === 'contradiction');
}

/**
 * Compares a draft and its parsed extraction against stored state. Contradictions block commit;
 * new-entity and style flags are advisory.
 */
export default class ConsistencyChecker {
  private lexicon: ConceptLexicon;

  private minRepeatedParagraphChars: number;

  constructor({ lexicon = defaultLexicon, minRepeatedParagraphChars = 40 }: ConsistencyCheckerOptions = {}) {
    this.lexicon = lexicon;
    this.minRepeatedParagraphChars = minRepeatedParagraphChars;
  }

  check(text: string, project: Readonly<ProjectState>, { chapterIndex, extraction, plan }: CheckOptions): Flag[] {
    const flags = [
      ...(extraction ? this.checkCharacters(project, extraction) : []),
      ...(extraction ? this.checkThreads(project, extraction) : []),
      ...(extraction ? this.checkFacts(project, extraction) : []),
      ...this.checkNegatedFacts(text, project, chapterIndex),
      ...(plan ? this.checkPlannedCharacters(text, plan) : []),
      ...this.checkRepeatedParagraphs(text),
    ];

    const seen = new Set<string>();
    return flags.filter((flag) => {
      const key = flagKey(flag);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  private checkCharacters(project: Readonly<ProjectState>, extraction: ChapterExtraction): Flag[] {
    const flags: Flag[] = [];
    extraction.characters.forEach((mentioned) => {
      const key = normaliseKey(mentioned.name);
      const known = project.characters.find((character) => normaliseKey(character.name) === key);
      if (!known) {
        flags.push({
          severity: 'new-entity',
          entity: 'character',
          description: `New character "${mentioned.name}"${mentioned.role ? ` (${mentioned.role})` : ''}`,
          suggestion: 'Added to the cast when the chapter is approved',
        });
        return;
      }
      if (mentioned.role && mentioned.role !== known.role) {
        flags.push({
          severity: 'contradiction',
          entity: 'character',
          description: `"${mentioned.name}" appears as ${mentioned.role} but "${known.name}" is recorded as ${known.role}`,
          ref: known.id,
          suggestion: 'If this is a different person, rename them; otherwise revise the chapter',
        });
      }
    });
    return flags;
  }

  private checkThreads(project: Readonly<ProjectState>, extraction: ChapterExtraction): Flag[] {
    const flags: Flag[] = [];
    extraction.threads.forEach((mentioned) => {
      const key = normaliseKey(mentioned.title);
      const known = project.plotThreads.find((thread) => normaliseKey(thread.title) === key);
      if (!known) {
        flags.push({
          severity: 'new-entity',
          entity: 'plot-thread',
          description: `New plot thread "${mentioned.title}"`,
          evidence: mentioned.description || undefined,
          suggestion: 'Tracked as a thread when the chapter is approved',
        });
        return;
      }
      const ongoing = mentioned.status === 'open' || mentioned.status === 'advanced';
      if (known.status !== 'open' && ongoing) {
        const closedAt = known.closedAtChapter === null ? '' : ` in chapter ${known.closedAtChapter + 1}`;
        flags.push({
          severity: 'contradiction',
          entity: 'plot-thread',
          description: `Plot thread "${known.title}" was ${known.status}${closedAt} but the draft treats it as ongoing`,
          evidence: mentioned.description || undefined,
          ref: known.id,
          suggestion: 'Threads cannot reopen; start a new thread or revise the chapter',
        });
      }
    });
    return flags;
  }

  private checkFacts(project: Readonly<ProjectState>, extraction: ChapterExtraction): Flag[] {
    const flags: Flag[] = [];
    // First statement per category and subject within this draft.
    const stated = new Map<string, string>();
    extraction.facts.forEach((mentioned) => {
      const subject = normaliseKey(mentioned.subject.trim() ? mentioned.subject : deriveSubject(mentioned.statement));
      const known = project.worldFacts.find((fact) => fact.category === mentioned.category && fact.subject === subject);
      if (!known) {
        const key = `${mentioned.category}|${subject}`;
        const earlier = stated.get(key);
        if (earlier !== undefined) {
          if (statementsConflict(earlier, mentioned.statement)) {
            flags.push({
              severity: 'contradiction',
              entity: 'world-fact',
              description: `The draft states both "${earlier}" and "${mentioned.statement}" about ${subject}`,
              evidence: mentioned.statement,
              suggestion: 'Revise the chapter, or approve with override to keep the later statement',
            });
          }
          return;
        }
        stated.set(key, mentioned.statement);
        flags.push({
          severity: 'new-entity',
          entity: 'world-fact',
          description: `New ${mentioned.category} fact: ${mentioned.statement}`,
          suggestion: 'Recorded as a world fact when the chapter is approved',
        });
        return;
      }
      if (statementsConflict(known.statement, mentioned.statement)) {
        flags.push({
          severity: 'contradiction',
          entity: 'world-fact',
          description: `Established ${known.category} fact "${known.statement}" is restated as "${mentioned.statement}"`,
          evidence: mentioned.statement,
          ref: known.id,
          suggestion: 'Approve with override to replace the established fact, or revise the chapter',
        });
      }
    });
    return flags;
  }

  private checkNegatedFacts(text: string, project: Readonly<ProjectState>, chapterIndex: number): Flag[] {
    const sentences = splitSentences(text)
      .filter((sentence) => !isNegated(sentence))
      .map((sentence) => ({ sentence, key: toSearchKey(sentence) }));
    if (!sentences.length) {
      return [];
    }

    const flags: Flag[] = [];
    project.worldFacts
      .filter((fact) => fact.establishedIn <= chapterIndex && isNegated(fact.statement))
      .forEach((fact) => {
        const factKey = toSearchKey(`${fact.subject} ${fact.statement}`);
        const concepts = this.lexicon.concepts.filter((concept) =>
          concept.aliases.some((alias) => containsPhrase(factKey, alias))
        );
        concepts.forEach((concept) => {
          const hit = this.findIndicator(sentences, concept);
          if (!hit) {
            return;
          }
          flags.push({
            severity: 'contradiction',
            entity: 'world-fact',
            description: `"${hit.indicator}" implies ${concept.concept}, but the story establishes that ${fact.statement.replace(/[.!]+$/, '')}`,
            evidence: truncateBySentences(hit.sentence, EVIDENCE_CHARS),
            ref: fact.id,
            suggestion: 'Revise the passage, or approve with override to record a deliberate exception',
          });
        });
      });
    return flags;
  }

  private findIndicator(
    sentences: Array<{ sentence: string; key: string }>,
    concept: Concept
  ): { sentence: string; indicator: string } | null {
    for (const { sentence, key } of sentences) {
      const indicator = concept.indicators.find((candidate) => containsPhrase(key, candidate));
      if (indicator) {
        return { sentence, indicator };
      }
    }
    return null;
  }

  private checkPlannedCharacters(text: string, plan: ChapterPlan): Flag[] {
    const searchKey = toSearchKey(text);
    return plan.characters
      .filter((name) => !mentionsName(searchKey, name))
      .map((name) => ({
        severity: 'style' as const,
        entity: 'character' as const,
        description: `"${name}" is planned for this chapter but never appears`,
      }));
  }

  private checkRepeatedParagraphs(text: string): Flag[] {
    const counts = new Map<string, { paragraph: string; count: number }>();
    splitParagraphs(text)
      .filter((paragraph) => paragraph.length >= this.minRepeatedParagraphChars)
      .forEach((paragraph) => {
        const key = normaliseKey(paragraph);
        const entry = counts.get(key);
        if (entry) {
          entry.count += 1;
        } else {
          counts.set(key, { paragraph, count: 1 });
        }
      });

    return Array.from(counts.values())
      .filter((entry) => entry.count > 1)
      .map((entry) => ({
        severity: 'style' as const,
        entity: 'prose' as const,
        description: `A paragraph is repeated ${entry.count} times`,
        evidence: truncateBySentences(entry.paragraph, EVIDENCE_CHARS),
      }));
  }
}
