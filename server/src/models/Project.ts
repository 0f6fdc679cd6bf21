import { Schema, model, HydratedDocument } from 'mongoose';
import {
  CHARACTER_ROLES,
  FACT_CATEGORIES,
  PHASES,
  STORY_TYPES,
  THREAD_STATUSES,
  type Chapter,
  type ChapterPlan,
  type Character,
  type PlotThread,
  type ProjectState,
  type WorldFact,
} from '../types/narrative';

/** Stored shape of the whole project aggregate. `revision` guards the single-writer commit. */
export interface ProjectRecord extends Omit<ProjectState, 'id'> {
  projectId: string;
  revision: number;
  logSeq: number;
}

export type ProjectDocument = HydratedDocument<ProjectRecord>;

const ChapterPlanSchema = new Schema<ChapterPlan>(
  {
    index: { type: Number, required: true },
    title: { type: String, required: true },
    summary: { type: String, default: '' },
    keyEvents: [{ type: String }],
    targetWords: { type: Number, required: true },
    characters: [{ type: String }],
    threads: [{ type: String }],
  },
  { _id: false }
);

const ChapterSchema = new Schema<Chapter>(
  {
    index: { type: Number, required: true },
    title: { type: String, required: true },
    text: { type: String, required: true },
    wordCount: { type: Number, required: true },
    critiqueNotes: [{ type: String }],
    revisionCount: { type: Number, default: 0 },
    status: { type: String, enum: ['draft', 'critiqued', 'approved'], default: 'approved' },
    characters: [{ type: String }],
    threads: [{ type: String }],
    committedAt: { type: String, required: true },
  },
  { _id: false }
);

const CharacterSchema = new Schema<Character>(
  {
    id: { type: String, required: true },
    name: { type: String, required: true },
    role: { type: String, enum: CHARACTER_ROLES, required: true },
    arc: { type: String, default: '' },
    currentState: { type: String, default: '' },
    stateHistory: { type: Schema.Types.Mixed, default: [] },
    firstAppearance: { type: Number, required: true },
  },
  { _id: false, id: false }
);

const PlotThreadSchema = new Schema<PlotThread>(
  {
    id: { type: String, required: true },
    title: { type: String, required: true },
    description: { type: String, default: '' },
    status: { type: String, enum: THREAD_STATUSES, default: 'open' },
    chapters: [{ type: Number }],
    resolutionChapter: { type: Number, default: null },
    closedAtChapter: { type: Number, default: null },
  },
  { _id: false, id: false }
);

const WorldFactSchema = new Schema<WorldFact>(
  {
    id: { type: String, required: true },
    category: { type: String, enum: FACT_CATEGORIES, required: true },
    subject: { type: String, required: true },
    statement: { type: String, required: true },
    establishedIn: { type: Number, required: true },
    revisions: { type: Schema.Types.Mixed, default: [] },
  },
  { _id: false, id: false }
);

const ProjectSchema = new Schema<ProjectRecord>(
  {
    projectId: { type: String, required: true, unique: true },
    name: { type: String, required: true, unique: true },
    storyType: { type: String, enum: STORY_TYPES, required: true },
    genre: { type: String, required: true },
    targetLength: { type: Number, required: true },
    premise: { type: String, default: '' },
    styleNotes: { type: String, default: null },
    phase: { type: String, enum: PHASES, required: true },
    resumePhase: { type: String, default: null },
    analysis: { type: Schema.Types.Mixed, default: null },
    questions: { type: Schema.Types.Mixed, default: [] },
    answers: { type: Schema.Types.Mixed, default: {} },
    outline: { type: [ChapterPlanSchema], default: [] },
    chapters: { type: [ChapterSchema], default: [] },
    characters: { type: [CharacterSchema], default: [] },
    plotThreads: { type: [PlotThreadSchema], default: [] },
    worldFacts: { type: [WorldFactSchema], default: [] },
    pendingDraft: { type: Schema.Types.Mixed, default: null },
    chapterDigests: { type: Schema.Types.Mixed, default: [] },
    reviews: { type: Schema.Types.Mixed, default: [] },
    createdAt: { type: String, required: true },
    updatedAt: { type: String, required: true },
    revision: { type: Number, required: true, default: 0 },
    logSeq: { type: Number, required: true, default: 0 },
  },
  { minimize: false, versionKey: false }
);

const ProjectModel = model<ProjectRecord>('Project', ProjectSchema);

export default ProjectModel;
