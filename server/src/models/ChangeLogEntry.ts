import { Schema, model, HydratedDocument } from 'mongoose';
import type { ChangeLogEntry } from '../types/narrative';

export interface ChangeLogRecord extends ChangeLogEntry {
  project: string;
}

export type ChangeLogDocument = HydratedDocument<ChangeLogRecord>;

const ChangeLogEntrySchema = new Schema<ChangeLogRecord>(
  {
    project: { type: String, required: true },
    seq: { type: Number, required: true },
    at: { type: String, required: true },
    op: { type: String, required: true },
    payload: { type: Schema.Types.Mixed, default: {} },
  },
  { minimize: false, versionKey: false }
);

ChangeLogEntrySchema.index({ project: 1, seq: 1 }, { unique: true });

const ChangeLogEntryModel = model<ChangeLogRecord>('ChangeLogEntry', ChangeLogEntrySchema);

export default ChangeLogEntryModel;
