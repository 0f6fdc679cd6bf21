import ApiError from './ApiError';
import type { Flag } from '../types/narrative';

export class ContradictionError extends ApiError {
  public flags: Flag[];

  constructor(message: string, flags: Flag[] = [], details: Record<string, unknown> = {}) {
    super(409, message, { ...details, flags }, 'CONTRADICTION');
    this.name = 'ContradictionError';
    this.flags = flags;
  }
}

export class SequenceError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, message, details, 'SEQUENCE_ERROR');
    this.name = 'SequenceError';
  }
}

export class StateTransitionError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, message, details, 'INVALID_TRANSITION');
    this.name = 'StateTransitionError';
  }
}

export type TransportFailure = 'unavailable' | 'timeout' | 'empty' | 'malformed';

const TRANSPORT_STATUS: Record<TransportFailure, { statusCode: number; code: string }> = {
  unavailable: { statusCode: 503, code: 'MODEL_UNAVAILABLE' },
  timeout: { statusCode: 504, code: 'MODEL_TIMEOUT' },
  empty: { statusCode: 502, code: 'MODEL_BAD_RESPONSE' },
  malformed: { statusCode: 502, code: 'MODEL_BAD_RESPONSE' },
};

export class TransportError extends ApiError {
  public reason: TransportFailure;

  public attempts: number;

  constructor(reason: TransportFailure, message: string, attempts = 1) {
    const { statusCode, code } = TRANSPORT_STATUS[reason];
    super(statusCode, message, { reason, attempts }, code);
    this.name = 'TransportError';
    this.reason = reason;
    this.attempts = attempts;
  }

  withAttempts(attempts: number): TransportError {
    return new TransportError(this.reason, `${this.message} (gave up after ${attempts} attempts)`, attempts);
  }
}

export class GenerationCancelledError extends ApiError {
  constructor(message = 'Generation cancelled by operator') {
    super(499, message, undefined, 'GENERATION_CANCELLED');
    this.name = 'GenerationCancelledError';
  }
}

export class BudgetExceededError extends ApiError {
  public required: number;

  public budget: number;

  constructor(required: number, budget: number, pinned: string[]) {
    super(
      422,
      `Context needs at least ${required} tokens of foundational material but the budget is ${budget}`,
      { required, budget, pinned },
      'BUDGET_EXCEEDED'
    );
    this.name = 'BudgetExceededError';
    this.required = required;
    this.budget = budget;
  }
}

export class ProjectBusyError extends ApiError {
  constructor(projectName: string) {
    super(409, `Project "${projectName}" already has a command in progress`, { project: projectName }, 'PROJECT_BUSY');
    this.name = 'ProjectBusyError';
  }
}

export class ProjectNotFoundError extends ApiError {
  constructor(projectName: string) {
    super(404, `Project "${projectName}" not found`, { project: projectName }, 'PROJECT_NOT_FOUND');
    this.name = 'ProjectNotFoundError';
  }
}

export class ProjectExistsError extends ApiError {
  constructor(projectName: string) {
    super(409, `Project "${projectName}" already exists`, { project: projectName }, 'PROJECT_EXISTS');
    this.name = 'ProjectExistsError';
  }
}

export class ConcurrentModificationError extends ApiError {
  constructor(projectName: string, expectedRevision: number) {
    super(
      409,
      `Project "${projectName}" was modified by another writer`,
      { project: projectName, expectedRevision },
      'CONCURRENT_MODIFICATION'
    );
    this.name = 'ConcurrentModificationError';
  }
}

export class EntityNotFoundError extends ApiError {
  constructor(kind: 'character' | 'plot-thread' | 'world-fact' | 'chapter', ref: string) {
    super(404, `Unknown ${kind} "${ref}"`, { kind, ref }, 'ENTITY_NOT_FOUND');
    this.name = 'EntityNotFoundError';
  }
}
