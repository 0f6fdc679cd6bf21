import type { Request } from 'express';
import type { ZodError, ZodTypeAny, z } from 'zod';
import ApiError from '../utils/ApiError';

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

function parseValidationError(error: ZodError): { issues: ValidationIssue[] } {
  return {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
      code: issue.code,
    })),
  };
}

function parseWith<T extends ZodTypeAny>(schema: T, value: unknown, source: string): z.infer<T> {
  const parseResult = schema.safeParse(value);
  if (!parseResult.success) {
    throw new ApiError(400, `Request ${source} validation failed`, parseValidationError(parseResult.error), 'VALIDATION_FAILED');
  }
  return parseResult.data;
}

export function parseBody<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.body ?? {}, 'body');
}

export function parseQuery<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.query, 'query');
}
