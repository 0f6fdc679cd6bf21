import { jsonrepair } from 'jsonrepair';
import { z, ZodError, ZodTypeAny } from 'zod';
import { TransportError } from './errors';

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

export function extractJsonBlock(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    return '';
  }
  const fenced = FENCE_PATTERN.exec(trimmed);
  const body = fenced ? fenced[1].trim() : trimmed;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return body;
  }
  return body.slice(start, end + 1);
}

function describeFailure(label: string, error: unknown): TransportError {
  if (error instanceof ZodError) {
    const issues = error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new TransportError('malformed', `${label} response did not match the expected structure: ${issues}`);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError('malformed', `${label} response is not valid JSON: ${reason}`);
}

/**
 * Model output is untrusted text. It is parsed, repaired when the JSON is broken, and validated
 * before anything downstream sees a typed value.
 */
export function parseModelJson<S extends ZodTypeAny>(raw: string, schema: S, label: string): z.infer<S> {
  const candidate = extractJsonBlock(raw);
  if (!candidate) {
    throw new TransportError('empty', `${label} response was empty`);
  }

  const parseAndValidate = (value: string): z.infer<S> => schema.parse(JSON.parse(value));

  try {
    return parseAndValidate(candidate);
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw describeFailure(label, error);
    }
  }

  try {
    return parseAndValidate(jsonrepair(candidate));
  } catch (repairError) {
    throw describeFailure(label, repairError);
  }
}
