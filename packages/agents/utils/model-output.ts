// Parsing of structured model output
// Models are asked for a bare JSON object but sometimes wrap it in prose or code fences

import type { z } from 'zod';
import { MalformedOutputError } from './errors.js';

/** Pull the outermost JSON object out of a model reply. */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) throw new MalformedOutputError('Model returned empty output', text);

  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to brace matching
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new MalformedOutputError('No JSON object found in model output', text);
  }

  try {
    return JSON.parse(trimmed.slice(start, end + 1));
  } catch (err) {
    throw new MalformedOutputError(
      `Unparseable JSON in model output: ${err instanceof Error ? err.message : String(err)}`,
      text,
    );
  }
}

export function parseModelOutput<S extends z.ZodTypeAny>(schema: S, text: string): z.output<S> {
  const candidate = extractJsonObject(text);
  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedOutputError(`Model output failed validation: ${detail}`, text);
  }
  return parsed.data;
}

/** Render a tool result as a short evidence excerpt. */
export function excerpt(value: unknown, max = 500): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
