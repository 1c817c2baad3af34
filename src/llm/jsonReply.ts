import Ajv, { SchemaObject } from 'ajv';
import { ParseError } from '../errors';

const ajv = new Ajv({ allErrors: true, useDefaults: true });

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pulls a JSON object out of a model reply. Tries, in order: a fenced
 * ```json block, the whole reply, then the first-to-last brace span.
 */
export function extractJson(reply: string): unknown {
  const candidates: string[] = [];
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(reply);
  if (fenced) candidates.push(fenced[1]);
  candidates.push(reply.trim());
  const first = reply.indexOf('{');
  const last = reply.lastIndexOf('}');
  if (first !== -1 && last > first) candidates.push(reply.slice(first, last + 1));

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }
  throw new ParseError(`No valid JSON found in reply: ${reply.slice(0, 200)}`);
}

export interface ReplyValidator<T> {
  parse(reply: string): T;
}

/** Compiles a schema once and returns a parser that extracts and validates replies. */
export function replyValidator<T>(name: string, schema: SchemaObject): ReplyValidator<T> {
  const validate = ajv.compile<T>(schema);
  return {
    parse(reply: string): T {
      const data = extractJson(reply);
      if (!validate(data)) {
        throw new ParseError(`${name} reply failed validation: ${ajv.errorsText(validate.errors)}`);
      }
      return data;
    }
  };
}
