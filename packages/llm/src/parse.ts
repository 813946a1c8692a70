/**
 * Oracle answers are never trusted: every one is pulled out of its prose,
 * repaired where the damage is mechanical, then checked against a schema.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export type ParsedAnswer<T> = { success: true; data: T } | { success: false; error: string };

type Repair = (input: string) => string;

const dropTrailingCommas: Repair = (input) => input.replace(/,\s*([}\]])/g, '$1');

const quoteBareKeys: Repair = (input) =>
  input.replace(/(\{|,)\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":');

// Quote rewriting is left out: selectors legitimately contain single quotes.
const REPAIRS: Repair[] = [dropTrailingCommas, quoteBareKeys];

function unwrapJson(answer: string): string {
  const trimmed = answer.trim();
  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) return fenced[1].trim();
  const bare = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  return bare ? bare[1] : trimmed;
}

function parseOnce<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): ParsedAnswer<T> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { success: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const result = schema.safeParse(json);
  if (result.success) return { success: true, data: result.data };
  return { success: false, error: `Validation failed: ${describeIssues(result.error)}` };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/**
 * Parse an oracle answer against a schema, applying the repairs cumulatively
 * until one parses. The first failure is reported when none does.
 */
export function parseOracleAnswer<T>(
  answer: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParsedAnswer<T> {
  let text = unwrapJson(answer);
  const first = parseOnce(text, schema);
  if (first.success) return first;

  for (const repair of REPAIRS) {
    text = repair(text);
    const repaired = parseOnce(text, schema);
    if (repaired.success) return repaired;
  }
  return first;
}
