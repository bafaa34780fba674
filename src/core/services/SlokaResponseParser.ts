import { DictionaryEntry, ParsedResult, emptyResult, parsedResultSchema } from '../entities/DictionaryEntry';
import { Logger } from './Logger';

export type ParseOutcome =
  | { ok: true; result: ParsedResult }
  | { ok: false; reason: 'invalid-json' | 'schema-mismatch'; detail: string; preview: string };

const PREVIEW_LENGTH = 200;

// Removes a ``` or ```json fence the model may wrap its JSON in.
export function stripCodeFence(text: string): string {
  let body = text.trim();

  if (body.startsWith('```')) {
    const lines = body.split('\n');
    if (lines.length > 2) body = lines.slice(1, -1).join('\n');
  }
  // Leftovers of a one- or two-line fence, e.g. ```json {...}```
  if (body.startsWith('```json')) body = body.slice(7);
  if (body.endsWith('```')) body = body.slice(0, -3);

  return body.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sourceEntries(raw: unknown): unknown[] {
  return isRecord(raw) && Array.isArray(raw.entries) ? raw.entries : [];
}

// zod emits declared keys first; restore the order the model wrote them in.
function inSourceOrder(source: unknown, checked: DictionaryEntry): DictionaryEntry {
  if (!isRecord(source)) return checked;
  const ordered: DictionaryEntry = {};
  for (const field of Object.keys(source)) {
    if (field in checked) ordered[field] = checked[field];
  }
  return ordered;
}

export function parseSlokaResponse(text: string, logger: Logger): ParseOutcome {
  const body = stripCodeFence(text);
  const preview = body.slice(0, PREVIEW_LENGTH);

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.error(`Error parsing JSON from model: ${detail}`);
    logger.error(`Response was: ${preview}...`);
    return { ok: false, reason: 'invalid-json', detail, preview };
  }

  const checked = parsedResultSchema.safeParse(raw);
  if (!checked.success) {
    const detail = checked.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    logger.error(`Model response does not match the entry schema: ${detail}`);
    logger.debug(`Response was: ${preview}...`);
    return { ok: false, reason: 'schema-mismatch', detail, preview };
  }

  const rawEntries = sourceEntries(raw);
  return {
    ok: true,
    result: {
      entries: checked.data.entries.map((entry, i) => inSourceOrder(rawEntries[i], entry)),
    },
  };
}

export function resultOf(outcome: ParseOutcome): ParsedResult {
  return outcome.ok ? outcome.result : emptyResult();
}
