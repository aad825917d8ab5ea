/**
 * Parsing of free-form model responses into a tagged variant.
 *
 * Models answer with bare JSON, fenced JSON, JSON buried in prose, or plain
 * text. Everything downstream works on {@link ModelResponse} only.
 *
 * @module
 */

import { isRecord } from '../utils/type-guards.js';

export type ModelResponse =
  | { kind: 'detected'; fields: Record<string, unknown>[] }
  | { kind: 'not_detected' }
  | { kind: 'unparseable'; rawText: string };

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;
const NEGATIVE_PHRASES = [
  'no dark pattern',
  'no patterns',
  'none detected',
  'none found',
  'not found',
  'no suspicious',
  'no issues',
];
/** Keys whose array holds individual findings. */
const FINDING_LIST_KEYS = ['findings', 'patterns', 'detections'];

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractJson(text: string): unknown {
  const direct = tryJson(text);
  if (direct !== undefined) return direct;

  const fenced = FENCED_JSON.exec(text);
  if (fenced) {
    const parsed = tryJson(fenced[1].trim());
    if (parsed !== undefined) return parsed;
  }

  for (const [open, close] of [
    ['{', '}'],
    ['[', ']'],
  ] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start !== -1 && end > start) {
      const parsed = tryJson(text.slice(start, end + 1));
      if (parsed !== undefined) return parsed;
    }
  }
  return undefined;
}

function fromArray(entries: readonly unknown[]): ModelResponse {
  const fields = entries.filter(isRecord);
  return fields.length > 0 ? { kind: 'detected', fields } : { kind: 'not_detected' };
}

function fromObject(value: Record<string, unknown>): ModelResponse {
  if (value.detected === false || value.found === false) {
    return { kind: 'not_detected' };
  }
  for (const key of FINDING_LIST_KEYS) {
    const list = value[key];
    if (Array.isArray(list)) return fromArray(list);
  }
  return { kind: 'detected', fields: [value] };
}

export function parseModelResponse(text: string): ModelResponse {
  const trimmed = text.trim();
  if (trimmed === '') return { kind: 'unparseable', rawText: text };

  const parsed = extractJson(trimmed);
  if (Array.isArray(parsed)) return fromArray(parsed);
  if (isRecord(parsed)) return fromObject(parsed);

  const lower = trimmed.toLowerCase();
  if (NEGATIVE_PHRASES.some((phrase) => lower.includes(phrase))) {
    return { kind: 'not_detected' };
  }
  return { kind: 'unparseable', rawText: text };
}
