import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { NoteId, NotePayload, NoteRecord } from '../types';

export type CodecError =
  | { kind: 'ValidationError'; message: string }
  | { kind: 'MalformedPayload'; message: string };

export type CodecResult<T> = { ok: true; value: T } | { ok: false; error: CodecError };

/** Transport-neutral view of an inbound request. */
export interface NoteRequest {
  body?: string | null;
  pathParameters?: Record<string, string | undefined> | null;
}

// Non-string scalars are stringified; absent and null read as empty.
const asText = (value: unknown): string => {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

const requiredText = (field: string) =>
  z.preprocess(asText, z.string().trim().min(1, `${field} is required`));

// ---------- Schemas ----------
const payloadSchema = z.object({
  title: requiredText('title'),
  note: requiredText('note'),
});

export const noteRecordSchema = z.object({
  owner: z.string().min(1),
  id: z.string().min(1),
  title: z.string(),
  note: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

/**
 * Parses a create/update body into trimmed `title` and `note`.
 * A missing body counts as `{}`; anything that is not a JSON object has no fields.
 */
export function parseNotePayload(rawBody: string | null | undefined): CodecResult<NotePayload> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(rawBody || '{}');
  } catch {
    return { ok: false, error: { kind: 'MalformedPayload', message: 'body is not valid JSON' } };
  }

  const fields = isPlainObject(decoded) ? decoded : {};
  const parsed = payloadSchema.safeParse(fields);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    return {
      ok: false,
      error: { kind: 'ValidationError', message: first?.message ?? 'invalid payload' },
    };
  }
  return { ok: true, value: parsed.data };
}

export function extractPathId(request: NoteRequest): CodecResult<NoteId> {
  const raw = request.pathParameters?.id;
  const id = typeof raw === 'string' ? raw.trim() : '';
  if (!id) {
    return { ok: false, error: { kind: 'ValidationError', message: 'Note id is required' } };
  }
  return { ok: true, value: id };
}

/** Decodes a record read back from a store; null when it is not a complete note. */
export function decodeNoteRecord(value: unknown): NoteRecord | null {
  const parsed = noteRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export const newId = (): NoteId => randomUUID();

// ---------- Timestamps ----------
// ISO-8601 UTC with microseconds, e.g. 2024-01-01T00:00:00.000001Z
const TIMESTAMP_RE = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,6}))?Z$/;

let lastIssued = 0;

export function formatMicros(micros: number): string {
  const ms = Math.floor(micros / 1000);
  const sub = String(micros - ms * 1000).padStart(3, '0');
  return new Date(ms).toISOString().replace('Z', `${sub}Z`);
}

/** Microseconds since the epoch, or null for text that is not a UTC timestamp. */
export function toMicros(timestamp: string): number | null {
  const match = TIMESTAMP_RE.exec(timestamp);
  if (!match) return null;
  const seconds = Date.parse(`${match[1]}Z`);
  if (Number.isNaN(seconds)) return null;
  return seconds * 1000 + Number((match[2] ?? '').padEnd(6, '0'));
}

/** Current time; never repeats or goes backwards within this process. */
export function now(): string {
  const micros = Math.max(Math.floor((performance.timeOrigin + performance.now()) * 1000), lastIssued + 1);
  lastIssued = micros;
  return formatMicros(micros);
}

/** `candidate` when it is later than `previous`, otherwise one microsecond past `previous`. */
export function nextUpdatedAt(previous: string, candidate: string): string {
  const prev = toMicros(previous);
  const next = toMicros(candidate);
  if (prev === null || next === null) return candidate;
  return next > prev ? candidate : formatMicros(prev + 1);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
