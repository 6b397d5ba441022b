import { describe, expect, it } from 'vitest';
import {
  decodeNoteRecord,
  extractPathId,
  formatMicros,
  newId,
  nextUpdatedAt,
  now,
  parseNotePayload,
  toMicros,
} from '../src/codec/note';

describe('parseNotePayload', () => {
  it('trims title and note', () => {
    const res = parseNotePayload('{"title":"  Groceries ","note":"\\n milk, eggs \\t"}');
    expect(res).toEqual({ ok: true, value: { title: 'Groceries', note: 'milk, eggs' } });
  });

  it('ignores fields other than title and note', () => {
    const res = parseNotePayload(JSON.stringify({ id: 'caller-id', owner: 'me', title: 'a', note: 'b' }));
    expect(res).toEqual({ ok: true, value: { title: 'a', note: 'b' } });
  });

  it('stringifies non-string scalars', () => {
    const res = parseNotePayload('{"title":42,"note":true}');
    expect(res).toEqual({ ok: true, value: { title: '42', note: 'true' } });
  });

  it('reports a body that is not JSON as malformed', () => {
    const res = parseNotePayload('{title: oops');
    expect(res).toEqual({
      ok: false,
      error: { kind: 'MalformedPayload', message: 'body is not valid JSON' },
    });
  });

  it('treats a missing body as an empty object', () => {
    expect(parseNotePayload(undefined)).toEqual({
      ok: false,
      error: { kind: 'ValidationError', message: 'title is required' },
    });
    expect(parseNotePayload(null)).toEqual({
      ok: false,
      error: { kind: 'ValidationError', message: 'title is required' },
    });
    expect(parseNotePayload('')).toEqual({
      ok: false,
      error: { kind: 'ValidationError', message: 'title is required' },
    });
  });

  it('checks title before note', () => {
    const res = parseNotePayload('{}');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('title is required');
  });

  it('rejects an empty title', () => {
    const res = parseNotePayload('{"title":"","note":"x"}');
    expect(res).toEqual({ ok: false, error: { kind: 'ValidationError', message: 'title is required' } });
  });

  it('rejects a note that is only whitespace', () => {
    const res = parseNotePayload('{"title":"x","note":"   "}');
    expect(res).toEqual({ ok: false, error: { kind: 'ValidationError', message: 'note is required' } });
  });

  it('treats null fields as missing', () => {
    const res = parseNotePayload('{"title":null,"note":"x"}');
    expect(res).toEqual({ ok: false, error: { kind: 'ValidationError', message: 'title is required' } });
  });

  it('finds no fields in JSON that is not an object', () => {
    for (const body of ['[1,2]', '"text"', '7', 'null']) {
      const res = parseNotePayload(body);
      expect(res).toEqual({ ok: false, error: { kind: 'ValidationError', message: 'title is required' } });
    }
  });
});

describe('extractPathId', () => {
  it('returns the trimmed id', () => {
    expect(extractPathId({ pathParameters: { id: '  abc-123 ' } })).toEqual({ ok: true, value: 'abc-123' });
  });

  it('rejects missing, null and blank ids', () => {
    const expected = { ok: false, error: { kind: 'ValidationError', message: 'Note id is required' } };
    expect(extractPathId({})).toEqual(expected);
    expect(extractPathId({ pathParameters: null })).toEqual(expected);
    expect(extractPathId({ pathParameters: { other: 'x' } })).toEqual(expected);
    expect(extractPathId({ pathParameters: { id: '   ' } })).toEqual(expected);
  });
});

describe('newId / now', () => {
  it('generates distinct v4 UUIDs', () => {
    const a = newId();
    const b = newId();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(a).not.toBe(b);
  });

  it('renders UTC ISO-8601 timestamps with microseconds', () => {
    const ts = now();
    expect(ts).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{6}Z$/);
    expect(new Date(ts).toISOString()).toBe(`${ts.slice(0, 23)}Z`);
  });

  it('never hands out the same instant twice', () => {
    let previous = toMicros(now()) ?? 0;
    for (let i = 0; i < 1000; i++) {
      const current = toMicros(now()) ?? 0;
      expect(current).toBeGreaterThan(previous);
      previous = current;
    }
  });
});

describe('timestamp arithmetic', () => {
  const base = Date.parse('2024-01-01T00:00:00Z') * 1000;

  it('reads millisecond and microsecond fractions', () => {
    expect(toMicros('2024-01-01T00:00:00Z')).toBe(base);
    expect(toMicros('2024-01-01T00:00:00.5Z')).toBe(base + 500_000);
    expect(toMicros('2024-01-01T00:00:00.123Z')).toBe(base + 123_000);
    expect(toMicros('2024-01-01T00:00:00.123456Z')).toBe(base + 123_456);
  });

  it('rejects text that is not a UTC timestamp', () => {
    expect(toMicros('yesterday')).toBeNull();
    expect(toMicros('2024-01-01T00:00:00.000+01:00')).toBeNull();
  });

  it('formats microseconds back to text', () => {
    expect(formatMicros(base + 123_456)).toBe('2024-01-01T00:00:00.123456Z');
    expect(formatMicros(base + 7)).toBe('2024-01-01T00:00:00.000007Z');
  });

  it('keeps a later candidate as is', () => {
    expect(nextUpdatedAt('2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000001Z')).toBe(
      '2024-01-01T00:00:00.000001Z',
    );
  });

  it('moves an equal or earlier candidate one microsecond past the previous value', () => {
    expect(nextUpdatedAt('2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')).toBe(
      '2024-01-01T00:00:00.000001Z',
    );
    expect(nextUpdatedAt('2024-01-01T00:00:01.250000Z', '2024-01-01T00:00:00.999999Z')).toBe(
      '2024-01-01T00:00:01.250001Z',
    );
  });
});

describe('decodeNoteRecord', () => {
  const record = {
    owner: 'global',
    id: 'n1',
    title: 't',
    note: 'n',
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
  };

  it('accepts a complete record', () => {
    expect(decodeNoteRecord(record)).toEqual(record);
  });

  it('rejects partial records', () => {
    const { updated_at: _dropped, ...partial } = record;
    expect(decodeNoteRecord(partial)).toBeNull();
    expect(decodeNoteRecord(undefined)).toBeNull();
  });
});
