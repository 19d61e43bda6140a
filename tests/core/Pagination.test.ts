import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { decodePageToken, encodePageToken, paginate } from '../../src/core/Pagination.js';
import { A2AError } from '../../src/errors/A2AError.js';
import type { Task } from '../../src/types/task.js';

const makeTask = (id: string, timestamp: string): Task => ({
  id,
  contextId: 'ctx',
  status: { state: 'working', timestamp },
});

describe('Pagination', () => {
  const tasks = [
    makeTask('a', '2024-01-01T00:00:01.000Z'),
    makeTask('b', '2024-01-01T00:00:03.000Z'),
    makeTask('c', '2024-01-01T00:00:02.000Z'),
    makeTask('d', '2024-01-01T00:00:03.000Z'),
  ];

  it('orders by most recent update, ties by id descending', () => {
    const page = paginate(tasks, 10);
    expect(page.tasks.map((t) => t.id)).toEqual(['d', 'b', 'c', 'a']);
    expect(page.nextPageToken).toBe('');
  });

  it('walks pages with the continuation token', () => {
    const first = paginate(tasks, 2);
    expect(first.tasks.map((t) => t.id)).toEqual(['d', 'b']);
    expect(first.nextPageToken).toBe(encodePageToken({ timestamp: '2024-01-01T00:00:03.000Z', id: 'b' }));

    const second = paginate(tasks, 2, first.nextPageToken);
    expect(second.tasks.map((t) => t.id)).toEqual(['c', 'a']);
    expect(second.nextPageToken).toBe('');
  });

  it('returns an empty token when the page is exactly the rest', () => {
    expect(paginate(tasks, 4).nextPageToken).toBe('');
  });

  it('skips tasks already returned even when new ones appear ahead', () => {
    const first = paginate(tasks, 2);
    const grown = [...tasks, makeTask('e', '2024-01-01T00:00:09.000Z')];
    const second = paginate(grown, 2, first.nextPageToken);
    expect(second.tasks.map((t) => t.id)).toEqual(['c', 'a']);
  });

  it('round-trips a cursor through a token', () => {
    const cursor = { timestamp: '2024-05-06T07:08:09.000Z', id: 'task-1' };
    expect(decodePageToken(encodePageToken(cursor))).toEqual(cursor);
  });

  it('rejects a malformed token as invalid params', () => {
    for (const token of ['not-a-token', Buffer.from('["x"]').toString('base64url'), Buffer.from('["nope","a"]').toString('base64url')]) {
      try {
        decodePageToken(token);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(A2AError);
        if (err instanceof A2AError) {
          expect(err.reason).toBe('INVALID_PARAMS');
          expect(err.data).toEqual({ field: 'pageToken' });
        }
      }
    }
  });

  it('visits every task exactly once across pages', () => {
    const arbTask = fc
      .record({
        id: fc.stringMatching(/^[a-z0-9]{1,6}$/),
        seconds: fc.integer({ min: 0, max: 20 }),
      })
      .map(({ id, seconds }) => makeTask(id, new Date(Date.UTC(2024, 0, 1, 0, 0, seconds)).toISOString()));

    fc.assert(
      fc.property(
        fc.uniqueArray(arbTask, { selector: (t) => t.id, maxLength: 30 }),
        fc.integer({ min: 1, max: 7 }),
        (all, pageSize) => {
          const seen: string[] = [];
          let token: string | undefined;
          for (;;) {
            const page = paginate(all, pageSize, token);
            expect(page.tasks.length).toBeLessThanOrEqual(pageSize);
            seen.push(...page.tasks.map((t) => t.id));
            if (page.nextPageToken === '') break;
            token = page.nextPageToken;
          }
          expect([...seen].sort()).toEqual(all.map((t) => t.id).sort());
        },
      ),
    );
  });
});
