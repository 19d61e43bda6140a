import type { Task } from '../types/task.js';
import { A2AError } from '../errors/A2AError.js';

/** Position after which the next page starts. */
export interface PageCursor {
  timestamp: string;
  id: string;
}

export interface Page {
  tasks: Task[];
  /** Empty string when no tasks remain. */
  nextPageToken: string;
}

export function encodePageToken(cursor: PageCursor): string {
  return Buffer.from(JSON.stringify([cursor.timestamp, cursor.id]), 'utf-8').toString('base64url');
}

export function decodePageToken(token: string): PageCursor {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(token, 'base64url').toString('utf-8'));
  } catch {
    throw A2AError.invalidParams('Invalid page token', 'pageToken');
  }
  if (
    !Array.isArray(decoded) ||
    decoded.length !== 2 ||
    typeof decoded[0] !== 'string' ||
    typeof decoded[1] !== 'string' ||
    Number.isNaN(Date.parse(decoded[0]))
  ) {
    throw A2AError.invalidParams('Invalid page token', 'pageToken');
  }
  return { timestamp: decoded[0], id: decoded[1] };
}

/** Most recently updated first; ties broken by id, descending. */
export function compareByUpdateDesc(a: PageCursor, b: PageCursor): number {
  const delta = Date.parse(b.timestamp) - Date.parse(a.timestamp);
  if (delta !== 0) return delta;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

function cursorOf(task: Task): PageCursor {
  return { timestamp: task.status.timestamp, id: task.id };
}

/** Order `tasks` and cut the page that follows `pageToken`. */
export function paginate(tasks: Task[], pageSize: number, pageToken?: string): Page {
  const sorted = [...tasks].sort((a, b) => compareByUpdateDesc(cursorOf(a), cursorOf(b)));

  let remaining = sorted;
  if (pageToken) {
    const cursor = decodePageToken(pageToken);
    remaining = sorted.filter((task) => compareByUpdateDesc(cursorOf(task), cursor) > 0);
  }

  const page = remaining.slice(0, pageSize);
  const last = page[page.length - 1];
  const nextPageToken =
    remaining.length > pageSize && last !== undefined ? encodePageToken(cursorOf(last)) : '';

  return { tasks: page, nextPageToken };
}
