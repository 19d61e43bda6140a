import type { TaskQuery, TaskRecord } from '../types/plugin.js';

export function matchesQuery(record: TaskRecord, query: TaskQuery): boolean {
  const { task } = record;
  if (query.contextId !== undefined && task.contextId !== query.contextId) return false;
  if (query.state !== undefined && task.status.state !== query.state) return false;
  if (
    query.updatedAfter !== undefined &&
    !(Date.parse(task.status.timestamp) > Date.parse(query.updatedAfter))
  ) {
    return false;
  }
  return true;
}
