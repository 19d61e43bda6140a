import type { TaskQuery, TaskRecord, TaskStore } from '../types/plugin.js';
import { matchesQuery } from './query.js';

/** In-memory task store backed by a Map, with a contextId index. */
export class InMemoryTaskStore implements TaskStore {
  private readonly records = new Map<string, TaskRecord>();
  private readonly byContext = new Map<string, Set<string>>();

  async get(taskId: string): Promise<TaskRecord | undefined> {
    return this.records.get(taskId);
  }

  async set(taskId: string, record: TaskRecord): Promise<void> {
    const previous = this.records.get(taskId);
    if (previous && previous.task.contextId !== record.task.contextId) {
      this.unindex(previous.task.contextId, taskId);
    }
    this.records.set(taskId, record);

    let ids = this.byContext.get(record.task.contextId);
    if (!ids) {
      ids = new Set();
      this.byContext.set(record.task.contextId, ids);
    }
    ids.add(taskId);
  }

  async delete(taskId: string): Promise<void> {
    const previous = this.records.get(taskId);
    if (!previous) return;
    this.records.delete(taskId);
    this.unindex(previous.task.contextId, taskId);
  }

  async list(query: TaskQuery): Promise<TaskRecord[]> {
    const candidates =
      query.contextId !== undefined
        ? [...(this.byContext.get(query.contextId) ?? [])].flatMap((id) => {
            const record = this.records.get(id);
            return record ? [record] : [];
          })
        : [...this.records.values()];
    return candidates.filter((record) => matchesQuery(record, query));
  }

  /** Task ids sharing a context, in insertion order. */
  contextTaskIds(contextId: string): string[] {
    return [...(this.byContext.get(contextId) ?? [])];
  }

  /** Returns the number of tasks currently stored. */
  get size(): number {
    return this.records.size;
  }

  /** Remove all tasks. */
  clear(): void {
    this.records.clear();
    this.byContext.clear();
  }

  private unindex(contextId: string, taskId: string): void {
    const ids = this.byContext.get(contextId);
    if (!ids) return;
    ids.delete(taskId);
    if (ids.size === 0) this.byContext.delete(contextId);
  }
}
