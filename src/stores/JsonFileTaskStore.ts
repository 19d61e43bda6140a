import { mkdir, readFile, readdir, rm, writeFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { TaskQuery, TaskRecord, TaskStore } from '../types/plugin.js';
import { KeyedMutex } from '../core/KeyedMutex.js';
import { matchesQuery } from './query.js';

const SAFE_ID = /^[A-Za-z0-9_.-]+$/;

/**
 * File-backed task store: one JSON document per task under `directory`.
 * Writes go through a temp file and a rename so readers never see half a file.
 */
export class JsonFileTaskStore implements TaskStore {
  private readonly directory: string;
  private readonly writes = new KeyedMutex();
  private ready: Promise<void> | null = null;

  constructor(directory: string) {
    this.directory = directory;
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    await this.ensureDirectory();
    return this.read(this.pathFor(taskId));
  }

  async set(taskId: string, record: TaskRecord): Promise<void> {
    await this.ensureDirectory();
    const path = this.pathFor(taskId);
    await this.writes.run(taskId, async () => {
      const temp = `${path}.tmp`;
      await writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
      await rename(temp, path);
    });
  }

  async delete(taskId: string): Promise<void> {
    await this.ensureDirectory();
    const path = this.pathFor(taskId);
    await this.writes.run(taskId, () => rm(path, { force: true }));
  }

  async list(query: TaskQuery): Promise<TaskRecord[]> {
    await this.ensureDirectory();
    const entries = await readdir(this.directory);
    const records: TaskRecord[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const record = await this.read(join(this.directory, entry));
      if (record && matchesQuery(record, query)) records.push(record);
    }
    return records;
  }

  private pathFor(taskId: string): string {
    if (!SAFE_ID.test(taskId)) {
      throw new Error(`Task id is not safe to use as a file name: ${taskId}`);
    }
    return join(this.directory, `${taskId}.json`);
  }

  private async read(path: string): Promise<TaskRecord | undefined> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isTaskRecord(parsed)) {
      throw new Error(`Corrupt task record at ${path}`);
    }
    return parsed;
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function isTaskRecord(value: unknown): value is TaskRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('task' in value) || !('owner' in value)) return false;
  const { task, owner } = value;
  return (
    typeof task === 'object' &&
    task !== null &&
    'id' in task &&
    typeof task.id === 'string' &&
    'status' in task &&
    typeof owner === 'object' &&
    owner !== null &&
    'tenant' in owner &&
    typeof owner.tenant === 'string'
  );
}
