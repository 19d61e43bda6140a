import type { PushConfigStore, StoredPushNotificationConfig } from '../types/plugin.js';

/** In-memory push config store: task id → config id → config. Configs are copied in and out. */
export class InMemoryPushConfigStore implements PushConfigStore {
  private readonly configs = new Map<string, Map<string, StoredPushNotificationConfig>>();

  async get(taskId: string, configId: string): Promise<StoredPushNotificationConfig | undefined> {
    const config = this.configs.get(taskId)?.get(configId);
    return config && structuredClone(config);
  }

  async set(taskId: string, config: StoredPushNotificationConfig): Promise<void> {
    let forTask = this.configs.get(taskId);
    if (!forTask) {
      forTask = new Map();
      this.configs.set(taskId, forTask);
    }
    forTask.set(config.id, structuredClone(config));
  }

  async list(taskId: string): Promise<StoredPushNotificationConfig[]> {
    return [...(this.configs.get(taskId)?.values() ?? [])].map((config) => structuredClone(config));
  }

  async delete(taskId: string, configId: string): Promise<void> {
    const forTask = this.configs.get(taskId);
    if (!forTask) return;
    forTask.delete(configId);
    if (forTask.size === 0) this.configs.delete(taskId);
  }

  async deleteAll(taskId: string): Promise<void> {
    this.configs.delete(taskId);
  }

  /** Number of tasks with at least one config. */
  get size(): number {
    return this.configs.size;
  }
}
