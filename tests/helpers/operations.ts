import { A2AError } from '../../src/errors/A2AError.js';
import type { StreamResponse } from '../../src/types/events.js';
import type { A2AOperations, TaskStream } from '../../src/types/handler.js';
import type { Task } from '../../src/types/task.js';

const notStubbed = (name: string) => () => Promise.reject(A2AError.unsupportedOperation(`${name} not stubbed`));

/** Operations that refuse everything except what the test overrides. */
export function stubOperations(overrides: Partial<A2AOperations> = {}): A2AOperations {
  return {
    sendMessage: notStubbed('sendMessage'),
    sendStreamingMessage: notStubbed('sendStreamingMessage'),
    getTask: notStubbed('getTask'),
    listTasks: notStubbed('listTasks'),
    cancelTask: notStubbed('cancelTask'),
    subscribeToTask: notStubbed('subscribeToTask'),
    createTaskPushNotificationConfig: notStubbed('createTaskPushNotificationConfig'),
    getTaskPushNotificationConfig: notStubbed('getTaskPushNotificationConfig'),
    listTaskPushNotificationConfigs: notStubbed('listTaskPushNotificationConfigs'),
    deleteTaskPushNotificationConfig: notStubbed('deleteTaskPushNotificationConfig'),
    getExtendedAgentCard: notStubbed('getExtendedAgentCard'),
    ...overrides,
  };
}

/** A finished stream replaying fixed events. */
export function fixedStream(events: StreamResponse[]): TaskStream {
  return {
    close: () => {},
    async *[Symbol.asyncIterator]() {
      yield* events;
    },
  };
}

export function sampleTask(id = 't1', state: Task['status']['state'] = 'working'): Task {
  return { id, contextId: 'c1', status: { state, timestamp: '2024-01-01T00:00:00.000Z' } };
}

export async function collect(stream: AsyncIterable<StreamResponse>): Promise<StreamResponse[]> {
  const events: StreamResponse[] = [];
  for await (const event of stream) events.push(event);
  return events;
}
