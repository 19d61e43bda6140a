export { A2AClient, errorFromJsonRpc } from './A2AClient.js';
export type { A2AClientConfig, DiscoverOptions } from './A2AClient.js';

export { TaskObserver, extractText, extractQuestion, cardToPrompt } from './TaskObserver.js';
export type { ObserveStatus, ObserveResult, ObserveOptions, TaskObserverConfig } from './TaskObserver.js';

export {
  isTask,
  isMessage,
  isSendMessageResult,
  isStreamResponse,
  isListTasksResult,
  isTaskPushNotificationConfig,
  isAgentCard,
} from './guards.js';
