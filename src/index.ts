// Server core
export { A2AServer } from './agent/A2AServer.js';
export type { A2AServerConfig, ExtendedCardSource } from './agent/A2AServer.js';
export { AgentCardBuilder } from './agent/AgentCardBuilder.js';

// Task lifecycle
export {
  TERMINAL_STATES,
  INTERRUPTED_STATES,
  isTerminal,
  isInterrupted,
  nextState,
  canTransition,
  transition,
} from './core/TaskStateMachine.js';
export type { TransitionTrigger } from './core/TaskStateMachine.js';
export { projectTask } from './core/TaskView.js';
export type { TaskViewOptions } from './core/TaskView.js';
export { encodePageToken, decodePageToken, paginate } from './core/Pagination.js';
export type { PageCursor, Page } from './core/Pagination.js';

// Events
export { EventBroadcaster } from './events/EventBroadcaster.js';
export type { EventBroadcasterConfig, SubscribeOptions, LoggedEvent, EventListener } from './events/EventBroadcaster.js';
export { SubscriberOverflowError } from './events/SubscriberQueue.js';

// Push notifications
export { PushNotificationDispatcher, NOTIFICATION_TOKEN_HEADER } from './push/PushNotificationDispatcher.js';
export type { PushDispatcherConfig, FetchLike, DeliveryState } from './push/PushNotificationDispatcher.js';
export { checkWebhookUrl, checkResolvedUrl, isBlockedAddress, dnsResolver } from './push/UrlGuard.js';
export type { HostResolver, UrlCheck } from './push/UrlGuard.js';

// Scoping and negotiation
export { TenantScopePolicy, ANONYMOUS_CALLER, TENANT_ADMIN_ROLE } from './auth/ScopePolicy.js';
export type { ScopePolicy } from './auth/ScopePolicy.js';
export { VersionNegotiator } from './negotiation/VersionNegotiator.js';
export { ExtensionNegotiator, parseExtensionHeader } from './negotiation/ExtensionNegotiator.js';

// Stores
export { InMemoryTaskStore } from './stores/InMemoryTaskStore.js';
export { JsonFileTaskStore } from './stores/JsonFileTaskStore.js';
export { InMemoryPushConfigStore } from './stores/InMemoryPushConfigStore.js';

// Errors
export { A2AError } from './errors/A2AError.js';
export { bindingCodes, reasonForJsonRpcCode } from './errors/bindings.js';
export type { BindingCodes, GrpcStatus } from './errors/bindings.js';

// Messaging
export { MessageBuilder, textMessage, MessageValidator, ParamsValidator } from './messaging/index.js';
export type { ValidationProblem } from './messaging/index.js';

// Agent card signing
export { Canonicalizer, SchnorrCardSigner, SCHNORR_ALG, signAgentCard } from './crypto/index.js';
export type { AgentCardSigner, SignatureHeader } from './crypto/index.js';

// Configuration
export {
  resolveServerConfig,
  parseServerConfig,
  loadServerConfig,
  expandEnvVars,
  DEFAULT_SETTINGS,
  ServerSettingsSchema,
  PushSettingsSchema,
} from './config/ServerConfig.js';
export type { ServerSettings, ServerOptions, PushSettings, Env } from './config/ServerConfig.js';
export { ClientConfigRegistry, ClientConfigSchema, parseClientConfigs, loadClientConfigs } from './config/ClientConfig.js';
export type { NamedClientConfig } from './config/ClientConfig.js';

// Bindings and transports
export { JsonRpcBinding, JSON_RPC_METHODS, STREAMING_METHODS } from './bindings/JsonRpcBinding.js';
export type { JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonRpcOutcome } from './bindings/JsonRpcBinding.js';
export { RestBinding } from './bindings/RestBinding.js';
export type { RestRequest, RestOutcome } from './bindings/RestBinding.js';
export * from './transport/index.js';

// Client
export * from './client/index.js';

// Types
export * from './types/index.js';
