import { randomUUID } from 'node:crypto';
import type { AgentCard } from '../types/agent-card.js';
import type { Artifact } from '../types/artifact.js';
import type { SendMessageResult, StreamResponse } from '../types/events.js';
import type { AgentExecutor } from '../types/executor.js';
import type {
  A2AOperations,
  CallContext,
  CallerIdentity,
  OperationName,
  TaskStream,
} from '../types/handler.js';
import type { Message } from '../types/message.js';
import type {
  CreateTaskPushNotificationConfigParams,
  GetTaskParams,
  ListTaskPushNotificationConfigsParams,
  ListTasksParams,
  ListTasksResult,
  SendMessageParams,
  TaskIdParams,
  TaskPushNotificationConfigParams,
} from '../types/payloads.js';
import type {
  Logger,
  Middleware,
  MiddlewareContext,
  NextFn,
  PushConfigStore,
  StoredPushNotificationConfig,
  TaskRecord,
  TaskStore,
} from '../types/plugin.js';
import type { PushNotificationConfig, TaskPushNotificationConfig } from '../types/push.js';
import type { Task, TaskState } from '../types/task.js';
import type { TransportHost, TransportPlugin } from '../types/transport.js';
import { A2AError } from '../errors/A2AError.js';
import { ANONYMOUS_CALLER, TenantScopePolicy, type ScopePolicy } from '../auth/ScopePolicy.js';
import { KeyedMutex } from '../core/KeyedMutex.js';
import { paginate } from '../core/Pagination.js';
import { isInterrupted, isTerminal, transition, type TransitionTrigger } from '../core/TaskStateMachine.js';
import { projectTask } from '../core/TaskView.js';
import { resolveServerConfig, type Env, type ServerOptions, type ServerSettings } from '../config/ServerConfig.js';
import { signAgentCard, type AgentCardSigner } from '../crypto/AgentCardSigner.js';
import { EventBroadcaster } from '../events/EventBroadcaster.js';
import { SubscriberQueue } from '../events/SubscriberQueue.js';
import { MessageValidator } from '../messaging/MessageValidator.js';
import { ParamsValidator } from '../messaging/ParamsValidator.js';
import { ExtensionNegotiator } from '../negotiation/ExtensionNegotiator.js';
import { VersionNegotiator } from '../negotiation/VersionNegotiator.js';
import { PushNotificationDispatcher, type PushDispatcherConfig } from '../push/PushNotificationDispatcher.js';
import { InMemoryPushConfigStore } from '../stores/InMemoryPushConfigStore.js';
import { InMemoryTaskStore } from '../stores/InMemoryTaskStore.js';
import { ServerTaskUpdater, type TaskChange, type TaskMutator } from './TaskUpdater.js';

export type ExtendedCardSource = AgentCard | ((caller: CallerIdentity) => AgentCard | Promise<AgentCard>);

export interface A2AServerConfig {
  card: AgentCard;
  executor: AgentExecutor;
  /** Served by getExtendedAgentCard when the card sets supportsAuthenticatedExtendedCard. */
  extendedCard?: ExtendedCardSource;
  taskStore?: TaskStore;
  pushConfigStore?: PushConfigStore;
  scopePolicy?: ScopePolicy;
  signers?: AgentCardSigner[];
  settings?: ServerOptions;
  /** Environment consulted for `A2A_*` settings (default: process.env). */
  env?: Env;
  /** Delivery plumbing for webhooks; retry limits come from `settings.push`. */
  push?: Pick<PushDispatcherConfig, 'fetch' | 'resolveHost' | 'sleep' | 'allowPrivateNetworks'>;
  logger?: Logger;
  clock?: () => Date;
}

interface Execution {
  controller: AbortController;
  done: Promise<void>;
}

interface Prepared {
  caller: CallerIdentity;
  extensions: string[];
}

type Routed =
  | { kind: 'message'; message: Message }
  | { kind: 'task'; task: Task; stream?: SubscriberQueue; execution?: Promise<void> };

const AUTO_START: ReadonlySet<TransitionTrigger> = new Set<TransitionTrigger>([
  'complete',
  'requireInput',
  'requireAuth',
]);

function modesOverlap(accepted: string[], offered: string[]): boolean {
  if (accepted.includes('*/*') || offered.includes('*/*')) return true;
  return accepted.some((mode) => offered.includes(mode));
}

/** A `Last-Event-ID` we issued is a plain event log position. */
function resumePosition(lastEventId: string | undefined): number | undefined {
  return lastEventId !== undefined && /^\d+$/.test(lastEventId) ? Number(lastEventId) : undefined;
}

/**
 * The A2A task engine. Implements every operation once; transports and
 * bindings only translate wire formats to these calls.
 */
export class A2AServer implements A2AOperations, TaskMutator {
  readonly card: AgentCard;
  readonly settings: ServerSettings;

  private readonly executor: AgentExecutor;
  private readonly tasks: TaskStore;
  private readonly pushConfigs: PushConfigStore;
  private readonly scope: ScopePolicy;
  private readonly extendedCardSource?: ExtendedCardSource;
  private readonly signers: AgentCardSigner[];
  private readonly signedCard: AgentCard;
  private readonly logger?: Logger;
  private readonly clock: () => Date;

  private readonly locks = new KeyedMutex();
  private readonly broadcaster: EventBroadcaster;
  private readonly dispatcher: PushNotificationDispatcher;
  private readonly versions: VersionNegotiator;
  private readonly extensions: ExtensionNegotiator;
  private readonly transports: TransportPlugin[] = [];
  private readonly middlewares: Middleware[] = [];
  private readonly executions = new Map<string, Execution>();

  constructor(config: A2AServerConfig) {
    this.card = config.card;
    this.executor = config.executor;
    this.settings = resolveServerConfig(config.settings, config.env);
    this.tasks = config.taskStore ?? new InMemoryTaskStore();
    this.pushConfigs = config.pushConfigStore ?? new InMemoryPushConfigStore();
    this.scope = config.scopePolicy ?? new TenantScopePolicy();
    this.extendedCardSource = config.extendedCard;
    this.signers = config.signers ?? [];
    this.signedCard = signAgentCard(config.card, this.signers);
    this.logger = config.logger;
    this.clock = config.clock ?? (() => new Date());

    this.versions = new VersionNegotiator(config.card.protocolVersion, config.card.supportedVersions);
    this.extensions = new ExtensionNegotiator(config.card.capabilities.extensions);
    this.broadcaster = new EventBroadcaster({
      eventLogLimit: this.settings.eventLogLimit,
      subscriberQueueLimit: this.settings.subscriberQueueLimit,
      logger: this.logger,
    });
    this.dispatcher = new PushNotificationDispatcher(this.pushConfigs, {
      ...config.push,
      ...this.settings.push,
      logger: this.logger,
    });
    if (this.card.capabilities.pushNotifications) {
      this.broadcaster.addListener((taskId, event) => this.dispatcher.enqueue(taskId, event));
    }
  }

  // --- Registration ---

  /** Add a transport plugin. */
  transport(plugin: TransportPlugin): this {
    this.transports.push(plugin);
    return this;
  }

  /** Add a middleware. Middleware runs before negotiation, in registration order. */
  use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  /** The public card, with signatures when signers are configured. */
  agentCard(): AgentCard {
    return structuredClone(this.signedCard);
  }

  /** Start listening on all transports. */
  async start(): Promise<void> {
    const host: TransportHost = { operations: this, agentCard: () => this.agentCard() };
    for (const tp of this.transports) {
      await tp.listen(host);
    }
  }

  /** Stop all transports, then wait for running executions and pending webhooks. */
  async stop(): Promise<void> {
    for (const tp of this.transports) {
      await tp.close();
    }
    await Promise.all([...this.executions.values()].map((execution) => execution.done));
    await this.dispatcher.drain();
    this.broadcaster.closeAll();
  }

  // --- Operations ---

  async sendMessage(params: SendMessageParams, call?: CallContext): Promise<SendMessageResult> {
    const prepared = await this.prepare('sendMessage', params, call);
    const request = ParamsValidator.sendMessage(params);
    const blocking = request.configuration?.blocking ?? false;
    const routed = await this.route(request, prepared, blocking);
    if (routed.kind === 'message') return { message: routed.message };

    const historyLength = request.configuration?.historyLength;
    if (!blocking || !routed.stream) {
      return { task: projectTask(routed.task, { historyLength }) };
    }

    await this.waitForTurnEnd(routed.stream, routed.execution);
    const record = await this.tasks.get(routed.task.id);
    return { task: projectTask(record?.task ?? routed.task, { historyLength }) };
  }

  async sendStreamingMessage(params: SendMessageParams, call?: CallContext): Promise<TaskStream> {
    const prepared = await this.prepare('sendStreamingMessage', params, call);
    this.requireStreaming();
    const request = ParamsValidator.sendMessage(params);
    const routed = await this.route(request, prepared, true);
    if (routed.kind === 'message') {
      const single = new SubscriberQueue('', 1, () => undefined, false);
      single.push({ message: routed.message });
      single.end();
      return single;
    }
    if (!routed.stream) throw A2AError.internal('Stream was not opened');
    return routed.stream;
  }

  async getTask(params: GetTaskParams, call?: CallContext): Promise<Task> {
    const prepared = await this.prepare('getTask', params, call);
    const request = ParamsValidator.getTask(params);
    const record = await this.loadVisible(request.id, prepared.caller);
    return projectTask(record.task, { historyLength: request.historyLength });
  }

  async listTasks(params: ListTasksParams, call?: CallContext): Promise<ListTasksResult> {
    const prepared = await this.prepare('listTasks', params, call);
    const request = ParamsValidator.listTasks(params);
    const pageSize = MessageValidator.pageSize(
      request.pageSize,
      this.settings.defaultPageSize,
      this.settings.maxPageSize,
    );

    const records = await this.tasks.list({
      contextId: request.contextId,
      state: request.status,
      updatedAfter: request.statusTimestampAfter,
    });
    const visible = records
      .filter((record) => this.scope.canAccess(prepared.caller, record.owner))
      .map((record) => record.task);
    const page = paginate(visible, pageSize, request.pageToken);

    return {
      tasks: page.tasks.map((task) =>
        projectTask(task, {
          historyLength: request.historyLength,
          includeArtifacts: request.includeArtifacts ?? false,
        }),
      ),
      nextPageToken: page.nextPageToken,
      pageSize,
      totalSize: visible.length,
    };
  }

  async cancelTask(params: TaskIdParams, call?: CallContext): Promise<Task> {
    const prepared = await this.prepare('cancelTask', params, call);
    const { id } = ParamsValidator.taskId(params);

    const { task, changed } = await this.locks.run(id, async () => {
      const record = await this.loadVisible(id, prepared.caller);
      if (record.task.status.state === 'canceled') {
        return { task: record.task, changed: false };
      }
      const state = transition(id, record.task.status.state, 'cancel');
      const next = this.withStatus(record.task, state);
      await this.commit(record, next, [this.statusEvent(next)]);
      return { task: next, changed: true };
    });

    if (changed) {
      this.executions.get(id)?.controller.abort();
      await this.notifyExecutorCancel(id);
    }
    return projectTask(task);
  }

  async subscribeToTask(params: TaskIdParams, call?: CallContext): Promise<TaskStream> {
    const prepared = await this.prepare('subscribeToTask', params, call);
    this.requireStreaming();
    const { id } = ParamsValidator.taskId(params);

    return this.locks.run(id, async () => {
      const record = await this.loadVisible(id, prepared.caller);
      if (isTerminal(record.task.status.state)) {
        throw A2AError.terminalTask(id, record.task.status.state);
      }
      return this.broadcaster.subscribe(projectTask(record.task), {
        closeOnInterrupt: false,
        afterSeq: resumePosition(call?.lastEventId),
      });
    });
  }

  async createTaskPushNotificationConfig(
    params: CreateTaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig> {
    const prepared = await this.prepare('createTaskPushNotificationConfig', params, call);
    this.requirePush();
    const request = ParamsValidator.createPushConfig(params);
    await this.loadVisible(request.taskId, prepared.caller);
    const stored = await this.registerPushConfig(request.taskId, request.pushNotificationConfig);
    return { taskId: request.taskId, pushNotificationConfig: stored };
  }

  async getTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig> {
    const prepared = await this.prepare('getTaskPushNotificationConfig', params, call);
    this.requirePush();
    const request = ParamsValidator.pushConfig(params);
    await this.loadVisible(request.taskId, prepared.caller);
    const config = await this.pushConfigs.get(request.taskId, request.pushNotificationConfigId);
    if (!config) {
      throw A2AError.invalidParams('Push notification config not found', 'pushNotificationConfigId');
    }
    return { taskId: request.taskId, pushNotificationConfig: config };
  }

  async listTaskPushNotificationConfigs(
    params: ListTaskPushNotificationConfigsParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig[]> {
    const prepared = await this.prepare('listTaskPushNotificationConfigs', params, call);
    this.requirePush();
    const { taskId } = ParamsValidator.listPushConfigs(params);
    await this.loadVisible(taskId, prepared.caller);
    const configs = await this.pushConfigs.list(taskId);
    return configs.map((config) => ({ taskId, pushNotificationConfig: config }));
  }

  async deleteTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<void> {
    const prepared = await this.prepare('deleteTaskPushNotificationConfig', params, call);
    this.requirePush();
    const request = ParamsValidator.pushConfig(params);
    await this.loadVisible(request.taskId, prepared.caller);
    await this.pushConfigs.delete(request.taskId, request.pushNotificationConfigId);
    this.dispatcher.forget(request.taskId, request.pushNotificationConfigId);
  }

  async getExtendedAgentCard(call?: CallContext): Promise<AgentCard> {
    const prepared = await this.prepare('getExtendedAgentCard', {}, call);
    const source = this.extendedCardSource;
    if (!this.card.supportsAuthenticatedExtendedCard || source === undefined) {
      throw A2AError.extendedAgentCardNotConfigured();
    }
    const card = typeof source === 'function' ? await source(prepared.caller) : source;
    return signAgentCard(structuredClone(card), this.signers);
  }

  // --- Administration ---

  /**
   * Remove a terminal task with its webhook configs and event log.
   * @throws A2AError TASK_NOT_FOUND, or UNSUPPORTED_OPERATION for a live task.
   */
  async purgeTask(taskId: string): Promise<void> {
    await this.locks.run(taskId, async () => {
      const record = await this.tasks.get(taskId);
      if (!record) throw A2AError.taskNotFound(taskId);
      if (!isTerminal(record.task.status.state)) {
        throw A2AError.unsupportedOperation('Only terminal tasks can be purged', {
          taskId,
          state: record.task.status.state,
        });
      }
      await this.tasks.delete(taskId);
      await this.pushConfigs.deleteAll(taskId);
      this.dispatcher.forget(taskId);
      this.broadcaster.purge(taskId);
    });
  }

  /** Wait until queued webhook deliveries have finished. */
  drainNotifications(): Promise<void> {
    return this.dispatcher.drain();
  }

  // --- Executor side ---

  /** Apply an executor's update under the task lock. */
  async applyChange(taskId: string, change: TaskChange): Promise<void> {
    await this.locks.run(taskId, async () => {
      const record = await this.tasks.get(taskId);
      if (!record) throw A2AError.taskNotFound(taskId);
      const current = record.task;
      const state = current.status.state;
      if (isTerminal(state)) throw A2AError.terminalTask(taskId, state);

      const events: StreamResponse[] = [];
      let next = current;

      if (change.kind === 'history') {
        next = this.withHistory(current, change.message);
      } else if (change.kind === 'artifact') {
        if (state === 'submitted') {
          next = this.withStatus(next, 'working');
          events.push(this.statusEvent(next));
        }
        const artifact = structuredClone(MessageValidator.validateArtifact(change.artifact));
        next = this.withArtifact(next, artifact, change.append);
        events.push({
          artifactUpdate: {
            taskId,
            contextId: current.contextId,
            artifact: structuredClone(artifact),
            ...(change.append && { append: true }),
            ...(change.lastChunk !== undefined && { lastChunk: change.lastChunk }),
          },
        });
      } else if (change.trigger === 'start' && state === 'working') {
        if (!change.message) return;
        next = this.withStatus(current, 'working', change.message);
        events.push(this.statusEvent(next));
      } else {
        if (AUTO_START.has(change.trigger) && state === 'submitted') {
          next = this.withStatus(next, 'working');
          events.push(this.statusEvent(next));
        }
        const target = transition(taskId, next.status.state, change.trigger);
        next = this.withStatus(next, target, change.message);
        events.push(this.statusEvent(next));
      }

      await this.commit(record, next, events);
    });
  }

  // --- Internals ---

  private async prepare(operation: OperationName, params: unknown, call?: CallContext): Promise<Prepared> {
    const context = call ?? {};
    await this.runMiddleware({ operation, params, call: context });
    this.versions.negotiate(context.version);
    const activated = this.extensions.negotiate(context.extensions);
    context.activatedExtensions = activated;
    return { caller: context.caller ?? ANONYMOUS_CALLER, extensions: activated };
  }

  private async runMiddleware(ctx: MiddlewareContext): Promise<void> {
    const stack = [...this.middlewares];
    let index = 0;

    const next: NextFn = async () => {
      if (index < stack.length) {
        const mw = stack[index++];
        await mw.handle(ctx, next);
      }
    };

    await next();
  }

  private requireStreaming(): void {
    if (!this.card.capabilities.streaming) {
      throw A2AError.unsupportedOperation('Streaming is not supported by this agent');
    }
  }

  private requirePush(): void {
    if (!this.card.capabilities.pushNotifications) {
      throw A2AError.pushNotificationNotSupported();
    }
  }

  /** Missing and out-of-scope tasks are reported identically. */
  private async loadVisible(taskId: string, caller: CallerIdentity): Promise<TaskRecord> {
    const record = await this.tasks.get(taskId);
    if (!record || !this.scope.canAccess(caller, record.owner)) {
      throw A2AError.taskNotFound(taskId);
    }
    return record;
  }

  private async registerPushConfig(
    taskId: string,
    config: PushNotificationConfig,
  ): Promise<StoredPushNotificationConfig> {
    const rejected = this.dispatcher.rejectUrl(config.url);
    if (rejected !== undefined) {
      throw A2AError.invalidParams(`Webhook URL rejected: ${rejected}`, 'pushNotificationConfig.url');
    }
    const stored: StoredPushNotificationConfig = { ...structuredClone(config), id: config.id ?? randomUUID() };
    await this.pushConfigs.set(taskId, stored);
    return structuredClone(stored);
  }

  /**
   * Validate, then create or continue a task. Everything that can be refused
   * is checked before the first write.
   */
  private async route(request: SendMessageParams, prepared: Prepared, openStream: boolean): Promise<Routed> {
    const { message, configuration } = request;

    if (configuration?.acceptedOutputModes && configuration.acceptedOutputModes.length > 0) {
      if (!modesOverlap(configuration.acceptedOutputModes, this.card.defaultOutputModes)) {
        throw A2AError.contentTypeNotSupported(configuration.acceptedOutputModes, this.card.defaultOutputModes);
      }
    }
    if (configuration?.pushNotificationConfig) {
      this.requirePush();
      const rejected = this.dispatcher.rejectUrl(configuration.pushNotificationConfig.url);
      if (rejected !== undefined) {
        throw A2AError.invalidParams(
          `Webhook URL rejected: ${rejected}`,
          'configuration.pushNotificationConfig.url',
        );
      }
    }
    for (const referenced of message.referenceTaskIds ?? []) {
      await this.loadVisible(referenced, prepared.caller);
    }

    if (message.taskId !== undefined) {
      return this.continueTask(message.taskId, request, prepared, openStream);
    }

    if (this.executor.respond) {
      const reply = await this.executor.respond(structuredClone(message), {
        caller: prepared.caller,
        extensions: prepared.extensions,
      });
      if (reply !== undefined) return { kind: 'message', message: reply };
    }
    return this.createTask(request, prepared, openStream);
  }

  private async createTask(request: SendMessageParams, prepared: Prepared, openStream: boolean): Promise<Routed> {
    const id = randomUUID();
    const contextId = request.message.contextId ?? randomUUID();
    const message: Message = { ...structuredClone(request.message), taskId: id, contextId };
    const task: Task = {
      id,
      contextId,
      status: { state: 'submitted', timestamp: this.now() },
      history: this.trimHistory([message]),
      ...(request.metadata && { metadata: structuredClone(request.metadata) }),
    };
    const record: TaskRecord = { task, owner: this.scope.ownerFor(prepared.caller) };

    const stream = await this.locks.run(id, async () => {
      await this.tasks.set(id, record);
      return openStream ? this.broadcaster.subscribe(projectTask(task), { closeOnInterrupt: true }) : undefined;
    });

    const pushConfig = request.configuration?.pushNotificationConfig;
    if (pushConfig) await this.registerPushConfig(id, pushConfig);

    const execution = this.dispatch(task, message, prepared);
    return { kind: 'task', task, stream, execution };
  }

  private async continueTask(
    taskId: string,
    request: SendMessageParams,
    prepared: Prepared,
    openStream: boolean,
  ): Promise<Routed> {
    const pushConfig = request.configuration?.pushNotificationConfig;

    const result = await this.locks.run(taskId, async () => {
      const record = await this.loadVisible(taskId, prepared.caller);
      const current = record.task;
      if (request.message.contextId !== undefined && request.message.contextId !== current.contextId) {
        throw A2AError.invalidParams(
          `contextId ${request.message.contextId} does not match task ${taskId}`,
          'contextId',
        );
      }
      const state = current.status.state;
      if (isTerminal(state)) throw A2AError.terminalTask(taskId, state);

      const message: Message = { ...structuredClone(request.message), taskId, contextId: current.contextId };
      const events: StreamResponse[] = [];
      let next = this.withHistory(current, message);
      if (isInterrupted(state)) {
        next = this.withStatus(next, transition(taskId, state, 'message'));
        events.push(this.statusEvent(next));
      }
      await this.commit(record, next, events);

      const stream = openStream ? this.broadcaster.subscribe(projectTask(next), { closeOnInterrupt: true }) : undefined;
      return { task: next, message, stream, resumed: isInterrupted(state) };
    });

    if (pushConfig) await this.registerPushConfig(taskId, pushConfig);

    const running = this.executions.get(taskId);
    const execution =
      running && !result.resumed ? running.done : this.dispatch(result.task, result.message, prepared);
    return { kind: 'task', task: result.task, stream: result.stream, execution };
  }

  /** Run the executor in the background; its failures fail the task. */
  private dispatch(task: Task, message: Message, prepared: Prepared): Promise<void> {
    const controller = new AbortController();
    const updater = new ServerTaskUpdater(this, task.id, task.contextId);
    const previous = this.executions.get(task.id);

    const done = (async () => {
      if (previous) await previous.done;
      try {
        await this.executor.execute(
          {
            task: projectTask(task),
            message: structuredClone(message),
            caller: prepared.caller,
            extensions: prepared.extensions,
            signal: controller.signal,
          },
          updater,
        );
      } catch (err) {
        await this.failFromError(task.id, err);
      }
    })();

    const execution: Execution = { controller, done };
    this.executions.set(task.id, execution);
    void done.finally(() => {
      if (this.executions.get(task.id) === execution) this.executions.delete(task.id);
    });
    return done;
  }

  private async failFromError(taskId: string, err: unknown): Promise<void> {
    const error = A2AError.from(err);
    try {
      await this.locks.run(taskId, async () => {
        const record = await this.tasks.get(taskId);
        if (!record || isTerminal(record.task.status.state)) {
          this.logger?.('warn', 'Executor error after task ended', { taskId, error: error.message });
          return;
        }
        this.logger?.('error', 'Executor failed', { taskId, error: error.message });
        const reason: Message = {
          messageId: randomUUID(),
          role: 'agent',
          parts: [{ text: error.message }],
          taskId,
          contextId: record.task.contextId,
        };
        const next = this.withStatus(record.task, 'failed', reason);
        await this.commit(record, next, [this.statusEvent(next)]);
      });
    } catch (storeErr) {
      this.logger?.('error', 'Could not record executor failure', { taskId, error: storeErr });
    }
  }

  private async notifyExecutorCancel(taskId: string): Promise<void> {
    if (!this.executor.cancel) return;
    try {
      await this.executor.cancel(taskId);
    } catch (err) {
      this.logger?.('warn', 'Executor cancel hook failed', { taskId, error: err });
    }
  }

  /** Resolve once the stream has ended (terminal or interrupted) or the execution returned. */
  private async waitForTurnEnd(stream: SubscriberQueue, execution?: Promise<void>): Promise<void> {
    const ended = (async () => {
      for await (const event of stream) {
        this.logger?.('debug', 'Blocking send observed event', { kind: Object.keys(event)[0] });
      }
    })().catch((err: unknown) => {
      this.logger?.('warn', 'Blocking send lost its stream', { error: err });
      return execution;
    });
    try {
      await Promise.race(execution ? [ended, execution] : [ended]);
    } finally {
      stream.close();
    }
  }

  private async commit(record: TaskRecord, task: Task, events: StreamResponse[]): Promise<void> {
    await this.tasks.set(task.id, { task, owner: record.owner });
    for (const event of events) {
      this.broadcaster.publish(task.id, event);
    }
  }

  private statusEvent(task: Task): StreamResponse {
    const state = task.status.state;
    return {
      statusUpdate: {
        taskId: task.id,
        contextId: task.contextId,
        status: structuredClone(task.status),
        final: isTerminal(state) || isInterrupted(state),
      },
    };
  }

  /** New status; an agent status message is also recorded in history. */
  private withStatus(task: Task, state: TaskState, message?: Message): Task {
    const next: Task = {
      ...task,
      status: { state, timestamp: this.now(), ...(message && { message }) },
    };
    return message ? this.withHistory(next, message) : next;
  }

  private withHistory(task: Task, message: Message): Task {
    return { ...task, history: this.trimHistory([...(task.history ?? []), message]) };
  }

  private withArtifact(task: Task, artifact: Artifact, append: boolean): Task {
    const artifacts = [...(task.artifacts ?? [])];
    const index = artifacts.findIndex((existing) => existing.artifactId === artifact.artifactId);
    if (index === -1) {
      artifacts.push(artifact);
    } else if (!append) {
      throw A2AError.invalidAgentResponse(`Artifact ${artifact.artifactId} already exists; set append`, {
        taskId: task.id,
        artifactId: artifact.artifactId,
      });
    } else {
      const existing = artifacts[index];
      artifacts[index] = { ...existing, parts: [...existing.parts, ...artifact.parts] };
    }
    return { ...task, artifacts };
  }

  private trimHistory(history: Message[]): Message[] {
    const limit = this.settings.maxHistoryLength;
    return limit !== undefined && history.length > limit ? history.slice(-limit) : history;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
