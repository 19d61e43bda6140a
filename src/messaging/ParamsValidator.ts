import { A2AError } from '../errors/A2AError.js';
import type {
  CreateTaskPushNotificationConfigParams,
  GetTaskParams,
  ListTaskPushNotificationConfigsParams,
  ListTasksParams,
  SendMessageConfiguration,
  SendMessageParams,
  TaskIdParams,
  TaskPushNotificationConfigParams,
} from '../types/payloads.js';
import type { PushNotificationConfig } from '../types/push.js';
import { MessageValidator } from './MessageValidator.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) throw A2AError.invalidParams(`${field} must be an object`, field);
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw A2AError.invalidParams(`${field} must be a string`, field);
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw A2AError.invalidParams(`${field} must be a boolean`, field);
  return value;
}

function optionalStrings(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw A2AError.invalidParams(`${field} must be an array of strings`, field);
  }
  return value;
}

function optionalMetadata(value: unknown, field: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) return undefined;
  return record(value, field);
}

function optionalInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw A2AError.invalidParams(`${field} must be an integer`, field);
  }
  return value;
}

/**
 * Shape checks for operation params. Each parser accepts anything a binding
 * decoded and returns a typed copy, or throws INVALID_PARAMS naming the field.
 */
export class ParamsValidator {
  static pushNotificationConfig(raw: unknown, field = 'pushNotificationConfig'): PushNotificationConfig {
    const source = record(raw, field);
    const url = source.url;
    if (typeof url !== 'string' || url.length === 0) {
      throw A2AError.invalidParams('url is required', `${field}.url`);
    }
    const config: PushNotificationConfig = { url };
    const id = optionalString(source.id, `${field}.id`);
    if (id !== undefined && id.length > 0) config.id = id;
    const token = optionalString(source.token, `${field}.token`);
    if (token !== undefined) config.token = token;
    if (source.authentication !== undefined && source.authentication !== null) {
      const auth = record(source.authentication, `${field}.authentication`);
      const schemes = optionalStrings(auth.schemes, `${field}.authentication.schemes`) ?? [];
      const credentials = optionalString(auth.credentials, `${field}.authentication.credentials`);
      config.authentication = credentials === undefined ? { schemes } : { schemes, credentials };
    }
    return config;
  }

  static sendMessage(raw: unknown): SendMessageParams {
    const source = record(raw, 'params');
    const params: SendMessageParams = { message: MessageValidator.validate(source.message) };

    if (source.configuration !== undefined && source.configuration !== null) {
      const cfg = record(source.configuration, 'configuration');
      const configuration: SendMessageConfiguration = {};
      const modes = optionalStrings(cfg.acceptedOutputModes, 'configuration.acceptedOutputModes');
      if (modes !== undefined) configuration.acceptedOutputModes = modes;
      const historyLength = MessageValidator.historyLength(cfg.historyLength, 'configuration.historyLength');
      if (historyLength !== undefined) configuration.historyLength = historyLength;
      const blocking = optionalBoolean(cfg.blocking, 'configuration.blocking');
      if (blocking !== undefined) configuration.blocking = blocking;
      if (cfg.pushNotificationConfig !== undefined && cfg.pushNotificationConfig !== null) {
        configuration.pushNotificationConfig = ParamsValidator.pushNotificationConfig(
          cfg.pushNotificationConfig,
          'configuration.pushNotificationConfig',
        );
      }
      params.configuration = configuration;
    }

    const metadata = optionalMetadata(source.metadata, 'metadata');
    if (metadata !== undefined) params.metadata = metadata;
    return params;
  }

  static getTask(raw: unknown): GetTaskParams {
    const source = record(raw, 'params');
    const params: GetTaskParams = { id: MessageValidator.requiredId(source.id, 'id') };
    const historyLength = MessageValidator.historyLength(source.historyLength);
    if (historyLength !== undefined) params.historyLength = historyLength;
    return params;
  }

  /** Range checks on pageSize belong to the server, which knows its limits. */
  static listTasks(raw: unknown): ListTasksParams {
    const source = raw === undefined || raw === null ? {} : record(raw, 'params');
    const params: ListTasksParams = {};
    const contextId = optionalString(source.contextId, 'contextId');
    if (contextId !== undefined) params.contextId = contextId;
    const status = MessageValidator.taskState(source.status);
    if (status !== undefined) params.status = status;
    const after = MessageValidator.timestamp(source.statusTimestampAfter, 'statusTimestampAfter');
    if (after !== undefined) params.statusTimestampAfter = after;
    const pageSize = optionalInteger(source.pageSize, 'pageSize');
    if (pageSize !== undefined) params.pageSize = pageSize;
    const pageToken = optionalString(source.pageToken, 'pageToken');
    if (pageToken !== undefined && pageToken !== '') params.pageToken = pageToken;
    const historyLength = MessageValidator.historyLength(source.historyLength);
    if (historyLength !== undefined) params.historyLength = historyLength;
    const includeArtifacts = optionalBoolean(source.includeArtifacts, 'includeArtifacts');
    if (includeArtifacts !== undefined) params.includeArtifacts = includeArtifacts;
    return params;
  }

  static taskId(raw: unknown): TaskIdParams {
    const source = record(raw, 'params');
    const params: TaskIdParams = { id: MessageValidator.requiredId(source.id, 'id') };
    const metadata = optionalMetadata(source.metadata, 'metadata');
    if (metadata !== undefined) params.metadata = metadata;
    return params;
  }

  static createPushConfig(raw: unknown): CreateTaskPushNotificationConfigParams {
    const source = record(raw, 'params');
    return {
      taskId: MessageValidator.requiredId(source.taskId, 'taskId'),
      pushNotificationConfig: ParamsValidator.pushNotificationConfig(source.pushNotificationConfig),
    };
  }

  static pushConfig(raw: unknown): TaskPushNotificationConfigParams {
    const source = record(raw, 'params');
    return {
      taskId: MessageValidator.requiredId(source.taskId, 'taskId'),
      pushNotificationConfigId: MessageValidator.requiredId(source.pushNotificationConfigId, 'pushNotificationConfigId'),
    };
  }

  static listPushConfigs(raw: unknown): ListTaskPushNotificationConfigsParams {
    const source = record(raw, 'params');
    return { taskId: MessageValidator.requiredId(source.taskId, 'taskId') };
  }
}
