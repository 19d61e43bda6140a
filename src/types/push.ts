/** Credentials the server presents when calling a webhook. */
export interface PushNotificationAuthenticationInfo {
  /** e.g. ["Bearer"]. */
  schemes: string[];
  credentials?: string;
}

/** A webhook registration for one task. */
export interface PushNotificationConfig {
  /** Assigned by the server when absent. */
  id?: string;
  url: string;
  /** Opaque client token echoed in every notification. */
  token?: string;
  authentication?: PushNotificationAuthenticationInfo;
}

export interface TaskPushNotificationConfig {
  taskId: string;
  pushNotificationConfig: PushNotificationConfig & { id: string };
}
