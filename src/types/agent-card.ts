import type { MediaType } from './part.js';

/** A capability that the agent provides. */
export interface AgentSkill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
  inputModes?: MediaType[];
  outputModes?: MediaType[];
}

/** A protocol extension the agent understands. */
export interface AgentExtension {
  uri: string;
  description?: string;
  /** When true, callers must declare this extension on every request. */
  required?: boolean;
  params?: Record<string, unknown>;
}

/** Optional feature flags for an agent. */
export interface AgentCapabilities {
  streaming?: boolean;
  pushNotifications?: boolean;
  extensions?: AgentExtension[];
}

/** Organization operating the agent. */
export interface AgentProvider {
  organization: string;
  url?: string;
}

export type SecurityScheme =
  | { type: 'http'; scheme: string; bearerFormat?: string; description?: string }
  | { type: 'apiKey'; name: string; in: 'header' | 'query' | 'cookie'; description?: string }
  | { type: 'oauth2'; flows: Record<string, unknown>; description?: string }
  | { type: 'openIdConnect'; openIdConnectUrl: string; description?: string };

/** Detached signature over the canonical card (JWS-like). */
export interface AgentCardSignature {
  /** base64url JSON header: { alg, kid }. */
  protected: string;
  /** base64url signature bytes. */
  signature: string;
  header?: Record<string, unknown>;
}

/** Discovery document describing an agent's identity and capabilities. */
export interface AgentCard {
  name: string;
  description: string;
  version: string;
  /** Preferred protocol version, "Major.Minor". */
  protocolVersion: string;
  supportedVersions?: string[];
  url: string;
  capabilities: AgentCapabilities;
  skills: AgentSkill[];
  defaultInputModes: MediaType[];
  defaultOutputModes: MediaType[];
  securitySchemes?: Record<string, SecurityScheme>;
  security?: Record<string, string[]>[];
  supportsAuthenticatedExtendedCard?: boolean;
  provider?: AgentProvider;
  iconUrl?: string;
  documentationUrl?: string;
  signatures?: AgentCardSignature[];
}
