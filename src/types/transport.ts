import type { AgentCard } from './agent-card.js';
import type { A2AOperations } from './handler.js';

/** What a hosting transport needs from the server it fronts. */
export interface TransportHost {
  operations: A2AOperations;
  /** The public (possibly signed) agent card served for discovery. */
  agentCard(): AgentCard;
}

/** A wire host (HTTP, WebSocket, ...) that exposes the operations. */
export interface TransportPlugin {
  readonly name: string;
  listen(host: TransportHost): Promise<void>;
  close(): Promise<void>;
}
