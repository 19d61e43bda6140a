import type { AgentExtension } from '../types/agent-card.js';
import { A2AError } from '../errors/A2AError.js';

/**
 * Match caller-declared extension URIs against the agent's declared extensions.
 * Matching is by exact URI: a request for another version of an extension
 * is simply not activated.
 */
export class ExtensionNegotiator {
  private readonly declared: ReadonlyMap<string, AgentExtension>;

  constructor(extensions: AgentExtension[] = []) {
    this.declared = new Map(extensions.map((ext) => [ext.uri, ext]));
  }

  /**
   * @returns the URIs in effect for this request, in the caller's order.
   * @throws A2AError EXTENSION_SUPPORT_REQUIRED when a required extension was not declared.
   */
  negotiate(requested: readonly string[] = []): string[] {
    const requestedSet = new Set(requested);
    const missing = [...this.declared.values()]
      .filter((ext) => ext.required === true && !requestedSet.has(ext.uri))
      .map((ext) => ext.uri);
    if (missing.length > 0) {
      throw A2AError.extensionSupportRequired(missing);
    }
    return [...requestedSet].filter((uri) => this.declared.has(uri));
  }

  /** URIs every caller must declare. */
  get required(): string[] {
    return [...this.declared.values()].filter((ext) => ext.required === true).map((ext) => ext.uri);
  }
}

/** Parse a comma-separated extension header value. */
export function parseExtensionHeader(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const joined = Array.isArray(value) ? value.join(',') : value;
  return joined
    .split(',')
    .map((uri) => uri.trim())
    .filter((uri) => uri.length > 0);
}
