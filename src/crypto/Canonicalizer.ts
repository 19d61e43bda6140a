import { createRequire } from 'module';
import type { AgentCard } from '../types/agent-card.js';

const require = createRequire(import.meta.url);
const canonicalizeFn = require('canonicalize') as (input: unknown) => string | undefined;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Canonicalizer {
  /**
   * Canonicalize a JSON-serializable object per RFC 8785 (JCS).
   * Returns the canonical JSON string.
   * @throws if input cannot be serialized.
   */
  static canonicalize(obj: unknown): string {
    const result = canonicalizeFn(obj);
    if (result === undefined) {
      throw new Error('Cannot canonicalize input: result is undefined');
    }
    return result;
  }

  /**
   * Recursively drop default-valued fields: undefined, null, false,
   * empty arrays and empty objects. Array elements are kept in place.
   */
  static stripDefaults(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => Canonicalizer.stripDefaults(item));
    }
    if (!isPlainObject(value)) return value;

    const out: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(value)) {
      const item = Canonicalizer.stripDefaults(raw);
      if (item === undefined || item === null || item === false) continue;
      if (Array.isArray(item) && item.length === 0) continue;
      if (isPlainObject(item) && Object.keys(item).length === 0) continue;
      out[key] = item;
    }
    return out;
  }

  /** Signing payload of an agent card: no signatures, no default-valued fields. */
  static agentCard(card: AgentCard): string {
    const { signatures: _signatures, ...unsigned } = card;
    return Canonicalizer.canonicalize(Canonicalizer.stripDefaults(unsigned));
  }
}
