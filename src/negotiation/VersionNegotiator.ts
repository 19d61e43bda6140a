import { A2AError } from '../errors/A2AError.js';

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

/** Reduce "0.3.0" or "0.3" to "0.3". */
export function majorMinor(version: string): string | undefined {
  const match = /^(\d+)\.(\d+)(?:\.\d+)?$/.exec(version.trim());
  return match ? `${match[1]}.${match[2]}` : undefined;
}

/**
 * Accept a caller's declared Major.Minor only when the agent supports it.
 * There is no fallback to a nearby version.
 */
export class VersionNegotiator {
  private readonly supported: string[];
  private readonly preferred: string;

  constructor(protocolVersion: string, supportedVersions?: string[]) {
    const preferred = majorMinor(protocolVersion);
    if (!preferred) {
      throw new Error(`Invalid protocolVersion: ${protocolVersion}`);
    }
    this.preferred = preferred;
    const listed = (supportedVersions ?? []).map((v) => {
      const mm = majorMinor(v);
      if (!mm) throw new Error(`Invalid supported version: ${v}`);
      return mm;
    });
    this.supported = listed.length > 0 ? [...new Set(listed)] : [preferred];
  }

  /** @returns the version in effect; unset means the agent's preferred version. */
  negotiate(requested?: string): string {
    if (requested === undefined || requested === '') return this.preferred;
    if (!VERSION_PATTERN.test(requested) || !this.supported.includes(requested)) {
      throw A2AError.versionNotSupported(requested, this.supported);
    }
    return requested;
  }

  get supportedVersions(): string[] {
    return [...this.supported];
  }
}
