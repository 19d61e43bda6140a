import type { Part } from './part.js';

/** Output produced by a task. Append-only once produced. */
export interface Artifact {
  artifactId: string;
  name?: string;
  description?: string;
  parts: Part[];
  extensions?: string[];
  metadata?: Record<string, unknown>;
}
