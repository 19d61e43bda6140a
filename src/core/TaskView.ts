import type { Task } from '../types/task.js';

export interface TaskViewOptions {
  /** unset: `defaultHistoryLength`; 0: omit history; N: the most recent N. */
  historyLength?: number;
  /** Server default when the caller sets no length. Unset means full retained history. */
  defaultHistoryLength?: number;
  /** Default true. When false the field is omitted, not emptied. */
  includeArtifacts?: boolean;
}

/** A detached copy of `task` shaped for a response. */
export function projectTask(task: Task, options: TaskViewOptions = {}): Task {
  const view = structuredClone(task);
  const length = options.historyLength ?? options.defaultHistoryLength;

  if (length === 0) {
    delete view.history;
  } else if (length !== undefined && view.history && view.history.length > length) {
    view.history = view.history.slice(-length);
  }

  if (options.includeArtifacts === false) {
    delete view.artifacts;
  }

  return view;
}
