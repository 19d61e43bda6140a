import type { TaskState } from '../types/task.js';
import { A2AError } from '../errors/A2AError.js';

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'completed',
  'failed',
  'canceled',
  'rejected',
]);

export const INTERRUPTED_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'input-required',
  'auth-required',
]);

export type TransitionTrigger =
  | 'start'
  | 'message'
  | 'complete'
  | 'fail'
  | 'reject'
  | 'requireInput'
  | 'requireAuth'
  | 'cancel';

const TRANSITIONS: Record<TaskState, Partial<Record<TransitionTrigger, TaskState>>> = {
  submitted: {
    start: 'working',
    message: 'submitted',
    fail: 'failed',
    reject: 'rejected',
    cancel: 'canceled',
  },
  working: {
    message: 'working',
    complete: 'completed',
    fail: 'failed',
    reject: 'rejected',
    requireInput: 'input-required',
    requireAuth: 'auth-required',
    cancel: 'canceled',
  },
  'input-required': { message: 'working', fail: 'failed', cancel: 'canceled' },
  'auth-required': { message: 'working', fail: 'failed', cancel: 'canceled' },
  completed: {},
  failed: {},
  canceled: {},
  rejected: {},
};

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isInterrupted(state: TaskState): boolean {
  return INTERRUPTED_STATES.has(state);
}

/** The state `trigger` leads to from `state`, or undefined when illegal. */
export function nextState(state: TaskState, trigger: TransitionTrigger): TaskState | undefined {
  return TRANSITIONS[state][trigger];
}

export function canTransition(state: TaskState, trigger: TransitionTrigger): boolean {
  return nextState(state, trigger) !== undefined;
}

/**
 * Apply a trigger, throwing the protocol error for an illegal move:
 * cancel on a terminal task is TaskNotCancelable, anything else on a terminal
 * task is UnsupportedOperation, other illegal moves are agent mistakes.
 */
export function transition(taskId: string, state: TaskState, trigger: TransitionTrigger): TaskState {
  const next = nextState(state, trigger);
  if (next !== undefined) return next;

  if (isTerminal(state)) {
    if (trigger === 'cancel') throw A2AError.taskNotCancelable(taskId, state);
    throw A2AError.terminalTask(taskId, state);
  }
  throw A2AError.invalidAgentResponse(`Illegal transition ${trigger} from ${state}`, {
    taskId,
    state,
    trigger,
  });
}
