/**
 * Collection lifecycle state machine
 *
 * Transitions are pure: each takes the current state and returns either the
 * next state or the reason the transition is refused. Completion is one way.
 */

import { GRACE_PERIOD } from '../utils/constants.js';
import { CollectionError, CollectionErrorCode } from './errors.js';

export type Completion = { kind: 'incomplete' } | { kind: 'completed'; completedAt: number };

export type LifecycleState =
  | { status: 'uninitialized' }
  | {
      status: 'initialized';
      approved: boolean;
      editable: boolean;
      createdAt: number;
      completion: Completion;
    };

export type InitializedState = Extract<LifecycleState, { status: 'initialized' }>;

export type Transition = { ok: true; next: InitializedState } | { ok: false; code: CollectionErrorCode };

export const UNINITIALIZED: LifecycleState = { status: 'uninitialized' };

function refuse(code: CollectionErrorCode): Transition {
  return { ok: false, code };
}

export function initializeLifecycle(state: LifecycleState, now: number): Transition {
  if (state.status !== 'uninitialized') {
    return refuse(CollectionErrorCode.ALREADY_INITIALIZED);
  }
  return {
    ok: true,
    next: { status: 'initialized', approved: true, editable: true, createdAt: now, completion: { kind: 'incomplete' } },
  };
}

export function setApprovedLifecycle(state: LifecycleState, value: boolean): Transition {
  if (state.status !== 'initialized') return refuse(CollectionErrorCode.NOT_INITIALIZED);
  if (state.approved === value) return refuse(CollectionErrorCode.VALUE_IS_THE_SAME);
  return { ok: true, next: { ...state, approved: value } };
}

export function setEditableLifecycle(state: LifecycleState, value: boolean): Transition {
  if (state.status !== 'initialized') return refuse(CollectionErrorCode.NOT_INITIALIZED);
  if (state.editable === value) return refuse(CollectionErrorCode.VALUE_IS_THE_SAME);
  return { ok: true, next: { ...state, editable: value } };
}

export function completeLifecycle(state: LifecycleState, now: number): Transition {
  if (state.status !== 'initialized') return refuse(CollectionErrorCode.NOT_INITIALIZED);
  if (state.completion.kind === 'completed') return refuse(CollectionErrorCode.COLLECTION_ALREADY_COMPLETED);
  return { ok: true, next: { ...state, completion: { kind: 'completed', completedAt: now } } };
}

/**
 * Reason minting is refused at `now`, or undefined when it is allowed.
 * Checked in order: approved, completed, grace period elapsed.
 */
export function mintingBlocker(state: LifecycleState, now: number): CollectionErrorCode | undefined {
  if (state.status !== 'initialized') return CollectionErrorCode.NOT_INITIALIZED;
  if (!state.approved) return CollectionErrorCode.NOT_APPROVED;
  if (state.completion.kind !== 'completed') return CollectionErrorCode.NOT_COMPLETED;
  if (now < state.completion.completedAt + GRACE_PERIOD) return CollectionErrorCode.IN_GRACE_PERIOD;
  return undefined;
}

export function isCompleted(state: LifecycleState): boolean {
  return state.status === 'initialized' && state.completion.kind === 'completed';
}

/**
 * Next state of a successful transition
 * @throws CollectionError with the refusal code otherwise
 */
export function applyTransition(transition: Transition, scope: string): InitializedState {
  if (!transition.ok) {
    throw new CollectionError(transition.code, scope);
  }
  return transition.next;
}
