/**
 * Booking state machine
 * Transition table keyed by trigger event; the orchestrator owns side effects.
 */

import type { BookingState, TriggerKind } from '../types/booking.js';

export interface TransitionEdge {
  trigger: TriggerKind;
  from: BookingState;
  to: BookingState;
}

export const ALL_STATES: readonly BookingState[] = [
  'Searching',
  'AwaitingSelection',
  'CollectingDetails',
  'VerifyingAvailability',
  'Confirmed',
  'RetrySelection',
  'DocumentsPending',
  'DocumentsVerified',
  'InTransit',
  'Delivered',
  'Cancelled',
  'Failed',
];

export const TERMINAL_STATES: readonly BookingState[] = ['Delivered', 'Cancelled', 'Failed'];

export function isTerminal(state: BookingState): boolean {
  return TERMINAL_STATES.includes(state);
}

const FORWARD_EDGES: TransitionEdge[] = [
  { trigger: 'search_completed', from: 'Searching', to: 'AwaitingSelection' },
  { trigger: 'search_completed', from: 'RetrySelection', to: 'AwaitingSelection' },
  // Re-search came back empty: no alternatives left
  { trigger: 'search_completed', from: 'RetrySelection', to: 'Failed' },
  { trigger: 'selection', from: 'AwaitingSelection', to: 'CollectingDetails' },
  { trigger: 'details_completed', from: 'CollectingDetails', to: 'VerifyingAvailability' },
  { trigger: 'availability_confirmed', from: 'VerifyingAvailability', to: 'Confirmed' },
  { trigger: 'availability_rejected', from: 'VerifyingAvailability', to: 'RetrySelection' },
  { trigger: 'document_uploaded', from: 'Confirmed', to: 'DocumentsPending' },
  { trigger: 'documents_verified', from: 'DocumentsPending', to: 'DocumentsVerified' },
  { trigger: 'transit_started', from: 'DocumentsVerified', to: 'InTransit' },
  { trigger: 'delivery_confirmed', from: 'InTransit', to: 'Delivered' },
];

const ESCAPE_EDGES: TransitionEdge[] = ALL_STATES.filter((state) => !isTerminal(state)).flatMap(
  (state): TransitionEdge[] => [
    { trigger: 'cancel', from: state, to: 'Cancelled' },
    { trigger: 'fatal', from: state, to: 'Failed' },
  ]
);

export const TRANSITION_TABLE: readonly TransitionEdge[] = [...FORWARD_EDGES, ...ESCAPE_EDGES];

/**
 * Whether the state accepts the trigger at all
 */
export function permits(state: BookingState, trigger: TriggerKind): boolean {
  return TRANSITION_TABLE.some((edge) => edge.from === state && edge.trigger === trigger);
}

export function isValidTransition(from: BookingState, to: BookingState, trigger: TriggerKind): boolean {
  return TRANSITION_TABLE.some((edge) => edge.from === from && edge.to === to && edge.trigger === trigger);
}

/**
 * Resolve the target state of a trigger
 *
 * `search_completed` from RetrySelection has two targets; pass `emptyResult`
 * to pick the failure edge.
 *
 * @returns Target state, or null when the trigger is not permitted in `from`
 */
export function nextState(
  from: BookingState,
  trigger: TriggerKind,
  options: { emptyResult?: boolean } = {}
): BookingState | null {
  if (trigger === 'search_completed') {
    if (options.emptyResult) {
      return from === 'RetrySelection' ? 'Failed' : null;
    }
    return permits(from, trigger) ? 'AwaitingSelection' : null;
  }

  const edge = TRANSITION_TABLE.find((e) => e.from === from && e.trigger === trigger);
  return edge ? edge.to : null;
}

export interface PathStep {
  from: BookingState;
  to: BookingState;
  trigger: TriggerKind;
}

/**
 * Check that recorded transitions form one connected path from Searching
 * through permitted edges
 */
export function isValidPath(steps: PathStep[]): boolean {
  let current: BookingState = 'Searching';
  for (const step of steps) {
    if (step.from !== current || !isValidTransition(step.from, step.to, step.trigger)) {
      return false;
    }
    current = step.to;
  }
  return true;
}
