import { SchedulerInvariantViolation } from './errors.js';
import { JobState, TERMINAL_STATES } from './types.js';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ['in_flight', 'cancelled'],
  // back to pending only when the attempt was never issued (shutdown) or on crash recovery
  in_flight: ['sent', 'failed_transient', 'failed_permanent', 'pending'],
  failed_transient: ['pending'],
  sent: [],
  failed_permanent: [],
  cancelled: [],
};

export function canTransition(from: JobState, to: JobState) {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: JobState, to: JobState) {
  if (!canTransition(from, to)) {
    throw new SchedulerInvariantViolation(`illegal transition ${from} -> ${to} for job ${jobId}`);
  }
}

export function isTerminal(state: JobState) {
  return TERMINAL_STATES.includes(state);
}
