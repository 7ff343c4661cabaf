import type { AppointmentStatus } from '../dtos';

/** Decides whether an appointment may move from one status to another. */
export type StatusTransitionPolicy = (from: AppointmentStatus, to: AppointmentStatus) => boolean;

export type StatusTransitionPolicyName = 'permissive' | 'strict';

/** Any status may be set from any status. */
export const permissiveTransitions: StatusTransitionPolicy = () => true;

const FORWARD_TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  scheduled: ['confirmed', 'cancelled', 'no_show'],
  confirmed: ['completed', 'cancelled', 'no_show'],
  completed: [],
  cancelled: [],
  no_show: []
};

/** Only forward moves along the lifecycle; re-setting the current status is a no-op and allowed. */
export const strictTransitions: StatusTransitionPolicy = (from, to) =>
  from === to || FORWARD_TRANSITIONS[from].includes(to);

export function resolveStatusPolicy(name: StatusTransitionPolicyName): StatusTransitionPolicy {
  return name === 'strict' ? strictTransitions : permissiveTransitions;
}
