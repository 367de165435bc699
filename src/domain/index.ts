export { SPOKE_STATUSES, toPublicSpoke } from './spoke.js';
export type { Spoke, SpokeStatus, SpokeMetrics, PublicSpoke, HeartbeatSample, TransitionEvent } from './spoke.js';
export { DEFAULT_THRESHOLDS, canTransition, assertThresholds, applyHeartbeat } from './status-machine.js';
export type { LivenessThresholds, LivenessState } from './status-machine.js';
export { COMMAND_VERBS, COMMAND_STATES, canAdvance, isTerminal } from './command.js';
export type { Command, CommandVerb, CommandState, TerminalCommandState } from './command.js';
export { ROLES } from './user.js';
export type { Role, Principal, User } from './user.js';
export { ControlPlaneError, isControlPlaneError } from './errors.js';
export type { ErrorKind } from './errors.js';
