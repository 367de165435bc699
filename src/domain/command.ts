/**
 * Command entity: one operator-issued control action against a spoke.
 */

export const COMMAND_VERBS = ['start', 'stop', 'restart', 'update', 'custom'] as const;

export type CommandVerb = (typeof COMMAND_VERBS)[number];

export const COMMAND_STATES = [
  'queued',
  'sent',
  'acknowledged',
  'succeeded',
  'failed',
  'timed_out',
] as const;

export type CommandState = (typeof COMMAND_STATES)[number];

export type TerminalCommandState = Extract<CommandState, 'succeeded' | 'failed' | 'timed_out'>;

export interface Command {
  readonly command_id: string;
  readonly spoke_id: string;
  readonly verb: CommandVerb;
  /** Script action passed to the instance; equals `verb` unless `verb` is custom. */
  readonly action: string;
  readonly target_instance: string;
  readonly issued_by: string;
  readonly issued_at: string; // ISO-8601
  readonly updated_at: string; // ISO-8601
  readonly state: CommandState;
  readonly result_detail: string | null;
}

const NEXT_STATES: Record<CommandState, readonly CommandState[]> = {
  queued: ['sent', 'failed'],
  sent: ['acknowledged', 'failed', 'timed_out'],
  acknowledged: ['succeeded', 'failed', 'timed_out'],
  succeeded: [],
  failed: [],
  timed_out: [],
};

/** Command state only moves forward; terminal states accept nothing. */
export function canAdvance(from: CommandState, to: CommandState): boolean {
  return NEXT_STATES[from].includes(to);
}

export function isTerminal(state: CommandState): state is TerminalCommandState {
  return NEXT_STATES[state].length === 0;
}
