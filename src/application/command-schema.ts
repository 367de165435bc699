import { z } from 'zod';
import { COMMAND_VERBS } from '../domain/index.js';

/** Schema for POST /api/v1/spokes/:spoke_id/commands. */
export const issueCommandSchema = z.object({
  verb: z.enum(COMMAND_VERBS),
  target_instance: z.string().min(1).max(64),
  action: z.string().min(1).max(32).optional(),
});

export type IssueCommandInput = z.infer<typeof issueCommandSchema>;

/** Body a spoke posts once the script for a command has finished. */
export const commandResultSchema = z.object({
  succeeded: z.boolean(),
  detail: z.string().max(4096).nullable().optional(),
  exit_code: z.number().int().nullable().optional(),
});

export type CommandResultInput = z.infer<typeof commandResultSchema>;

export const commandParamsSchema = z.object({
  command_id: z.string().uuid(),
});

export const commandResultParamsSchema = z.object({
  spoke_id: z.string().uuid(),
  command_id: z.string().uuid(),
});

export const listCommandsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

