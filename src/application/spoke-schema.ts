import { z } from 'zod';

const ADDRESS_PATTERN = /^(https?:\/\/)?[A-Za-z0-9.-]+(:\d{1,5})?\/?$|^(https?:\/\/)?\[[0-9A-Fa-f:.]+\](:\d{1,5})?\/?$/;

/**
 * Schema for POST /api/v1/spokes.
 *
 * `address` is `host:port`, `host`, or an http(s) URL without a path.
 * The API key is chosen by the operator provisioning the spoke and must
 * match the agent's SPOKE_API_KEY.
 */
export const registerSpokeSchema = z.object({
  name: z.string().trim().min(1).max(64),
  address: z.string().trim().min(1).max(255).regex(ADDRESS_PATTERN, 'Must be host[:port] or an http(s) URL'),
  api_key: z.string().min(16, 'API key must be at least 16 characters').max(256),
  allowed_source_ip: z.string().ip().nullable().optional(),
});

export type RegisterSpokeInput = z.infer<typeof registerSpokeSchema>;

export const spokeParamsSchema = z.object({
  spoke_id: z.string().uuid(),
});

export const heartbeatQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(60).default(60),
});
