import { z } from 'zod';

/** PUT /api/v1/settings/notifications. A null URL clears the override. */
export const notificationSettingsSchema = z.object({
  webhook_url: z.string().url().refine((u) => /^https?:\/\//.test(u), 'Must be an http(s) URL').nullable(),
});

export type NotificationSettingsInput = z.infer<typeof notificationSettingsSchema>;

export const transitionQuerySchema = z.object({
  spoke_id: z.string().uuid().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});
