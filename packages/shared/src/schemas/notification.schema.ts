// ============================================================================
// Notifications — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- Feed Query ---

export const notificationFeedQuerySchema = z.object({
  unread_only: z
    .enum(['true', 'false'])
    .optional()
    .default('false')
    .transform((v) => v === 'true'),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type NotificationFeedQuery = z.infer<typeof notificationFeedQuerySchema>;

// --- Notification ID Parameter ---

export const notificationIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type NotificationIdParam = z.infer<typeof notificationIdParamSchema>;
