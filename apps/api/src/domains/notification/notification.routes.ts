import { type FastifyInstance } from 'fastify';
import {
  notificationFeedQuerySchema,
  notificationIdParamSchema,
  type NotificationFeedQuery,
  type NotificationIdParam,
} from '@medclaims/shared/schemas/notification.schema.js';
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { createNotificationHandlers } from './notification.handlers.js';
import { type NotificationFeedDeps } from './notification.service.js';

// ---------------------------------------------------------------------------
// Notification Feed Routes
// ---------------------------------------------------------------------------

export async function notificationRoutes(
  app: FastifyInstance,
  opts: { serviceDeps: NotificationFeedDeps },
) {
  const handlers = createNotificationHandlers(opts.serviceDeps);

  app.get<{ Querystring: NotificationFeedQuery }>('/api/v1/notifications', {
    schema: { querystring: notificationFeedQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.NOTIFICATION_VIEW)],
    handler: handlers.listNotificationsHandler,
  });

  // NOTE: registered BEFORE /:id/read so "read-all" is never taken as an :id
  app.put('/api/v1/notifications/read-all', {
    preHandler: [app.authenticate, app.authorize(Permission.NOTIFICATION_VIEW)],
    handler: handlers.markAllReadHandler,
  });

  app.put<{ Params: NotificationIdParam }>('/api/v1/notifications/:id/read', {
    schema: { params: notificationIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.NOTIFICATION_VIEW)],
    handler: handlers.markReadHandler,
  });
}
