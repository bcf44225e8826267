import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type NotificationFeedQuery,
  type NotificationIdParam,
} from '@medclaims/shared/schemas/notification.schema.js';
import {
  listNotifications,
  markNotificationRead,
  markAllNotificationsRead,
  type NotificationFeedDeps,
} from './notification.service.js';

// ---------------------------------------------------------------------------
// Handler Factory
// ---------------------------------------------------------------------------

export function createNotificationHandlers(deps: NotificationFeedDeps) {
  // GET /api/v1/notifications
  async function listNotificationsHandler(
    request: FastifyRequest<{ Querystring: NotificationFeedQuery }>,
    reply: FastifyReply,
  ) {
    const { unread_only, limit, offset } = request.query;
    const result = await listNotifications(deps, request.authContext.userId, {
      unreadOnly: unread_only,
      limit,
      offset,
    });

    return reply.code(200).send({
      data: {
        notifications: result.data,
        unreadCount: result.unreadCount,
      },
    });
  }

  // PUT /api/v1/notifications/:id/read
  async function markReadHandler(
    request: FastifyRequest<{ Params: NotificationIdParam }>,
    reply: FastifyReply,
  ) {
    const notification = await markNotificationRead(
      deps,
      request.authContext.userId,
      request.params.id,
    );
    return reply.code(200).send({ data: notification });
  }

  // PUT /api/v1/notifications/read-all
  async function markAllReadHandler(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const updated = await markAllNotificationsRead(deps, request.authContext.userId);
    return reply.code(200).send({ data: { updated } });
  }

  return {
    listNotificationsHandler,
    markReadHandler,
    markAllReadHandler,
  };
}
