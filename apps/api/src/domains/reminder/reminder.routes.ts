// ============================================================================
// Reminder Routes
// GET /api/v1/reminders: appointments on a date (default today)
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  reminderQuerySchema,
  type ReminderQuery,
} from '@dentdesk/shared/schemas/patient.schema.js';
import { getReminders, type ReminderServiceDeps } from './reminder.service.js';
import { handleAppError } from '../patient/patient.handlers.js';

export interface ReminderRouteDeps {
  serviceDeps: ReminderServiceDeps;
}

export async function reminderRoutes(
  app: FastifyInstance,
  opts: { deps: ReminderRouteDeps },
) {
  const { serviceDeps } = opts.deps;

  app.get('/api/v1/reminders', {
    schema: { querystring: reminderQuerySchema },
    handler: async (
      request: FastifyRequest<{ Querystring: ReminderQuery }>,
      reply: FastifyReply,
    ) => {
      try {
        const data = await getReminders(serviceDeps, request.query.date);
        return reply.code(200).send({ data });
      } catch (err) {
        return handleAppError(err, reply);
      }
    },
  });
}
