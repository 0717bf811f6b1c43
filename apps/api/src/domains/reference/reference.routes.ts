// ============================================================================
// Reference Routes
// Form option lists and the teeth picker.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  toggleToothSchema,
  type ToggleTooth,
} from '@dentdesk/shared/schemas/reference.schema.js';
import { applyToothToggle, getFormOptions } from './reference.service.js';

export async function referenceRoutes(app: FastifyInstance) {
  // =========================================================================
  // GET /api/v1/reference/form-options
  // =========================================================================

  app.get('/api/v1/reference/form-options', async (_request, reply) => {
    return reply.code(200).send({ data: getFormOptions() });
  });

  // =========================================================================
  // POST /api/v1/reference/teeth/toggle
  // =========================================================================

  app.post('/api/v1/reference/teeth/toggle', {
    schema: { body: toggleToothSchema },
    handler: async (
      request: FastifyRequest<{ Body: ToggleTooth }>,
      reply: FastifyReply,
    ) => {
      const { teeth_location, tooth } = request.body;
      return reply.code(200).send({ data: applyToothToggle(teeth_location, tooth) });
    },
  });
}
