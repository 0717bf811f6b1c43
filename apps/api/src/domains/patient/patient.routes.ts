import { type FastifyInstance } from 'fastify';
import {
  addPatientAppointmentSchema,
  modifyPatientSchema,
  phoneParamSchema,
  recordSearchQuerySchema,
} from '@dentdesk/shared/schemas/patient.schema.js';
import {
  createPatientHandlers,
  type PatientHandlerDeps,
} from './patient.handlers.js';

// ---------------------------------------------------------------------------
// Patient Routes
// ---------------------------------------------------------------------------

export async function patientRoutes(
  app: FastifyInstance,
  opts: { deps: PatientHandlerDeps },
) {
  const handlers = createPatientHandlers(opts.deps);

  // =========================================================================
  // Search Routes
  // =========================================================================

  app.get('/api/v1/patients', {
    schema: { querystring: recordSearchQuerySchema },
    handler: handlers.searchPatientsHandler,
  });

  app.get('/api/v1/records', {
    schema: { querystring: recordSearchQuerySchema },
    handler: handlers.recordRowsHandler,
  });

  // =========================================================================
  // Patient & Appointment Routes
  // =========================================================================

  app.post('/api/v1/patients/appointments', {
    schema: { body: addPatientAppointmentSchema },
    handler: handlers.addPatientAppointmentHandler,
  });

  app.get('/api/v1/patients/by-phone/:phone', {
    schema: { params: phoneParamSchema },
    handler: handlers.getPatientHandler,
  });

  app.put('/api/v1/patients/by-phone/:phone', {
    schema: { body: modifyPatientSchema, params: phoneParamSchema },
    handler: handlers.modifyPatientHandler,
  });

  app.delete('/api/v1/patients/by-phone/:phone', {
    schema: { params: phoneParamSchema },
    handler: handlers.deletePatientHandler,
  });
}
