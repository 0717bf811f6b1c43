import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type AddPatientAppointment,
  type ModifyPatient,
  type PhoneParam,
  type RecordSearchQuery,
} from '@dentdesk/shared/schemas/patient.schema.js';
import {
  addPatientAndAppointment,
  getPatientByPhone,
  modifyPatient,
  deletePatient,
  searchRecords,
  toRecordRows,
  type PatientServiceDeps,
} from './patient.service.js';
import { AppError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface PatientHandlerDeps {
  serviceDeps: PatientServiceDeps;
}

// ---------------------------------------------------------------------------
// Helper: map domain errors to the JSON error envelope
// ---------------------------------------------------------------------------

export function handleAppError(err: unknown, reply: FastifyReply): FastifyReply {
  if (err instanceof AppError) {
    return reply.code(err.statusCode).send({
      error: { code: err.code, message: err.message },
    });
  }
  throw err;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createPatientHandlers(deps: PatientHandlerDeps) {
  const { serviceDeps } = deps;

  // =========================================================================
  // Search Handlers
  // =========================================================================

  async function searchPatientsHandler(
    request: FastifyRequest<{ Querystring: RecordSearchQuery }>,
    reply: FastifyReply,
  ) {
    try {
      const patients = await searchRecords(serviceDeps, request.query.q);
      return reply.code(200).send({ data: patients });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  async function recordRowsHandler(
    request: FastifyRequest<{ Querystring: RecordSearchQuery }>,
    reply: FastifyReply,
  ) {
    try {
      const patients = await searchRecords(serviceDeps, request.query.q);
      return reply.code(200).send({ data: toRecordRows(patients) });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  // =========================================================================
  // CRUD Handlers
  // =========================================================================

  async function addPatientAppointmentHandler(
    request: FastifyRequest<{ Body: AddPatientAppointment }>,
    reply: FastifyReply,
  ) {
    const body = request.body;

    try {
      const result = await addPatientAndAppointment(serviceDeps, {
        patientName: body.patient_name,
        phoneNumber: body.phone_number,
        patientTreatment: body.patient_treatment,
        teethLocation: body.teeth_location,
        appointmentDate: body.appointment_date,
        treatmentType: body.treatment_type,
        dentist: body.dentist,
        fee: body.fee,
        notes: body.notes,
      });
      return reply.code(201).send({ data: result });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  async function getPatientHandler(
    request: FastifyRequest<{ Params: PhoneParam }>,
    reply: FastifyReply,
  ) {
    try {
      const patient = await getPatientByPhone(serviceDeps, request.params.phone);
      return reply.code(200).send({ data: patient });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  async function modifyPatientHandler(
    request: FastifyRequest<{ Params: PhoneParam; Body: ModifyPatient }>,
    reply: FastifyReply,
  ) {
    const body = request.body;

    try {
      const updated = await modifyPatient(serviceDeps, request.params.phone, {
        patientName: body.patient_name,
        patientTreatment: body.patient_treatment,
        teethLocation: body.teeth_location,
      });
      return reply.code(200).send({ data: updated });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  async function deletePatientHandler(
    request: FastifyRequest<{ Params: PhoneParam }>,
    reply: FastifyReply,
  ) {
    try {
      const result = await deletePatient(serviceDeps, request.params.phone);
      return reply.code(200).send({ data: result });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  return {
    searchPatientsHandler,
    recordRowsHandler,
    addPatientAppointmentHandler,
    getPatientHandler,
    modifyPatientHandler,
    deletePatientHandler,
  };
}
