import type {
  PatientRepository,
  PatientWithAppointments,
} from './patient.repository.js';
import type {
  SelectPatient,
  SelectAppointment,
} from '@dentdesk/shared/schemas/db/patient.schema.js';
import { RecordEvent } from '@dentdesk/shared/constants/patient.constants.js';
import { validatePhone, maskPhone } from '@dentdesk/shared/utils/phone.utils.js';
import { validateFee, formatFee } from '@dentdesk/shared/utils/fee.utils.js';
import { normalizeTeeth } from '@dentdesk/shared/utils/teeth.utils.js';
import { isCalendarDate } from '@dentdesk/shared/utils/date.utils.js';
import {
  AppError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '../../lib/errors.js';
import type { ServiceLogger } from '../../lib/logger.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface EventEmitter {
  emit(event: string, payload: Record<string, unknown>): void;
}

export interface PatientServiceDeps {
  repo: PatientRepository;
  logger: ServiceLogger;
  events: EventEmitter;
}

// ---------------------------------------------------------------------------
// Input types
// ---------------------------------------------------------------------------

/** Raw form input for the "Add Patient & Appointment" action. */
export interface AddPatientAppointmentInput {
  patientName: string;
  phoneNumber: string;
  patientTreatment?: string;
  teethLocation?: string;
  appointmentDate: string;
  treatmentType: string;
  dentist: string;
  fee?: string;
  notes?: string;
}

export interface ModifyPatientInput {
  patientName: string;
  patientTreatment?: string;
  teethLocation?: string;
}

/** One line of the records table. Optional fields render as "". */
export interface RecordRow {
  patientName: string;
  phoneNumber: string;
  patientTreatment: string;
  teethLocation: string;
  appointmentDate: string;
  treatmentType: string;
  dentist: string;
  fee: string;
  notes: string;
}

// ---------------------------------------------------------------------------
// Input validation helpers
// ---------------------------------------------------------------------------

function requireText(value: string | undefined, message: string): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

function requirePhone(raw: string): string {
  const phone = validatePhone(raw.trim());
  if (!phone) {
    throw new ValidationError('Invalid phone number.');
  }
  return phone;
}

/** Blank fee means "unspecified"; anything else must be a non-negative number. */
function parseOptionalFee(raw: string | undefined): number | null {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) {
    return null;
  }

  const fee = validateFee(trimmed);
  if (fee === null) {
    throw new ValidationError('Fee must be a non-negative number.');
  }
  return fee;
}

function optionalText(value: string | undefined): string | null {
  return value === undefined ? null : value.trim();
}

// ---------------------------------------------------------------------------
// Store call wrapper
// ---------------------------------------------------------------------------

/**
 * Runs a repository call. Domain errors pass through; anything else is a
 * failed unit of work (already rolled back by the repository), which is
 * logged and surfaced as StoreError.
 */
export async function runStore<T>(
  deps: { logger: ServiceLogger },
  action: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (err instanceof AppError) {
      throw err;
    }
    deps.logger.error(`Store operation failed: ${action}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    throw new StoreError(`Could not ${action}. No changes were saved.`);
  }
}

// ---------------------------------------------------------------------------
// Service: addPatientAndAppointment
// ---------------------------------------------------------------------------

/**
 * Saves the patient (creating it, or updating the one with the same phone
 * number) and books the appointment in one transaction.
 */
export async function addPatientAndAppointment(
  deps: PatientServiceDeps,
  input: AddPatientAppointmentInput,
): Promise<{ patient: SelectPatient; appointment: SelectAppointment }> {
  const patientName = requireText(input.patientName, 'Patient name cannot be empty.');
  const phoneNumber = requirePhone(input.phoneNumber);
  const appointmentDate = input.appointmentDate.trim();
  if (!isCalendarDate(appointmentDate)) {
    throw new ValidationError('Appointment date must be a valid YYYY-MM-DD date.');
  }
  const treatmentType = requireText(
    input.treatmentType,
    'Appointment treatment type is required.',
  );
  const dentist = requireText(input.dentist, 'Dentist name is required.');
  const fee = parseOptionalFee(input.fee);

  const result = await runStore(deps, 'save patient and appointment', () =>
    deps.repo.upsertPatientWithAppointment(
      {
        patientName,
        phoneNumber,
        treatmentType: optionalText(input.patientTreatment),
        teethLocation:
          input.teethLocation === undefined ? null : normalizeTeeth(input.teethLocation),
      },
      {
        appointmentDate,
        treatmentType,
        dentist,
        fee,
        notes: optionalText(input.notes),
      },
    ),
  );

  deps.logger.info('Patient and appointment saved', {
    patientId: result.patient.id,
    appointmentId: result.appointment.id,
    phone: maskPhone(phoneNumber),
  });
  deps.events.emit(RecordEvent.PATIENT_SAVED, {
    patientId: result.patient.id,
    appointmentId: result.appointment.id,
  });

  return result;
}

// ---------------------------------------------------------------------------
// Service: getPatientByPhone
// ---------------------------------------------------------------------------

export async function getPatientByPhone(
  deps: PatientServiceDeps,
  rawPhone: string,
): Promise<SelectPatient> {
  const phone = requirePhone(rawPhone);
  const patient = await runStore(deps, 'look up patient', () =>
    deps.repo.findPatientByPhone(phone),
  );
  if (!patient) {
    throw new NotFoundError('Patient');
  }
  return patient;
}

// ---------------------------------------------------------------------------
// Service: modifyPatient
// ---------------------------------------------------------------------------

export async function modifyPatient(
  deps: PatientServiceDeps,
  rawPhone: string,
  input: ModifyPatientInput,
): Promise<SelectPatient> {
  const phone = requirePhone(rawPhone);
  const patientName = requireText(input.patientName, 'Patient name cannot be empty.');

  // Omitted fields keep their stored values.
  const updated = await runStore(deps, 'update patient', () =>
    deps.repo.updatePatientFields(phone, {
      patientName,
      treatmentType: input.patientTreatment?.trim(),
      teethLocation:
        input.teethLocation === undefined ? undefined : normalizeTeeth(input.teethLocation),
    }),
  );
  if (!updated) {
    throw new NotFoundError('Patient');
  }

  deps.logger.info('Patient details updated', {
    patientId: updated.id,
    phone: maskPhone(phone),
  });
  deps.events.emit(RecordEvent.PATIENT_UPDATED, { patientId: updated.id });

  return updated;
}

// ---------------------------------------------------------------------------
// Service: deletePatient
// ---------------------------------------------------------------------------

/**
 * Deletes the patient with this phone number together with all of its
 * appointments.
 */
export async function deletePatient(
  deps: PatientServiceDeps,
  rawPhone: string,
): Promise<{ deleted: true; phoneNumber: string }> {
  const phone = requirePhone(rawPhone);

  const deleted = await runStore(deps, 'delete patient', () =>
    deps.repo.deletePatientByPhone(phone),
  );
  if (!deleted) {
    throw new NotFoundError('Patient');
  }

  deps.logger.info('Patient deleted', { phone: maskPhone(phone) });
  deps.events.emit(RecordEvent.PATIENT_DELETED, { phone: maskPhone(phone) });

  return { deleted: true, phoneNumber: phone };
}

// ---------------------------------------------------------------------------
// Service: searchRecords
// ---------------------------------------------------------------------------

export async function searchRecords(
  deps: PatientServiceDeps,
  term?: string,
): Promise<PatientWithAppointments[]> {
  const trimmed = term?.trim() ?? '';
  return runStore(deps, 'load records', () =>
    deps.repo.searchPatients(trimmed || undefined),
  );
}

// ---------------------------------------------------------------------------
// Records table rows
// ---------------------------------------------------------------------------

/**
 * Flattens patients into table rows: one per appointment, or a single row
 * with blank appointment columns for a patient without appointments.
 */
export function toRecordRows(records: PatientWithAppointments[]): RecordRow[] {
  const rows: RecordRow[] = [];

  for (const patient of records) {
    const base = {
      patientName: patient.patientName,
      phoneNumber: patient.phoneNumber,
      patientTreatment: patient.treatmentType ?? '',
      teethLocation: patient.teethLocation ?? '',
    };

    if (patient.appointments.length === 0) {
      rows.push({
        ...base,
        appointmentDate: '',
        treatmentType: '',
        dentist: '',
        fee: '',
        notes: '',
      });
      continue;
    }

    for (const appointment of patient.appointments) {
      rows.push({
        ...base,
        appointmentDate: appointment.appointmentDate,
        treatmentType: appointment.treatmentType,
        dentist: appointment.dentist,
        fee: formatFee(appointment.fee),
        notes: appointment.notes ?? '',
      });
    }
  }

  return rows;
}
