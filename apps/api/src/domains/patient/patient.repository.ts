import { eq, and, or, asc, count, exists, inArray, sql, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import {
  patients,
  appointments,
  type SelectPatient,
  type SelectAppointment,
} from '@dentdesk/shared/schemas/db/patient.schema.js';
import {
  UNICODE_LOWER,
  type ClinicDatabase,
  type ClinicTransaction,
} from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Record types
// ---------------------------------------------------------------------------

export interface PatientFields {
  patientName: string;
  phoneNumber: string;
  treatmentType: string | null;
  teethLocation: string | null;
}

/** Fields left undefined keep their stored value. */
export interface PatientUpdateFields {
  patientName: string;
  treatmentType?: string | null;
  teethLocation?: string | null;
}

export interface AppointmentFields {
  /** Calendar date, YYYY-MM-DD. */
  appointmentDate: string;
  treatmentType: string;
  dentist: string;
  fee: number | null;
  notes: string | null;
}

export interface PatientWithAppointments extends SelectPatient {
  /** Ordered by appointment date ascending. */
  appointments: SelectAppointment[];
}

export interface DailyAppointment extends SelectAppointment {
  patientName: string;
}

// ---------------------------------------------------------------------------
// Search helpers
// ---------------------------------------------------------------------------

/** Escapes LIKE wildcards so a search term matches literally. */
function escapeLikeTerm(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Both sides are folded in SQL so non-ASCII capitals compare equal. */
function containsIgnoreCase(column: AnySQLiteColumn, pattern: string): SQL {
  const lower = sql.raw(UNICODE_LOWER);
  return sql`${lower}(${column}) like ${lower}(${pattern}) escape '\\'`;
}

// ---------------------------------------------------------------------------
// Unit-of-work steps (run inside a transaction)
// ---------------------------------------------------------------------------

function findByPhone(tx: ClinicTransaction, phone: string): SelectPatient | undefined {
  return tx
    .select()
    .from(patients)
    .where(eq(patients.phoneNumber, phone))
    .limit(1)
    .get();
}

function upsertPatientStep(tx: ClinicTransaction, data: PatientFields): SelectPatient {
  const existing = findByPhone(tx, data.phoneNumber);

  if (existing) {
    const rows = tx
      .update(patients)
      .set({
        patientName: data.patientName,
        treatmentType: data.treatmentType,
        teethLocation: data.teethLocation,
      })
      .where(eq(patients.id, existing.id))
      .returning()
      .all();
    return rows[0];
  }

  const rows = tx.insert(patients).values(data).returning().all();
  return rows[0];
}

function insertAppointmentStep(
  tx: ClinicTransaction,
  patientId: number,
  data: AppointmentFields,
): SelectAppointment {
  const rows = tx
    .insert(appointments)
    .values({ ...data, patientId })
    .returning()
    .all();
  return rows[0];
}

function attachAppointments(
  tx: ClinicTransaction,
  rows: SelectPatient[],
  allPatients: boolean,
): PatientWithAppointments[] {
  if (rows.length === 0) {
    return [];
  }

  const owned = allPatients
    ? tx
        .select()
        .from(appointments)
        .orderBy(asc(appointments.appointmentDate), asc(appointments.id))
        .all()
    : tx
        .select()
        .from(appointments)
        .where(inArray(appointments.patientId, rows.map((p) => p.id)))
        .orderBy(asc(appointments.appointmentDate), asc(appointments.id))
        .all();

  const byPatient = new Map<number, SelectAppointment[]>();
  for (const appointment of owned) {
    const list = byPatient.get(appointment.patientId);
    if (list) {
      list.push(appointment);
    } else {
      byPatient.set(appointment.patientId, [appointment]);
    }
  }

  return rows.map((patient) => ({
    ...patient,
    appointments: byPatient.get(patient.id) ?? [],
  }));
}

// ---------------------------------------------------------------------------
// Patient Repository
// ---------------------------------------------------------------------------
// Every method runs as one better-sqlite3 transaction: a throw inside the
// callback rolls the whole unit of work back before the promise rejects.

export function createPatientRepository(db: ClinicDatabase) {
  return {
    /**
     * Exact match on phone number.
     */
    async findPatientByPhone(phone: string): Promise<SelectPatient | undefined> {
      return db.transaction((tx) => findByPhone(tx, phone));
    },

    /**
     * Create the patient, or overwrite name / treatment type / teeth location
     * on the patient that already holds this phone number.
     */
    async upsertPatient(data: PatientFields): Promise<SelectPatient> {
      return db.transaction((tx) => upsertPatientStep(tx, data));
    },

    /**
     * Attach a new appointment to an existing patient.
     */
    async addAppointment(
      patient: Pick<SelectPatient, 'id'>,
      data: AppointmentFields,
    ): Promise<SelectAppointment> {
      return db.transaction((tx) => insertAppointmentStep(tx, patient.id, data));
    },

    /**
     * Upsert the patient by phone and attach the appointment in a single
     * transaction. Either both rows are written or neither is.
     */
    async upsertPatientWithAppointment(
      patientData: PatientFields,
      appointmentData: AppointmentFields,
    ): Promise<{ patient: SelectPatient; appointment: SelectAppointment }> {
      return db.transaction((tx) => {
        const patient = upsertPatientStep(tx, patientData);
        const appointment = insertAppointmentStep(tx, patient.id, appointmentData);
        return { patient, appointment };
      });
    },

    /**
     * Delete the patient and every appointment it owns. Children go first,
     * then the parent. Returns false when no patient has this phone number.
     */
    async deletePatientByPhone(phone: string): Promise<boolean> {
      return db.transaction((tx) => {
        const existing = findByPhone(tx, phone);
        if (!existing) {
          return false;
        }

        tx.delete(appointments).where(eq(appointments.patientId, existing.id)).run();
        tx.delete(patients).where(eq(patients.id, existing.id)).run();
        return true;
      });
    },

    /**
     * Update name / treatment type / teeth location in place. Omitted
     * optional fields are left as stored. Returns undefined when no patient
     * has this phone number.
     */
    async updatePatientFields(
      phone: string,
      data: PatientUpdateFields,
    ): Promise<SelectPatient | undefined> {
      return db.transaction((tx) => {
        const existing = findByPhone(tx, phone);
        if (!existing) {
          return undefined;
        }

        const rows = tx
          .update(patients)
          .set({
            patientName: data.patientName,
            ...(data.treatmentType === undefined ? {} : { treatmentType: data.treatmentType }),
            ...(data.teethLocation === undefined ? {} : { teethLocation: data.teethLocation }),
          })
          .where(eq(patients.id, existing.id))
          .returning()
          .all();
        return rows[0];
      });
    },

    // =========================================================================
    // Search functions
    // =========================================================================

    /**
     * Without a term, every patient. With a term, patients whose name, phone,
     * treatment type, teeth location or any appointment's treatment type
     * contains it, ignoring case. Patients come back in insertion order.
     */
    async searchPatients(term?: string): Promise<PatientWithAppointments[]> {
      return db.transaction((tx) => {
        if (!term) {
          const rows = tx.select().from(patients).orderBy(asc(patients.id)).all();
          return attachAppointments(tx, rows, true);
        }

        const pattern = `%${escapeLikeTerm(term)}%`;
        const rows = tx
          .select()
          .from(patients)
          .where(
            or(
              containsIgnoreCase(patients.patientName, pattern),
              containsIgnoreCase(patients.phoneNumber, pattern),
              containsIgnoreCase(patients.treatmentType, pattern),
              containsIgnoreCase(patients.teethLocation, pattern),
              exists(
                tx
                  .select({ id: appointments.id })
                  .from(appointments)
                  .where(
                    and(
                      eq(appointments.patientId, patients.id),
                      containsIgnoreCase(appointments.treatmentType, pattern),
                    ),
                  ),
              ),
            ),
          )
          .orderBy(asc(patients.id))
          .all();
        return attachAppointments(tx, rows, false);
      });
    },

    /**
     * Appointments on a calendar date (YYYY-MM-DD) with the owning patient's
     * name.
     */
    async appointmentsOnDate(date: string): Promise<DailyAppointment[]> {
      return db.transaction((tx) =>
        tx
          .select({ appointment: appointments, patientName: patients.patientName })
          .from(appointments)
          .innerJoin(patients, eq(appointments.patientId, patients.id))
          .where(eq(appointments.appointmentDate, date))
          .orderBy(asc(appointments.id))
          .all()
          .map(({ appointment, patientName }) => ({ ...appointment, patientName })),
      );
    },

    async countAppointmentsOnDate(date: string): Promise<number> {
      return db.transaction((tx) => {
        const row = tx
          .select({ total: count() })
          .from(appointments)
          .where(eq(appointments.appointmentDate, date))
          .get();
        return Number(row?.total ?? 0);
      });
    },

    async listAppointmentsByPatientId(patientId: number): Promise<SelectAppointment[]> {
      return db.transaction((tx) =>
        tx
          .select()
          .from(appointments)
          .where(eq(appointments.patientId, patientId))
          .orderBy(asc(appointments.appointmentDate), asc(appointments.id))
          .all(),
      );
    },
  };
}

export type PatientRepository = ReturnType<typeof createPatientRepository>;
