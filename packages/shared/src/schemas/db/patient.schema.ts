// ============================================================================
// Patient Records: Drizzle DB Schema
// ============================================================================

import {
  sqliteTable,
  integer,
  text,
  real,
  index,
} from 'drizzle-orm/sqlite-core';

// --- Patients Table ---
// One row per patient. The phone number is the business key: adding a record
// with a known phone number updates the existing row.
// teeth_location holds a serialized teeth selection ("LL1, UR3").

export const patients = sqliteTable(
  'patients',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    patientName: text('patient_name').notNull(),
    phoneNumber: text('phone_number').notNull().unique(),
    treatmentType: text('treatment_type'),
    teethLocation: text('teeth_location'),
  },
  (table) => [
    // Phone lookup
    index('idx_phone').on(table.phoneNumber),
  ],
);

// --- Appointments Table ---
// Every appointment belongs to exactly one patient. appointment_date is a
// calendar date stored as YYYY-MM-DD text, so equality and ordering work on
// the raw column.

export const appointments = sqliteTable(
  'appointments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    appointmentDate: text('appointment_date').notNull(),
    treatmentType: text('treatment_type').notNull(),
    dentist: text('dentist').notNull(),
    fee: real('fee'),
    notes: text('notes'),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.id, { onDelete: 'cascade' }),
  },
  (table) => [
    // Same-day reminder lookup
    index('idx_appointments_date').on(table.appointmentDate),

    // Cascade delete and per-patient listing
    index('idx_appointments_patient').on(table.patientId),
  ],
);

// --- Inferred Types ---

export type InsertPatient = typeof patients.$inferInsert;
export type SelectPatient = typeof patients.$inferSelect;

export type InsertAppointment = typeof appointments.$inferInsert;
export type SelectAppointment = typeof appointments.$inferSelect;
