// ============================================================================
// Patient Records: Zod Validation Schemas
// ============================================================================
// Request shapes only. Field-level business rules (trimmed non-empty text,
// phone format, fee parsing) are applied by the patient service so that every
// caller gets the same ValidationError.

import { z } from 'zod';

// ============================================================================
// Add Patient & Appointment
// ============================================================================

export const addPatientAppointmentSchema = z.object({
  patient_name: z.string().min(1).max(100),
  phone_number: z.string().min(1).max(32),
  patient_treatment: z.string().max(100).optional(),
  teeth_location: z.string().max(500).optional(),
  appointment_date: z.string().date(),
  treatment_type: z.string().min(1).max(100),
  dentist: z.string().min(1).max(100),
  fee: z.string().max(32).optional(),
  notes: z.string().max(1000).optional(),
});

export type AddPatientAppointment = z.infer<typeof addPatientAppointmentSchema>;

// ============================================================================
// Modify Patient
// ============================================================================

export const modifyPatientSchema = z.object({
  patient_name: z.string().min(1).max(100),
  patient_treatment: z.string().max(100).optional(),
  teeth_location: z.string().max(500).optional(),
});

export type ModifyPatient = z.infer<typeof modifyPatientSchema>;

// --- Phone Number Parameter ---

export const phoneParamSchema = z.object({
  phone: z.string().min(1).max(32),
});

export type PhoneParam = z.infer<typeof phoneParamSchema>;

// ============================================================================
// Search
// ============================================================================

export const recordSearchQuerySchema = z.object({
  q: z.string().max(100).optional(),
});

export type RecordSearchQuery = z.infer<typeof recordSearchQuerySchema>;

// ============================================================================
// Reminders
// ============================================================================

export const reminderQuerySchema = z.object({
  date: z.string().date().optional(),
});

export type ReminderQuery = z.infer<typeof reminderQuerySchema>;
