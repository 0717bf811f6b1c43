// ============================================================================
// Patient Records: Constants
// ============================================================================

// --- Phone Number Format ---
// Optional leading '+' followed by 8 to 15 digits.

export const PHONE_NUMBER_PATTERN = /^\+?\d{8,15}$/;

// --- Appointment Treatment Types (form suggestions) ---

export const TreatmentType = {
  CLEANING: 'Cleaning',
  FILLING: 'Filling',
  EXTRACTION: 'Extraction',
  WHITENING: 'Whitening',
  IMPLANT: 'Implant',
  ROOT_CANAL: 'Root Canal',
  CROWN: 'Crown',
  OTHER: 'Other',
} as const;

export type TreatmentType = (typeof TreatmentType)[keyof typeof TreatmentType];

export const TREATMENT_TYPES: readonly TreatmentType[] = Object.freeze(
  Object.values(TreatmentType),
);

// --- Clinic Dentists (form suggestions) ---

export const DENTISTS: readonly string[] = Object.freeze([
  'Mohamed',
  'Essam',
  'Noha',
]);

// --- Record Events ---

export const RecordEvent = {
  REFRESHED: 'records.refreshed',
  PATIENT_SAVED: 'patient.saved',
  PATIENT_UPDATED: 'patient.updated',
  PATIENT_DELETED: 'patient.deleted',
} as const;

export type RecordEvent = (typeof RecordEvent)[keyof typeof RecordEvent];

// --- Reminder Messages ---

export const NO_REMINDERS_MESSAGE = 'No appointments scheduled for today.';

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;
