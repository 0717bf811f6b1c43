// Barrel export for Drizzle DB schemas
export { patients, appointments } from './patient.schema.js';
export type {
  InsertPatient,
  SelectPatient,
  InsertAppointment,
  SelectAppointment,
} from './patient.schema.js';
