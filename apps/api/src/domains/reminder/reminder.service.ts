// ============================================================================
// Appointment Reminders
// Same-day reminder listing and the recurring records refresh that checks
// for today's appointments.
// ============================================================================

import {
  NO_REMINDERS_MESSAGE,
  RecordEvent,
} from '@dentdesk/shared/constants/patient.constants.js';
import { formatDate, isCalendarDate } from '@dentdesk/shared/utils/date.utils.js';
import type { DailyAppointment, PatientRepository } from '../patient/patient.repository.js';
import { runStore, type EventEmitter } from '../patient/patient.service.js';
import { ValidationError } from '../../lib/errors.js';
import type { ServiceLogger } from '../../lib/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Clock abstraction for testability. */
export interface ReminderClock {
  now(): Date;
}

export interface ReminderServiceDeps {
  repo: Pick<
    PatientRepository,
    'appointmentsOnDate' | 'countAppointmentsOnDate' | 'searchPatients'
  >;
  logger: ServiceLogger;
  events: EventEmitter;
  clock?: ReminderClock;
}

export interface Reminder {
  appointmentId: number;
  patientName: string;
  treatmentType: string;
  dentist: string;
  appointmentDate: string;
  message: string;
}

export interface ReminderListing {
  date: string;
  reminders: Reminder[];
  /** All reminder messages joined by newlines, or the "none today" notice. */
  summary: string;
}

export interface RefreshCheckResult {
  patientCount: number;
  todayCount: number;
}

export interface ReminderJob {
  name: string;
  intervalMs: number;
  handler: () => Promise<void>;
}

function today(deps: ReminderServiceDeps): string {
  return formatDate(deps.clock?.now() ?? new Date());
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export function formatReminderMessage(
  appointment: DailyAppointment,
  todayDate: string,
): string {
  const when =
    appointment.appointmentDate === todayDate
      ? `today (${appointment.appointmentDate})`
      : `on ${appointment.appointmentDate}`;
  return `${appointment.patientName} has an appointment for ${appointment.treatmentType} with Dr. ${appointment.dentist} ${when}.`;
}

// ---------------------------------------------------------------------------
// Service: getReminders
// ---------------------------------------------------------------------------

/**
 * Reminders for every appointment on `date` (defaults to today).
 */
export async function getReminders(
  deps: ReminderServiceDeps,
  date?: string,
): Promise<ReminderListing> {
  const todayDate = today(deps);
  const target = date ?? todayDate;
  if (!isCalendarDate(target)) {
    throw new ValidationError('Date must be a valid YYYY-MM-DD date.');
  }

  const due = await runStore(deps, 'retrieve reminders', () =>
    deps.repo.appointmentsOnDate(target),
  );

  const reminders = due.map((appointment) => ({
    appointmentId: appointment.id,
    patientName: appointment.patientName,
    treatmentType: appointment.treatmentType,
    dentist: appointment.dentist,
    appointmentDate: appointment.appointmentDate,
    message: formatReminderMessage(appointment, todayDate),
  }));

  return {
    date: target,
    reminders,
    summary:
      reminders.length === 0
        ? NO_REMINDERS_MESSAGE
        : reminders.map((r) => r.message).join('\n'),
  };
}

// ---------------------------------------------------------------------------
// Service: runRefreshCheck
// ---------------------------------------------------------------------------

/**
 * Reloads the full record set for listeners of `records.refreshed` and logs
 * how many appointments fall on today. Read-only.
 */
export async function runRefreshCheck(
  deps: ReminderServiceDeps,
): Promise<RefreshCheckResult> {
  const records = await deps.repo.searchPatients();
  deps.events.emit(RecordEvent.REFRESHED, { patientCount: records.length });

  const todayDate = today(deps);
  const todayCount = await deps.repo.countAppointmentsOnDate(todayDate);
  if (todayCount > 0) {
    deps.logger.info(
      `There are ${todayCount} appointment(s) scheduled for today.`,
      { date: todayDate, count: todayCount },
    );
  }

  return { patientCount: records.length, todayCount };
}

// ---------------------------------------------------------------------------
// Scheduled jobs
// ---------------------------------------------------------------------------

/**
 * Job definitions for the server to schedule. Each handler logs its own
 * failure and never throws.
 */
export function registerReminderJobs(
  deps: ReminderServiceDeps,
  intervalMs: number,
): ReminderJob[] {
  return [
    {
      name: 'records-refresh',
      intervalMs,
      handler: async () => {
        try {
          await runRefreshCheck(deps);
        } catch (err: unknown) {
          deps.logger.error('Records refresh failed', {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      },
    },
  ];
}
