import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { pathToFileURL } from 'node:url';
import { getEnv } from './lib/env.js';
import { openDatabase, type ClinicDatabase } from './lib/db.js';
import { createServiceLogger } from './lib/logger.js';
import { createRecurringTask, type RecurringTask } from './lib/recurring-task.js';
import { createPatientRepository } from './domains/patient/patient.repository.js';
import { patientRoutes } from './domains/patient/patient.routes.js';
import { reminderRoutes } from './domains/reminder/reminder.routes.js';
import {
  registerReminderJobs,
  type ReminderClock,
} from './domains/reminder/reminder.service.js';
import { referenceRoutes } from './domains/reference/reference.routes.js';

export interface BuildAppOptions {
  db: ClinicDatabase;
  /** Interval for the records refresh / today's-appointments check. Omit to disable. */
  refreshIntervalMs?: number;
  corsOrigin?: string;
  /** Source of "today" for reminders. Defaults to the system clock. */
  clock?: ReminderClock;
  fastify?: FastifyServerOptions;
}

export function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    genReqId: () => randomUUID(),
    ...opts.fastify,
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  });
  app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: {
        code: 'RATE_LIMITED',
        message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
      },
    }),
  });

  const serviceDeps = {
    repo: createPatientRepository(opts.db),
    logger: createServiceLogger(app.log),
    events: new EventEmitter(),
    clock: opts.clock,
  };

  app.register(patientRoutes, { deps: { serviceDeps } });
  app.register(reminderRoutes, { deps: { serviceDeps } });
  app.register(referenceRoutes);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  // Recurring records refresh, cancelled on close
  const refreshIntervalMs = opts.refreshIntervalMs;
  if (refreshIntervalMs !== undefined) {
    const tasks: RecurringTask[] = [];

    app.addHook('onReady', async () => {
      for (const job of registerReminderJobs(serviceDeps, refreshIntervalMs)) {
        tasks.push(createRecurringTask({ ...job, logger: serviceDeps.logger }));
      }
    });

    app.addHook('onClose', async () => {
      for (const task of tasks) {
        task.stop();
      }
    });
  }

  return app;
}

// Start server when run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const env = getEnv();
  const database = openDatabase(env.DATABASE_FILE);
  const app = buildApp({
    db: database.db,
    refreshIntervalMs: env.REMINDER_INTERVAL_MS,
    corsOrigin: env.CORS_ORIGIN,
    fastify: { logger: { level: env.LOG_LEVEL } },
  });
  app.addHook('onClose', async () => database.close());

  const shutdown = () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  app.listen({ port: env.API_PORT, host: env.API_HOST }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
