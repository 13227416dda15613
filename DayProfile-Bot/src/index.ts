import { loadEnvSafely } from '@day-profile/shared/Utils/env';
loadEnvSafely(import.meta.url);

import { Bot } from 'grammy';
import { ConfigurationError } from '@day-profile/shared/Types/errors';
import { Logger } from '@day-profile/shared/Utils/logger';
import { loadConfig, type Config } from './config.js';
import { ReferenceEngine } from './engine/index.js';
import { ProfileAggregator } from './profile/aggregator.js';
import { todayIn } from './profile/calendar-date.js';
import { ReportService } from './report/report-service.js';
import { CallbackRouter } from './bot/callback-router.js';
import { CommandHandlers } from './bot/commands.js';
import { TelegramTransport } from './bot/telegram-bot.js';
import { ReportScheduler } from './scheduler/report-scheduler.js';
import { HealthServer } from './health/server.js';
import { TaskSupervisor } from './lifecycle.js';

const logger = new Logger('day-profile');

function buildSupervisor(config: Config): TaskSupervisor {
  const aggregator = new ProfileAggregator(new ReferenceEngine(), {
    birthDate: config.birthDate,
    secondaryProfiles: config.secondaryProfiles,
  });
  const reports = new ReportService(aggregator, () => todayIn(config.timeZone));

  const telegram = new TelegramTransport({
    bot: new Bot(config.botToken),
    commands: new CommandHandlers(reports, logger.child('commands')),
    router: new CallbackRouter(reports, logger.child('callbacks')),
    logger: logger.child('telegram'),
  });

  const scheduler = new ReportScheduler(
    reports,
    telegram,
    {
      reportTime: config.reportTime,
      timeZone: config.timeZone,
      destination: config.reportChatId,
    },
    logger.child('scheduler')
  );

  return new TaskSupervisor(
    [new HealthServer(config.port, logger.child('health')), scheduler, telegram],
    logger.child('supervisor')
  );
}

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  logger.setLevel(config.logLevel);
  logger.info('Starting day-profile bot', {
    timeZone: config.timeZone,
    reportTime: config.reportTime,
    reportChatConfigured: config.reportChatId !== undefined,
    secondaryProfiles: config.secondaryProfiles,
  });

  const supervisor = buildSupervisor(config);
  await supervisor.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    supervisor
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  logger.error('Fatal error', { error });
  process.exit(1);
});
