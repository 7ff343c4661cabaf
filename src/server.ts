import { config, logger } from '@agenda/shared';

import { createApp } from './app';
import { FileBusinessHoursProvider } from './modules/availability/domain/businessHours';

async function main(): Promise<void> {
  const businessHours = new FileBusinessHoursProvider(config.BUSINESS_HOURS_FILE);
  await businessHours.load();

  process.on('SIGHUP', () => {
    businessHours.reload().catch((error: unknown) => {
      logger.error({ err: error }, 'Business hours reload failed, keeping previous hours');
    });
  });

  const app = createApp({ businessHours });

  app.listen(config.PORT, () => {
    logger.info(
      { port: config.PORT, store: config.STORE_DRIVER, timezone: config.BUSINESS_TIMEZONE },
      'Appointment scheduling service listening'
    );
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start appointment scheduling service');
  process.exit(1);
});
