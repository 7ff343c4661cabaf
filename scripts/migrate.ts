async function main() {
  process.env.DATABASE_URL =
    process.env.DATABASE_URL ?? 'postgresql://localhost:5432/appointments';
  process.env.STORE_DRIVER = 'postgres';
  process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

  const { closeDb, logger, runMigrations } = await import('@agenda/shared');

  logger.info('Starting migrations');
  await runMigrations();
  await closeDb();
  logger.info('Migrations finished');
}

main().catch(async (error) => {
  const { logger } = await import('@agenda/shared');
  logger.error({ err: error }, 'Migration runner failed');
  process.exit(1);
});
