import { ApolloServer } from '@apollo/server';
import { startStandaloneServer } from '@apollo/server/standalone';
import { AppContext, createAppContext } from './app_context';
import { buildSchema } from './graphql/schema';
import { loadConfig } from './config/environment';
import { InMemoryScheduleRepository } from './repository/in_memory_repository';
import { seedFromFile } from './repository/seed';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

let context: AppContext | undefined;

async function start() {
  const config = loadConfig();

  const repository = new InMemoryScheduleRepository();
  if (config.data.seedFile) {
    await seedFromFile(repository, config.data.seedFile);
  }
  context = createAppContext(config, repository);

  const server = new ApolloServer({
    schema: buildSchema(context),
    introspection: config.server.nodeEnv === 'development',
  });

  const { url } = await startStandaloneServer(server, {
    listen: { port: config.server.port },
  });

  logger.info('Production scheduling service started', {
    url,
    environment: config.server.nodeEnv,
    port: config.server.port,
    workWindow: `${config.scheduling.workStartHour}:00-${config.scheduling.workEndHour}:00 ${config.scheduling.timezone}`,
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await context?.queue.close();
    logger.info('Scheduling queue closed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

start().catch(err => {
  const stack = err instanceof Error ? err.stack : undefined;
  logger.error('Unhandled error during startup', { error: errorMessage(err), stack });
  process.exit(1);
});
