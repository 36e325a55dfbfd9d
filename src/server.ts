import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';

dotenv.config();

const start = async () => {
  const config = loadConfig();
  const fastify = await buildApp({ config });

  const gracefulShutdown = async (signal: string) => {
    fastify.log.info(`Received ${signal}, closing server...`);
    try {
      await fastify.close();
      fastify.log.info('Server closed successfully');
      process.exit(0);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  await fastify.listen({ host: config.host, port: config.port });
  fastify.log.info(
    { orderServiceUrl: config.orderServiceUrl },
    `Gateway listening on http://${config.host}:${config.port}`
  );
};

start().catch((error: unknown) => {
  // The logger may not exist yet, e.g. when configuration is invalid
  console.error('Failed to start gateway:', error instanceof Error ? error.message : error);
  process.exit(1);
});
