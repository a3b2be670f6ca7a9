import 'dotenv/config';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerQueryRoutes } from './adapters/query-handler';
import { createAppContext, type AppContext } from './app-context';
import { loadConfig } from './config';
import { errorMessage } from './core/errors';
import { logger } from './observability/logger';

export function buildServer(ctx: AppContext): FastifyInstance {
  const server = Fastify({ logger: false });
  registerQueryRoutes(server, ctx);
  return server;
}

async function start() {
  logger.info('=== travel planner start ===');
  const config = loadConfig();
  const ctx = createAppContext(config);
  logger.info('tool palette ready', { tools: ctx.registry.list().map((t) => t.name), model: config.openaiModel });

  const server = buildServer(ctx);
  await server.listen({ port: config.port, host: config.host });
  logger.info('server listening', { port: config.port, host: config.host });
}

if (require.main === module) {
  start().catch((err) => {
    logger.error('failed to start server', errorMessage(err));
    process.exit(1);
  });
}
