// ---------------------------------------------------------------------------
// Fastify server
// ---------------------------------------------------------------------------

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import authPlugin from './plugins/auth';
import { runRoutes } from './routes/run';
import type { SyncRunner } from './routes/run';

export interface ServerOptions {
  apiKey: string | null;
  logLevel: string;
  runner: SyncRunner;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  // ── Plugins ───────────────────────────────────────────────────────────────
  await server.register(authPlugin, { apiKey: options.apiKey });

  // Health checks — unauthenticated, probed by Cloud Run and load balancers
  server.get('/', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', service: 'iam-db-role-sync' });
  });
  server.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', service: 'iam-db-role-sync' });
  });

  // ── Authenticated sync route ──────────────────────────────────────────────
  await server.register(runRoutes, { runner: options.runner });

  return server;
}
