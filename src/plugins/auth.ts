// ---------------------------------------------------------------------------
// Bearer API-key authentication plugin
//
// Decorates the FastifyInstance with an `authenticate` hook that routes
// attach via:  server.addHook('onRequest', server.authenticate)
//
// With no API key configured the hook lets every request through; the
// service is then expected to sit behind Cloud Run IAM.
// ---------------------------------------------------------------------------

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  }
}

export interface AuthPluginOptions {
  apiKey: string | null;
}

async function authPlugin(server: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  const { apiKey } = options;

  server.decorate(
    'authenticate',
    async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
      if (apiKey === null) return undefined;

      const authHeader = request.headers['authorization'] ?? '';
      if (!authHeader.startsWith('Bearer ')) {
        return reply
          .status(401)
          .header('WWW-Authenticate', 'Bearer realm="iam-db-role-sync"')
          .send({ error: 'UNAUTHORIZED', detail: 'Authorization header with a Bearer token is required.' });
      }

      if (authHeader.slice(7) !== apiKey) {
        return reply
          .status(401)
          .header('WWW-Authenticate', 'Bearer realm="iam-db-role-sync"')
          .send({ error: 'UNAUTHORIZED', detail: 'Invalid credentials.' });
      }
      return undefined;
    },
  );
}

export default fp(authPlugin, { name: 'auth' });
