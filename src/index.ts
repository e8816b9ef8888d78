// ---------------------------------------------------------------------------
// Entry point — wires Google clients and the database factory into the server
// ---------------------------------------------------------------------------

import pino from 'pino';
import { config } from './config';
import { CloudSqlRoleServiceFactory } from './db';
import { GoogleCredentials } from './clients/credentials';
import { GoogleDirectoryClient } from './clients/directory';
import { GoogleApiClient } from './clients/google-api';
import { CloudSqlAdminClient } from './clients/sql-admin';
import { buildServer } from './server';
import { runSync } from './sync/orchestrator';

async function start(): Promise<void> {
  const credentials = GoogleCredentials.fromEnvironment([...config.google.scopes]);
  const api = new GoogleApiClient({ credentials });
  const directory = new GoogleDirectoryClient(api);
  const admin = new CloudSqlAdminClient(api);
  const roleServices = new CloudSqlRoleServiceFactory(credentials, config.database);

  const server = await buildServer({
    apiKey: config.apiKey,
    logLevel: config.logLevel,
    runner: (request, logger, runId) =>
      runSync(request, { runId, credentials, directory, admin, roleServices, logger }),
  });

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

// Failures before the server (and its logger) exists
const bootLogger = pino({ level: config.logLevel });

start().catch((err: unknown) => {
  bootLogger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
