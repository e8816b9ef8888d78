// ---------------------------------------------------------------------------
// PUT /run — trigger one reconciliation pass
//
// Body:
//   sql_instances  string[]                 required
//   iam_groups     string[]                 required
//   group_roles    { [group]: role }        optional
//   private_ip     boolean                  optional, default false
//   log_level      DEBUG|INFO|WARNING|ERROR optional, applies to this run
// ---------------------------------------------------------------------------

import type { FastifyInstance, FastifyReply } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { mapSyncErrorToHttp } from '../sync/errors';
import type { SyncOutcome } from '../sync/orchestrator';
import type { SyncLogger, SyncRequest } from '../sync/types';

export type SyncRunner = (
  request: SyncRequest,
  logger: SyncLogger,
  runId: string,
) => Promise<SyncOutcome>;

export interface RunRouteOptions {
  runner: SyncRunner;
}

const LOG_LEVELS: Readonly<Record<string, string>> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
};

export type ParsedRunBody =
  | { ok: true; request: SyncRequest; logLevel: string | null }
  | { ok: false; detail: string };

// ---------------------------------------------------------------------------
// Body validation
// ---------------------------------------------------------------------------

export function parseRunBody(body: unknown): ParsedRunBody {
  const fields = typeof body === 'object' && body !== null && !Array.isArray(body) ? body : {};
  const get = (key: string): unknown => Reflect.get(fields, key);

  const instances = get('sql_instances');
  if (!isStringArray(instances)) {
    return {
      ok: false,
      detail: 'Missing or incorrect type for required request parameter: `sql_instances`',
    };
  }

  const groups = get('iam_groups');
  if (!isStringArray(groups)) {
    return {
      ok: false,
      detail: 'Missing or incorrect type for required request parameter: `iam_groups`',
    };
  }

  const groupRoles = get('group_roles') ?? {};
  if (!isStringRecord(groupRoles)) {
    return {
      ok: false,
      detail: 'Incorrect type for request parameter: `group_roles`, should be an object of strings.',
    };
  }

  const privateIp = get('private_ip') ?? false;
  if (typeof privateIp !== 'boolean') {
    return {
      ok: false,
      detail: 'Incorrect type for request parameter: `private_ip`, should be boolean.',
    };
  }

  const rawLevel = get('log_level');
  const logLevel = typeof rawLevel === 'string' ? LOG_LEVELS[rawLevel.toUpperCase()] ?? null : null;

  return {
    ok: true,
    request: {
      groups,
      instances,
      roleOverrides: groupRoles,
      usePrivateNetwork: privateIp,
    },
    logLevel,
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

// ---------------------------------------------------------------------------
// Route plugin
// ---------------------------------------------------------------------------

export async function runRoutes(server: FastifyInstance, options: RunRouteOptions): Promise<void> {
  server.addHook('onRequest', server.authenticate);

  server.put('/run', async (request, reply: FastifyReply) => {
    const parsed = parseRunBody(request.body);
    if (!parsed.ok) {
      return reply.status(400).send({ error: 'BAD_REQUEST', detail: parsed.detail });
    }

    const runId = uuidv4();
    const logger = request.log.child(
      { runId },
      parsed.logLevel ? { level: parsed.logLevel } : {},
    );
    logger.info(
      { groups: parsed.request.groups.length, instances: parsed.request.instances.length },
      'Sync requested',
    );

    const outcome = await options.runner(parsed.request, logger, runId);
    if (outcome.ok) {
      return reply.status(200).send({ status: 'ok', runId, pairs: outcome.summary.pairs });
    }

    const { status, code, detail } = mapSyncErrorToHttp(outcome.error);
    return reply.status(status).send({ error: code, detail, runId });
  });
}
