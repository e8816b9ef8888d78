import { ConfigurationError } from './errors';
import type { InstanceRef } from './types';

/**
 * Parses an instance connection name.
 *
 *   my-project:us-central1:my-instance
 *   example.com:my-project:us-central1:my-instance   (domain-scoped project)
 */
export function parseInstanceRef(connectionName: string): InstanceRef {
  const parts = connectionName.split(':');
  if (parts.some((p) => p.trim() === '')) {
    throw invalid(connectionName);
  }

  if (parts.length === 3) {
    const [namespace, locality, name] = parts;
    return { namespace, locality, name };
  }
  if (parts.length === 4) {
    const [domain, project, locality, name] = parts;
    return { namespace: `${domain}:${project}`, locality, name };
  }
  throw invalid(connectionName);
}

export function formatInstanceRef(ref: InstanceRef): string {
  return `${ref.namespace}:${ref.locality}:${ref.name}`;
}

function invalid(connectionName: string): ConfigurationError {
  return new ConfigurationError(
    `Invalid instance connection name \`${connectionName}\`. ` +
      'Expected the format <PROJECT>:<REGION>:<INSTANCE>.',
  );
}
