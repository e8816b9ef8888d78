// ---------------------------------------------------------------------------
// Authenticated JSON calls to Google REST APIs
//
// Every call refreshes the credentials first when they are no longer valid.
// Non-2xx responses and transport failures become UpstreamLookupError with
// the upstream status, so callers can tell "not found" and "already exists"
// apart from real failures.
// ---------------------------------------------------------------------------

import { request } from 'undici';
import type { Dispatcher } from 'undici';
import { ensureValidCredentials } from '../sync/credentials';
import { errorMessage, UpstreamLookupError } from '../sync/errors';
import type { UpstreamService } from '../sync/errors';
import type { CredentialProvider } from '../sync/types';

export interface GoogleApiRequest {
  service: UpstreamService;
  /** Human-readable name of what is being looked up, used in errors. */
  resource: string;
  method: 'GET' | 'POST';
  url: string;
  query?: Record<string, string>;
  body?: unknown;
  /** Message prefix for failures. */
  failure: string;
}

export interface GoogleApiClientOptions {
  credentials: CredentialProvider;
  /** Overrides undici's global dispatcher (tests use a MockAgent). */
  dispatcher?: Dispatcher;
}

export class GoogleApiClient {
  private readonly credentials: CredentialProvider;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: GoogleApiClientOptions) {
    this.credentials = options.credentials;
    this.dispatcher = options.dispatcher;
  }

  async requestJson(req: GoogleApiRequest): Promise<Record<string, unknown>> {
    let statusCode: number;
    let text: string;

    try {
      const token = await ensureValidCredentials(this.credentials);
      const url = new URL(req.url);
      for (const [key, value] of Object.entries(req.query ?? {})) {
        url.searchParams.set(key, value);
      }

      const response = await request(url, {
        method: req.method,
        headers: {
          authorization: `Bearer ${token}`,
          'content-type': 'application/json',
        },
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (err) {
      throw new UpstreamLookupError(
        req.service,
        req.resource,
        `${req.failure}: ${errorMessage(err)}`,
        null,
        { cause: err },
      );
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new UpstreamLookupError(
        req.service,
        req.resource,
        `${req.failure}: HTTP ${statusCode} ${upstreamMessage(text)}`.trimEnd(),
        statusCode,
      );
    }

    const body = tryParseObject(text);
    if (body === null) {
      throw new UpstreamLookupError(
        req.service,
        req.resource,
        `${req.failure}: response is not a JSON object`,
        statusCode,
      );
    }
    return body;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function tryParseObject(text: string): Record<string, unknown> | null {
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Extracts `error.message` from a Google error envelope. */
function upstreamMessage(text: string): string {
  const error = tryParseObject(text)?.['error'];
  if (isRecord(error) && typeof error['message'] === 'string') return error['message'];
  return text.substring(0, 500);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
