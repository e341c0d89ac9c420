/**
 * JSON-over-HTTPS request helper shared by the vendor clients
 * Separates network failures, HTTP error statuses, and malformed bodies
 */

import { z } from 'zod';
import {
  MalformedResponseError,
  NetworkError,
  RemoteApiError,
  type RemoteService,
} from '../errors/newsletter-errors';
import { logDebug } from '../observability/logger';

export interface RequestTarget {
  service: RemoteService;
  /** Short label used in diagnostics, e.g. "files/list_folder" */
  operation: string;
  url: string;
}

export interface HttpErrorBody {
  status: number;
  text: string;
  json?: unknown;
}

const MAX_DETAIL_LENGTH = 500;

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pick the most useful human-readable field from a vendor error body.
 * Dropbox: error_summary, Wix: message, Mailchimp: detail / title.
 */
export function describeErrorBody(body: HttpErrorBody): string {
  const parsed = z.record(z.unknown()).safeParse(body.json);
  if (parsed.success) {
    const record = parsed.data;
    for (const key of ['error_summary', 'detail', 'message', 'title', 'error_description']) {
      const value = record[key];
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
    if (typeof record.error === 'string' && record.error.trim()) return record.error.trim();
  }
  const text = body.text.trim();
  if (!text) return `HTTP ${body.status}`;
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}…` : text;
}

async function send(target: RequestTarget, init: RequestInit): Promise<Response> {
  logDebug('HTTP request', {
    service: target.service,
    operation: target.operation,
    method: init.method ?? 'GET',
  });

  try {
    return await fetch(target.url, init);
  } catch (error) {
    throw new NetworkError(target.service, target.operation, error);
  }
}

async function readErrorBody(response: Response): Promise<HttpErrorBody> {
  const text = await response.text().catch(() => '');
  return { status: response.status, text, json: tryParseJson(text) };
}

export type ErrorBodyHandler<T> = (body: HttpErrorBody) => T | undefined;

/**
 * Perform a request and validate the JSON response against `schema`.
 * `onError` may turn a specific error status into a value; returning
 * undefined lets the RemoteApiError propagate.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  target: RequestTarget,
  init: RequestInit,
  schema: S,
  onError?: ErrorBodyHandler<z.output<S>>
): Promise<z.output<S>> {
  const response = await send(target, init);

  if (!response.ok) {
    const body = await readErrorBody(response);
    const handled = onError?.(body);
    if (handled !== undefined) return handled;
    throw new RemoteApiError(target.service, target.operation, body.status, describeErrorBody(body));
  }

  const text = await response.text();
  const json = tryParseJson(text);
  if (json === undefined) {
    throw new MalformedResponseError(target.service, target.operation, 'body is not valid JSON');
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(target.service, target.operation, issues);
  }

  return parsed.data;
}

/**
 * Perform a request whose successful response is raw bytes.
 */
export async function requestBytes(target: RequestTarget, init: RequestInit): Promise<Buffer> {
  const response = await send(target, init);

  if (!response.ok) {
    const body = await readErrorBody(response);
    throw new RemoteApiError(target.service, target.operation, body.status, describeErrorBody(body));
  }

  return Buffer.from(await response.arrayBuffer());
}
