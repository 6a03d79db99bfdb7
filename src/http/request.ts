import type { z } from 'zod';
import { ConnectivityError, DeserializationError, UpstreamError } from '../errors.js';
import type { Service } from '../errors.js';

export interface RequestOptions {
  service: Service;
  url: string;
  timeoutMs: number;
  init?: RequestInit;
}

/**
 * Send one request and return its body text. Transport failures and timeouts
 * become ConnectivityError; any status other than 200 becomes UpstreamError.
 */
export async function requestText({ service, url, timeoutMs, init }: RequestOptions): Promise<string> {
  let res: Response;
  let body: string;
  try {
    res = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    body = await res.text();
  } catch (err) {
    throw new ConnectivityError(service, url, err);
  }

  if (res.status !== 200) {
    throw new UpstreamError(service, res.status, body);
  }

  return body;
}

export function parseJsonBody<T extends z.ZodTypeAny>(
  service: Service,
  body: string,
  schema: T,
): z.infer<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new DeserializationError(service, [
      `body is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    ]);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new DeserializationError(
      service,
      parsed.error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`),
    );
  }
  return parsed.data;
}
