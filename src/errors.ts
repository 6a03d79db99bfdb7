export type ErrorKind =
  | 'ConfigError'
  | 'ConnectivityError'
  | 'UpstreamError'
  | 'DeserializationError'
  | 'PublishRejectedError';

/** Remote systems the reporter talks to, used to label diagnostics. */
export type Service = 'alertmanager' | 'slack';

export const CONFIG_EXIT_CODE = 2;

export abstract class ReporterError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;
}

export class ConfigError extends ReporterError {
  readonly kind = 'ConfigError';
  readonly exitCode = CONFIG_EXIT_CODE;

  constructor(
    message: string,
    readonly fields: readonly string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConnectivityError extends ReporterError {
  readonly kind = 'ConnectivityError';
  readonly exitCode = 3;

  constructor(
    readonly service: Service,
    readonly url: string,
    cause: unknown,
  ) {
    super(`Could not reach ${service} at ${url}: ${describeCause(cause)}`, { cause });
    this.name = 'ConnectivityError';
  }
}

export class UpstreamError extends ReporterError {
  readonly kind = 'UpstreamError';
  readonly exitCode = 4;

  constructor(
    readonly service: Service,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${service} returned HTTP ${status}${body ? `: ${body}` : ''}`);
    this.name = 'UpstreamError';
  }
}

export class DeserializationError extends ReporterError {
  readonly kind = 'DeserializationError';
  readonly exitCode = 5;

  constructor(
    readonly service: Service,
    readonly issues: readonly string[],
  ) {
    super(`Unexpected response from ${service}: ${issues.join('; ')}`);
    this.name = 'DeserializationError';
  }
}

export class PublishRejectedError extends ReporterError {
  readonly kind = 'PublishRejectedError';
  readonly exitCode = 6;

  constructor(readonly code: string) {
    super(`Slack rejected the message: ${code}`);
    this.name = 'PublishRejectedError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps the socket error; the inner one names the actual failure
    if (cause.cause instanceof Error) return `${cause.message} (${cause.cause.message})`;
    return cause.message;
  }
  return String(cause);
}
