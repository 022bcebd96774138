/* Typed failures raised by the exchange client and whole-payload adapters. */

export type FailureKind = "connection" | "auth" | "server" | "malformed" | "request";

export abstract class ExchangeFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    readonly path: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Exchange unreachable, connection dropped, or request timed out. */
export class ConnectionFailure extends ExchangeFailure {
  readonly kind = "connection";
}

/** 401 / 403. */
export class AuthFailure extends ExchangeFailure {
  readonly kind = "auth";
}

/** 5xx. */
export class ServerFailure extends ExchangeFailure {
  readonly kind = "server";
}

/** 2xx whose body does not have the expected shape. */
export class MalformedResponseFailure extends ExchangeFailure {
  readonly kind = "malformed";
}

/** Any other non-2xx status (404, 422, ...). */
export class RequestFailure extends ExchangeFailure {
  readonly kind = "request";
}

export function isExchangeFailure(err: unknown): err is ExchangeFailure {
  return err instanceof ExchangeFailure;
}

export function failureForStatus(status: number, path: string, body: string): ExchangeFailure {
  const detail = body ? `: ${body.slice(0, 200)}` : "";
  if (status === 401 || status === 403) {
    return new AuthFailure(`Exchange rejected API key (${status}) on ${path}${detail}`, path, status);
  }
  if (status >= 500) {
    return new ServerFailure(`Exchange error ${status} on ${path}${detail}`, path, status);
  }
  return new RequestFailure(`Unexpected status ${status} on ${path}${detail}`, path, status);
}
