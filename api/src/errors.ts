export type EndpointErrorKind = "unreachable" | "malformed";

export abstract class EndpointError extends Error {
  abstract readonly kind: EndpointErrorKind;

  constructor(
    readonly location: string,
    readonly routeServer: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${location}/${routeServer}: ${message}`, options);
    this.name = new.target.name;
  }
}

/** Missing URL, connection failure, timeout or non-2xx status. */
export class EndpointUnreachableError extends EndpointError {
  readonly kind = "unreachable";
}

/** Body is not JSON, or not a `{ protocols: {...} }` session table. */
export class EndpointMalformedResponseError extends EndpointError {
  readonly kind = "malformed";
}
