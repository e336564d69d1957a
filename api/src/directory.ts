import { pino, type BaseLogger } from "pino";
import {
  DirectoryConfigSchema,
  type DirectoryConfig,
  type DirectoryConfigInput,
} from "./config.js";
import {
  EndpointMalformedResponseError,
  EndpointUnreachableError,
  type EndpointError,
} from "./errors.js";
import { parseSessionPayload } from "./session.js";
import type {
  AsnIndexEntry,
  EndpointConfig,
  EndpointState,
  EndpointStatus,
  IpIndexEntry,
  LookupResult,
  PeeringRow,
  Snapshot,
} from "./types.js";

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export type DirectoryOptions = {
  logger?: BaseLogger;
  fetch?: FetchLike;
  now?: () => number;
};

const EMPTY_SNAPSHOT: Snapshot = { fetchedAt: 0, endpoints: [] };

/**
 * Parses an ASN given as a number or as decimal text. Returns null for
 * anything that is not an integer.
 */
export function parseAsn(input: number | string): number | null {
  if (typeof input === "number") {
    return Number.isSafeInteger(input) ? input : null;
  }
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  const asn = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(asn) ? asn : null;
}

export class RouteServerDirectory {
  readonly config: DirectoryConfig;
  private readonly log: BaseLogger;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private last: Snapshot = EMPTY_SNAPSHOT;
  private started = 0;
  private lastStarted = 0;

  constructor(config: DirectoryConfigInput, options: DirectoryOptions = {}) {
    this.config = DirectoryConfigSchema.parse(config);
    this.log = options.logger ?? pino({ name: "route-server-directory" });
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  /** Builds a directory and loads its first snapshot. */
  static async create(
    config: DirectoryConfigInput,
    options: DirectoryOptions = {},
  ): Promise<RouteServerDirectory> {
    const directory = new RouteServerDirectory(config, options);
    await directory.refresh();
    return directory;
  }

  /** The snapshot from the most recent refresh. */
  get snapshot(): Snapshot {
    return this.last;
  }

  async refresh(): Promise<Snapshot> {
    const sequence = ++this.started;
    const fetchedAt = this.now();
    const endpoints = await Promise.all(
      this.config.endpoints.map((endpoint) => this.fetchEndpoint(endpoint)),
    );
    const snapshot: Snapshot = { fetchedAt, endpoints };
    // An overlapping refresh that started later may already have landed.
    if (sequence > this.lastStarted) {
      this.last = snapshot;
      this.lastStarted = sequence;
    }

    const errored = endpoints.filter((endpoint) => endpoint.status === "errored").length;
    this.log.debug({ endpoints: endpoints.length, errored }, "route servers refreshed");
    return snapshot;
  }

  /**
   * Returns the last snapshot while it is younger than `cacheTtlMs`, and a
   * fresh one otherwise. With the default TTL of 0 this always refreshes.
   */
  async current(): Promise<Snapshot> {
    const ttl = this.config.cacheTtlMs;
    if (ttl > 0 && this.last !== EMPTY_SNAPSHOT && this.now() - this.last.fetchedAt < ttl) {
      return this.last;
    }
    return this.refresh();
  }

  async lookupAsn(input: number | string): Promise<LookupResult> {
    const asn = parseAsn(input);
    if (asn === null) {
      return { kind: "invalid-input", input: String(input) };
    }
    return findAsn(await this.current(), asn);
  }

  asnIndex(): Map<number, AsnIndexEntry> {
    return buildAsnIndex(this.last);
  }

  ipIndex(): Map<string, IpIndexEntry> {
    return buildIpIndex(this.last);
  }

  private async fetchEndpoint(endpoint: EndpointConfig): Promise<EndpointState> {
    const { location, routeServer, url } = endpoint;
    const errored = (error: EndpointError): EndpointState => {
      this.log.warn({ location, routeServer, url, err: error }, "route server unavailable");
      return { status: "errored", location, routeServer, url, error };
    };

    if (!url) {
      return errored(new EndpointUnreachableError(location, routeServer, "no URL configured"));
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.config.timeoutMs) });
    } catch (error) {
      return errored(
        new EndpointUnreachableError(location, routeServer, "request failed", { cause: error }),
      );
    }
    if (!response.ok) {
      return errored(
        new EndpointUnreachableError(location, routeServer, `status ${response.status}`),
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      return errored(
        new EndpointMalformedResponseError(location, routeServer, "body is not JSON", {
          cause: error,
        }),
      );
    }

    const parsed = parseSessionPayload(body);
    if (!parsed.ok) {
      return errored(new EndpointMalformedResponseError(location, routeServer, parsed.reason));
    }
    return { status: "populated", location, routeServer, url, sessions: parsed.sessions };
  }
}

/**
 * Scans a snapshot for sessions with `asn`, keeping the first match per route
 * server. The display name is the description of the last row.
 */
export function findAsn(snapshot: Snapshot, asn: number): LookupResult {
  const rows: PeeringRow[] = [];
  let name: string | null = null;

  for (const endpoint of snapshot.endpoints) {
    if (endpoint.status !== "populated") continue;
    const session = Object.values(endpoint.sessions).find((record) => record.neighbor_as === asn);
    if (!session) continue;
    rows.push({
      location: endpoint.location,
      routeServer: endpoint.routeServer,
      state: session.state ?? null,
    });
    name = session.description ?? null;
  }

  if (rows.length === 0) return { kind: "not-found", asn };
  return { kind: "found", asn, rows, name };
}

export function buildAsnIndex(snapshot: Snapshot): Map<number, AsnIndexEntry> {
  const index = new Map<number, AsnIndexEntry>();
  for (const endpoint of snapshot.endpoints) {
    if (endpoint.status !== "populated") continue;
    const label = `${endpoint.location} - ${endpoint.routeServer}`;
    for (const session of Object.values(endpoint.sessions)) {
      if (session.neighbor_as === undefined) continue;
      const locations = index.get(session.neighbor_as)?.locations ?? [];
      locations.push(label);
      index.set(session.neighbor_as, { description: session.description ?? null, locations });
    }
  }
  return index;
}

export function buildIpIndex(snapshot: Snapshot): Map<string, IpIndexEntry> {
  const index = new Map<string, IpIndexEntry>();
  for (const endpoint of snapshot.endpoints) {
    if (endpoint.status !== "populated") continue;
    for (const session of Object.values(endpoint.sessions)) {
      if (session.neighbor_address === undefined) continue;
      index.set(session.neighbor_address, {
        description: session.description ?? null,
        location: endpoint.location,
      });
    }
  }
  return index;
}

export function summarizeEndpoints(snapshot: Snapshot): EndpointStatus[] {
  return snapshot.endpoints.map((endpoint): EndpointStatus =>
    endpoint.status === "populated"
      ? {
          location: endpoint.location,
          routeServer: endpoint.routeServer,
          status: "populated",
          sessions: Object.keys(endpoint.sessions).length,
        }
      : {
          location: endpoint.location,
          routeServer: endpoint.routeServer,
          status: "errored",
          error: { kind: endpoint.error.kind, message: endpoint.error.message },
        },
  );
}
