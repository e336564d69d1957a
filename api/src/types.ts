import type { EndpointError } from "./errors.js";

export type SessionRecord = {
  neighbor_as?: number;
  description?: string;
  state?: string;
  neighbor_address?: string;
};

export type SessionTable = Record<string, SessionRecord>;

export type EndpointConfig = {
  location: string;
  routeServer: string;
  url?: string;
};

export type PopulatedEndpoint = {
  status: "populated";
  location: string;
  routeServer: string;
  url?: string;
  sessions: SessionTable;
};

export type ErroredEndpoint = {
  status: "errored";
  location: string;
  routeServer: string;
  url?: string;
  error: EndpointError;
};

export type EndpointState = PopulatedEndpoint | ErroredEndpoint;

export type Snapshot = {
  fetchedAt: number;
  endpoints: readonly EndpointState[];
};

export type PeeringRow = {
  location: string;
  routeServer: string;
  state: string | null;
};

export type InvalidInput = { kind: "invalid-input"; input: string };
export type NotFound = { kind: "not-found"; asn: number };
export type Found = {
  kind: "found";
  asn: number;
  rows: PeeringRow[];
  name: string | null;
};

export type LookupResult = InvalidInput | NotFound | Found;

export type AsnIndexEntry = {
  description: string | null;
  locations: string[];
};

export type IpIndexEntry = {
  description: string | null;
  location: string;
};

export type EndpointStatus =
  | { location: string; routeServer: string; status: "populated"; sessions: number }
  | {
      location: string;
      routeServer: string;
      status: "errored";
      error: { kind: EndpointError["kind"]; message: string };
    };

export type ResponderMessage = {
  kind: "advisory" | "table";
  body: string;
  caption: string;
};
