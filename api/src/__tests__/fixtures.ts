import { vi } from "vitest";
import { pino } from "pino";

export const silentLogger = () => pino({ level: "silent" });

export type Route = () => Response | Promise<Response>;

export const json = (body: unknown, status = 200): Route => () =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

export const text = (body: string, status = 200): Route => () =>
  new Response(body, { status, headers: { "content-type": "text/html" } });

export const refused: Route = () => {
  throw new TypeError("fetch failed");
};

export function sessions(...records: Array<Record<string, unknown>>) {
  const protocols: Record<string, Record<string, unknown>> = {};
  records.forEach((record, i) => {
    protocols[`s${i + 1}`] = record;
  });
  return { protocols };
}

/** In-process stand-in for the route server status endpoints, keyed by URL. */
export function fakeUpstream(routes: Record<string, Route>) {
  return vi.fn(async (url: string, _init: { signal: AbortSignal }) => {
    const route = routes[url];
    if (!route) {
      throw new TypeError("fetch failed");
    }
    return route();
  });
}

export const EXAMPLE_NET = {
  neighbor_as: 64500,
  description: "ExampleNet",
  state: "Established",
  neighbor_address: "203.0.113.1",
};
