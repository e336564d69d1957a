import { z } from "zod";

/**
 * Route servers per location, in lookup order.
 */
export const DEFAULT_LAYOUT: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["SYD", ["rs1", "rs2"]],
  ["MEL", ["rs1", "rs2"]],
  ["ADL", ["rs1", "rs2"]],
  ["BNE", ["rs1", "rs2"]],
  ["PER", ["rs1", "rs2"]],
  ["DRW", ["rs1"]],
  ["HBA", ["rs1"]],
];

export const EndpointConfigSchema = z.object({
  location: z.string().min(1),
  routeServer: z.string().min(1),
  url: z.string().min(1).optional(),
});

type EndpointConfigEntry = z.infer<typeof EndpointConfigSchema>;

/**
 * Endpoints are keyed by (location, route server) and iterated grouped by
 * location, in the order each location first appears.
 */
const EndpointListSchema = z
  .array(EndpointConfigSchema)
  .superRefine((endpoints, ctx) => {
    const seen = new Set<string>();
    endpoints.forEach((endpoint, i) => {
      const key = `${endpoint.location}/${endpoint.routeServer}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i],
          message: `duplicate route server ${key}`,
        });
      }
      seen.add(key);
    });
  })
  .transform((endpoints) => {
    const byLocation = new Map<string, EndpointConfigEntry[]>();
    for (const endpoint of endpoints) {
      const group = byLocation.get(endpoint.location) ?? [];
      group.push(endpoint);
      byLocation.set(endpoint.location, group);
    }
    return [...byLocation.values()].flat();
  });

export const DirectoryConfigSchema = z.object({
  endpoints: EndpointListSchema,
  timeoutMs: z.number().int().positive().default(5000),
  cacheTtlMs: z.number().int().nonnegative().default(0),
});

export type DirectoryConfig = z.infer<typeof DirectoryConfigSchema>;
export type DirectoryConfigInput = z.input<typeof DirectoryConfigSchema>;

export const ResponderConfigSchema = z.object({
  peeringContact: z.string().min(1).optional(),
});

export type ResponderConfig = z.infer<typeof ResponderConfigSchema>;

export const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  directory: DirectoryConfigSchema,
  responder: ResponderConfigSchema,
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const LayoutSchema = z
  .string()
  .transform((value, ctx) => {
    // A location listed twice contributes its route servers to its first entry.
    const layout = new Map<string, string[]>();
    for (const part of value.split(";")) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      const fields = trimmed.split(":");
      const location = fields[0]?.trim() ?? "";
      const routeServers = (fields[1] ?? "")
        .split(",")
        .map((server) => server.trim())
        .filter((server) => server.length > 0);
      if (fields.length !== 2 || !location || routeServers.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected LOCATION:rs1,rs2 but got "${trimmed}"`,
        });
        return z.NEVER;
      }
      layout.set(location, [...(layout.get(location) ?? []), ...routeServers]);
    }
    return [...layout.entries()];
  });

export function endpointEnvKey(location: string, routeServer: string): string {
  return `${location}_${routeServer}`.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Reads the server configuration from environment variables. Endpoint URLs
 * come from `<LOCATION>_<ROUTESERVER>` (e.g. `SYD_RS1`); an unset URL is kept
 * as an endpoint without a URL, which refreshes as unreachable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const layoutValue = envValue(env, "ROUTE_SERVERS");
  const layout: ReadonlyArray<readonly [string, readonly string[]]> =
    layoutValue === undefined ? DEFAULT_LAYOUT : LayoutSchema.parse(layoutValue);

  const endpoints = layout.flatMap(([location, routeServers]) =>
    routeServers.map((routeServer) => ({
      location,
      routeServer,
      url: envValue(env, endpointEnvKey(location, routeServer)),
    })),
  );

  return ServerConfigSchema.parse({
    host: envValue(env, "HOST"),
    port: envValue(env, "PORT"),
    logLevel: envValue(env, "LOG_LEVEL"),
    directory: {
      endpoints,
      timeoutMs: numberValue(env, "FETCH_TIMEOUT_MS"),
      cacheTtlMs: numberValue(env, "CACHE_TTL_MS"),
    },
    responder: {
      peeringContact: envValue(env, "PEERING_CONTACT"),
    },
  });
}

function numberValue(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = envValue(env, key);
  return value === undefined ? undefined : Number(value);
}
