import Fastify, { type FastifyInstance } from "fastify";
import { loadConfig, type ServerConfig } from "./config.js";
import {
  RouteServerDirectory,
  buildAsnIndex,
  buildIpIndex,
  summarizeEndpoints,
} from "./directory.js";
import { createResponder, type Responder } from "./responder.js";
import type { AsnIndexEntry, IpIndexEntry } from "./types.js";

export type AppDependencies = {
  config: ServerConfig;
  directory?: RouteServerDirectory;
  responder?: Responder;
};

type AsnParams = { Params: { asn: string } };

function setupApp(app: FastifyInstance, directory: RouteServerDirectory, responder: Responder) {
  app.get<AsnParams>("/api/lookup/:asn", async (request, reply) => {
    const result = await directory.lookupAsn(request.params.asn);
    if (result.kind === "invalid-input") {
      reply.code(400);
    } else if (result.kind === "not-found") {
      reply.code(404);
    }
    return result;
  });

  app.get<AsnParams>("/api/message/:asn", async (request) => responder.onMessage(request.params.asn));

  app.get("/api/asns", async () => {
    const index = buildAsnIndex(await directory.current());
    const body: Record<string, AsnIndexEntry> = {};
    for (const [asn, entry] of index) {
      body[String(asn)] = entry;
    }
    return body;
  });

  app.get("/api/ips", async () => {
    const index = buildIpIndex(await directory.current());
    const body: Record<string, IpIndexEntry> = {};
    for (const [ip, entry] of index) {
      body[ip] = entry;
    }
    return body;
  });

  app.get("/api/endpoints", async () => summarizeEndpoints(await directory.current()));
}

export async function createApp(
  overrides: Partial<AppDependencies> = {},
): Promise<FastifyInstance> {
  const config = overrides.config ?? loadConfig();

  const app = Fastify({ logger: { level: config.logLevel } });

  const directory =
    overrides.directory ??
    (await RouteServerDirectory.create(config.directory, { logger: app.log }));
  const responder = overrides.responder ?? createResponder(directory, config.responder);

  setupApp(app, directory, responder);

  return app;
}
