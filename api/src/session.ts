import { z } from "zod";
import type { SessionRecord, SessionTable } from "./types.js";

// Upstream sends null for fields a session does not carry; both mean absent.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

export const SessionRecordSchema = z.object({
  neighbor_as: optional(z.number().int()),
  description: optional(z.string()),
  state: optional(z.string()),
  neighbor_address: optional(z.string()),
});

export const SessionPayloadSchema = z.object({
  protocols: z.record(z.string(), SessionRecordSchema),
});

export type ParsedSessions =
  | { ok: true; sessions: SessionTable }
  | { ok: false; reason: string };

export function parseSessionPayload(raw: unknown): ParsedSessions {
  const parsed = SessionPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
    return { ok: false, reason: `${path}: ${issue?.message ?? "invalid payload"}` };
  }
  const sessions: SessionTable = {};
  for (const [id, record] of Object.entries(parsed.data.protocols)) {
    sessions[id] = compact(record);
  }
  return { ok: true, sessions };
}

function compact(record: z.infer<typeof SessionRecordSchema>): SessionRecord {
  const session: SessionRecord = {};
  if (record.neighbor_as !== undefined) session.neighbor_as = record.neighbor_as;
  if (record.description !== undefined) session.description = record.description;
  if (record.state !== undefined) session.state = record.state;
  if (record.neighbor_address !== undefined) session.neighbor_address = record.neighbor_address;
  return session;
}
