import type { ResponderConfig } from "./config.js";
import { parseAsn, type RouteServerDirectory } from "./directory.js";
import { renderTable } from "./table.js";
import type { ResponderMessage } from "./types.js";

export type AsnLookup = Pick<RouteServerDirectory, "lookupAsn">;

export type ResponderOptions = ResponderConfig & {
  specialCases?: ReadonlyMap<number, { body: string; caption: string }>;
};

export const DEFAULT_SPECIAL_CASES: ReadonlyMap<number, { body: string; caption: string }> =
  new Map([
    [
      1221,
      {
        body: "The day AS1221 peers on these Route Servers is the day pigs fly..",
        caption: "No Chance",
      },
    ],
  ]);

const advisory = (body: string, caption = "Response"): ResponderMessage => ({
  kind: "advisory",
  body,
  caption,
});

/**
 * Answers a chat command with either an advisory line or a rendered table,
 * each paired with a caption for the reply.
 */
export function createResponder(directory: AsnLookup, options: ResponderOptions = {}) {
  const specialCases = options.specialCases ?? DEFAULT_SPECIAL_CASES;

  async function onMessage(input: number | string): Promise<ResponderMessage> {
    const asn = parseAsn(input);
    if (asn === null) {
      return advisory("Please enter a valid ASN!");
    }

    const special = specialCases.get(asn);
    if (special) {
      return advisory(special.body, special.caption);
    }

    const result = await directory.lookupAsn(asn);
    switch (result.kind) {
      case "invalid-input":
        return advisory("Please enter a valid ASN!");
      case "not-found": {
        const hint = options.peeringContact
          ? ` perhaps they should email ${options.peeringContact}?`
          : "";
        return advisory(`AS${asn} is not present on any Route Servers..${hint}`);
      }
      case "found": {
        const { table, caption } = renderTable(result);
        return { kind: "table", body: `\`\`\`\n${table}\n\`\`\``, caption };
      }
    }
  }

  return { onMessage };
}

export type Responder = ReturnType<typeof createResponder>;
