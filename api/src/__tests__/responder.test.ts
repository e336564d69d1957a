import { describe, expect, it, vi } from "vitest";
import { createResponder } from "../responder.js";
import { renderTable } from "../table.js";
import type { Found, LookupResult } from "../types.js";

const found: Found = {
  kind: "found",
  asn: 64500,
  rows: [{ location: "SYD", routeServer: "rs1", state: "Established" }],
  name: "ExampleNet",
};

function directoryReturning(result: LookupResult) {
  return { lookupAsn: vi.fn(async (_asn: number | string) => result) };
}

describe("createResponder", () => {
  it("asks for a valid ASN without looking anything up", async () => {
    const directory = directoryReturning(found);
    const { onMessage } = createResponder(directory);

    expect(await onMessage("not-a-number")).toEqual({
      kind: "advisory",
      body: "Please enter a valid ASN!",
      caption: "Response",
    });
    expect(directory.lookupAsn).not.toHaveBeenCalled();
  });

  it("answers special-case ASNs without looking them up", async () => {
    const directory = directoryReturning(found);
    const { onMessage } = createResponder(directory);

    expect(await onMessage("1221")).toEqual({
      kind: "advisory",
      body: "The day AS1221 peers on these Route Servers is the day pigs fly..",
      caption: "No Chance",
    });
    expect(directory.lookupAsn).not.toHaveBeenCalled();
  });

  it("accepts custom special cases", async () => {
    const { onMessage } = createResponder(directoryReturning(found), {
      specialCases: new Map([[64496, { body: "Documentation ASN.", caption: "Docs" }]]),
    });

    expect(await onMessage(64496)).toEqual({
      kind: "advisory",
      body: "Documentation ASN.",
      caption: "Docs",
    });
  });

  it("reports an ASN that is on no route server", async () => {
    const { onMessage } = createResponder(directoryReturning({ kind: "not-found", asn: 9999 }));

    expect(await onMessage(9999)).toEqual({
      kind: "advisory",
      body: "AS9999 is not present on any Route Servers..",
      caption: "Response",
    });
  });

  it("names the peering contact when one is configured", async () => {
    const { onMessage } = createResponder(directoryReturning({ kind: "not-found", asn: 9999 }), {
      peeringContact: "peering@example.net",
    });

    const message = await onMessage("9999");
    expect(message.body).toBe(
      "AS9999 is not present on any Route Servers.. perhaps they should email peering@example.net?",
    );
  });

  it("returns the rendered table in a code block captioned with the peer name", async () => {
    const directory = directoryReturning(found);
    const { onMessage } = createResponder(directory);

    expect(await onMessage("64500")).toEqual({
      kind: "table",
      body: `\`\`\`\n${renderTable(found).table}\n\`\`\``,
      caption: "ExampleNet",
    });
    expect(directory.lookupAsn).toHaveBeenCalledWith(64500);
  });
});
