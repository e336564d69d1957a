import type { Found } from "./types.js";

export const TABLE_COLUMNS = ["City", "Route Server", "BGP State"] as const;

export type RenderedTable = {
  table: string;
  caption: string;
};

function border(widths: number[]): string {
  return `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
}

function line(cells: readonly string[], widths: number[]): string {
  return `|${cells.map((cell, i) => ` ${cell.padEnd(widths[i] ?? 0)} `).join("|")}|`;
}

/**
 * Renders one row per route server carrying the ASN. The caption is the
 * peer's description, or `AS<asn>` when the sessions have none.
 */
export function renderTable(result: Found): RenderedTable {
  const rows = result.rows.map((row) => [row.location, row.routeServer, row.state ?? ""]);
  const widths = TABLE_COLUMNS.map((column, i) =>
    Math.max(column.length, ...rows.map((row) => row[i]?.length ?? 0)),
  );

  const rule = border(widths);
  const table = [
    rule,
    line(TABLE_COLUMNS, widths),
    rule,
    ...rows.map((row) => line(row, widths)),
    rule,
  ].join("\n");

  return { table, caption: result.name ?? `AS${result.asn}` };
}
