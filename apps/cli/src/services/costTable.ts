import type { CostRow, UsageDetailsDocument, UsageRecord } from "@cost-tracker/types";

export const TABLE_HEADER = "Date\t\tCost";
export const TABLE_SEPARATOR = "---------------------";
export const NO_COST_DATA = "No cost data found.";
export const INVALID_RECORD = "Invalid or missing data in response.";

export type FieldLookup =
  | { state: "present"; value: string }
  | { state: "absent" }
  | { state: "no-properties" };

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Reads `entry.properties[field]` as text. JSON null counts as absent. */
export function readProperty(entry: unknown, field: string): FieldLookup {
  if (!isObject(entry) || !isObject(entry.properties)) return { state: "no-properties" };
  const raw = entry.properties[field];
  if (typeof raw === "string") return { state: "present", value: raw };
  if (typeof raw === "number") return { state: "present", value: String(raw) };
  return { state: "absent" };
}

/** "2024-01-15T00:00:00Z" -> "2024-01-15"; strings without a T pass through. */
export function toUsageDate(usageStart: string): string {
  const t = usageStart.indexOf("T");
  return t === -1 ? usageStart : usageStart.slice(0, t);
}

export function toCostRow(entry: unknown): CostRow {
  const start = readProperty(entry, "usageStart");
  const cost = readProperty(entry, "pretaxCost");
  if (start.state !== "present" || cost.state !== "present") return { kind: "invalid" };
  const record: UsageRecord = { usageStart: toUsageDate(start.value), pretaxCost: cost.value };
  return { kind: "record", record };
}

export function usageEntries(doc: UsageDetailsDocument): unknown[] {
  return Array.isArray(doc.value) ? doc.value : [];
}

export function formatCostRow(row: CostRow): string {
  return row.kind === "record" ? `${row.record.usageStart}\t${row.record.pretaxCost}` : INVALID_RECORD;
}

function renderRows(rows: CostRow[]): string[] {
  const lines = [TABLE_HEADER, TABLE_SEPARATOR];
  if (rows.length === 0) {
    lines.push(NO_COST_DATA);
    return lines;
  }
  for (const row of rows) {
    lines.push(formatCostRow(row));
  }
  return lines;
}

export function renderCostTable(doc: UsageDetailsDocument): string[] {
  return renderRows(usageEntries(doc).map(toCostRow));
}

export type RenderSummary = { rows: number; invalidRows: number };

export function printCostTable(
  doc: UsageDetailsDocument,
  writeLine: (line: string) => void = console.log,
): RenderSummary {
  const rows = usageEntries(doc).map(toCostRow);
  renderRows(rows).forEach((l) => writeLine(l));
  return { rows: rows.length, invalidRows: rows.filter((r) => r.kind === "invalid").length };
}
