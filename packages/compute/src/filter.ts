import type { SummaryRow } from "./aggregate.js";
import { compareCodepoints } from "./compare.js";

/**
 * Rows whose channel AND region are both selected.
 * Exact membership: an empty set selects nothing.
 */
export function filterSummary(
  summary: readonly SummaryRow[],
  channels: Iterable<string>,
  regions: Iterable<string>
): SummaryRow[] {
  const ch = new Set(channels);
  const rg = new Set(regions);
  return summary.filter((r) => ch.has(r.channel) && rg.has(r.region));
}

export function listChannels(rows: readonly SummaryRow[]): string[] {
  return distinctSorted(rows.map((r) => r.channel));
}

export function listRegions(rows: readonly SummaryRow[]): string[] {
  return distinctSorted(rows.map((r) => r.region));
}

function distinctSorted(xs: string[]): string[] {
  return [...new Set(xs)].sort(compareCodepoints);
}
