import { bySegment, type SummaryRow } from "../../compute/src/aggregate.js";
import { compareCodepoints } from "../../compute/src/compare.js";
import { filterSummary, listChannels, listRegions } from "../../compute/src/filter.js";
import { kpis, type KpiBundle } from "../../compute/src/kpis.js";
import type { SegmentSimulation, SimulationParams } from "../../simulate/src/types.js";
import { resolveSimulationParams } from "../../simulate/src/params.js";
import { segmentBaseline, simulateSegment } from "../../simulate/src/segment.js";
import { resolveSelection } from "./selection.js";
import { UnknownSegmentError } from "./errors.js";

export type ViewFilters = {
  channels?: readonly string[];
  regions?: readonly string[];
};

export type OverviewView = {
  channels: string[];
  regions: string[];
  rows: SummaryRow[];
  kpis: KpiBundle;
  simulation: SegmentSimulation;
};

export type SegmentView =
  | { status: "EMPTY"; dimension: "channel" | "region" }
  | {
      status: "OK";
      dimension: "channel" | "region";
      options: string[];
      selected: string;
      rows: SummaryRow[];
      kpis: KpiBundle;
      simulation: SegmentSimulation;
    };

/**
 * Filtered total across all selected channels and regions.
 * The simulation baseline is the filtered total.
 */
export function buildOverview(
  summary: readonly SummaryRow[],
  filters: ViewFilters = {},
  params: Partial<SimulationParams> = {}
): OverviewView {
  const channels = resolveSelection(listChannels(summary), filters.channels);
  const regions = resolveSelection(listRegions(summary), filters.regions);
  const rows = filterSummary(summary, channels, regions).sort(bySegment);

  return {
    channels,
    regions,
    rows,
    kpis: kpis(rows),
    simulation: simulateSegment(segmentBaseline(rows), resolveSimulationParams(params)),
  };
}

/** One channel, aggregated across its regions. */
export function buildChannelView(
  filtered: readonly SummaryRow[],
  channel?: string,
  params: Partial<SimulationParams> = {}
): SegmentView {
  return buildSegmentView(filtered, "channel", channel, params);
}

/** One region, aggregated across its channels. */
export function buildRegionView(
  filtered: readonly SummaryRow[],
  region?: string,
  params: Partial<SimulationParams> = {}
): SegmentView {
  return buildSegmentView(filtered, "region", region, params);
}

function buildSegmentView(
  filtered: readonly SummaryRow[],
  dimension: "channel" | "region",
  requested: string | undefined,
  params: Partial<SimulationParams>
): SegmentView {
  const options = dimension === "channel" ? listChannels(filtered) : listRegions(filtered);
  const first = options[0];
  if (first === undefined) return { status: "EMPTY", dimension };

  const selected = requested ?? first;
  if (!options.includes(selected)) throw new UnknownSegmentError(dimension, selected, options);

  // Within a channel rows are ordered by region, and the other way round.
  const other = dimension === "channel" ? "region" : "channel";
  const rows = filtered
    .filter((r) => r[dimension] === selected)
    .sort((a, b) => compareCodepoints(a[other], b[other]));

  return {
    status: "OK",
    dimension,
    options,
    selected,
    rows,
    kpis: kpis(rows),
    simulation: simulateSegment(segmentBaseline(rows), resolveSimulationParams(params)),
  };
}
