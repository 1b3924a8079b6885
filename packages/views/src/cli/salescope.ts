// packages/views/src/cli/salescope.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import { parseOrders } from "../../../orders/src/validate.js";
import { OrderValidationError, SchemaError } from "../../../orders/src/errors.js";
import { aggregate, type SummaryRow } from "../../../compute/src/aggregate.js";
import { InvalidElasticityDomainError, InvalidSimulationParamsError } from "../../../simulate/src/errors.js";
import type { SimulationParams } from "../../../simulate/src/types.js";
import { explainKpis, roundSummaryRows, type MetricLine } from "../../../explain/src/explain-kpis.js";
import { explainSimulation } from "../../../explain/src/explain-simulation.js";
import { buildChannelView, buildOverview, buildRegionView, type SegmentView } from "../views.js";
import { parseSelectionList } from "../selection.js";
import { UnknownSegmentError } from "../errors.js";

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
  readFile: (absPath: string) => string;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => console.error(text),
  readFile: (absPath) => fs.readFileSync(absPath, "utf8"),
};

type Command = "summary" | "overview" | "channel" | "region";

type CliArgs = {
  file: string;
  command: Command;
  segment?: string;
  channels?: string[];
  regions?: string[];
  params: Partial<SimulationParams>;
  json: boolean;
};

class UsageError extends Error {}
class InputFileError extends Error {}

function usage(): string {
  return `salescope - sales summaries and price-elasticity simulation

Usage:
  salescope --help
  salescope <orders.json> [summary|overview] [options]
  salescope <orders.json> channel [<name>] [options]
  salescope <orders.json> region [<name>] [options]

Options:
  --channels <a,b>      channels to include (default: all)
  --regions <x,y>       regions to include (default: all)
  --delta <n>           fractional price change (default: 0.05)
  --elasticity <n>      demand elasticity (default: 1.2)
  --json                print JSON instead of text

Examples:
  salescope orders.json
  salescope orders.json overview --regions West,Midwest --delta -0.1
  salescope orders.json channel Online --elasticity 1.8 --json
`;
}

// -------------------- argument parsing --------------------

const VALUE_FLAGS = new Set(["--channels", "--regions", "--delta", "--elasticity"]);

function toCommand(x: string): Command {
  if (x === "summary" || x === "overview" || x === "channel" || x === "region") return x;
  throw new UsageError(`Unknown command "${x}"`);
}

export function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === undefined) continue;
    if (a === "--json") {
      json = true;
    } else if (VALUE_FLAGS.has(a)) {
      const next = args[i + 1];
      if (next === undefined) throw new UsageError(`Missing value for ${a}`);
      values.set(a, next);
      i++;
    } else if (a.startsWith("--")) {
      throw new UsageError(`Unknown option ${a}`);
    } else {
      positional.push(a);
    }
  }

  const [file, cmd, segment, ...rest] = positional;
  if (!file) throw new UsageError("Missing orders file.");
  const command = cmd === undefined ? "overview" : toCommand(cmd);
  if (segment !== undefined && command !== "channel" && command !== "region") {
    throw new UsageError(`"${command}" takes no segment name`);
  }
  if (rest.length) throw new UsageError(`Unexpected argument "${rest[0]}"`);
  if (command === "summary" && values.size) {
    throw new UsageError(`"summary" takes no ${[...values.keys()].join(", ")}`);
  }

  return {
    file,
    command,
    segment,
    channels: parseSelectionList(values.get("--channels")),
    regions: parseSelectionList(values.get("--regions")),
    params: {
      price_delta: numberFlag(values, "--delta"),
      elasticity: numberFlag(values, "--elasticity"),
    },
    json,
  };
}

function numberFlag(values: Map<string, string>, flag: string): number | undefined {
  const raw = values.get(flag);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || Number.isNaN(n)) throw new UsageError(`${flag} expects a number (got "${raw}")`);
  return n;
}

// -------------------- rendering --------------------

function renderMetrics(lines: MetricLine[]): string {
  return lines.map((l) => `${l.label}: ${l.value}`).join("\n") + "\n";
}

function renderRows(rows: readonly SummaryRow[]): string {
  const header = ["channel", "region", "orders", "revenue", "profit", "AOV"];
  const body = roundSummaryRows(rows).map((r) => [
    r.channel,
    r.region,
    String(r.orders),
    r.revenue.toFixed(2),
    r.profit.toFixed(2),
    r.AOV.toFixed(2),
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...body.map((b) => (b[i] ?? "").length)));
  const fmtLine = (cells: string[]) =>
    cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join("  ").trimEnd();
  return [fmtLine(header), ...body.map(fmtLine)].join("\n") + "\n";
}

function renderSegment(v: SegmentView): string {
  if (v.status === "EMPTY") return `No ${v.dimension}s available with current filters.\n`;
  const sim = explainSimulation(v.simulation).map((l) => l.text).join("\n");
  return [
    renderMetrics(explainKpis(v.kpis, `${v.selected} – `)),
    `${sim}\n`,
    renderRows(v.rows),
  ].join("\n");
}

// -------------------- commands --------------------

function loadSummary(file: string, io: CliIo): SummaryRow[] {
  const abs = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = io.readFile(abs);
  } catch {
    throw new InputFileError(`file not found: ${file}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new InputFileError(`"${file}" is not valid JSON.`);
  }

  return aggregate(parseOrders(data));
}

function execute(a: CliArgs, io: CliIo): void {
  const summary = loadSummary(a.file, io);

  if (a.command === "summary") {
    io.out(a.json ? JSON.stringify(summary, null, 2) + "\n" : renderRows(summary));
    return;
  }

  const overview = buildOverview(summary, { channels: a.channels, regions: a.regions }, a.params);

  if (a.command === "overview") {
    if (a.json) {
      io.out(JSON.stringify(overview, null, 2) + "\n");
      return;
    }
    const sim = explainSimulation(overview.simulation).map((l) => l.text).join("\n");
    io.out(
      [renderMetrics(explainKpis(overview.kpis)), `${sim}\n`, renderRows(overview.rows)].join("\n")
    );
    return;
  }

  const view =
    a.command === "channel"
      ? buildChannelView(overview.rows, a.segment, a.params)
      : buildRegionView(overview.rows, a.segment, a.params);
  io.out(a.json ? JSON.stringify(view, null, 2) + "\n" : renderSegment(view));
}

function isReportable(e: unknown): e is Error {
  return (
    e instanceof UsageError ||
    e instanceof InputFileError ||
    e instanceof SchemaError ||
    e instanceof OrderValidationError ||
    e instanceof InvalidElasticityDomainError ||
    e instanceof InvalidSimulationParamsError ||
    e instanceof UnknownSegmentError
  );
}

/** Returns the process exit code. */
export function run(argv: string[] = process.argv, io: CliIo = defaultIo): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  try {
    execute(parseArgs(args), io);
    return 0;
  } catch (e) {
    if (!isReportable(e)) throw e;
    io.err(`[salescope] ${e.message}`);
    if (e instanceof UsageError) io.err(usage());
    return 1;
  }
}
