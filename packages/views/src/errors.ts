export class UnknownSegmentError extends Error {
  readonly code = "UNKNOWN_SEGMENT";
  readonly dimension: "channel" | "region";
  readonly value: string;

  constructor(dimension: "channel" | "region", value: string, available: readonly string[]) {
    super(
      `UNKNOWN_SEGMENT: ${dimension} '${value}' not in current view (available: ${available.join(", ") || "none"})`
    );
    this.name = "UnknownSegmentError";
    this.dimension = dimension;
    this.value = value;
  }
}
