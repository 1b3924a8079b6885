export class InvalidElasticityDomainError extends Error {
  readonly code = "INVALID_ELASTICITY_DOMAIN";
  readonly price_delta: number;

  constructor(price_delta: number) {
    super(
      `INVALID_ELASTICITY_DOMAIN: price_delta must be greater than -1 (got ${price_delta})`
    );
    this.name = "InvalidElasticityDomainError";
    this.price_delta = price_delta;
  }
}

export class InvalidSimulationParamsError extends Error {
  readonly code = "INVALID_SIMULATION_PARAMS";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`INVALID_SIMULATION_PARAMS: ${issues.join("; ")}`);
    this.name = "InvalidSimulationParamsError";
    this.issues = issues;
  }
}
