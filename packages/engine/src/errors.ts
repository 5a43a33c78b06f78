export class LoanError extends Error {
  constructor(
    public code: string,
    message: string,
    public details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends LoanError {
  constructor(
    public field: string,
    message: string,
  ) {
    super('CONFIGURATION_ERROR', message, { field });
  }
}

export class InvalidTermError extends LoanError {
  constructor(public term: number) {
    super('INVALID_TERM', `Term must be positive, got ${term}`, { term });
  }
}

export class ParseError extends LoanError {
  constructor(
    public input: string,
    message: string,
  ) {
    super('PARSE_ERROR', message, { input });
  }
}

/**
 * The period loop hit its safety bound (twice the nominal term) with a balance
 * still outstanding. Raised instead of returning a truncated schedule.
 */
export class SimulationDivergenceError extends LoanError {
  constructor(
    public periodIndex: number,
    public balance: string,
  ) {
    super(
      'SIMULATION_DIVERGENCE',
      `Schedule did not converge: balance ${balance} still outstanding at period ${periodIndex}`,
      { periodIndex, balance },
    );
  }
}
