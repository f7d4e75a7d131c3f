/**
 * Configuration errors raised while planning a network ACL.
 * All of them are fatal: nothing is declared to Pulumi once one is thrown.
 */

export class ConfigurationError extends Error {
  constructor(
    public readonly input: string,
    public readonly constraint: string
  ) {
    super(`${input}: ${constraint}`);
    this.name = "ConfigurationError";
  }
}

// Two rules resolving to the same key, or to the same number in one direction.
export class RuleConflictError extends ConfigurationError {
  constructor(input: string, constraint: string) {
    super(input, constraint);
    this.name = "RuleConflictError";
  }
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration is invalid:\n${issues.map((issue) => `- ${issue}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}
