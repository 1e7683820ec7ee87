/**
 * VPC Atlas — Error Types
 */

/** A configuration value failed validation. Raised before any work starts. */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/** Every requested region failed discovery. */
export class DiscoveryFailedError extends Error {
  constructor(
    message: string,
    public readonly failures: Array<{ region: string; error: string }>,
  ) {
    super(message);
    this.name = "DiscoveryFailedError";
  }
}

/** The topology could not be built consistently; no partial result exists. */
export class TopologyBuildError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = "TopologyBuildError";
  }
}

/**
 * Format an error message from any thrown value.
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
