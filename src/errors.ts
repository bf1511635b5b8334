export class ComposeFileNotFoundError extends Error {
  constructor(
    public filePath: string,
    message?: string,
  ) {
    super(message || `Compose file not found: ${filePath}`);
    this.name = "ComposeFileNotFoundError";
  }
}

export class ComposeParseError extends Error {
  constructor(
    public filePath: string,
    public cause?: unknown,
    message?: string,
  ) {
    super(
      message ||
        `Failed to parse compose file: ${filePath}` +
          (cause instanceof Error ? `: ${cause.message}` : ""),
    );
    this.name = "ComposeParseError";
  }
}

export class ComposeValidationError extends Error {
  constructor(
    public issues: string[],
    message?: string,
  ) {
    super(message || `Compose file validation failed: ${issues.join(", ")}`);
    this.name = "ComposeValidationError";
  }
}

export class SecretNotFoundError extends Error {
  constructor(
    public secretName: string,
    message?: string,
  ) {
    super(message || `secret '${secretName}' not found in project secrets`);
    this.name = "SecretNotFoundError";
  }
}

export class ExternalSecretError extends Error {
  constructor(
    public secretName: string,
    message?: string,
  ) {
    super(message || `external secrets are not supported: ${secretName}`);
    this.name = "ExternalSecretError";
  }
}

export class SecretFileReadError extends Error {
  constructor(
    public secretName: string,
    public filePath: string,
    public cause?: unknown,
    message?: string,
  ) {
    super(
      message ||
        `read secret from file '${filePath}'` +
          (cause instanceof Error ? `: ${cause.message}` : ""),
    );
    this.name = "SecretFileReadError";
  }
}

export class SecretValidationError extends Error {
  constructor(
    public reason: string,
    message?: string,
  ) {
    super(message || reason);
    this.name = "SecretValidationError";
  }
}

export class ServicePlanError extends Error {
  constructor(
    public serviceName: string,
    public cause?: unknown,
    message?: string,
  ) {
    super(
      message ||
        `service '${serviceName}'` +
          (cause instanceof Error ? `: ${cause.message}` : ""),
    );
    this.name = "ServicePlanError";
  }
}

export class ServiceNotFoundError extends Error {
  constructor(
    public serviceName: string,
    public availableServices?: string[],
    message?: string,
  ) {
    super(
      message ||
        `Service not found: ${serviceName}` +
          (availableServices && availableServices.length > 0
            ? `. Available services: ${availableServices.join(", ")}`
            : ""),
    );
    this.name = "ServiceNotFoundError";
  }
}

export class UnsupportedPlatformError extends Error {
  constructor(
    public platform: string,
    public operation: string,
    message?: string,
  ) {
    super(message || `${operation}: not supported on ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

export class CompatibilityCheckError extends Error {
  constructor(
    public warningCount: number,
    message?: string,
  ) {
    super(
      message ||
        `${warningCount} compatibility warning${warningCount === 1 ? "" : "s"} found (strict mode)`,
    );
    this.name = "CompatibilityCheckError";
  }
}

// ANSI color codes
const colors = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
};

const knownErrors = [
  ComposeFileNotFoundError,
  ComposeParseError,
  ComposeValidationError,
  SecretNotFoundError,
  ExternalSecretError,
  SecretFileReadError,
  SecretValidationError,
  ServicePlanError,
  ServiceNotFoundError,
  UnsupportedPlatformError,
  CompatibilityCheckError,
];

function isKnownError(error: unknown): error is Error {
  return knownErrors.some((ErrorClass) => error instanceof ErrorClass);
}

export function formatError(error: unknown, showStackTrace = false): string {
  const symbol = "✗";

  if (isKnownError(error)) {
    const errorType = error.name.replace(/Error$/, "");

    let output = `${colors.red}${colors.bold}${symbol} ${errorType}${colors.reset}\n`;
    output += `${colors.dim}${error.message}${colors.reset}`;

    if (showStackTrace && error.stack) {
      output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
    }

    return output;
  }

  // Unknown error type
  const errorName =
    error instanceof Error ? error.constructor.name : typeof error;
  const errorMessage = error instanceof Error ? error.message : String(error);

  let output = `${colors.red}${colors.bold}${symbol} Unexpected Error: ${errorName}${colors.reset}\n`;
  output += `${colors.dim}${errorMessage}${colors.reset}`;

  if (showStackTrace && error instanceof Error && error.stack) {
    output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
  }

  return output;
}
