export interface ErrorContext {
  repository?: string;
  branch?: string;
}

export class CanopyError extends Error {
  readonly repository?: string;
  readonly branch?: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = "CanopyError";
    this.repository = context.repository;
    this.branch = context.branch;
  }
}

/** A single repository could not be read; the scan goes on without it. */
export class DiscoveryError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "DiscoveryError";
  }
}

export class InspectionError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "InspectionError";
  }
}

export class UnsafeRemovalError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "UnsafeRemovalError";
  }
}

export class AlreadyExistsError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "AlreadyExistsError";
  }
}

export class NotFoundError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "NotFoundError";
  }
}

export class InvalidBranchNameError extends CanopyError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "InvalidBranchNameError";
  }
}

export class ConfigError extends CanopyError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
