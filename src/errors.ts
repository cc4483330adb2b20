import type { BackendKind } from "./types.js";

export class ShrinkError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ShrinkError";
  }
}

/** Raised while constructing a backend whose library or executable is missing. */
export class BackendUnavailableError extends ShrinkError {
  constructor(
    public readonly backend: BackendKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super("BACKEND_UNAVAILABLE", message, options);
    this.name = "BackendUnavailableError";
  }
}

export interface BackendFailure {
  backend: BackendKind;
  reason: string;
}

export class NoBackendAvailableError extends ShrinkError {
  constructor(public readonly failures: BackendFailure[]) {
    const lines = failures.map((f) => `  - ${f.backend}: ${f.reason}`);
    super("NO_BACKEND", ["No image backend available:", ...lines].join("\n"));
    this.name = "NoBackendAvailableError";
  }
}

export class AccessError extends ShrinkError {
  constructor(public readonly file: string, message: string, options?: ErrorOptions) {
    super("ACCESS", message, options);
    this.name = "AccessError";
  }
}

export class DecodeError extends ShrinkError {
  constructor(public readonly file: string, message: string, options?: ErrorOptions) {
    super("DECODE", message, options);
    this.name = "DecodeError";
  }
}

export class ExternalToolExecutionError extends ShrinkError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super("EXTERNAL_TOOL", message, options);
    this.name = "ExternalToolExecutionError";
  }
}

export class ConfigError extends ShrinkError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export class ScanError extends ShrinkError {
  constructor(message: string, options?: ErrorOptions) {
    super("SCAN", message, options);
    this.name = "ScanError";
  }
}

export class UsageError extends ShrinkError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
