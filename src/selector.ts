import type { Backend } from "./backend.js";
import { BackendUnavailableError, NoBackendAvailableError } from "./errors.js";
import type { BackendFailure } from "./errors.js";
import { createMagickBackend } from "./magick-backend.js";
import { createSharpBackend } from "./sharp-backend.js";
import type { BackendConfig, BackendKind, Logger } from "./types.js";

export interface BackendCandidate {
  kind: BackendKind;
  create: (config: BackendConfig, logger: Logger) => Promise<Backend>;
}

export const DEFAULT_CANDIDATES: readonly BackendCandidate[] = [
  { kind: "sharp", create: (config, logger) => createSharpBackend(config, { logger }) },
  { kind: "imagemagick", create: (config, logger) => createMagickBackend(config, { logger }) },
];

export interface SelectBackendOptions {
  /** Try the external-tool backend before the in-process one. */
  preferExternal?: boolean;
  candidates?: readonly BackendCandidate[];
  logger?: Logger;
}

/**
 * Builds the first usable backend. The in-process backend goes first unless
 * `preferExternal` is set. Only BackendUnavailableError moves on to the next
 * candidate; when none is left, the collected reasons are thrown together.
 */
export async function selectBackend(
  config: BackendConfig,
  options: SelectBackendOptions = {},
): Promise<Backend> {
  const logger = options.logger ?? console;
  const candidates = [...(options.candidates ?? DEFAULT_CANDIDATES)];
  if (options.preferExternal) {
    candidates.reverse();
  }

  const failures: BackendFailure[] = [];
  for (const [index, candidate] of candidates.entries()) {
    try {
      const backend = await candidate.create(config, logger);
      logger.log(`Using ${candidate.kind} backend${index > 0 ? " (fallback)" : ""}`);
      return backend;
    } catch (err) {
      if (!(err instanceof BackendUnavailableError)) {
        throw err;
      }
      failures.push({ backend: candidate.kind, reason: err.message });
    }
  }

  throw new NoBackendAvailableError(failures);
}
