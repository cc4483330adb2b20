import fs from "node:fs/promises";
import fsSync from "node:fs";
import os from "node:os";
import path from "node:path";
import { AccessError, DecodeError, errorMessage } from "./errors.js";
import { computeTargetSize, imageFormatOf, withTempFile } from "./utils.js";
import type {
  BackendConfig,
  BackendKind,
  ConversionOutcome,
  Dimensions,
  FileRecord,
  ImageFormat,
  Logger,
} from "./types.js";

/** Something that can shrink one image file in place. */
export interface Backend {
  readonly kind: BackendKind;
  readonly config: Readonly<BackendConfig>;
  convert(record: FileRecord): Promise<ConversionOutcome>;
}

export interface BackendOptions {
  logger?: Logger;
}

export function normalizeConfig(config: BackendConfig): BackendConfig {
  if (!Number.isInteger(config.maxSize) || config.maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${config.maxSize}`);
  }
  return {
    maxSize: config.maxSize,
    quality: Math.max(1, Math.min(Math.round(config.quality), 100)),
    testMode: config.testMode,
  };
}

/**
 * Shared conversion flow. Subclasses only know how to read dimensions and
 * how to render a resized copy to a given path; the write-back, metadata
 * restore and test-mode handling live here.
 */
export abstract class BaseBackend implements Backend {
  abstract readonly kind: BackendKind;
  readonly config: Readonly<BackendConfig>;
  protected readonly logger: Logger;

  protected constructor(config: BackendConfig, options: BackendOptions = {}) {
    this.config = Object.freeze(normalizeConfig(config));
    this.logger = options.logger ?? console;
  }

  protected abstract readonly supportedFormats: readonly ImageFormat[];

  protected abstract probe(filePath: string): Promise<Dimensions>;

  protected abstract render(
    inputPath: string,
    outputPath: string,
    target: Dimensions,
    format: ImageFormat,
  ): Promise<void>;

  async convert(record: FileRecord): Promise<ConversionOutcome> {
    await this.checkAccess(record.path);

    const format = imageFormatOf(record.path);
    if (format === undefined || !this.supportedFormats.includes(format)) {
      throw new DecodeError(record.path, `Unsupported image format for ${this.kind} backend: ${record.path}`);
    }

    const source = await this.probe(record.path);
    const target = computeTargetSize(source, this.config.maxSize);
    if (target === null) {
      return { processed: false, ...source };
    }

    // Test mode never renames, so the output need not share the original's directory
    const tempDir = this.config.testMode ? os.tmpdir() : undefined;

    return withTempFile<ConversionOutcome>(record.path, this.logger, async (tempPath) => {
      await this.render(record.path, tempPath, target, format);

      const { size: sizeAfter } = await fs.stat(tempPath);
      if (sizeAfter === 0) {
        throw new DecodeError(record.path, `Generated file is empty: ${record.path}`);
      }

      const ownershipRestored = this.config.testMode
        ? true
        : await this.replaceOriginal(record, tempPath);

      return {
        processed: true,
        ...source,
        newWidth: target.width,
        newHeight: target.height,
        sizeBefore: record.size,
        sizeAfter,
        ownershipRestored,
      };
    }, tempDir);
  }

  private async checkAccess(filePath: string): Promise<void> {
    const mode = this.config.testMode
      ? fsSync.constants.R_OK
      : fsSync.constants.R_OK | fsSync.constants.W_OK;

    try {
      await fs.access(filePath, mode);
    } catch (err) {
      const needed = this.config.testMode ? "read" : "read/write";
      throw new AccessError(filePath, `No ${needed} access to file: ${filePath}`, { cause: err });
    }

    const lstat = await fs.lstat(filePath);
    if (lstat.isSymbolicLink()) {
      throw new AccessError(filePath, `Path is a symbolic link, refusing to overwrite: ${filePath}`);
    }

    if (this.config.testMode) {
      return;
    }

    // The replacement is written beside the original and renamed over it
    const dir = path.dirname(filePath);
    try {
      await fs.access(dir, fsSync.constants.W_OK);
    } catch (err) {
      throw new AccessError(filePath, `No write access to directory: ${dir}`, { cause: err });
    }
  }

  /** Moves the rendered file over the original; resolves false if ownership could not be restored. */
  private async replaceOriginal(record: FileRecord, tempPath: string): Promise<boolean> {
    await fs.rename(tempPath, record.path);
    await fs.chmod(record.path, record.mode);

    const written = await fs.stat(record.path);
    if (written.uid === record.uid && written.gid === record.gid) {
      return true;
    }

    try {
      await fs.chown(record.path, record.uid, record.gid);
      return true;
    } catch (err) {
      this.logger.warn(
        `Warning: could not restore ownership ${record.uid}:${record.gid} on ${record.path}: ${errorMessage(err)}`,
      );
      return false;
    }
  }
}
