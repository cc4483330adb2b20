import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { errorMessage } from "./errors.js";
import type { Dimensions, ImageFormat, Logger } from "./types.js";

const FORMATS_BY_EXTENSION: Record<string, ImageFormat> = {
  jpg: "jpeg",
  jpeg: "jpeg",
  png: "png",
  tif: "tiff",
  tiff: "tiff",
  bmp: "bmp",
};

export function imageFormatOf(filePath: string): ImageFormat | undefined {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return Object.hasOwn(FORMATS_BY_EXTENSION, ext) ? FORMATS_BY_EXTENSION[ext] : undefined;
}

export function isImageFile(filePath: string): boolean {
  return imageFormatOf(filePath) !== undefined;
}

/**
 * Target size for an image whose long side must not exceed `maxSize`.
 * Returns `null` when the image already fits.
 */
export function computeTargetSize(source: Dimensions, maxSize: number): Dimensions | null {
  const longSide = Math.max(source.width, source.height);
  if (longSide <= maxSize) {
    return null;
  }

  const scale = maxSize / longSide;
  return {
    width: Math.max(1, Math.round(source.width * scale)),
    height: Math.max(1, Math.round(source.height * scale)),
  };
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = Math.abs(bytes);
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  const sign = bytes < 0 ? "-" : "";
  return `${sign}${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

export function tempPathFor(filePath: string, dir = path.dirname(filePath)): string {
  const { name, ext } = path.parse(filePath);
  return path.join(dir, `.${name}.imgshrink-${crypto.randomBytes(8).toString("hex")}${ext}`);
}

/**
 * Runs `fn` with a fresh temporary path (beside `filePath` unless `dir` is
 * given) and removes whatever is left at that path once `fn` settles.
 */
export async function withTempFile<T>(
  filePath: string,
  logger: Logger,
  fn: (tempPath: string) => Promise<T>,
  dir?: string,
): Promise<T> {
  const tempPath = tempPathFor(filePath, dir);
  try {
    return await fn(tempPath);
  } finally {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (err) {
      logger.warn(`Warning: could not remove temporary file ${tempPath}: ${errorMessage(err)}`);
    }
  }
}
