import sharp from "sharp";
import bmp from "bmp-js";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { toFileRecord } from "../scanner.js";
import type { FileRecord, Logger } from "../types.js";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `imgshrink-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function createTestImage(
  filePath: string,
  format: "png" | "jpeg" | "tiff" = "png",
  width = 10,
  height = 10,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const background = format === "png" ? { r: 255, g: 0, b: 0 } : { r: 0, g: 255, b: 0 };
  await sharp({
    create: { width, height, channels: 3, background },
  })
    .toFormat(format)
    .toFile(filePath);
}

/** Writes a solid-colour 24-bit BMP. */
export async function createTestBmp(
  filePath: string,
  width: number,
  height: number,
  colour = { r: 10, g: 120, b: 200 },
): Promise<void> {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 0xff;
    data[i + 1] = colour.b;
    data[i + 2] = colour.g;
    data[i + 3] = colour.r;
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, bmp.encode({ data, width, height }).data);
}

export async function recordFor(filePath: string): Promise<FileRecord> {
  return toFileRecord(filePath, await fs.stat(filePath));
}

/** Names of leftover temporary outputs in `dir`. */
export async function tempFilesIn(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries.filter((entry) => entry.includes(".imgshrink-"));
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface CapturedLogger extends Logger {
  lines: string[];
  warnings: string[];
  errors: string[];
}

export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    warnings,
    errors,
    log: (...args: unknown[]) => lines.push(args.map(String).join(" ")),
    warn: (...args: unknown[]) => warnings.push(args.map(String).join(" ")),
    error: (...args: unknown[]) => errors.push(args.map(String).join(" ")),
  };
}
