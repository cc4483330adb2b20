export interface FileRecord {
  readonly path: string;
  readonly mode: number;
  readonly uid: number;
  readonly gid: number;
  readonly size: number;
}

export interface BackendConfig {
  maxSize: number;
  quality: number;
  testMode: boolean;
}

export type BackendKind = "sharp" | "imagemagick";

export type ImageFormat = "jpeg" | "png" | "tiff" | "bmp";

export interface Dimensions {
  width: number;
  height: number;
}

export interface SkippedOutcome extends Dimensions {
  processed: false;
}

export interface ProcessedOutcome extends Dimensions {
  processed: true;
  newWidth: number;
  newHeight: number;
  sizeBefore: number;
  sizeAfter: number;
  ownershipRestored: boolean;
}

export type ConversionOutcome = SkippedOutcome | ProcessedOutcome;

export interface FailedFile {
  file: string;
  error: string;
}

export interface StatsSnapshot {
  totalFiles: number;
  processed: number;
  skipped: number;
  failed: FailedFile[];
  sizeBefore: number;
  sizeAfter: number;
  savedBytes: number;
  compressionRatio: number;
}

export interface RunResult {
  stats: StatsSnapshot;
  interrupted: boolean;
  untouched: number;
  exitCode: number;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface ShrinkConfig {
  wrkDir?: string;
  maxSize: number;
  quality: number;
  testMode: boolean;
  preferExternal: boolean;
}

export interface ParsedArgs {
  dir?: string;
  configPath?: string;
  maxSize?: number;
  quality?: number;
  testMode: boolean;
  preferExternal: boolean;
  help: boolean;
  version: boolean;
}
