import type { FailedFile, StatsSnapshot } from "./types.js";

function assertByteCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Running totals for one conversion run. Counters only ever grow; a failed
 * file counts as skipped and is also listed in `failed`.
 */
export class ConversionStats {
  private processedCount = 0;
  private skippedCount = 0;
  private bytesBefore = 0;
  private bytesAfter = 0;
  private readonly failures: FailedFile[] = [];

  addProcessed(sizeBefore: number, sizeAfter: number): void {
    assertByteCount("sizeBefore", sizeBefore);
    assertByteCount("sizeAfter", sizeAfter);
    this.processedCount++;
    this.bytesBefore += sizeBefore;
    this.bytesAfter += sizeAfter;
  }

  addSkipped(): void {
    this.skippedCount++;
  }

  addFailed(file: string, error: string): void {
    this.skippedCount++;
    this.failures.push({ file, error });
  }

  get processed(): number {
    return this.processedCount;
  }

  get skipped(): number {
    return this.skippedCount;
  }

  get failed(): readonly FailedFile[] {
    return this.failures;
  }

  get total(): number {
    return this.processedCount + this.skippedCount;
  }

  get sizeBefore(): number {
    return this.bytesBefore;
  }

  get sizeAfter(): number {
    return this.bytesAfter;
  }

  get saved(): number {
    return this.bytesBefore - this.bytesAfter;
  }

  /** Percentage of `sizeBefore` saved; 0 when nothing was processed. */
  get compressionRatio(): number {
    return this.bytesBefore > 0 ? (this.saved / this.bytesBefore) * 100 : 0;
  }

  snapshot(): StatsSnapshot {
    return {
      totalFiles: this.total,
      processed: this.processedCount,
      skipped: this.skippedCount,
      failed: this.failures.map((f) => ({ ...f })),
      sizeBefore: this.bytesBefore,
      sizeAfter: this.bytesAfter,
      savedBytes: this.saved,
      compressionRatio: this.compressionRatio,
    };
  }
}
