import type { Backend } from "./backend.js";
import { errorMessage } from "./errors.js";
import { InterruptController } from "./interrupt.js";
import { ConversionStats } from "./stats.js";
import { formatBytes, formatDuration } from "./utils.js";
import type { FileRecord, Logger, RunResult, StatsSnapshot } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface OrchestratorOptions {
  interrupt?: InterruptController;
  logger?: Logger;
}

export function formatReport(stats: StatsSnapshot, durationMs: number, interrupted: boolean): string[] {
  return [
    interrupted ? "Conversion interrupted:" : "Conversion completed:",
    `  Total files: ${stats.totalFiles}`,
    `  Processed:   ${stats.processed}`,
    `  Skipped:     ${stats.skipped} (${stats.failed.length} failed)`,
    `  Duration:    ${formatDuration(durationMs)}`,
    `  Size before: ${formatBytes(stats.sizeBefore)}`,
    `  Size after:  ${formatBytes(stats.sizeAfter)}`,
    `  Saved:       ${formatBytes(stats.savedBytes)}`,
    `  Compression: ${stats.compressionRatio.toFixed(2)}%`,
  ];
}

/**
 * Sequential conversion loop. One backend and one stats accumulator per
 * run; the interrupt flag is read before each file, never during one.
 */
export class Orchestrator {
  readonly stats = new ConversionStats();
  private readonly interrupt: InterruptController;
  private readonly logger: Logger;

  constructor(
    private readonly backend: Backend,
    options: OrchestratorOptions = {},
  ) {
    this.interrupt = options.interrupt ?? new InterruptController();
    this.logger = options.logger ?? console;
  }

  async run(records: readonly FileRecord[]): Promise<RunResult> {
    const startTime = Date.now();
    let started = 0;

    this.interrupt.arm();
    try {
      for (const record of records) {
        if (this.interrupt.isSignaled) break;
        started++;
        await this.convertOne(record);
      }
    } finally {
      this.interrupt.disarm();
    }

    const interrupted = this.interrupt.isSignaled;
    const untouched = records.length - started;
    const stats = this.stats.snapshot();

    this.logger.log("");
    for (const line of formatReport(stats, Date.now() - startTime, interrupted)) {
      this.logger.log(line);
    }

    if (stats.failed.length > 0) {
      this.logger.log("\nFailed conversions:");
      stats.failed.forEach((f) => this.logger.log(`  - ${f.file}: ${f.error}`));
    }

    if (interrupted) {
      this.logger.log(`\nInterrupted: stopped early, ${untouched} file(s) left untouched`);
    }

    return {
      stats,
      interrupted,
      untouched,
      exitCode: interrupted ? EXIT_INTERRUPTED : EXIT_OK,
    };
  }

  private async convertOne(record: FileRecord): Promise<void> {
    const prefix = this.backend.config.testMode ? "[test] " : "";
    try {
      const outcome = await this.backend.convert(record);
      if (outcome.processed) {
        this.stats.addProcessed(outcome.sizeBefore, outcome.sizeAfter);
        this.logger.log(
          `${prefix}Processed: ${record.path} (${outcome.width}x${outcome.height} -> ${outcome.newWidth}x${outcome.newHeight}, ` +
            `${formatBytes(outcome.sizeBefore)} -> ${formatBytes(outcome.sizeAfter)})`,
        );
      } else {
        this.stats.addSkipped();
        this.logger.log(`${prefix}Skipped: ${record.path} (${outcome.width}x${outcome.height})`);
      }
    } catch (err) {
      const message = errorMessage(err);
      this.stats.addFailed(record.path, message);
      this.logger.error(`Failed: ${record.path}: ${message}`);
    }
  }
}
