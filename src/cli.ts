import { applyArgs, loadConfig } from "./config.js";
import { UsageError, errorMessage } from "./errors.js";
import { InterruptController } from "./interrupt.js";
import { EXIT_FAILURE, EXIT_OK, Orchestrator } from "./orchestrator.js";
import { findImages } from "./scanner.js";
import { selectBackend } from "./selector.js";
import type { BackendCandidate } from "./selector.js";
import type { ParsedArgs } from "./types.js";

export function helpText(version: string): string {
  return `
imgshrink v${version}: shrink oversized images in place

Usage:
  imgshrink <dir>                    Resize every image under dir (recursive)
  imgshrink -m 1280 <dir>            Custom maximum long side
  imgshrink -t <dir>                 Test mode: report, change nothing
  imgshrink -c <file>                Read settings from a YAML file

Options:
  -c, --config <file>        YAML configuration (default: etc/config.yaml)
  -m, --max-size <px>        Maximum long side in pixels (default: 1920)
  -q, --quality <n>          JPEG quality 1-100 (default: 97)
  -t, --test                 Compute results without modifying files
  -x, --prefer-imagemagick   Try the ImageMagick backend before sharp
  -h, --help                 Show this help message
  -v, --version              Show version number

Supported formats: jpg, jpeg, png, bmp, tif, tiff
`.trim();
}

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new UsageError(`${flag} requires a numeric argument`);
  }
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`invalid ${flag} value: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    testMode: false,
    preferExternal: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-t" || arg === "--test") {
      result.testMode = true;
      continue;
    }

    if (arg === "-x" || arg === "--prefer-imagemagick") {
      result.preferExternal = true;
      continue;
    }

    if (arg === "-m" || arg === "--max-size") {
      const val = parseInteger("--max-size", args[++i]);
      if (val < 1) {
        throw new UsageError(`--max-size must be positive, got ${val}`);
      }
      result.maxSize = val;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      // Clamp to 1-100
      result.quality = Math.max(1, Math.min(parseInteger("--quality", args[++i]), 100));
      continue;
    }

    if (arg === "-c" || arg === "--config") {
      const next = args[++i];
      if (next === undefined) {
        throw new UsageError("--config requires a file argument");
      }
      result.configPath = next;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    }

    if (result.dir !== undefined) {
      throw new UsageError(`only one directory may be given, got ${result.dir} and ${arg}`);
    }
    result.dir = arg;
  }

  return result;
}

export interface RunCliOptions {
  /** Backends to try, in order; defaults to sharp then ImageMagick. */
  candidates?: readonly BackendCandidate[];
}

/**
 * Runs the whole program and resolves to the process exit status. Errors
 * that end the run are printed to stderr and give EXIT_FAILURE.
 */
export async function runCli(argv: string[], version: string, options: RunCliOptions = {}): Promise<number> {
  try {
    return await execute(argv, version, options);
  } catch (err) {
    console.error("Error:", errorMessage(err));
    if (err instanceof UsageError) {
      console.error("Run imgshrink --help for usage");
    }
    return EXIT_FAILURE;
  }
}

async function execute(argv: string[], version: string, options: RunCliOptions): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.help) {
    console.log(helpText(version));
    return EXIT_OK;
  }

  if (parsed.version) {
    console.log(version);
    return EXIT_OK;
  }

  const config = applyArgs(await loadConfig(parsed.configPath), parsed);
  if (config.wrkDir === undefined) {
    throw new UsageError("no working directory specified");
  }

  const backend = await selectBackend(
    { maxSize: config.maxSize, quality: config.quality, testMode: config.testMode },
    { preferExternal: config.preferExternal, candidates: options.candidates },
  );

  const records = await findImages(config.wrkDir);
  console.log(`Found ${records.length} image(s) in ${config.wrkDir}`);
  if (config.testMode) {
    console.log("Test mode: no files will be modified");
  }

  const orchestrator = new Orchestrator(backend, { interrupt: new InterruptController() });
  const result = await orchestrator.run(records);
  return result.exitCode;
}
