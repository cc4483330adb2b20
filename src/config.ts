import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import type { ParsedArgs, ShrinkConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../etc/config.yaml", import.meta.url));

export const DEFAULTS: ShrinkConfig = {
  maxSize: 1920,
  quality: 97,
  testMode: false,
  preferExternal: false,
};

const configFileSchema = z
  .object({
    wrk_dir: z.string().min(1),
    max_size: z.number().int().positive(),
    quality: z.number().int().min(1).max(100),
    test_mode: z.boolean(),
    prefer_imagemagick: z.boolean(),
  })
  .partial()
  .strict();

export function parseConfig(text: string, source: string): ShrinkConfig {
  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse configuration file ${source}: ${errorMessage(err)}`, { cause: err });
  }

  // An empty document keeps every default
  if (data === null || data === undefined) {
    return { ...DEFAULTS };
  }

  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${key}: ${issue.message}`;
    });
    throw new ConfigError([`Invalid configuration in ${source}:`, ...issues].join("\n"));
  }

  const file = result.data;
  return {
    wrkDir: file.wrk_dir,
    maxSize: file.max_size ?? DEFAULTS.maxSize,
    quality: file.quality ?? DEFAULTS.quality,
    testMode: file.test_mode ?? DEFAULTS.testMode,
    preferExternal: file.prefer_imagemagick ?? DEFAULTS.preferExternal,
  };
}

/**
 * Reads a YAML configuration file. A missing file at the default location
 * yields the defaults; a missing file the caller named explicitly is an error.
 */
export async function loadConfig(configPath?: string): Promise<ShrinkConfig> {
  const source = configPath ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await fs.readFile(source, "utf8");
  } catch (err) {
    if (configPath === undefined && err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { ...DEFAULTS };
    }
    throw new ConfigError(`Cannot read configuration file ${source}: ${errorMessage(err)}`, { cause: err });
  }

  return parseConfig(text, source);
}

/** Command-line values win over the configuration file. */
export function applyArgs(config: ShrinkConfig, args: ParsedArgs): ShrinkConfig {
  return {
    wrkDir: args.dir ?? config.wrkDir,
    maxSize: args.maxSize ?? config.maxSize,
    quality: args.quality ?? config.quality,
    testMode: args.testMode || config.testMode,
    preferExternal: args.preferExternal || config.preferExternal,
  };
}
