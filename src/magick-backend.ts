import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { BaseBackend } from "./backend.js";
import type { BackendOptions } from "./backend.js";
import { BackendUnavailableError, DecodeError, ExternalToolExecutionError, errorMessage } from "./errors.js";
import type { BackendConfig, Dimensions, ImageFormat } from "./types.js";

const exec = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs one command to completion. Implementations reject with
 * ExternalToolExecutionError on spawn failure or a non-zero exit.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (command, args) => {
  try {
    const { stdout, stderr } = await exec(command, [...args], {
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    // execFile puts the exit status in `code`, or an errno string when spawning failed
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    const stderr = err instanceof Error && "stderr" in err ? err.stderr : undefined;
    throw new ExternalToolExecutionError(
      command,
      typeof code === "number" ? code : null,
      typeof stderr === "string" ? stderr.trim() : "",
      `${command} failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }
};

export interface MagickBackendOptions extends BackendOptions {
  convertCommand?: string;
  identifyCommand?: string;
  runner?: CommandRunner;
}

const DIMENSIONS_PATTERN = /^(\d+) (\d+)$/;

export function parseDimensions(filePath: string, output: string): Dimensions {
  const match = DIMENSIONS_PATTERN.exec(output.trim());
  if (!match) {
    throw new DecodeError(filePath, `Unexpected identify output for ${filePath}: "${output.trim()}"`);
  }

  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) {
    throw new DecodeError(filePath, `Invalid image dimensions for ${filePath}: ${width}x${height}`);
  }
  return { width, height };
}

function formatArgs(format: ImageFormat, quality: number): string[] {
  switch (format) {
    case "jpeg":
      return ["-quality", String(quality), "-define", "jpeg:optimize-coding=true"];
    case "png":
      return ["-quality", "100", "-define", "png:compression-level=9", "-interlace", "PNG"];
    case "tiff":
    case "bmp":
      return [];
  }
}

/** External-tool backend driving ImageMagick's `identify` and `convert`. */
export class MagickBackend extends BaseBackend {
  readonly kind = "imagemagick";
  protected readonly supportedFormats: readonly ImageFormat[] = ["jpeg", "png", "tiff", "bmp"];

  private readonly convertCommand: string;
  private readonly identifyCommand: string;
  private readonly run: CommandRunner;

  constructor(config: BackendConfig, options: MagickBackendOptions = {}) {
    super(config, options);
    this.convertCommand = options.convertCommand ?? "convert";
    this.identifyCommand = options.identifyCommand ?? "identify";
    this.run = options.runner ?? execFileRunner;
  }

  /** Fails with BackendUnavailableError unless both commands answer `-version`. */
  async verify(): Promise<void> {
    for (const command of [this.convertCommand, this.identifyCommand]) {
      try {
        await this.run(command, ["-version"]);
      } catch (err) {
        throw new BackendUnavailableError(
          "imagemagick",
          `ImageMagick '${command}' command is not available: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }
  }

  protected async probe(filePath: string): Promise<Dimensions> {
    const { stdout } = await this.run(this.identifyCommand, ["-format", "%w %h", filePath]);
    return parseDimensions(filePath, stdout);
  }

  protected async render(
    inputPath: string,
    outputPath: string,
    _target: Dimensions,
    format: ImageFormat,
  ): Promise<void> {
    const { maxSize, quality } = this.config;
    await this.run(this.convertCommand, [
      inputPath,
      "-filter",
      "Lanczos",
      "-resize",
      `${maxSize}x${maxSize}>`,
      ...formatArgs(format, quality),
      outputPath,
    ]);
  }
}

export async function createMagickBackend(
  config: BackendConfig,
  options: MagickBackendOptions = {},
): Promise<MagickBackend> {
  const backend = new MagickBackend(config, options);
  await backend.verify();
  return backend;
}
