import { describe, it, expect, beforeEach, afterEach } from "vitest";
import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import { MagickBackend, createMagickBackend, parseDimensions } from "../magick-backend.js";
import type { CommandRunner } from "../magick-backend.js";
import { BackendUnavailableError, DecodeError, ExternalToolExecutionError } from "../errors.js";
import { cleanup, createTestImage, recordFor, tempFilesIn, tmpDir } from "./helpers.js";
import type { BackendConfig } from "../types.js";

const config: BackendConfig = { maxSize: 1500, quality: 80, testMode: false };

interface FakeMagick {
  runner: CommandRunner;
  calls: string[][];
}

/**
 * Stands in for ImageMagick: `identify` reads dimensions with sharp and
 * `convert` honours the `WxH>` geometry, writing to the last argument.
 */
function fakeMagick(overrides: { identify?: string; convertFails?: boolean } = {}): FakeMagick {
  const calls: string[][] = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push([command, ...args]);

    if (args[0] === "-version") {
      return { stdout: "Version: ImageMagick 6.9.12", stderr: "" };
    }

    if (command === "identify") {
      if (overrides.identify !== undefined) {
        return { stdout: overrides.identify, stderr: "" };
      }
      const meta = await sharp(args[args.length - 1]).metadata();
      return { stdout: `${meta.width} ${meta.height}`, stderr: "" };
    }

    if (command === "convert") {
      const output = args[args.length - 1];
      if (overrides.convertFails) {
        await fs.writeFile(output, "partial");
        throw new ExternalToolExecutionError(command, 1, "convert: no decode delegate", "convert failed: exit 1");
      }
      const size = Number.parseInt(args[args.indexOf("-resize") + 1], 10);
      await sharp(args[0]).resize(size, size, { fit: "inside", withoutEnlargement: true }).toFile(output);
      return { stdout: "", stderr: "" };
    }

    throw new ExternalToolExecutionError(command, null, "", `spawn ${command} ENOENT`);
  };
  return { runner, calls };
}

describe("parseDimensions", () => {
  it("reads a width and height pair", () => {
    expect(parseDimensions("/a.jpg", " 640 480\n")).toEqual({ width: 640, height: 480 });
  });

  it("fails closed on anything else", () => {
    expect(() => parseDimensions("/a.jpg", "640x480")).toThrow(DecodeError);
    expect(() => parseDimensions("/a.tif", "640 480640 480")).toThrow(DecodeError);
    expect(() => parseDimensions("/a.jpg", "")).toThrow('Unexpected identify output for /a.jpg: ""');
    expect(() => parseDimensions("/a.jpg", "0 480")).toThrow("Invalid image dimensions for /a.jpg: 0x480");
  });
});

describe("MagickBackend", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  describe("construction", () => {
    it("checks both commands", async () => {
      const fake = fakeMagick();
      const backend = await createMagickBackend(config, { runner: fake.runner });

      expect(backend.kind).toBe("imagemagick");
      expect(fake.calls).toEqual([
        ["convert", "-version"],
        ["identify", "-version"],
      ]);
    });

    it("is unavailable when a command cannot be run", async () => {
      const runner: CommandRunner = async (command) => {
        throw new ExternalToolExecutionError(command, null, "", `spawn ${command} ENOENT`);
      };

      const attempt = createMagickBackend(config, { runner });
      await expect(attempt).rejects.toBeInstanceOf(BackendUnavailableError);
      await expect(attempt).rejects.toThrow(
        "ImageMagick 'convert' command is not available: spawn convert ENOENT",
      );
    });

    it("uses configured command names", async () => {
      const calls: string[][] = [];
      const runner: CommandRunner = async (command, args) => {
        calls.push([command, ...args]);
        return { stdout: "", stderr: "" };
      };

      await createMagickBackend(config, { runner, convertCommand: "magick", identifyCommand: "magick-identify" });
      expect(calls.map((c) => c[0])).toEqual(["magick", "magick-identify"]);
    });
  });

  describe("convert", () => {
    it("skips without calling convert when the image fits", async () => {
      const filePath = path.join(workDir, "small.jpg");
      await createTestImage(filePath, "jpeg", 800, 600);
      const before = await fs.readFile(filePath);
      const fake = fakeMagick();

      const backend = new MagickBackend(config, { runner: fake.runner });
      const outcome = await backend.convert(await recordFor(filePath));

      expect(outcome).toEqual({ processed: false, width: 800, height: 600 });
      expect(fake.calls).toEqual([["identify", "-format", "%w %h", filePath]]);
      expect(await fs.readFile(filePath)).toEqual(before);
    });

    it("passes JPEG quality and resize geometry", async () => {
      const filePath = path.join(workDir, "big.jpg");
      await createTestImage(filePath, "jpeg", 3000, 2000);
      const fake = fakeMagick();

      const backend = new MagickBackend(config, { runner: fake.runner });
      const outcome = await backend.convert(await recordFor(filePath));

      expect(outcome).toMatchObject({ processed: true, newWidth: 1500, newHeight: 1000 });
      expect(fake.calls[1]).toEqual([
        "convert",
        filePath,
        "-filter",
        "Lanczos",
        "-resize",
        "1500x1500>",
        "-quality",
        "80",
        "-define",
        "jpeg:optimize-coding=true",
        expect.stringMatching(/\/\.big\.imgshrink-[0-9a-f]{16}\.jpg$/),
      ]);

      const meta = await sharp(filePath).metadata();
      expect(meta.width).toBe(1500);
      expect(meta.height).toBe(1000);
      expect(await tempFilesIn(workDir)).toEqual([]);
    });

    it("forces PNG compression level 9 and interlacing", async () => {
      const filePath = path.join(workDir, "wide.png");
      await createTestImage(filePath, "png", 2000, 1000);
      const fake = fakeMagick();

      const backend = new MagickBackend({ ...config, maxSize: 1024 }, { runner: fake.runner });
      await backend.convert(await recordFor(filePath));

      expect(fake.calls[1].slice(2, -1)).toEqual([
        "-filter",
        "Lanczos",
        "-resize",
        "1024x1024>",
        "-quality",
        "100",
        "-define",
        "png:compression-level=9",
        "-interlace",
        "PNG",
      ]);
    });

    it("adds no compression flags for BMP", async () => {
      const filePath = path.join(workDir, "old.bmp");
      await fs.writeFile(filePath, "BM");
      const fake = fakeMagick({ identify: "3000 1000" });

      const backend = new MagickBackend(config, { runner: fake.runner });
      // the fake cannot render BMP, so only the argument list matters here
      await expect(backend.convert(await recordFor(filePath))).rejects.toThrow();

      expect(fake.calls[1].slice(2, -1)).toEqual(["-filter", "Lanczos", "-resize", "1500x1500>"]);
    });

    it("raises DecodeError on unparseable identify output", async () => {
      const filePath = path.join(workDir, "odd.jpg");
      await createTestImage(filePath, "jpeg", 50, 50);
      const fake = fakeMagick({ identify: "identify: improper image header" });

      const backend = new MagickBackend(config, { runner: fake.runner });
      await expect(backend.convert(await recordFor(filePath))).rejects.toBeInstanceOf(DecodeError);
      expect(fake.calls).toHaveLength(1);
    });

    it("surfaces convert failures and removes the partial output", async () => {
      const filePath = path.join(workDir, "big.jpg");
      await createTestImage(filePath, "jpeg", 3000, 2000);
      const before = await fs.readFile(filePath);
      const fake = fakeMagick({ convertFails: true });

      const backend = new MagickBackend(config, { runner: fake.runner });
      const attempt = backend.convert(await recordFor(filePath));

      await expect(attempt).rejects.toBeInstanceOf(ExternalToolExecutionError);
      await expect(attempt).rejects.toMatchObject({ command: "convert", exitCode: 1 });
      expect(await fs.readFile(filePath)).toEqual(before);
      expect(await tempFilesIn(workDir)).toEqual([]);
    });

    it("leaves the original alone in test mode, even when convert fails", async () => {
      const filePath = path.join(workDir, "big.jpg");
      await createTestImage(filePath, "jpeg", 3000, 2000);
      const before = await fs.readFile(filePath);

      const ok = new MagickBackend({ ...config, testMode: true }, { runner: fakeMagick().runner });
      const outcome = await ok.convert(await recordFor(filePath));
      expect(outcome.processed).toBe(true);

      const failing = new MagickBackend({ ...config, testMode: true }, { runner: fakeMagick({ convertFails: true }).runner });
      await expect(failing.convert(await recordFor(filePath))).rejects.toBeInstanceOf(ExternalToolExecutionError);

      expect(await fs.readFile(filePath)).toEqual(before);
      expect(await tempFilesIn(workDir)).toEqual([]);
    });
  });
});
