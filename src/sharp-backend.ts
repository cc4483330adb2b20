import fs from "node:fs/promises";
import type sharp from "sharp";
import bmp from "bmp-js";
import { BaseBackend } from "./backend.js";
import type { BackendOptions } from "./backend.js";
import { BackendUnavailableError, DecodeError, errorMessage } from "./errors.js";
import { imageFormatOf } from "./utils.js";
import type { BackendConfig, Dimensions, ImageFormat } from "./types.js";

type SharpModule = typeof sharp;

const INPUT_OPTIONS = {
  failOn: "error",
  limitInputPixels: 268402689, // 16384 x 16384
  sequentialRead: true,
} as const;

interface RgbImage extends Dimensions {
  data: Buffer;
}

/**
 * libvips has no BMP loader or saver, so BMP goes through bmp-js and is
 * handed to sharp as packed RGB. bmp-js lays pixels out as ABGR.
 */
async function readBmp(filePath: string): Promise<RgbImage> {
  let decoded: { width: number; height: number; data: Buffer };
  try {
    decoded = bmp.decode(await fs.readFile(filePath));
  } catch (err) {
    throw new DecodeError(filePath, `Failed to read image ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const { width, height, data } = decoded;
  if (width < 1 || height < 1 || data.length < width * height * 4) {
    throw new DecodeError(filePath, `Image has no dimensions: ${filePath}`);
  }

  const rgb = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; dst < rgb.length; src += 4, dst += 3) {
    rgb[dst] = data[src + 3];
    rgb[dst + 1] = data[src + 2];
    rgb[dst + 2] = data[src + 1];
  }
  return { width, height, data: rgb };
}

function encodeBmp(image: RgbImage): Buffer {
  const abgr = Buffer.alloc(image.width * image.height * 4);
  for (let src = 0, dst = 0; src < image.data.length; src += 3, dst += 4) {
    abgr[dst] = 0xff;
    abgr[dst + 1] = image.data[src + 2];
    abgr[dst + 2] = image.data[src + 1];
    abgr[dst + 3] = image.data[src];
  }
  return bmp.encode({ data: abgr, width: image.width, height: image.height }).data;
}

/** Loads the native sharp binding, failing with BackendUnavailableError if it cannot be used. */
export async function loadSharp(): Promise<SharpModule> {
  try {
    const mod = await import("sharp");
    return mod.default;
  } catch (err) {
    throw new BackendUnavailableError("sharp", `sharp could not be loaded: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * In-process backend on libvips. EXIF orientation is applied before
 * measuring, so the limit is enforced on the image as displayed.
 */
export class SharpBackend extends BaseBackend {
  readonly kind = "sharp";
  protected readonly supportedFormats: readonly ImageFormat[] = ["jpeg", "png", "tiff", "bmp"];

  constructor(
    private readonly sharp: SharpModule,
    config: BackendConfig,
    options: BackendOptions = {},
  ) {
    super(config, options);
    this.sharp.cache({ memory: 512 });
  }

  get libvipsVersion(): string {
    return this.sharp.versions.vips;
  }

  protected async probe(filePath: string): Promise<Dimensions> {
    if (imageFormatOf(filePath) === "bmp") {
      const { width, height } = await readBmp(filePath);
      return { width, height };
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await this.sharp(filePath, INPUT_OPTIONS).metadata();
    } catch (err) {
      throw new DecodeError(filePath, `Failed to read image ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    const { width, height, orientation } = metadata;
    if (width === undefined || height === undefined) {
      throw new DecodeError(filePath, `Image has no dimensions: ${filePath}`);
    }

    // Orientations 5-8 are rotated by 90 degrees
    return orientation !== undefined && orientation >= 5
      ? { width: height, height: width }
      : { width, height };
  }

  protected async render(
    inputPath: string,
    outputPath: string,
    target: Dimensions,
    format: ImageFormat,
  ): Promise<void> {
    if (format === "bmp") {
      return this.renderBmp(inputPath, outputPath, target);
    }

    const pipeline = this.sharp(inputPath, INPUT_OPTIONS)
      .rotate()
      .resize(target.width, target.height, { fit: "fill", kernel: "lanczos3" });

    switch (format) {
      case "jpeg":
        pipeline.jpeg({ quality: this.config.quality, optimiseCoding: true });
        break;
      case "png":
        pipeline.png({ compressionLevel: 9, progressive: true });
        break;
      case "tiff":
        // sharp defaults to JPEG-in-TIFF, which is lossy and drops alpha
        pipeline.tiff({ compression: "lzw" });
        break;
    }

    try {
      await pipeline.toFile(outputPath);
    } catch (err) {
      throw new DecodeError(inputPath, `Failed to convert image ${inputPath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async renderBmp(inputPath: string, outputPath: string, target: Dimensions): Promise<void> {
    const source = await readBmp(inputPath);

    try {
      const { data, info } = await this.sharp(source.data, {
        raw: { width: source.width, height: source.height, channels: 3 },
      })
        .resize(target.width, target.height, { fit: "fill", kernel: "lanczos3" })
        .raw()
        .toBuffer({ resolveWithObject: true });

      await fs.writeFile(outputPath, encodeBmp({ width: info.width, height: info.height, data }));
    } catch (err) {
      throw new DecodeError(inputPath, `Failed to convert image ${inputPath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export async function createSharpBackend(config: BackendConfig, options: BackendOptions = {}): Promise<SharpBackend> {
  const sharpModule = await loadSharp();
  return new SharpBackend(sharpModule, config, options);
}
