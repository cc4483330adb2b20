/**
 * Type declarations for bmp-js, which ships none
 */

declare module "bmp-js" {
  interface BmpImage {
    width: number;
    height: number;
    /** Pixels as ABGR, four bytes each, top row first. */
    data: Buffer;
  }

  const bmp: {
    decode(buffer: Buffer): BmpImage;
    encode(image: BmpImage, quality?: number): BmpImage;
  };

  export = bmp;
}
