/**
 * Pixel sinks and image encoding.
 */

/** 8-bit RGB triple, each channel an integer in [0, 255] */
export type RGB8 = readonly [r: number, g: number, b: number]

/** Receives tone-mapped pixels from the renderer. */
export interface PixelSink {
  setPixel(x: number, y: number, color: RGB8): void
}

/** Row-major packed RGB image held in memory. */
export class ImageBuffer implements PixelSink {
  readonly data: Uint8Array

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.data = new Uint8Array(width * height * 3)
  }

  setPixel(x: number, y: number, color: RGB8): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`)
    }
    const offset = (y * this.width + x) * 3
    this.data[offset] = color[0]
    this.data[offset + 1] = color[1]
    this.data[offset + 2] = color[2]
  }

  getPixel(x: number, y: number): RGB8 {
    const offset = (y * this.width + x) * 3
    return [this.data[offset] ?? 0, this.data[offset + 1] ?? 0, this.data[offset + 2] ?? 0]
  }
}

/** Binary PPM (P6), maxval 255. */
export function encodePPM(image: ImageBuffer): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${image.width} ${image.height}\n255\n`)
  const out = new Uint8Array(header.length + image.data.length)
  out.set(header, 0)
  out.set(image.data, header.length)
  return out
}
