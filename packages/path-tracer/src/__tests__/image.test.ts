import { describe, it, expect } from 'vitest'
import { ImageBuffer, encodePPM } from '../image.js'

describe('ImageBuffer', () => {
  it('stores pixels row-major as packed RGB', () => {
    const image = new ImageBuffer(2, 2)
    image.setPixel(1, 0, [10, 20, 30])
    image.setPixel(0, 1, [40, 50, 60])
    expect(Array.from(image.data)).toEqual([0, 0, 0, 10, 20, 30, 40, 50, 60, 0, 0, 0])
    expect(image.getPixel(0, 1)).toEqual([40, 50, 60])
  })

  it('rejects coordinates outside the image', () => {
    const image = new ImageBuffer(2, 2)
    expect(() => image.setPixel(2, 0, [0, 0, 0])).toThrow(RangeError)
    expect(() => image.setPixel(0, -1, [0, 0, 0])).toThrow(RangeError)
  })
})

describe('encodePPM', () => {
  it('writes a P6 header followed by raw bytes', () => {
    const image = new ImageBuffer(2, 1)
    image.setPixel(0, 0, [255, 0, 0])
    image.setPixel(1, 0, [0, 0, 255])
    const ppm = encodePPM(image)
    const header = 'P6\n2 1\n255\n'
    expect(new TextDecoder().decode(ppm.subarray(0, header.length))).toBe(header)
    expect(Array.from(ppm.subarray(header.length))).toEqual([255, 0, 0, 0, 0, 255])
    expect(ppm.length).toBe(header.length + 6)
  })
})
