/**
 * Synthetic frame source: fixed-size RGB frames filled with random bytes.
 */

import { randomFillSync } from "crypto";
import type { Frame, FrameGenerator } from "./types.js";

export const DEFAULT_FRAME_WIDTH = 1920;
export const DEFAULT_FRAME_HEIGHT = 1280;

export interface RandomFrameGeneratorOptions {
  width?: number;
  height?: number;
}

export class RandomFrameGenerator implements FrameGenerator {
  readonly width: number;
  readonly height: number;

  constructor(options: RandomFrameGeneratorOptions = {}) {
    this.width = options.width ?? DEFAULT_FRAME_WIDTH;
    this.height = options.height ?? DEFAULT_FRAME_HEIGHT;

    if (!Number.isInteger(this.width) || this.width <= 0) {
      throw new RangeError(`Frame width must be a positive integer, got ${this.width}`);
    }
    if (!Number.isInteger(this.height) || this.height <= 0) {
      throw new RangeError(`Frame height must be a positive integer, got ${this.height}`);
    }
  }

  /** Byte length of one generated frame. */
  get frameBytes(): number {
    return this.width * this.height * 3;
  }

  generate(): Frame {
    // Fresh buffer per frame: the frame is handed off and must not alias the next one
    const data = Buffer.allocUnsafe(this.frameBytes);
    randomFillSync(data);
    return {
      width: this.width,
      height: this.height,
      channels: 3,
      data,
      generatedAt: Date.now(),
    };
  }
}
