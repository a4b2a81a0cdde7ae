// Frame Pipeline - Frame Persistence
// Encodes frames to JPEG and writes them under the output directory.
//
// Output directory structure:
//   {baseDir}/
//     img_0.jpg
//     img_1.jpg
//     ...
// The directory is wiped and recreated once per run by prepare(), before any
// worker starts.

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import sharp from "sharp";
import type { Frame, FrameSink, OutputLocation } from "./types.js";
import { errorMessage } from "./logger.js";

export const DEFAULT_JPEG_QUALITY = 85;

export interface FrameEncoder {
  encode(frame: Frame, quality: number): Promise<Buffer>;
}

/** JPEG encoding on sharp's libuv thread pool, so parallel workers encode in parallel. */
export const sharpJpegEncoder: FrameEncoder = {
  encode(frame: Frame, quality: number): Promise<Buffer> {
    return sharp(frame.data, {
      raw: { width: frame.width, height: frame.height, channels: frame.channels },
    })
      .jpeg({ quality })
      .toBuffer();
  },
};

/** Thrown by persist() when encoding or writing one frame fails. */
export class PersistError extends Error {
  constructor(
    readonly sequence: number,
    readonly stage: "encode" | "write",
    cause: unknown,
  ) {
    super(`${stage} failed for frame #${sequence}: ${errorMessage(cause)}`, { cause });
    this.name = "PersistError";
  }
}

/**
 * Generates the file name for a save slot.
 * Format: `img_{sequence}.jpg`
 */
export function buildFileName(sequence: number): string {
  return `img_${sequence}.jpg`;
}

export interface FramePersistenceOptions {
  /** JPEG quality, 1-100. */
  quality?: number;
  encoder?: FrameEncoder;
}

export class FramePersistence implements FrameSink, OutputLocation {
  readonly baseDir: string;
  private readonly quality: number;
  private readonly encoder: FrameEncoder;

  constructor(baseDir: string = "output", options: FramePersistenceOptions = {}) {
    this.baseDir = baseDir;
    this.quality = options.quality ?? DEFAULT_JPEG_QUALITY;
    this.encoder = options.encoder ?? sharpJpegEncoder;
  }

  /** Remove any previous output and recreate the directory. Safe to call repeatedly. */
  async prepare(): Promise<void> {
    await rm(this.baseDir, { recursive: true, force: true });
    await mkdir(this.baseDir, { recursive: true });
  }

  pathFor(sequence: number): string {
    return join(this.baseDir, buildFileName(sequence));
  }

  /**
   * Encodes the frame and writes it as `img_{sequence}.jpg`.
   *
   * @returns Number of bytes written.
   * @throws PersistError on encode or write failure.
   */
  async persist(frame: Frame, sequence: number): Promise<number> {
    let encoded: Buffer;
    try {
      encoded = await this.encoder.encode(frame, this.quality);
    } catch (err) {
      throw new PersistError(sequence, "encode", err);
    }

    try {
      await writeFile(this.pathFor(sequence), encoded);
    } catch (err) {
      throw new PersistError(sequence, "write", err);
    }

    return encoded.length;
  }
}
