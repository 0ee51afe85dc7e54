import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import sharp from 'sharp';

import { normalizeRaw, type RGBImage } from '@huefield/color-field';

import { InputError, OutputError } from './errors';
import type { ImageFormat } from './types';

const SUPPORTED_FORMATS: readonly ImageFormat[] = ['jpeg', 'png', 'webp', 'tiff', 'avif', 'gif'];

export interface DecodedImage {
  image: RGBImage;
  format: ImageFormat;
}

/**
 * Map a decoder format name onto a format we can encode back to.
 * Anything unknown (heif, svg, raw input, ...) falls back to png.
 */
export const resolveImageFormat = (format: string | undefined): ImageFormat => {
  if (format === 'jpg') {
    return 'jpeg';
  }
  if (format === 'heif') {
    // libheif reports AVIF files as heif
    return 'avif';
  }
  return SUPPORTED_FORMATS.find(candidate => candidate === format) ?? 'png';
};

export async function decodeImage(filePath: string): Promise<DecodedImage> {
  try {
    await fs.access(filePath);
  } catch (error) {
    throw new InputError(filePath, 'file does not exist or is not readable', { cause: error });
  }

  try {
    const pipeline = sharp(filePath);
    const metadata = await pipeline.metadata();
    const { data, info } = await pipeline
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new Error(`expected 3 channels after decoding, got ${info.channels}`);
    }

    return {
      image: normalizeRaw(data, info.width, info.height),
      format: resolveImageFormat(metadata.format)
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(filePath, `not a decodable raster image (${reason})`, { cause: error });
  }
}

export async function encodeImage(
  bytes: Uint8Array,
  width: number,
  height: number,
  format: ImageFormat,
  channels: 1 | 3 = 3
): Promise<Buffer> {
  const input = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const pipeline = sharp(input, { raw: { width, height, channels } });
  // libvips widens 1-band input to sRGB on output unless told otherwise
  if (channels === 1) {
    pipeline.toColourspace('b-w');
  }
  return pipeline.toFormat(format).toBuffer();
}

export interface PendingWrite {
  filePath: string;
  contents: Buffer;
}

const createTempPath = (filePath: string): string =>
  path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);

/**
 * Write every file through a sibling temp file, then rename them into place in order.
 * If any step fails, temp files are removed and targets already renamed by this call are deleted,
 * so either all files land or none do.
 */
export async function writeFilesAtomic(writes: readonly PendingWrite[]): Promise<void> {
  const staged = writes.map(write => ({ ...write, tempPath: createTempPath(write.filePath) }));
  const committed: string[] = [];
  let current = '';

  try {
    for (const entry of staged) {
      current = entry.filePath;
      await fs.mkdir(path.dirname(entry.filePath), { recursive: true });
      await fs.writeFile(entry.tempPath, entry.contents);
    }
    for (const entry of staged) {
      current = entry.filePath;
      await fs.rename(entry.tempPath, entry.filePath);
      committed.push(entry.filePath);
    }
  } catch (error) {
    await Promise.all([
      ...staged.map(entry => fs.rm(entry.tempPath, { force: true })),
      ...committed.map(filePath => fs.rm(filePath, { force: true }))
    ]);
    const reason = error instanceof Error ? error.message : String(error);
    throw new OutputError(current, reason, { cause: error });
  }
}

export async function writeFileAtomic(filePath: string, contents: Buffer): Promise<void> {
  await writeFilesAtomic([{ filePath, contents }]);
}
