import { performance } from 'node:perf_hooks';

import {
  applyColorField,
  computeColorDifference,
  differenceToGrayscale,
  normalizeRaw,
  quantizeImage,
  summarizeDifference,
  validateColorFieldConfig
} from '@huefield/color-field';

import { decodeImage, encodeImage, writeFilesAtomic, type PendingWrite } from './image-io';
import type { ColorFieldPipelineOptions, ColorFieldPipelineResult } from './types';

/**
 * Decode, adjust and re-encode one image.
 * Every stage throws on failure; nothing is written unless encoding succeeded.
 */
export async function runColorFieldPipeline(
  options: ColorFieldPipelineOptions
): Promise<ColorFieldPipelineResult> {
  const startedAt = performance.now();
  const { config, logger } = options;

  validateColorFieldConfig(config);
  logger?.info?.(
    `[pipeline] secondaryMixFactor=${config.secondaryMixFactor} is accepted but currently has no effect`
  );

  const { image, format } = await decodeImage(options.inputPath);
  logger?.info?.(`[pipeline] decoded ${image.width}x${image.height} ${format} from ${options.inputPath}`);

  const result = applyColorField(image, config);
  for (const focus of result.focusPoints) {
    logger?.info?.(
      `[pipeline] focus '${focus.id}' at (${focus.centerX}, ${focus.centerY}) radius ${focus.radius}px -> hue ${focus.targetHue}`
    );
  }

  const bytes = quantizeImage(result.image);
  const encoded = await encodeImage(bytes, image.width, image.height, format);

  // Measured against what is actually written, after quantization
  const differenceMap = computeColorDifference(image, normalizeRaw(bytes, image.width, image.height));
  const difference = summarizeDifference(differenceMap);
  logger?.info?.(
    `[pipeline] color difference min ${difference.min.toFixed(4)} max ${difference.max.toFixed(4)} mean ${difference.mean.toFixed(4)}`
  );

  const writes: PendingWrite[] = [{ filePath: options.outputPath, contents: encoded }];
  const diffMapPath = options.diffMapPath ?? null;
  if (diffMapPath) {
    const gray = differenceToGrayscale(differenceMap);
    writes.push({ filePath: diffMapPath, contents: await encodeImage(gray, image.width, image.height, 'png', 1) });
  }

  // Both files land together or neither does
  await writeFilesAtomic(writes);
  logger?.info?.(`[pipeline] wrote ${options.outputPath}`);
  if (diffMapPath) {
    logger?.info?.(`[pipeline] wrote difference map ${diffMapPath}`);
  }

  return {
    outputPath: options.outputPath,
    diffMapPath,
    width: image.width,
    height: image.height,
    format,
    focusIds: result.composite.focusIds,
    difference,
    durationMs: performance.now() - startedAt
  };
}
