import type { ColorFieldConfig, DifferenceStats } from '@huefield/color-field';

export type PipelineLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'tiff' | 'avif' | 'gif';

export interface ColorFieldPipelineOptions {
  inputPath: string;
  outputPath: string;
  config: ColorFieldConfig;
  /** Optional grayscale PNG of the per-pixel RGB difference */
  diffMapPath?: string | null;
  logger?: PipelineLogger;
}

export interface ColorFieldPipelineResult {
  outputPath: string;
  diffMapPath: string | null;
  width: number;
  height: number;
  format: ImageFormat;
  focusIds: string[];
  difference: DifferenceStats;
  durationMs: number;
}
