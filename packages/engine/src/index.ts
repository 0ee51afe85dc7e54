/* c8 ignore file */
export { runColorFieldPipeline } from './pipeline';
export { decodeImage, encodeImage, writeFileAtomic, writeFilesAtomic, resolveImageFormat } from './image-io';
export { InputError, OutputError, isInputError, isOutputError } from './errors';
export type { DecodedImage, PendingWrite } from './image-io';
export type {
  ColorFieldPipelineOptions,
  ColorFieldPipelineResult,
  ImageFormat,
  PipelineLogger
} from './types';
