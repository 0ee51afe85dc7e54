import path from 'node:path';

import type { ColorFieldConfig } from '@huefield/color-field';
import {
  runColorFieldPipeline,
  type ColorFieldPipelineResult,
  type PipelineLogger
} from '@huefield/engine';
import {
  configFileExists,
  defaultFieldConfig,
  getConfigFilePath,
  loadFieldConfig,
  saveFieldConfig
} from '@huefield/settings';

export interface HfctlContext {
  loadConfig: typeof loadFieldConfig;
  saveConfig: typeof saveFieldConfig;
  configExists: typeof configFileExists;
  runPipeline: typeof runColorFieldPipeline;
  logger: PipelineLogger;
}

/* c8 ignore start */
export const createHfctlContext = (logger: PipelineLogger = console): HfctlContext => ({
  loadConfig: loadFieldConfig,
  saveConfig: saveFieldConfig,
  configExists: configFileExists,
  runPipeline: runColorFieldPipeline,
  logger
});
/* c8 ignore end */

const resolveConfigPath = (configPath?: string | null): string =>
  configPath ? path.resolve(configPath) : getConfigFilePath();

export interface ApplyActionInput {
  inputPath: string;
  outputPath: string;
  configPath?: string | null;
  diffMapPath?: string | null;
}

export const applyAction = async (
  input: ApplyActionInput,
  ctx = createHfctlContext()
): Promise<ColorFieldPipelineResult> => {
  const config = await ctx.loadConfig(resolveConfigPath(input.configPath));
  return ctx.runPipeline({
    inputPath: path.resolve(input.inputPath),
    outputPath: path.resolve(input.outputPath),
    diffMapPath: input.diffMapPath ? path.resolve(input.diffMapPath) : null,
    config,
    logger: ctx.logger
  });
};

export const showConfigAction = async (
  configPath?: string | null,
  ctx = createHfctlContext()
): Promise<ColorFieldConfig> => ctx.loadConfig(resolveConfigPath(configPath));

export interface InitConfigActionInput {
  configPath?: string | null;
  force: boolean;
}

export const initConfigAction = async (
  input: InitConfigActionInput,
  ctx = createHfctlContext()
): Promise<string> => {
  const target = resolveConfigPath(input.configPath);
  if (!input.force && (await ctx.configExists(target))) {
    throw new Error(`${target} already exists. Use --force to overwrite.`);
  }
  await ctx.saveConfig(defaultFieldConfig(), target);
  return target;
};
