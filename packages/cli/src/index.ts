#!/usr/bin/env tsx
import { Command } from 'commander';
import pc from 'picocolors';

import type { PipelineLogger } from '@huefield/engine';

import { applyAction, createHfctlContext, initConfigAction, showConfigAction } from './actions';

const handleError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`hfctl error: ${message}`));
  process.exitCode = 1;
};

const createLogger = (quiet: boolean): PipelineLogger => ({
  info: (...args: unknown[]) => {
    if (!quiet) {
      console.log(pc.dim(args.map(String).join(' ')));
    }
  },
  warn: (...args: unknown[]) => console.warn(pc.yellow(args.map(String).join(' '))),
  error: (...args: unknown[]) => console.error(pc.red(args.map(String).join(' ')))
});

const program = new Command();
program
  .name('hfctl')
  .description('Radial multi-focus HSL adjustment for raster images')
  .version('0.1.0');

program
  .command('apply')
  .description('Adjust an image and write the result in the same format family')
  .argument('<input>', 'Input image path')
  .argument('<output>', 'Output image path')
  .option('-c, --config <file>', 'Field configuration JSON (defaults to HUEFIELD_CONFIG_FILE or ~/.huefield)')
  .option('-d, --diff-map <file>', 'Also write a grayscale PNG of the per-pixel color difference')
  .option('-q, --quiet', 'Only print errors and the summary', false)
  .action(
    async (
      inputPath: string,
      outputPath: string,
      options: { config?: string; diffMap?: string; quiet?: boolean }
    ) => {
      try {
        const ctx = createHfctlContext(createLogger(Boolean(options.quiet)));
        const result = await applyAction(
          { inputPath, outputPath, configPath: options.config, diffMapPath: options.diffMap },
          ctx
        );
        console.log(pc.green(`Wrote ${result.outputPath} (${result.width}x${result.height} ${result.format})`));
        console.log(
          pc.dim(
            `Color difference: max ${result.difference.max.toFixed(4)}, mean ${result.difference.mean.toFixed(4)} in ${result.durationMs.toFixed(0)} ms`
          )
        );
        if (result.diffMapPath) {
          console.log(pc.dim(`Difference map: ${result.diffMapPath}`));
        }
      } catch (error) {
        handleError(error);
      }
    }
  );

const config = program.command('config').description('Field configuration helpers');

config
  .command('show')
  .description('Print the resolved configuration JSON')
  .option('-c, --config <file>', 'Field configuration JSON')
  .action(async (options: { config?: string }) => {
    try {
      const data = await showConfigAction(options.config, createHfctlContext());
      console.log(JSON.stringify(data, null, 2));
    } catch (error) {
      handleError(error);
    }
  });

config
  .command('init')
  .description('Write the default configuration')
  .argument('[file]', 'Target path (defaults to HUEFIELD_CONFIG_FILE or ~/.huefield)')
  .option('-f, --force', 'Overwrite an existing file', false)
  .action(async (file: string | undefined, options: { force?: boolean }) => {
    try {
      const target = await initConfigAction({ configPath: file, force: Boolean(options.force) }, createHfctlContext());
      console.log(pc.green(`Default configuration written to ${target}`));
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
