#!/usr/bin/env node
/**
 * wavedrom-mode CLI
 *
 * Renders WaveJSON timing diagrams through wavedrom-cli (and inkscape for
 * pdf) using the same render cycle as the Obsidian plugin:
 * - render: one render cycle
 * - preview: open the current artifact in the system viewer
 * - watch: render again every time the file is saved
 */

import { Command, program } from 'commander';
import { existsSync, watch } from 'fs';
import { basename, dirname, resolve } from 'path';
import {
  createLogger,
  debounce,
  loadConfig,
  mergeConfig,
  previewArtifact,
  renderDocument,
  toError,
  type Logger,
  type WaveDromConfig,
} from '../core';
import { ConsoleRenderHost } from './host';
import { parseTimeout } from './options';

// Package version (will be set during build)
const VERSION = '1.0.0';

const WATCH_DEBOUNCE_MS = 200;

interface ConfigCliOptions {
  config?: string;
  format?: string;
  outputDir?: string;
  renderer?: string;
  converter?: string;
  timeout?: number;
  verbose?: boolean;
}

interface RenderCliOptions extends ConfigCliOptions {
  open?: boolean;
}

function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file (default: wavedrom-mode.config.json)')
    .option('-f, --format <type>', 'Output format: svg, png, pdf (default: svg)')
    .option('-o, --output-dir <dir>', 'Output directory (default: beside the input)')
    .option('--renderer <path>', 'Path to wavedrom-cli')
    .option('--converter <path>', 'Path to inkscape (pdf only)')
    .option('--timeout <ms>', 'Kill the renderer after this long, 0 to wait forever', parseTimeout)
    .option('--verbose', 'Verbose output');
}

/**
 * Config file (or defaults) with command-line flags on top
 */
function buildConfig(options: ConfigCliOptions): WaveDromConfig {
  return mergeConfig(loadConfig(options.config), {
    renderer: { path: options.renderer },
    converter: { path: options.converter },
    output: { format: options.format, directory: options.outputDir },
    timeoutMs: options.timeout,
  });
}

function resolveInput(input: string): string | undefined {
  const inputPath = resolve(input);
  if (!existsSync(inputPath)) {
    console.error(`Error reading input file: ${input}`);
    process.exitCode = 1;
    return undefined;
  }
  return inputPath;
}

async function renderOnce(
  inputPath: string,
  config: WaveDromConfig,
  host: ConsoleRenderHost,
  logger: Logger,
): Promise<boolean> {
  const result = await renderDocument({ path: inputPath }, config, { host, logger });
  return result.success;
}

program
  .name('wavedrom-mode')
  .description('Render WaveJSON timing diagrams with wavedrom-cli')
  .version(VERSION);

addConfigOptions(
  program
    .command('render')
    .description('Render a WaveJSON file once')
    .argument('<input>', 'Input .wjson file'),
)
  .option('--open', 'Open the rendered file in the system viewer')
  .action(async (input: string, options: RenderCliOptions) => {
    const logger = createLogger('cli', { verbose: options.verbose });
    const inputPath = resolveInput(input);
    if (!inputPath) return;

    const config = buildConfig(options);
    if (options.verbose) {
      console.log('Config:', JSON.stringify(config, null, 2));
    }

    const host = new ConsoleRenderHost({ open: options.open, logger });
    if (!(await renderOnce(inputPath, config, host, logger))) {
      process.exitCode = 1;
    }
  });

addConfigOptions(
  program
    .command('preview')
    .description('Open the rendered file for a WaveJSON file in the system viewer')
    .argument('<input>', 'Input .wjson file'),
).action(async (input: string, options: ConfigCliOptions) => {
  try {
    const outputPath = await previewArtifact({ path: resolve(input) }, buildConfig(options));
    console.log(`Opened: ${outputPath}`);
  } catch (err) {
    console.error('Preview failed');
    console.error(toError(err).message);
    process.exitCode = 1;
  }
});

addConfigOptions(
  program
    .command('watch')
    .description('Render a WaveJSON file every time it is saved')
    .argument('<input>', 'Input .wjson file'),
)
  .option('--open', 'Open the rendered file in the system viewer after the first render')
  .action(async (input: string, options: RenderCliOptions) => {
    const logger = createLogger('watch', { verbose: options.verbose });
    const inputPath = resolveInput(input);
    if (!inputPath) return;

    const host = new ConsoleRenderHost({ open: options.open, logger });
    let queue: Promise<unknown> = Promise.resolve();

    // Config is re-read for every cycle so edits to it apply on the next save
    const schedule = () => {
      queue = queue
        .then(() => renderOnce(inputPath, buildConfig(options), host, logger))
        .catch(err => logger.error('Render failed:', toError(err)));
    };

    schedule();

    // Watch the directory: editors that save by rename would detach a file watch
    const fileName = basename(inputPath);
    const onSave = debounce(schedule, WATCH_DEBOUNCE_MS);
    const watcher = watch(dirname(inputPath), (_event, changed) => {
      if (changed === fileName) onSave();
    });

    console.log(`Watching ${inputPath} (Ctrl+C to stop)`);
    process.once('SIGINT', () => {
      onSave.cancel();
      watcher.close();
    });
  });

await program.parseAsync();
