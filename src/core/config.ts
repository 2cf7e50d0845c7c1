/**
 * Configuration for wavedrom-mode
 * Shared between CLI and Obsidian plugin
 *
 * A WaveDromConfig is read once at the start of a render cycle and never
 * mutated during it. Load order: defaults -> config file -> host overrides.
 */

import { readFileSync, existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { createLogger } from './log';

export type OutputFormat = 'svg' | 'png' | 'pdf';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['svg', 'png', 'pdf'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export interface WaveDromConfig {
  renderer: {
    path: string; // wavedrom-cli executable, bare name or path
  };

  converter: {
    path: string; // inkscape executable, only needed for pdf
  };

  output: {
    // Plain string: an unsupported value is reported by the precondition
    // check, not dropped while loading
    format: string;
    directory?: string; // unset: beside the source file
  };

  // Kill the external tool after this long; 0 waits forever
  timeoutMs: number;
}

export const DEFAULT_CONFIG: WaveDromConfig = {
  renderer: {
    path: 'wavedrom-cli',
  },
  converter: {
    path: 'inkscape',
  },
  output: {
    format: 'svg',
  },
  timeoutMs: 60000,
};

export const CONFIG_FILE_NAMES = [
  'wavedrom-mode.config.json',
  '.wavedrom-mode.json',
];

export type ConfigOverrides = {
  renderer?: Partial<WaveDromConfig['renderer']>;
  converter?: Partial<WaveDromConfig['converter']>;
  output?: Partial<WaveDromConfig['output']>;
  timeoutMs?: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Pick the recognised fields out of parsed JSON, ignoring everything else
 */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error('Config must be a JSON object');
  }

  const overrides: ConfigOverrides = {};

  if (isRecord(raw.renderer)) {
    const path = nonEmptyString(raw.renderer.path);
    if (path) overrides.renderer = { path };
  }

  if (isRecord(raw.converter)) {
    const path = nonEmptyString(raw.converter.path);
    if (path) overrides.converter = { path };
  }

  if (isRecord(raw.output)) {
    const output: Partial<WaveDromConfig['output']> = {};
    const format = nonEmptyString(raw.output.format);
    if (format) output.format = format;
    const directory = nonEmptyString(raw.output.directory);
    if (directory) output.directory = directory;
    overrides.output = output;
  }

  if (typeof raw.timeoutMs === 'number' && Number.isFinite(raw.timeoutMs) && raw.timeoutMs >= 0) {
    overrides.timeoutMs = raw.timeoutMs;
  }

  return overrides;
}

/**
 * Layer overrides on top of a base config, skipping undefined fields
 */
export function mergeConfig(base: WaveDromConfig, overrides: ConfigOverrides): WaveDromConfig {
  const output = { ...base.output };
  if (overrides.output?.format !== undefined) output.format = overrides.output.format;
  if (overrides.output?.directory !== undefined) output.directory = overrides.output.directory;

  return {
    renderer: { path: overrides.renderer?.path ?? base.renderer.path },
    converter: { path: overrides.converter?.path ?? base.converter.path },
    output,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
  };
}

/**
 * Load config from file, merging with defaults
 *
 * @param configPath - Explicit config file; otherwise the default names are
 *   looked up in `cwd`
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): WaveDromConfig {
  let configFile: string | undefined;

  if (configPath) {
    configFile = isAbsolute(configPath) ? configPath : join(cwd, configPath);
  } else {
    configFile = CONFIG_FILE_NAMES.map(name => join(cwd, name)).find(path => existsSync(path));
  }

  if (!configFile || !existsSync(configFile)) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  try {
    const content = readFileSync(configFile, 'utf-8');
    return mergeConfig(DEFAULT_CONFIG, parseConfigOverrides(JSON.parse(content)));
  } catch (e) {
    createLogger('config').warn(`Failed to load config from ${configFile}:`, e);
    return mergeConfig(DEFAULT_CONFIG, {});
  }
}

/**
 * Obsidian plugin settings, as persisted by the plugin
 */
export interface ObsidianWaveDromSettings {
  rendererPath: string;
  converterPath: string;
  outputFormat: OutputFormat;
  outputDirectory: string;
  renderOnSave: boolean;
  timeoutSeconds: number;
}

/**
 * Convert Obsidian plugin settings to core config format.
 * A relative output directory is taken relative to the vault root.
 */
export function fromObsidianSettings(
  settings: ObsidianWaveDromSettings,
  vaultBasePath: string,
): WaveDromConfig {
  const directory = settings.outputDirectory.trim();

  return mergeConfig(DEFAULT_CONFIG, {
    renderer: { path: nonEmptyString(settings.rendererPath) },
    converter: { path: nonEmptyString(settings.converterPath) },
    output: {
      format: settings.outputFormat,
      directory:
        directory === ''
          ? undefined
          : isAbsolute(directory) || directory.startsWith('~')
            ? directory
            : join(vaultBasePath, directory),
    },
    timeoutMs: Math.max(0, settings.timeoutSeconds) * 1000,
  });
}
