import { isOutputFormat, type ObsidianWaveDromSettings } from '../core';

export type WaveDromPluginSettings = ObsidianWaveDromSettings;

export const WAVEDROM_DEFAULT_SETTINGS: WaveDromPluginSettings = {
  // Tools
  rendererPath: 'wavedrom-cli',
  converterPath: 'inkscape',

  // Output
  outputFormat: 'svg',
  outputDirectory: '',

  // Render cycle
  renderOnSave: true,
  timeoutSeconds: 60,
};

/**
 * Settings from saved plugin data, falling back to the default for every
 * field that is missing or has the wrong type
 */
export function parsePluginSettings(raw: unknown): WaveDromPluginSettings {
  const settings = { ...WAVEDROM_DEFAULT_SETTINGS };
  if (typeof raw !== 'object' || raw === null) return settings;

  const data: Record<string, unknown> = { ...raw };

  if (typeof data.rendererPath === 'string') settings.rendererPath = data.rendererPath;
  if (typeof data.converterPath === 'string') settings.converterPath = data.converterPath;
  if (isOutputFormat(data.outputFormat)) settings.outputFormat = data.outputFormat;
  if (typeof data.outputDirectory === 'string') settings.outputDirectory = data.outputDirectory;
  if (typeof data.renderOnSave === 'boolean') settings.renderOnSave = data.renderOnSave;
  if (typeof data.timeoutSeconds === 'number' && data.timeoutSeconds >= 0) {
    settings.timeoutSeconds = data.timeoutSeconds;
  }

  return settings;
}
