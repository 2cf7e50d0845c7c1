import { describe, it, expect } from 'vitest';
import { WAVEDROM_DEFAULT_SETTINGS, parsePluginSettings } from './settings';

describe('parsePluginSettings', () => {
  it('returns the defaults when nothing was saved', () => {
    expect(parsePluginSettings(null)).toEqual(WAVEDROM_DEFAULT_SETTINGS);
    expect(parsePluginSettings(undefined)).toEqual(WAVEDROM_DEFAULT_SETTINGS);
  });

  it('keeps saved values of the right type', () => {
    expect(
      parsePluginSettings({
        rendererPath: '/opt/node/bin/wavedrom-cli',
        outputFormat: 'pdf',
        outputDirectory: 'renders',
        renderOnSave: false,
        timeoutSeconds: 0,
      }),
    ).toEqual({
      rendererPath: '/opt/node/bin/wavedrom-cli',
      converterPath: 'inkscape',
      outputFormat: 'pdf',
      outputDirectory: 'renders',
      renderOnSave: false,
      timeoutSeconds: 0,
    });
  });

  it('falls back per field on bad values', () => {
    const settings = parsePluginSettings({
      outputFormat: 'gif',
      renderOnSave: 'yes',
      timeoutSeconds: -1,
      converterPath: 42,
    });

    expect(settings).toEqual(WAVEDROM_DEFAULT_SETTINGS);
  });

  it('does not share state with the defaults', () => {
    const settings = parsePluginSettings({});
    settings.outputDirectory = 'elsewhere';

    expect(WAVEDROM_DEFAULT_SETTINGS.outputDirectory).toBe('');
  });
});
