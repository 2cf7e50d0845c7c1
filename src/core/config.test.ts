import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  fromObsidianSettings,
  isOutputFormat,
  loadConfig,
  mergeConfig,
  parseConfigOverrides,
  type ObsidianWaveDromSettings,
} from './config';

describe('isOutputFormat', () => {
  it('accepts the three supported formats', () => {
    expect(isOutputFormat('svg')).toBe(true);
    expect(isOutputFormat('png')).toBe(true);
    expect(isOutputFormat('pdf')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isOutputFormat('gif')).toBe(false);
    expect(isOutputFormat('SVG')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });
});

describe('parseConfigOverrides', () => {
  it('picks recognised fields and ignores the rest', () => {
    expect(
      parseConfigOverrides({
        renderer: { path: '/opt/bin/wavedrom-cli' },
        output: { format: 'png', directory: '~/wavedrom' },
        theme: 'dark',
      }),
    ).toEqual({
      renderer: { path: '/opt/bin/wavedrom-cli' },
      output: { format: 'png', directory: '~/wavedrom' },
    });
  });

  it('keeps an unsupported format for the precondition check to report', () => {
    expect(parseConfigOverrides({ output: { format: 'gif' } })).toEqual({
      output: { format: 'gif' },
    });
  });

  it('drops empty paths and invalid timeouts', () => {
    expect(
      parseConfigOverrides({ converter: { path: '  ' }, timeoutMs: -5 }),
    ).toEqual({});
    expect(parseConfigOverrides({ timeoutMs: 0 })).toEqual({ timeoutMs: 0 });
  });

  it('rejects non-object input', () => {
    expect(() => parseConfigOverrides([1, 2])).toThrow('Config must be a JSON object');
    expect(() => parseConfigOverrides('svg')).toThrow('Config must be a JSON object');
  });
});

describe('mergeConfig', () => {
  it('layers overrides without touching the base', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {
      converter: { path: '/usr/bin/inkscape' },
      output: { directory: '/tmp/out' },
    });

    expect(merged).toEqual({
      renderer: { path: 'wavedrom-cli' },
      converter: { path: '/usr/bin/inkscape' },
      output: { format: 'svg', directory: '/tmp/out' },
      timeoutMs: 60000,
    });
    expect(DEFAULT_CONFIG.output.directory).toBeUndefined();
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wavedrom-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('returns the defaults when no config file exists', () => {
    expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
  });

  it('merges the default config file over the defaults', () => {
    writeFileSync(
      join(dir, 'wavedrom-mode.config.json'),
      JSON.stringify({ output: { format: 'pdf' }, timeoutMs: 5000 }),
    );

    expect(loadConfig(undefined, dir)).toEqual({
      renderer: { path: 'wavedrom-cli' },
      converter: { path: 'inkscape' },
      output: { format: 'pdf' },
      timeoutMs: 5000,
    });
  });

  it('reads an explicit path relative to cwd', () => {
    writeFileSync(join(dir, 'custom.json'), JSON.stringify({ renderer: { path: './bin/wd' } }));

    expect(loadConfig('custom.json', dir).renderer.path).toBe('./bin/wd');
  });

  it('falls back to the defaults on malformed JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeFileSync(join(dir, '.wavedrom-mode.json'), '{ output: ');

    expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('fromObsidianSettings', () => {
  const settings: ObsidianWaveDromSettings = {
    rendererPath: '',
    converterPath: '/usr/local/bin/inkscape',
    outputFormat: 'png',
    outputDirectory: 'diagrams/out',
    renderOnSave: true,
    timeoutSeconds: 30,
  };

  it('resolves a relative output directory against the vault', () => {
    expect(fromObsidianSettings(settings, '/vault')).toEqual({
      renderer: { path: 'wavedrom-cli' },
      converter: { path: '/usr/local/bin/inkscape' },
      output: { format: 'png', directory: join('/vault', 'diagrams/out') },
      timeoutMs: 30000,
    });
  });

  it('leaves absolute and home-relative directories alone', () => {
    expect(
      fromObsidianSettings({ ...settings, outputDirectory: '/srv/out' }, '/vault').output.directory,
    ).toBe('/srv/out');
    expect(
      fromObsidianSettings({ ...settings, outputDirectory: '~/wavedrom' }, '/vault').output.directory,
    ).toBe('~/wavedrom');
  });

  it('writes beside the source when no directory is set', () => {
    expect(
      fromObsidianSettings({ ...settings, outputDirectory: '  ' }, '/vault').output.directory,
    ).toBeUndefined();
  });
});
