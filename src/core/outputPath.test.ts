import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_CONFIG, mergeConfig } from './config';
import { expandHome, resolveOutputDirectory, resolveOutputPath } from './outputPath';

function config(format: string, directory?: string) {
  return mergeConfig(DEFAULT_CONFIG, { output: { format, directory } });
}

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~/wavedrom', '/home/ada')).toBe(join('/home/ada', 'wavedrom'));
    expect(expandHome('~', '/home/ada')).toBe('/home/ada');
  });

  it('leaves other paths untouched', () => {
    expect(expandHome('/srv/~/x', '/home/ada')).toBe('/srv/~/x');
    expect(expandHome('~other/x', '/home/ada')).toBe('~other/x');
  });
});

describe('resolveOutputPath', () => {
  it('writes beside the source when no directory is configured', () => {
    expect(resolveOutputPath('/work/diagrams/hello_world.wjson', config('svg'))).toBe(
      join('/work/diagrams', 'hello_world.svg'),
    );
  });

  it('uses the configured directory whether or not it exists', () => {
    expect(resolveOutputPath('/work/hello_world.wjson', config('png', '/no/such/dir'))).toBe(
      join('/no/such/dir', 'hello_world.png'),
    );
  });

  it('expands the home directory in the configured directory', () => {
    expect(resolveOutputPath('/work/hello_world.wjson', config('svg', '~/wavedrom'))).toBe(
      join(homedir(), 'wavedrom', 'hello_world.svg'),
    );
  });

  it('drops only the last extension', () => {
    expect(resolveOutputPath('/work/bus.v2.wjson', config('pdf'))).toBe(join('/work', 'bus.v2.pdf'));
  });

  it('handles a source without extension', () => {
    expect(resolveOutputPath('/work/timing', config('svg'))).toBe(join('/work', 'timing.svg'));
  });
});

describe('resolveOutputDirectory', () => {
  it('falls back to the source directory', () => {
    expect(resolveOutputDirectory('/a/b/c.wjson', config('svg'))).toBe('/a/b');
  });
});
