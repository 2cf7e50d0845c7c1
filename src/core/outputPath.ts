/**
 * Output artifact path resolution
 *
 * Pure: nothing here touches the filesystem, so a configured directory is
 * used whether or not it exists yet.
 */

import { homedir } from 'os';
import { basename, dirname, extname, join } from 'path';
import type { WaveDromConfig } from './config';

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Directory the artifact is written to: the configured output directory,
 * or the source file's own directory
 */
export function resolveOutputDirectory(sourcePath: string, config: WaveDromConfig): string {
  const configured = config.output.directory;
  return configured ? expandHome(configured) : dirname(sourcePath);
}

/**
 * `<output dir>/<source basename without extension>.<format>`
 */
export function resolveOutputPath(sourcePath: string, config: WaveDromConfig): string {
  const stem = basename(sourcePath, extname(sourcePath));
  return join(resolveOutputDirectory(sourcePath, config), `${stem}.${config.output.format}`);
}
