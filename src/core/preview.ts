/**
 * Open a rendered artifact in the system's default viewer
 */

import { spawn } from 'child_process';
import type { WaveDromConfig } from './config';
import { ProcessLaunchError } from './errors';
import { resolveOutputPath } from './outputPath';
import type { SourceDocument } from './types';

export type ExternalOpener = (path: string) => Promise<void>;

function openerCommand(platform: NodeJS.Platform, path: string): { executable: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { executable: 'open', args: [path] };
    case 'win32':
      // `start` is a cmd builtin; the empty string is the window title
      return { executable: 'cmd', args: ['/c', 'start', '', path] };
    default:
      return { executable: 'xdg-open', args: [path] };
  }
}

/**
 * Hand a file to the platform opener (open / xdg-open / start)
 *
 * Resolves once the opener has been launched; what the viewer does with a
 * missing file is up to the viewer.
 */
export const openExternal: ExternalOpener = (path: string) => {
  const { executable, args } = openerCommand(process.platform, path);

  return new Promise<void>((resolve, reject) => {
    const proc = spawn(executable, args, { detached: true, stdio: 'ignore' });
    proc.on('error', err => reject(new ProcessLaunchError(executable, err)));
    proc.on('spawn', () => {
      proc.unref();
      resolve();
    });
  });
};

/**
 * Open the current output artifact of `source`
 *
 * Only the path is resolved; whether the file exists is not checked.
 *
 * @returns The path that was opened
 */
export async function previewArtifact(
  source: SourceDocument,
  config: WaveDromConfig,
  opener: ExternalOpener = openExternal,
): Promise<string> {
  if (!source.path) {
    throw new Error('WaveDrom: the document has not been saved to a file');
  }
  const outputPath = resolveOutputPath(source.path, config);
  await opener(outputPath);
  return outputPath;
}
