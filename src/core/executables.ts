/**
 * Locate external executables (wavedrom-cli, inkscape)
 */

import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { delimiter, isAbsolute, join, resolve, sep } from 'path';
import { expandHome } from './outputPath';

export type ExecutableResolver = (command: string) => Promise<string | null>;

async function isExecutableFile(path: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    // Windows has no execute bit; existence is all that can be checked
    if (platform !== 'win32') await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function hasPathSeparator(command: string): boolean {
  return command.includes('/') || command.includes(sep);
}

/**
 * Resolve a configured command to an executable file
 *
 * A command containing a path separator (or starting with `~`) is checked
 * as-is; a bare name is searched for along PATH. On Windows each PATHEXT
 * suffix is tried before the bare name, since npm installs an extensionless
 * shell shim next to the `.cmd` one.
 *
 * @returns Absolute path, or null when nothing executable was found
 */
export async function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const trimmed = command.trim();
  if (trimmed === '') return null;

  const expanded = expandHome(trimmed);
  if (isAbsolute(expanded) || hasPathSeparator(expanded)) {
    const candidate = resolve(expanded);
    return (await isExecutableFile(candidate, platform)) ? candidate : null;
  }

  const searchPath = env.PATH ?? env.Path ?? '';
  const extensions =
    platform === 'win32'
      ? [...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean), '']
      : [''];

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, expanded + ext);
      if (await isExecutableFile(candidate, platform)) return candidate;
    }
  }

  return null;
}
