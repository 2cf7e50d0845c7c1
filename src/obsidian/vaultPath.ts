import { isAbsolute, relative, sep } from 'path';

/**
 * Vault-relative path of an absolute path, or null when it is outside the
 * vault (or is the vault root itself). Vault paths always use `/`.
 */
export function toVaultPath(basePath: string, absolutePath: string): string | null {
  const rel = relative(basePath, absolutePath);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return rel.split(sep).join('/');
}
