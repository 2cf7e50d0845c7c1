import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { toVaultPath } from './vaultPath';

describe('toVaultPath', () => {
  const vault = join('/home', 'test', 'vault');

  it('maps a file inside the vault to a slash-separated vault path', () => {
    expect(toVaultPath(vault, join(vault, 'diagrams', 'out', 'bus.svg'))).toBe('diagrams/out/bus.svg');
    expect(toVaultPath(vault, join(vault, 'bus.svg'))).toBe('bus.svg');
  });

  it('treats paths that climb out of the vault as outside', () => {
    expect(toVaultPath(vault, join(vault, '..', 'exports', 'bus.svg'))).toBeNull();
    expect(toVaultPath(vault, join('/home', 'test'))).toBeNull();
  });

  it('keeps names that merely start with two dots inside', () => {
    expect(toVaultPath(vault, join(vault, '..bus.svg'))).toBe('..bus.svg');
  });

  it('does not treat the vault root as a file', () => {
    expect(toVaultPath(vault, vault)).toBeNull();
  });
});
