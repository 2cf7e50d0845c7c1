/**
 * Obsidian implementation of RenderHost
 *
 * Messages become Notices. Artifacts inside the vault open in a split leaf
 * (or the leaf already showing them is reloaded); anything outside the vault
 * goes to the system viewer.
 */

import { App, FileView, Modal, Notice, TFile, type WorkspaceLeaf } from 'obsidian';
import {
  MemoryErrorSink,
  openExternal,
  type Logger,
  type NotifyLevel,
  type RenderHost,
} from '../core';
import { toVaultPath } from './vaultPath';

export const SHOW_ERRORS_COMMAND_NAME = 'Show render errors';

// New files reach the vault index through its file watcher, not instantly
const VAULT_INDEX_TIMEOUT_MS = 5000;

function waitForVaultFile(app: App, path: string, timeoutMs: number): Promise<TFile | null> {
  const existing = app.vault.getAbstractFileByPath(path);
  if (existing instanceof TFile) return Promise.resolve(existing);

  return new Promise<TFile | null>(resolve => {
    const finish = (file: TFile | null) => {
      app.vault.offref(ref);
      clearTimeout(timer);
      resolve(file);
    };
    const ref = app.vault.on('create', created => {
      if (created instanceof TFile && created.path === path) finish(created);
    });
    const timer = setTimeout(() => finish(null), timeoutMs);
  });
}

function findLeafShowing(app: App, path: string): WorkspaceLeaf | undefined {
  const leaves: WorkspaceLeaf[] = [];
  app.workspace.iterateAllLeaves(leaf => {
    if (leaf.view instanceof FileView && leaf.view.file?.path === path) leaves.push(leaf);
  });
  return leaves[0];
}

export class ObsidianRenderHost implements RenderHost {
  readonly errorSink = new MemoryErrorSink(`"WaveDrom: ${SHOW_ERRORS_COMMAND_NAME}"`);
  private openedExternally = new Set<string>();

  constructor(
    private app: App,
    private basePath: string,
    private logger: Logger,
  ) {}

  notify(level: NotifyLevel, message: string): void {
    new Notice(message, level === 'info' ? 5000 : 10000);
  }

  async presentArtifact(outputPath: string): Promise<void> {
    const vaultPath = toVaultPath(this.basePath, outputPath);
    const file = vaultPath ? await waitForVaultFile(this.app, vaultPath, VAULT_INDEX_TIMEOUT_MS) : null;

    if (!file) {
      // The system viewer watches the file itself once it has it open
      if (this.openedExternally.has(outputPath)) return;
      await openExternal(outputPath);
      this.openedExternally.add(outputPath);
      return;
    }

    const leaf = findLeafShowing(this.app, file.path);
    if (leaf) {
      this.logger.debug(`Reloading ${file.path}`);
      const state = leaf.getViewState();
      await leaf.setViewState({ type: 'empty' });
      await leaf.setViewState(state);
      return;
    }

    this.logger.debug(`Opening ${file.path}`);
    await this.app.workspace.getLeaf('split').openFile(file, { active: false });
  }
}

/**
 * Shows what the external tools wrote to stderr during the last render
 */
export class RenderErrorsModal extends Modal {
  constructor(
    app: App,
    private errorOutput: string,
  ) {
    super(app);
  }

  onOpen(): void {
    this.titleEl.setText('WaveDrom render errors');
    this.contentEl.createEl('pre', {
      cls: 'wavedrom-render-errors',
      text: this.errorOutput || 'The last render produced no error output.',
    });
  }

  onClose(): void {
    this.contentEl.empty();
  }
}
