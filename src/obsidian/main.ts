import { FileSystemAdapter, Notice, Plugin, TFile } from 'obsidian';
import { join } from 'path';
import fixPath from 'fix-path';
import {
  createLogger,
  fromObsidianSettings,
  previewArtifact,
  renderDocument,
  toError,
  type Logger,
  type WaveDromConfig,
} from '../core';
import { WAVEDROM_DEFAULT_SETTINGS, parsePluginSettings, type WaveDromPluginSettings } from './settings';
import { WaveDromSettingTab } from './settingTab';
import { WAVEJSON_EXTENSION, WAVEJSON_VIEW_TYPE, WaveJsonView } from './wavejsonView';
import { ObsidianRenderHost, RenderErrorsModal, SHOW_ERRORS_COMMAND_NAME } from './host';

export default class WaveDromPlugin extends Plugin {
  settings: WaveDromPluginSettings = { ...WAVEDROM_DEFAULT_SETTINGS };
  private logger: Logger = createLogger('obsidian');
  private host: ObsidianRenderHost | null = null;

  async onload() {
    await this.loadSettings();

    // GUI apps on macOS start without the login shell's PATH
    fixPath();

    this.registerView(WAVEJSON_VIEW_TYPE, leaf => new WaveJsonView(leaf));
    this.registerExtensions([WAVEJSON_EXTENSION], WAVEJSON_VIEW_TYPE);
    this.addSettingTab(new WaveDromSettingTab(this.app, this));

    this.addRibbonIcon('activity', 'WaveDrom: Compile now', async () => {
      const file = this.getActiveWaveJsonFile();
      if (!file) {
        new Notice('Open a .wjson file to compile it with WaveDrom.', 10000);
        return;
      }
      await this.compile(file);
    });

    // Commands
    this.addCommand({
      id: 'compile-now',
      name: 'Compile now',
      checkCallback: checking => {
        const file = this.getActiveWaveJsonFile();
        if (!file) return false;
        if (!checking) this.runInBackground(this.compile(file));
        return true;
      },
    });

    this.addCommand({
      id: 'preview-in-browser',
      name: 'Preview in browser',
      checkCallback: checking => {
        const file = this.getActiveWaveJsonFile();
        if (!file) return false;
        if (!checking) this.runInBackground(this.preview(file));
        return true;
      },
    });

    this.addCommand({
      id: 'show-render-errors',
      name: SHOW_ERRORS_COMMAND_NAME,
      callback: () => {
        new RenderErrorsModal(this.app, this.host?.errorSink.contents() ?? '').open();
      },
    });

    // Render on save
    this.registerEvent(
      this.app.vault.on('modify', file => {
        if (!this.settings.renderOnSave) return;
        if (file instanceof TFile && file.extension === WAVEJSON_EXTENSION) {
          this.runInBackground(this.compile(file));
        }
      }),
    );
  }

  private runInBackground(task: Promise<void>): void {
    task.catch(err => {
      const error = toError(err);
      this.logger.error('Command failed:', error);
      new Notice(`WaveDrom: ${error.message}`, 10000);
    });
  }

  private getActiveWaveJsonFile(): TFile | null {
    const file = this.app.workspace.getActiveFile();
    return file && file.extension === WAVEJSON_EXTENSION ? file : null;
  }

  private getBasePath(): string {
    const adapter = this.app.vault.adapter;
    if (!(adapter instanceof FileSystemAdapter)) {
      throw new Error('WaveDrom rendering needs a vault on the local file system');
    }
    return adapter.getBasePath();
  }

  /**
   * Configuration snapshot for one render cycle
   */
  private getConfig(basePath: string): WaveDromConfig {
    return fromObsidianSettings(this.settings, basePath);
  }

  private getHost(basePath: string): ObsidianRenderHost {
    if (!this.host) this.host = new ObsidianRenderHost(this.app, basePath, this.logger);
    return this.host;
  }

  async compile(file: TFile): Promise<void> {
    const basePath = this.getBasePath();
    await renderDocument({ path: join(basePath, file.path) }, this.getConfig(basePath), {
      host: this.getHost(basePath),
      logger: this.logger,
    });
  }

  async preview(file: TFile): Promise<void> {
    const basePath = this.getBasePath();
    const outputPath = await previewArtifact(
      { path: join(basePath, file.path) },
      this.getConfig(basePath),
    );
    this.logger.debug(`Previewing ${outputPath}`);
  }

  async loadSettings() {
    this.settings = parsePluginSettings(await this.loadData());
  }

  async saveSettings() {
    await this.saveData(this.settings);
  }
}
