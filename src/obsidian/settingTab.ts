import { App, PluginSettingTab, Setting } from 'obsidian';
import { isOutputFormat } from '../core';
import type WaveDromPlugin from './main';

export class WaveDromSettingTab extends PluginSettingTab {
  plugin: WaveDromPlugin;

  constructor(app: App, plugin: WaveDromPlugin) {
    super(app, plugin);
    this.plugin = plugin;
  }

  display(): void {
    const { containerEl } = this;

    containerEl.empty();

    // Tools section
    new Setting(containerEl).setName('External tools').setHeading();

    new Setting(containerEl)
      .setName('wavedrom-cli path')
      .setDesc(
        'Command name or full path of the WaveDrom renderer. Install it with "npm install -g wavedrom-cli".',
      )
      .addText(text =>
        text
          .setPlaceholder('wavedrom-cli')
          .setValue(this.plugin.settings.rendererPath)
          .onChange(async v => {
            this.plugin.settings.rendererPath = v;
            await this.plugin.saveSettings();
          }),
      );

    new Setting(containerEl)
      .setName('Inkscape path')
      .setDesc('Command name or full path of Inkscape. Only needed for PDF output.')
      .addText(text =>
        text
          .setPlaceholder('inkscape')
          .setValue(this.plugin.settings.converterPath)
          .onChange(async v => {
            this.plugin.settings.converterPath = v;
            await this.plugin.saveSettings();
          }),
      );

    // Output section
    new Setting(containerEl).setName('Output').setHeading();

    new Setting(containerEl)
      .setName('Output format')
      .setDesc('Format of the rendered diagram.')
      .addDropdown(dropdown =>
        dropdown
          .addOption('svg', 'SVG')
          .addOption('png', 'PNG')
          .addOption('pdf', 'PDF (needs Inkscape)')
          .setValue(this.plugin.settings.outputFormat)
          .onChange(async v => {
            if (!isOutputFormat(v)) return;
            this.plugin.settings.outputFormat = v;
            await this.plugin.saveSettings();
          }),
      );

    new Setting(containerEl)
      .setName('Output directory')
      .setDesc(
        'Where rendered files are written. Relative paths are inside the vault. Leave empty to write next to the .wjson file.',
      )
      .addText(text =>
        text
          .setPlaceholder('Next to the source file')
          .setValue(this.plugin.settings.outputDirectory)
          .onChange(async v => {
            this.plugin.settings.outputDirectory = v;
            await this.plugin.saveSettings();
          }),
      );

    // Render cycle section
    new Setting(containerEl).setName('Rendering').setHeading();

    new Setting(containerEl)
      .setName('Render on save')
      .setDesc('Run wavedrom-cli every time a .wjson file is saved.')
      .addToggle(toggle =>
        toggle.setValue(this.plugin.settings.renderOnSave).onChange(async v => {
          this.plugin.settings.renderOnSave = v;
          await this.plugin.saveSettings();
        }),
      );

    new Setting(containerEl)
      .setName('Timeout (seconds)')
      .setDesc('Stop a render that takes longer than this. 0 waits forever.')
      .addText(text =>
        text
          .setPlaceholder('60')
          .setValue(String(this.plugin.settings.timeoutSeconds))
          .onChange(async v => {
            const seconds = Number(v);
            if (!Number.isFinite(seconds) || seconds < 0) return;
            this.plugin.settings.timeoutSeconds = seconds;
            await this.plugin.saveSettings();
          }),
      );
  }
}
