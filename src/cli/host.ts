/**
 * Console implementation of RenderHost
 *
 * Messages go to the terminal; the artifact is either reported or handed to
 * the system viewer when `--open` was given.
 */

import type { Logger, NotifyLevel, RenderHost } from '../core';
import { MemoryErrorSink, openExternal, type ExternalOpener } from '../core';

export interface ConsoleHostOptions {
  /** Open the artifact with the system viewer after each render */
  open?: boolean;
  opener?: ExternalOpener;
  logger: Logger;
}

export class ConsoleRenderHost implements RenderHost {
  readonly errorSink = new MemoryErrorSink('the renderer output above');
  private opened = new Set<string>();

  constructor(private options: ConsoleHostOptions) {}

  notify(level: NotifyLevel, message: string): void {
    if (level === 'error') {
      console.error(message);
      return;
    }
    if (level === 'warning') {
      // The sink only lives in memory, so show what it captured
      const captured = this.errorSink.contents();
      if (captured) process.stderr.write(captured.endsWith('\n') ? captured : `${captured}\n`);
      console.warn(message);
      return;
    }
    console.log(message);
  }

  async presentArtifact(outputPath: string): Promise<void> {
    console.log(`Rendered: ${outputPath}`);

    // A viewer that already has the file reloads it on its own; only open once
    if (!this.options.open || this.opened.has(outputPath)) return;

    await (this.options.opener ?? openExternal)(outputPath);
    this.opened.add(outputPath);
    this.options.logger.debug(`Opened ${outputPath}`);
  }
}
