/**
 * Core types shared between CLI and Obsidian plugin
 */

/**
 * A WaveJSON document as the host sees it. `path` is the absolute path of
 * the saved file; a buffer that was never written to disk has none.
 */
export interface SourceDocument {
  path?: string;
}

export type NotifyLevel = 'info' | 'warning' | 'error';

/**
 * Where the external tools' error output is collected
 *
 * Cleared at the start of every render cycle, so it only ever holds the
 * output of the latest one.
 */
export interface ErrorSink {
  /** How the user finds the sink (a command name, "stderr", ...) */
  readonly name: string;
  clear(): void;
  write(text: string): void;
  contents(): string;
}

/**
 * Capabilities the render cycle needs from its host
 *
 * - In CLI: console output, optional opening with the system viewer
 * - In Obsidian: Notice popups, workspace leaves for the artifact
 */
export interface RenderHost {
  errorSink: ErrorSink;

  /** Show a message to the user */
  notify(level: NotifyLevel, message: string): void;

  /**
   * Open the artifact in a secondary view, or refresh the view already
   * showing it so it reflects the new render
   */
  presentArtifact(outputPath: string): Promise<void>;
}

/**
 * ErrorSink that keeps the captured text in memory
 */
export class MemoryErrorSink implements ErrorSink {
  private buffer = '';

  constructor(readonly name: string) {}

  clear(): void {
    this.buffer = '';
  }

  write(text: string): void {
    this.buffer += text;
  }

  contents(): string {
    return this.buffer;
  }
}
