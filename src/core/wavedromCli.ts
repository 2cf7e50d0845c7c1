/**
 * wavedrom-cli command building utilities
 *
 * Shared logic for building the external command line used by both
 * the CLI tool and the Obsidian plugin. Commands are argument vectors,
 * never shell strings, so paths need no quoting when executed.
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { isOutputFormat } from './config';

export interface CommandStep {
  executable: string;
  args: string[];
}

export interface RenderCommand {
  /** Steps run in order; each must finish before the next starts */
  steps: CommandStep[];
  /** Files produced by one step for the next, deleted after the run */
  intermediates: string[];
}

export interface RenderTools {
  /** Resolved path to wavedrom-cli */
  renderer: string;
  /** Resolved path to inkscape, only read for pdf */
  converter?: string;
}

export interface BuildCommandOptions {
  /** Where pdf's intermediate svg goes. Default: os.tmpdir() */
  tempDir?: string;
}

/**
 * Unique path for the svg handed from wavedrom-cli to the converter
 */
function getIntermediateSvgPath(tempDir: string): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 8);
  return join(tempDir, `wavedrom-${timestamp}-${random}.svg`);
}

/**
 * Build the command that renders `inputPath` into `outputPath`
 *
 * @returns null for a format outside svg/png/pdf, or pdf without a converter
 */
export function buildRenderCommand(
  inputPath: string,
  outputPath: string,
  format: string,
  tools: RenderTools,
  options: BuildCommandOptions = {},
): RenderCommand | null {
  if (!isOutputFormat(format)) return null;

  switch (format) {
    case 'svg':
      return {
        steps: [{ executable: tools.renderer, args: ['-i', inputPath, '-s', outputPath] }],
        intermediates: [],
      };

    case 'png':
      return {
        steps: [{ executable: tools.renderer, args: ['-i', inputPath, '-p', outputPath] }],
        intermediates: [],
      };

    case 'pdf': {
      if (!tools.converter) return null;
      const svgPath = getIntermediateSvgPath(options.tempDir ?? tmpdir());
      return {
        steps: [
          { executable: tools.renderer, args: ['-i', inputPath, '-s', svgPath] },
          {
            executable: tools.converter,
            args: [svgPath, '--export-type=pdf', `--export-filename=${outputPath}`],
          },
        ],
        intermediates: [svgPath],
      };
    }
  }
}

function quoteArg(arg: string): string {
  return /[\s"']/.test(arg) ? `"${arg.replace(/(["\\$`])/g, '\\$1')}"` : arg;
}

/**
 * Human-readable form of a command, for logs and the verbose CLI
 */
export function formatRenderCommand(command: RenderCommand): string {
  return command.steps
    .map(step => [step.executable, ...step.args].map(quoteArg).join(' '))
    .join(' && ');
}
