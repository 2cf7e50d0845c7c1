/**
 * Render cycle for wavedrom-mode
 *
 * This module provides the core render logic used by both CLI and Obsidian.
 * Platform-specific concerns (messages, error sink, showing the artifact)
 * are injected via the RenderHost interface.
 *
 * Stages, in order:
 * 1. precondition        - reject bad configuration before touching anything
 * 2. ensure-output-dir   - create a configured output directory if missing
 * 3. build-command       - argument vectors for the selected format
 * 4. execute             - run each step, stderr into the error sink
 *                          (cleared when the cycle starts)
 * 5. classify            - advisory warning when the tools reported errors
 * 6. present             - open or refresh the artifact
 */

import { mkdir, stat, unlink } from 'fs/promises';
import type { WaveDromConfig, OutputFormat } from './config';
import { isOutputFormat } from './config';
import { RenderConfigurationError, toError } from './errors';
import { resolveExecutable as defaultResolveExecutable, type ExecutableResolver } from './executables';
import { createLogger, type Logger } from './log';
import { resolveOutputPath, resolveOutputDirectory } from './outputPath';
import { NodeProcessRunner, type ProcessOutcome, type ProcessRunner } from './process';
import type { RenderHost, SourceDocument } from './types';
import {
  buildRenderCommand,
  formatRenderCommand,
  type CommandStep,
  type RenderCommand,
  type RenderTools,
} from './wavedromCli';

export type RenderStage =
  | 'precondition'
  | 'ensure-output-dir'
  | 'build-command'
  | 'execute'
  | 'classify'
  | 'present';

/**
 * Render context - host dependencies plus optional overrides for the
 * process runner and executable lookup
 */
export interface RenderContext {
  host: RenderHost;

  /** Default: NodeProcessRunner */
  runner?: ProcessRunner;

  /** Default: PATH lookup via resolveExecutable */
  resolveExecutable?: ExecutableResolver;

  /** Temp directory for intermediate files (default: os.tmpdir()) */
  tempDir?: string;

  logger?: Logger;
}

export type RenderResult =
  | {
      success: true;
      outputPath: string;
      command: RenderCommand;
      /** Set when the tools reported errors; the artifact may be stale */
      advisory?: string;
    }
  | {
      success: false;
      stage: RenderStage;
      error: Error;
      outputPath?: string;
    };

/**
 * Everything the precondition check established about one render
 */
export interface RenderJob {
  sourcePath: string;
  outputPath: string;
  outputDirectory: string;
  /** The configured output directory does not exist yet */
  createOutputDirectory: boolean;
  format: OutputFormat;
  tools: RenderTools;
}

export interface StepOutcome {
  step: CommandStep;
  outcome: ProcessOutcome;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate the configuration for one render without side effects
 *
 * @throws RenderConfigurationError
 */
export async function checkPreconditions(
  source: SourceDocument,
  config: WaveDromConfig,
  resolveExecutable: ExecutableResolver = defaultResolveExecutable,
): Promise<RenderJob> {
  const sourcePath = source.path;
  if (!sourcePath) {
    throw new RenderConfigurationError(
      'no-source-path',
      'WaveDrom: the document has not been saved to a file',
    );
  }

  const format = config.output.format;
  if (!isOutputFormat(format)) {
    throw new RenderConfigurationError(
      'unsupported-format',
      `WaveDrom: unsupported output format "${format}" (expected svg, png or pdf)`,
    );
  }

  const renderer = await resolveExecutable(config.renderer.path);
  if (!renderer) {
    throw new RenderConfigurationError(
      'renderer-not-found',
      `WaveDrom: renderer "${config.renderer.path}" not found; install wavedrom-cli or set its path`,
    );
  }

  let converter: string | undefined;
  if (format === 'pdf') {
    converter = (await resolveExecutable(config.converter.path)) ?? undefined;
    if (!converter) {
      throw new RenderConfigurationError(
        'converter-not-found',
        `WaveDrom: converter "${config.converter.path}" not found; pdf output needs inkscape`,
      );
    }
  }

  const outputDirectory = resolveOutputDirectory(sourcePath, config);
  let createOutputDirectory = false;

  if (config.output.directory) {
    try {
      const info = await stat(outputDirectory);
      if (!info.isDirectory()) {
        throw new RenderConfigurationError(
          'output-dir-not-directory',
          `WaveDrom: output directory "${outputDirectory}" exists but is not a directory`,
        );
      }
    } catch (error) {
      if (!isMissing(error)) throw error;
      createOutputDirectory = true;
    }
  }

  return {
    sourcePath,
    outputPath: resolveOutputPath(sourcePath, config),
    outputDirectory,
    createOutputDirectory,
    format,
    tools: { renderer, converter },
  };
}

/**
 * Create the output directory and any missing parents
 */
export async function ensureOutputDirectory(job: RenderJob): Promise<void> {
  if (!job.createOutputDirectory) return;
  // recursive mkdir tolerates someone else creating it in the meantime
  await mkdir(job.outputDirectory, { recursive: true });
}

/**
 * Advisory message for a finished run, or undefined when it looked clean
 *
 * Non-empty error output is the primary signal. A non-zero exit status is
 * only consulted when nothing was written to the sink.
 */
export function classifyOutcome(
  errorOutput: string,
  outcomes: readonly StepOutcome[],
  sinkName: string,
): string | undefined {
  if (errorOutput.length > 0) {
    return `WaveDrom: there were errors, inspect ${sinkName}`;
  }

  const failed = outcomes.find(({ outcome }) => outcome.exitCode !== 0);
  if (!failed) return undefined;

  const { step, outcome } = failed;
  return outcome.signal
    ? `WaveDrom: ${step.executable} was terminated by ${outcome.signal}`
    : `WaveDrom: ${step.executable} exited with status ${outcome.exitCode}`;
}

async function runCommand(
  command: RenderCommand,
  runner: ProcessRunner,
  context: { host: RenderHost; logger: Logger; timeoutMs: number },
): Promise<StepOutcome[]> {
  const { host, logger, timeoutMs } = context;
  const outcomes: StepOutcome[] = [];

  try {
    for (const step of command.steps) {
      logger.debug(`Running ${step.executable}`);
      const outcome = await runner.run(step, { timeoutMs });
      if (outcome.stdout) logger.debug(outcome.stdout);
      if (outcome.stderr) host.errorSink.write(outcome.stderr);
      outcomes.push({ step, outcome });
    }
  } finally {
    for (const path of command.intermediates) {
      await unlink(path).catch(err => {
        logger.debug(`Could not remove intermediate ${path}: ${toError(err).message}`);
      });
    }
  }

  return outcomes;
}

/**
 * Run one render cycle for a saved WaveJSON document
 *
 * Hard failures are reported through `host.notify('error', ...)` and
 * returned; nothing is thrown. No stage is retried.
 *
 * @param source - The document being rendered
 * @param config - Configuration snapshot for this cycle
 * @param context - Host and optional runner/resolver overrides
 */
export async function renderDocument(
  source: SourceDocument,
  config: WaveDromConfig,
  context: RenderContext,
): Promise<RenderResult> {
  const {
    host,
    runner = new NodeProcessRunner(),
    resolveExecutable,
    tempDir,
    logger = createLogger('render'),
  } = context;

  let stage: RenderStage = 'precondition';
  let outputPath: string | undefined;

  // Before any stage, so a cycle that stops early leaves an empty sink
  host.errorSink.clear();

  try {
    const job = await checkPreconditions(source, config, resolveExecutable);
    outputPath = job.outputPath;

    stage = 'ensure-output-dir';
    await ensureOutputDirectory(job);

    stage = 'build-command';
    const command = buildRenderCommand(job.sourcePath, job.outputPath, job.format, job.tools, {
      tempDir,
    });
    if (!command) {
      throw new RenderConfigurationError(
        'unsupported-format',
        `WaveDrom: no command for output format "${job.format}"`,
      );
    }
    logger.debug(`Executing: ${formatRenderCommand(command)}`);

    stage = 'execute';
    const outcomes = await runCommand(command, runner, {
      host,
      logger,
      timeoutMs: config.timeoutMs,
    });

    stage = 'classify';
    const advisory = classifyOutcome(host.errorSink.contents(), outcomes, host.errorSink.name);
    if (advisory) {
      logger.warn(advisory);
      host.notify('warning', advisory);
    }

    stage = 'present';
    await host.presentArtifact(job.outputPath);

    return { success: true, outputPath: job.outputPath, command, advisory };
  } catch (error) {
    const err = toError(error);
    logger.error(`Render failed at ${stage}:`, err);
    host.notify('error', err instanceof RenderConfigurationError ? err.message : `WaveDrom: ${err.message}`);
    return { success: false, stage, error: err, outputPath };
  }
}
