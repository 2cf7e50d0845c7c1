/**
 * Core module exports
 *
 * This is the shared core used by both CLI and Obsidian plugin.
 */

// Types
export { type SourceDocument, type ErrorSink, type RenderHost, type NotifyLevel, MemoryErrorSink } from './types';

// Configuration
export {
  type WaveDromConfig,
  type OutputFormat,
  type ConfigOverrides,
  type ObsidianWaveDromSettings,
  OUTPUT_FORMATS,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  isOutputFormat,
  parseConfigOverrides,
  mergeConfig,
  loadConfig,
  fromObsidianSettings,
} from './config';

// Token classifier
export {
  type TokenCategory,
  type TokenSpan,
  VOCABULARY,
  classifyToken,
  completionCandidates,
  scanTokens,
  symbolAt,
} from './tokens';

// Paths and executables
export { expandHome, resolveOutputDirectory, resolveOutputPath } from './outputPath';
export { resolveExecutable, type ExecutableResolver } from './executables';

// wavedrom-cli utilities
export {
  buildRenderCommand,
  formatRenderCommand,
  type CommandStep,
  type RenderCommand,
  type RenderTools,
  type BuildCommandOptions,
} from './wavedromCli';

// Process execution
export {
  NodeProcessRunner,
  spawnCommand,
  type ProcessRunner,
  type ProcessOutcome,
  type RunOptions,
} from './process';

// Render cycle
export {
  renderDocument,
  checkPreconditions,
  ensureOutputDirectory,
  classifyOutcome,
  type RenderContext,
  type RenderResult,
  type RenderStage,
  type RenderJob,
  type StepOutcome,
} from './render';

// Preview
export { previewArtifact, openExternal, type ExternalOpener } from './preview';

// Errors and logging
export {
  RenderConfigurationError,
  ProcessLaunchError,
  ProcessTimeoutError,
  toError,
  type PreconditionFailure,
} from './errors';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './log';
export { debounce } from './debounce';
