/**
 * Board build pipeline.
 *
 * Acquires a firmware source tree, isolates its caches on the host, drives
 * the tree's build script through clean, build and release, and records the
 * resulting image names. `src/cli.ts` runs it from the environment; the
 * exports below are for programmatic use.
 */

export * from './domain';
export { parseBuildRequest, splitArgs, EnvSchema } from './config/env';
export type { EnvSource, ConfigResult, ParsedEnv } from './config/env';
export { BuildPipeline } from './engine/pipeline';
export type { PipelineDeps } from './engine/pipeline';
export { PhaseSequencer, cleanPhaseFor, detachesDownloadCache } from './engine/sequencer';
export type { SequencerReport, SequencerDeps } from './engine/sequencer';
export { transitionSequencerState } from './engine/state-machine';
export { ScriptBuildDriver } from './engine/build-driver';
export type { BuildDriver, ScriptBuildDriverOptions } from './engine/build-driver';
export { SpawnCommandRunner, toDelegatedEnv, SPAWN_FAILURE_STATUS } from './engine/process-runner';
export type { CommandRunner, CommandSpec, CommandResult, SpawnRunnerOptions } from './engine/process-runner';
export { PipelinePublisher, EVENT_SCHEMA_VERSION } from './events/publisher';
export { resolveCheckout, injectCredentials, runIdentifier } from './resolver/reference';
export { resolveVersion, abbreviateVersion, buildMetadataEnv, DEFAULT_VERSION } from './resolver/version';
export { acquireSource, prepareCheckoutDir, DEFAULT_REMOTE } from './source/acquisition';
export { GitCliClient } from './source/git-client';
export type { SourceControlClient } from './source/git-client';
export {
  SymlinkAttachment,
  BindMountAttachment,
  AutoAttachment,
  AttachmentFailure,
  createAttachmentDriver,
} from './workspace/attach';
export type { AttachmentDriver } from './workspace/attach';
export { WorkspaceIsolator, planWorkspace, compilerCacheDirName } from './workspace/isolator';
export { reportArtifacts, readManifest, readProductName, imageFileNames, manifestPath, writeManifest } from './artifacts/reporter';
export { parseKeyValue } from './artifacts/version-info';
export type { KeyValueParseResult } from './artifacts/version-info';
export { logger, createLogger, setLogHandler, resetLogHandler, setLogLevel, parseLogLevel, setRedactedSecrets, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
