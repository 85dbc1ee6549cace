/**
 * Build pipeline orchestration engine.
 *
 * Runs the six stages in fixed order (resolve, acquire, isolate, version,
 * build, report) against one immutable BuildRequest. Each stage yields a
 * typed outcome; the first failure halts the run and its error is forwarded
 * unchanged to the run record and the exit status.
 */

import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';
import { BuildRequest, requestSecrets } from '../domain/request';
import { ResolvedCheckout } from '../domain/checkout';
import {
  PipelineRun,
  RunStatus,
  STAGE_ORDER,
  SequencerState,
  StageName,
  StageResult,
  StageStatus,
} from '../domain/run';
import {
  PipelineError,
  TypedError,
  createTypedError,
  exitCodeFor,
  maskSecretsInMessage,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { StageOutcome, sequence, succeed } from '../domain/outcome';
import { PipelinePublisher } from '../events/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { injectCredentials, resolveCheckout, runIdentifier } from '../resolver/reference';
import { buildMetadataEnv, resolveVersion } from '../resolver/version';
import { acquireSource } from '../source/acquisition';
import { GitCliClient, SourceControlClient } from '../source/git-client';
import { AttachmentDriver, createAttachmentDriver } from '../workspace/attach';
import { WorkspaceIsolator, planWorkspace } from '../workspace/isolator';
import { reportArtifacts } from '../artifacts/reporter';
import { errorMessage } from '../util/fs';
import { BuildDriver, ScriptBuildDriver } from './build-driver';
import { CommandRunner } from './process-runner';
import { PhaseSequencer, SequencerReport } from './sequencer';

/** Error domain for unexpected exceptions escaping each stage. */
const STAGE_DOMAINS: Record<StageName, string> = {
  [StageName.Resolve]: 'CONFIGURATION',
  [StageName.Acquire]: 'ACQUISITION',
  [StageName.Isolate]: 'ISOLATION',
  [StageName.Version]: 'CONFIGURATION',
  [StageName.Build]: 'BUILD',
  [StageName.Report]: 'ARTIFACT',
};

export interface PipelineDeps {
  /** Runs every delegated command unless a more specific collaborator is given. */
  runner: CommandRunner;
  sourceClient?: SourceControlClient;
  attachmentDriver?: AttachmentDriver;
  /** Factory for the build driver, given the resolved build metadata env. */
  buildDriver?: (request: BuildRequest, env: Record<string, string>) => BuildDriver;
  publisher?: PipelinePublisher;
  logger?: Logger;
}

/** Mutable context threaded through a single run's stages. */
interface RunContext {
  run: PipelineRun;
  request: BuildRequest;
  log: Logger;
  repositoryUrl?: string;
  checkout?: ResolvedCheckout;
  isolator?: WorkspaceIsolator;
  version?: string;
  sequencer?: SequencerReport;
}

export class BuildPipeline {
  readonly publisher: PipelinePublisher;
  private readonly logger: Logger;

  constructor(private deps: PipelineDeps) {
    this.publisher = deps.publisher ?? new PipelinePublisher();
    this.logger = deps.logger ?? rootLogger;
  }

  /** Execute every stage for a request and return the finished run record. */
  async run(request: BuildRequest): Promise<PipelineRun> {
    const run = createRun(request);
    const ctx: RunContext = { run, request, log: this.logger.child({ runId: run.id, board: request.board }) };

    run.status = RunStatus.Running;
    run.startedAt = new Date().toISOString();
    this.publish(ctx, 'run.started', { mode: request.mode, cleanScope: request.cleanScope });
    ctx.log.info('pipeline started', { mode: request.mode });

    const stages: Record<StageName, () => Promise<StageOutcome<unknown>>> = {
      [StageName.Resolve]: () => this.resolve(ctx),
      [StageName.Acquire]: () => this.acquire(ctx),
      [StageName.Isolate]: () => this.isolate(ctx),
      [StageName.Version]: () => this.version(ctx),
      [StageName.Build]: () => this.build(ctx),
      [StageName.Report]: () => this.report(ctx),
    };

    const outcome = await sequence(STAGE_ORDER.map((stage) => () => this.step(ctx, stage, stages[stage])));
    let failure: TypedError | undefined = outcome.success ? undefined : outcome.error;
    for (const stage of STAGE_ORDER) {
      if (run.stageResults[stage].status === StageStatus.Pending) this.markStage(ctx, stage, StageStatus.Skipped);
    }

    if (ctx.isolator && !request.isolation.keepAttached) {
      const released = await ctx.isolator.release();
      if (!released.success && !failure) failure = released.error;
    }

    return this.finish(ctx, failure);
  }

  private async resolve(ctx: RunContext): Promise<StageOutcome<ResolvedCheckout | undefined>> {
    const { request } = ctx;
    ctx.checkout = resolveCheckout(request.selectors);
    ctx.repositoryUrl = request.repositoryUrl
      ? injectCredentials(request.repositoryUrl, request.credential)
      : undefined;
    ctx.run.checkout = ctx.checkout;
    ctx.run.key = `${runIdentifier(ctx.checkout, request.customCommand, sha1)}/${request.board}`;
    ctx.log.info('reference resolved', {
      ref: ctx.checkout?.ref ?? '(default branch)',
      kind: ctx.checkout?.kind,
      key: ctx.run.key,
    });
    return succeed(ctx.checkout);
  }

  private acquire(ctx: RunContext): Promise<StageOutcome<void>> {
    return acquireSource({
      request: ctx.request,
      repositoryUrl: ctx.repositoryUrl,
      checkout: ctx.checkout,
      client: this.deps.sourceClient ?? new GitCliClient(this.deps.runner),
      logger: ctx.log.child({ stage: StageName.Acquire }),
    });
  }

  private isolate(ctx: RunContext): Promise<StageOutcome<void>> {
    const log = ctx.log.child({ stage: StageName.Isolate });
    const driver = this.deps.attachmentDriver
      ?? createAttachmentDriver(ctx.request.isolation.strategy, this.deps.runner, log);
    ctx.isolator = new WorkspaceIsolator(planWorkspace(ctx.request), driver, log, this.publisher, ctx.run.id);
    return ctx.isolator.attachAll();
  }

  private async version(ctx: RunContext): Promise<StageOutcome<string>> {
    ctx.version = resolveVersion(ctx.request.versionOverride, ctx.checkout);
    ctx.run.version = ctx.version;
    ctx.log.info('version resolved', { version: ctx.version });
    return succeed(ctx.version);
  }

  private async build(ctx: RunContext): Promise<StageOutcome<SequencerReport>> {
    const { request } = ctx;
    const isolator = ctx.isolator;
    if (!isolator || ctx.version === undefined) {
      throw new Error('build stage reached before workspace and version were resolved');
    }

    const env = buildMetadataEnv(ctx.version, request.versionEnvVar, request.loopDevice);
    const driver = this.deps.buildDriver
      ? this.deps.buildDriver(request, env)
      : new ScriptBuildDriver(this.deps.runner, {
          checkoutDir: request.layout.checkoutDir,
          driverPath: request.layout.driverPath,
          board: request.board,
          env,
        });

    const sequencer = new PhaseSequencer({
      request,
      driver,
      isolator,
      logger: ctx.log.child({ stage: StageName.Build }),
      publisher: this.publisher,
      runId: ctx.run.id,
    });

    try {
      const outcome = await sequencer.run();
      if (outcome.success) ctx.sequencer = outcome.value;
      return outcome;
    } finally {
      ctx.run.phaseResults = [...sequencer.phaseResults];
      ctx.run.sequencerState = sequencer.state;
    }
  }

  private async report(ctx: RunContext): Promise<StageOutcome<unknown>> {
    if (ctx.version === undefined) {
      throw new Error('report stage reached before version was resolved');
    }
    const outcome = await reportArtifacts({
      request: ctx.request,
      version: ctx.version,
      logger: ctx.log.child({ stage: StageName.Report }),
      publisher: this.publisher,
      runId: ctx.run.id,
    });
    if (outcome.success) ctx.run.manifest = outcome.value.files;
    return outcome;
  }

  /** The report is skipped after a custom command, since no release was made. */
  private step(
    ctx: RunContext,
    stage: StageName,
    fn: () => Promise<StageOutcome<unknown>>,
  ): Promise<StageOutcome<unknown>> {
    if (stage === StageName.Report && ctx.sequencer?.custom) {
      this.markStage(ctx, stage, StageStatus.Skipped);
      this.publish(ctx, 'stage.skipped', { reason: 'custom command' }, stage);
      return Promise.resolve(succeed(undefined));
    }
    return this.runStage(ctx, stage, fn);
  }

  /** Run one stage, recording its result. Unexpected exceptions become typed errors of the stage's domain. */
  private async runStage(
    ctx: RunContext,
    stage: StageName,
    fn: () => Promise<StageOutcome<unknown>>,
  ): Promise<StageOutcome<unknown>> {
    const startedAt = new Date().toISOString();
    ctx.run.stageResults[stage] = { stage, status: StageStatus.Running, startedAt };
    this.publish(ctx, 'stage.started', {}, stage);

    let outcome: StageOutcome<unknown>;
    try {
      outcome = await fn();
    } catch (err) {
      outcome = {
        success: false,
        error: err instanceof PipelineError
          ? err.typedError
          : createTypedError({
              code: `${STAGE_DOMAINS[stage]}.UNEXPECTED`,
              message: errorMessage(err),
              stage,
              retryable: false,
            }),
      };
    }

    const completedAt = new Date().toISOString();
    const result: StageResult = {
      stage,
      status: outcome.success ? StageStatus.Succeeded : StageStatus.Failed,
      startedAt,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
    };

    if (outcome.success) {
      ctx.run.stageResults[stage] = result;
      this.publish(ctx, 'stage.succeeded', { durationMs: result.durationMs }, stage);
      return outcome;
    }

    const error: TypedError = {
      ...outcome.error,
      stage: outcome.error.stage ?? stage,
      runId: ctx.run.id,
      message: maskSecretsInMessage(outcome.error.message, requestSecrets(ctx.request)),
    };
    ctx.run.stageResults[stage] = { ...result, error };
    this.publish(ctx, 'stage.failed', { code: error.code, message: error.message }, stage);
    return { success: false, error };
  }

  private markStage(ctx: RunContext, stage: StageName, status: StageStatus): void {
    ctx.run.stageResults[stage] = { stage, status };
  }

  private finish(ctx: RunContext, failure: TypedError | undefined): PipelineRun {
    const { run } = ctx;
    run.completedAt = new Date().toISOString();

    if (failure) {
      run.status = RunStatus.Failed;
      run.error = failure;
      run.exitCode = exitCodeFor(failure);
      ctx.log.error('pipeline failed', { code: failure.code, message: failure.message, exitCode: run.exitCode });
      this.publish(ctx, 'run.failed', { code: failure.code, exitCode: run.exitCode });
      return run;
    }

    run.status = RunStatus.Succeeded;
    run.exitCode = 0;
    ctx.log.info('pipeline succeeded', { version: run.version, manifest: run.manifest });
    this.publish(ctx, 'run.succeeded', { version: run.version, manifest: run.manifest });
    return run;
  }

  private publish(
    ctx: RunContext,
    type: PipelineEventType,
    payload: Record<string, unknown>,
    stage?: StageName,
  ): void {
    this.publisher.publish({ type, runId: ctx.run.id, board: ctx.request.board, stage, payload });
  }
}

function createRun(request: BuildRequest): PipelineRun {
  const pending = (stage: StageName): StageResult => ({ stage, status: StageStatus.Pending });
  const stageResults: Record<StageName, StageResult> = {
    [StageName.Resolve]: pending(StageName.Resolve),
    [StageName.Acquire]: pending(StageName.Acquire),
    [StageName.Isolate]: pending(StageName.Isolate),
    [StageName.Version]: pending(StageName.Version),
    [StageName.Build]: pending(StageName.Build),
    [StageName.Report]: pending(StageName.Report),
  };
  return {
    id: `run_${uuid()}`,
    key: request.board,
    board: request.board,
    status: RunStatus.Created,
    createdAt: new Date().toISOString(),
    stageResults,
    phaseResults: [],
    sequencerState: SequencerState.Init,
  };
}

function sha1(value: string): string {
  return createHash('sha1').update(value).digest('hex');
}
