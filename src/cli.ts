#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Reads the build request from the environment, runs the pipeline once and
 * exits with the run's status. Configuration errors are all reported before
 * anything touches the filesystem or spawns a process.
 *
 * The resolved version reaches the build driver as `OS_VERSION` unless
 * `BB_VERSION_ENV` names another variable. A tree whose build script reads
 * a product-specific name (for example `THINGOS_VERSION`) must set it.
 */

import { requestSecrets } from './domain/request';
import { EnvSource, parseBuildRequest } from './config/env';
import { BuildPipeline, PipelineDeps } from './engine/pipeline';
import { SpawnCommandRunner } from './engine/process-runner';
import { PipelinePublisher } from './events/publisher';
import { logger, parseLogLevel, setLogLevel, setRedactedSecrets } from './logger';
import { errorMessage } from './util/fs';

/** Run the pipeline for an environment and resolve to the process exit status. */
export async function main(env: EnvSource, deps: Partial<PipelineDeps> = {}): Promise<number> {
  const log = deps.logger ?? logger;

  if (env.BB_LOG_LEVEL) {
    const level = parseLogLevel(env.BB_LOG_LEVEL);
    if (level) {
      setLogLevel(level);
    } else {
      log.warn('ignoring unknown log level', { value: env.BB_LOG_LEVEL });
    }
  }

  const config = parseBuildRequest(env);
  if (!config.success) {
    for (const error of config.errors) {
      log.error(error.message, { code: error.code, ...error.details });
    }
    log.error('configuration invalid; nothing was done', { errors: config.errors.length });
    return 1;
  }

  const { request } = config;
  setRedactedSecrets(requestSecrets(request));

  const publisher = deps.publisher ?? new PipelinePublisher();
  publisher.subscribe((event) => {
    log.debug(`event ${event.type}`, { stage: event.stage, phase: event.phase, ...event.payload });
  });

  const pipeline = new BuildPipeline({
    ...deps,
    runner: deps.runner ?? new SpawnCommandRunner({ baseEnv: env }),
    publisher,
    logger: log,
  });

  const run = await pipeline.run(request);
  return run.exitCode ?? 1;
}

if (require.main === module) {
  main(process.env).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error('pipeline crashed', { error: errorMessage(err) });
      process.exitCode = 1;
    },
  );
}
