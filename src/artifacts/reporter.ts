/**
 * Artifact reporter: names the release images and writes the manifest.
 *
 * Runs only after a successful release phase. A missing or malformed
 * version-info resource is fatal; a degenerate image name is never written.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BuildRequest } from '../domain/request';
import {
  ArtifactManifest,
  IMAGES_DIR,
  IMAGE_FORMATS,
  ImageFilesByFormat,
  MANIFEST_FILE,
} from '../domain/artifact';
import { artifactError } from '../domain/errors';
import { StageOutcome, andThen, fail, succeed } from '../domain/outcome';
import { PipelinePublisher } from '../events/publisher';
import { Logger } from '../logger';
import { errorMessage, isErrnoException } from '../util/fs';
import { parseKeyValue } from './version-info';

/** `<product>-<board>-<version>.img.gz` and its `.img.xz` counterpart. */
export function imageFileNames(product: string, board: string, version: string): [string, string] {
  const base = `${product}-${board}-${version}.img`;
  return [`${base}.gz`, `${base}.xz`];
}

/** Fixed per-board manifest location under the shared output root. */
export function manifestPath(outputRoot: string, board: string): string {
  return path.join(outputRoot, board, MANIFEST_FILE);
}

/** Read the short product name from the version-info resource inside the checkout. */
export async function readProductName(
  checkoutDir: string,
  versionInfoPath: string,
  key: string,
): Promise<StageOutcome<string>> {
  const file = path.join(checkoutDir, versionInfoPath);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    return fail(artifactError('VERSION_INFO_MISSING', `cannot read version info ${file}: ${errorMessage(err)}`, { file }));
  }

  const parsed = parseKeyValue(text);
  if (!parsed.success) {
    return fail(artifactError(
      'VERSION_INFO_MALFORMED',
      `${file}:${parsed.line}: ${parsed.message}`,
      { file, line: parsed.line },
    ));
  }

  const product = Object.hasOwn(parsed.values, key) ? parsed.values[key] : undefined;
  if (!product) {
    return fail(artifactError('PRODUCT_NAME_MISSING', `${file} does not define ${key}`, { file, key }));
  }
  return succeed(product);
}

/** Write the gzip filename (truncating) and append the xz filename. */
export async function writeManifest(file: string, files: [string, string]): Promise<StageOutcome<void>> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, `${files[0]}\n`);
    await fs.appendFile(file, `${files[1]}\n`);
    return succeed(undefined);
  } catch (err) {
    return fail(artifactError('MANIFEST_WRITE', `writing ${file} failed: ${errorMessage(err)}`, { file }));
  }
}

export interface ReportParams {
  request: BuildRequest;
  version: string;
  logger: Logger;
  publisher?: PipelinePublisher;
  runId?: string;
}

export async function reportArtifacts(params: ReportParams): Promise<StageOutcome<ArtifactManifest>> {
  const { request, version, logger } = params;
  const { layout, board } = request;

  const product = readProductName(layout.checkoutDir, layout.versionInfoPath, layout.productNameKey);
  return andThen(product, async (name): Promise<StageOutcome<ArtifactManifest>> => {
    const files = imageFileNames(name, board, version);
    const file = manifestPath(layout.outputRoot, board);
    const written = await writeManifest(file, files);
    if (!written.success) return fail(written.error);

    logger.info('manifest written', { path: file, images: files });
    params.publisher?.publish({
      type: 'manifest.written',
      runId: params.runId,
      board,
      payload: { path: file, files },
    });
    return succeed({ path: file, files });
  });
}

/**
 * Read a board's manifest back and resolve each entry to its image path
 * under `<outputRoot>/<board>/images/`, keyed by compression format.
 */
export async function readManifest(outputRoot: string, board: string): Promise<StageOutcome<ImageFilesByFormat>> {
  const file = manifestPath(outputRoot, board);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    const reason = isErrnoException(err) && err.code === 'ENOENT' ? 'not found' : errorMessage(err);
    return fail(artifactError('MANIFEST_READ', `reading ${file} failed: ${reason}`, { file }));
  }

  const names = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const byFormat: ImageFilesByFormat = {};
  for (const format of IMAGE_FORMATS) {
    const name = names.find((n) => n.endsWith(`.${format}`));
    if (name) byFormat[format] = path.join(outputRoot, board, IMAGES_DIR, name);
  }
  return succeed(byFormat);
}
