/**
 * Artifact domain model.
 *
 * Release images are referenced by filename in a two-line manifest under
 * the shared output root.
 */

/** Image compression formats, in manifest order. */
export const IMAGE_FORMATS = ['gz', 'xz'] as const;

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Manifest filename inside `<outputRoot>/<board>/`. */
export const MANIFEST_FILE = '.image_files';

/** Directory holding produced images inside `<outputRoot>/<board>/`. */
export const IMAGES_DIR = 'images';

/** The manifest as written: gzip image first, xz image second. */
export interface ArtifactManifest {
  path: string;
  files: [string, string];
}

/** Image file paths read back from a manifest, grouped by format. */
export type ImageFilesByFormat = Partial<Record<ImageFormat, string>>;
