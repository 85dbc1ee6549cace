/**
 * Build request domain model.
 *
 * The single immutable input to a pipeline run, parsed once at process
 * start and passed by reference through every stage.
 */

/** Clean scope: full tree reset or current board's output only. */
export type CleanScope = 'full' | 'target';

/**
 * How the checkout root comes to hold the source tree.
 *
 * - `clone`: clone into a fresh checkout root.
 * - `premounted`: the checkout root is a pre-mounted, empty directory; clone into it.
 * - `local`: offline; the checkout root already holds a work tree and nothing is cloned.
 */
export type ExecutionMode = 'clone' | 'premounted' | 'local';

/** Attachment primitive used to bind host caches into the checkout. */
export type AttachStrategyName = 'auto' | 'bind' | 'symlink';

/** Reference selectors, in priority order branch > pull request > tag > commit. */
export interface ReferenceSelectors {
  branch?: string;
  pullRequest?: string;
  tag?: string;
  commit?: string;
}

/** Host and tree locations used by the workspace isolator and driver. */
export interface WorkspaceLayout {
  /** Disposable checkout root. */
  checkoutDir: string;
  /** Host root of per-board download caches. */
  downloadRoot: string;
  /** Host root of per-board compiler caches. */
  compilerCacheRoot: string;
  /** Shared host output root with per-board subdirectories. */
  outputRoot: string;
  /** Build driver path, relative to the checkout root. */
  driverPath: string;
  /** Version-info resource path, relative to the checkout root. */
  versionInfoPath: string;
  /** Key of the short product name inside the version-info resource. */
  productNameKey: string;
}

export interface IsolationPolicy {
  strategy: AttachStrategyName;
  /** Also detach the download cache around a target-only clean. */
  preserveCacheOnTargetClean: boolean;
  /** Leave bindings attached when the run ends. */
  keepAttached: boolean;
}

/** The validated, immutable build request. */
export interface BuildRequest {
  /** Repository URL as configured. Absent in local mode only. */
  readonly repositoryUrl?: string;
  /** Credential, retained so it can be masked in logs. */
  readonly credential?: string;
  readonly board: string;
  readonly selectors: Readonly<ReferenceSelectors>;
  readonly versionOverride?: string;
  readonly customCommand?: string;
  readonly cleanScope: CleanScope;
  readonly loopDevice?: string;
  readonly cloneArgs: readonly string[];
  readonly mode: ExecutionMode;
  readonly layout: Readonly<WorkspaceLayout>;
  readonly isolation: Readonly<IsolationPolicy>;
  /** Name of the environment variable the resolved version is exported under. */
  readonly versionEnvVar: string;
}

export const DEFAULT_LAYOUT: WorkspaceLayout = {
  checkoutDir: '/os',
  downloadRoot: '/mnt/dl',
  compilerCacheRoot: '/mnt/ccache',
  outputRoot: '/mnt/output',
  driverPath: 'build.sh',
  versionInfoPath: 'board/common/overlay/etc/version',
  productNameKey: 'os_short_name',
};

/** Version variable exported to the build driver when `BB_VERSION_ENV` is unset. */
export const DEFAULT_VERSION_ENV_VAR = 'OS_VERSION';

/** Secrets carried by a request that must never reach logs unmasked. */
export function requestSecrets(request: BuildRequest): string[] {
  return request.credential ? [request.credential] : [];
}
