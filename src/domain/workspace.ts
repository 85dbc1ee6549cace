/**
 * Workspace domain model.
 *
 * A workspace is the disposable checkout plus an ordered list of
 * bindings that attach persistent host directories into it.
 */

export type BindingName = 'download-cache' | 'compiler-cache' | 'output';

/** A host directory attached at a fixed path inside the checkout. */
export interface Binding {
  name: BindingName;
  /** Persistent host directory. */
  hostPath: string;
  /** Attachment point inside the checkout. */
  treePath: string;
}

export interface WorkspaceSpec {
  board: string;
  checkoutDir: string;
  /** Bindings in attachment order. */
  bindings: Binding[];
  /** Host directories that must exist besides the binding host paths. */
  extraHostDirs: string[];
}

/** How a binding is currently attached, if at all. */
export type AttachmentKind = 'bind' | 'symlink';

export interface AttachmentState {
  binding: Binding;
  attachedAs?: AttachmentKind;
}
