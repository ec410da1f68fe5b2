import type { ToastEntry } from '../domain/types.js';
import type { SyncActivity, SyncCoordinator } from '../application/services/sync-coordinator.js';
import type { AuthSession } from '../application/services/auth-session.js';
import type { ToastLog } from '../application/services/toast-log.js';

/** What the gist button slot in the toolbar shows. */
export type SyncControl =
  | { readonly kind: 'enable_integration' }
  | { readonly kind: 'signing_in' }
  | { readonly kind: 'save_unsaved' }
  | { readonly kind: 'saved_link'; readonly href: string }
  | { readonly kind: 'saving'; readonly mode: 'creating' | 'updating' }
  | { readonly kind: 'downloading' };

export interface SyncControlsInput {
  readonly activity: SyncActivity;
  readonly hasToken: boolean;
  readonly signingIn: boolean;
  readonly hasSnapshot: boolean;
  readonly isDirty: boolean;
  /** Web link of the published gist, null before the first save/load. */
  readonly sharedLink: string | null;
  /** Newest first, as stored. */
  readonly toasts: readonly ToastEntry[];
}

export interface SyncControlsView {
  readonly control: SyncControl;
  /** Oldest first, as rendered. */
  readonly toasts: readonly ToastEntry[];
}

export function selectControl(input: SyncControlsInput): SyncControl {
  if (input.activity.kind === 'load_pending') return { kind: 'downloading' };
  if (input.activity.kind === 'save_pending') {
    return { kind: 'saving', mode: input.activity.mode === 'create' ? 'creating' : 'updating' };
  }
  if (input.signingIn) return { kind: 'signing_in' };
  if (!input.hasToken) return { kind: 'enable_integration' };
  if (input.hasSnapshot && !input.isDirty && input.sharedLink !== null) {
    return { kind: 'saved_link', href: input.sharedLink };
  }
  return { kind: 'save_unsaved' };
}

/** Pure: the same input always gives the same view. */
export function presentSyncControls(input: SyncControlsInput): SyncControlsView {
  return {
    control: selectControl(input),
    toasts: [...input.toasts].reverse(),
  };
}

/** Reads the current state of the live components and presents it. */
export function presentEditorShell(sync: SyncCoordinator, auth: AuthSession, toastLog: ToastLog): SyncControlsView {
  const state = sync.getState();
  return presentSyncControls({
    activity: state.activity,
    hasToken: auth.currentToken() !== null,
    signingIn: auth.isSigningIn(),
    hasSnapshot: state.snapshot !== null,
    isDirty: sync.isDirty(),
    sharedLink: sync.sharedLink(),
    toasts: toastLog.list(),
  });
}
