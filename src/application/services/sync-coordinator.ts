import type { Result } from 'neverthrow';
import { ResultAsync, ok } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import type { BasenamePromptPort } from '../../ports/basename-prompt.port.js';
import type { FileContentsPreparerPort } from '../../ports/file-contents-preparer.port.js';
import type { FetchError, RemoteSnapshotPort, SaveError } from '../../ports/remote-snapshot.port.js';
import type {
  EditorDocument,
  RemoteId,
  ResourceName,
  Snapshot,
  ToastEntry,
  Unsubscribe,
  Variable,
} from '../../domain/types.js';
import { EMPTY_DOCUMENT } from '../../domain/types.js';
import { documentsEqual, freezeDocument, isDirty } from '../../domain/document-equality.js';
import { parseFileContents } from '../../domain/file-contents.js';
import { toResourceName } from '../../domain/resource-name.js';
import { AuthSession } from './auth-session.js';
import { ToastLog } from './toast-log.js';
import { ToastFactory } from './toast-factory.js';
import { RequestGenerations } from './request-generations.js';

export type SyncActivity =
  | { readonly kind: 'idle' }
  /** Waiting on file contents or the basename dialog; nothing on the wire yet. */
  | { readonly kind: 'preparing_save' }
  | { readonly kind: 'save_pending'; readonly mode: 'create' | 'update' }
  | { readonly kind: 'load_pending'; readonly remoteId: RemoteId };

export type SyncPhase = 'clean' | 'dirty' | 'save_pending' | 'load_pending' | 'load_failed';

/** Idle: no network operation outstanding. */
export type SyncStatus = 'idle' | 'pending';

export interface SyncState {
  readonly live: EditorDocument;
  readonly snapshot: Snapshot | null;
  readonly remoteId: RemoteId | null;
  /** True when `remoteId` names a gist this session created; only those are updated in place. */
  readonly ownsRemote: boolean;
  readonly resourceName: ResourceName | null;
  readonly activity: SyncActivity;
  readonly loadFailure: FetchError | null;
}

export type SaveOutcome =
  | { readonly kind: 'saved'; readonly remoteId: RemoteId }
  | { readonly kind: 'skipped_clean' }
  | { readonly kind: 'rejected_in_progress' }
  | { readonly kind: 'cancelled' }
  | { readonly kind: 'failed'; readonly reason: 'file_contents'; readonly toast: ToastEntry }
  | { readonly kind: 'failed'; readonly reason: 'remote'; readonly error: SaveError }
  /** A load started meanwhile; nothing from this save was applied. */
  | { readonly kind: 'superseded' };

export type LoadOutcome =
  | { readonly kind: 'loaded'; readonly document: Snapshot }
  | { readonly kind: 'failed'; readonly error: FetchError }
  | { readonly kind: 'superseded' };

export interface SaveOptions {
  /** Upload even when the live document equals the last snapshot. */
  readonly force?: boolean;
}

interface PreparedContents {
  readonly revision: number;
  readonly document: EditorDocument;
  readonly payload: string;
}

const IDLE: SyncActivity = { kind: 'idle' };
const DEFAULT_BASENAME = 'untitled';

/**
 * The save/load state machine.
 *
 * Tracks the live document against the last snapshot the remote store accepted
 * or returned, and runs the two network flows:
 *
 *   save: file contents → basename dialog (first save only) → create/update
 *         (update only for a gist this session created; a loaded gist is forked)
 *   load: fetch by id → parse → replace live + snapshot
 *
 * Invariants:
 * - snapshot only ever holds a document the remote accepted or returned
 * - a failed save or load never touches the live document
 * - one save at a time; a second request while one runs is rejected
 * - a load supersedes any in-flight save or older load (stale responses are dropped)
 */
@singleton()
export class SyncCoordinator {
  private state: SyncState = {
    live: EMPTY_DOCUMENT,
    snapshot: null,
    remoteId: null,
    ownsRemote: false,
    resourceName: null,
    activity: IDLE,
    loadFailure: null,
  };
  private revision = 0;
  private fileContents: PreparedContents | null = null;
  private readonly generations = new RequestGenerations<'save' | 'load'>();
  private readonly listeners = new Set<(state: SyncState) => void>();
  private readonly logger: Logger;

  constructor(
    @inject(DI.Services.AuthSession) private readonly auth: AuthSession,
    @inject(DI.Ports.RemoteSnapshots) private readonly remote: RemoteSnapshotPort,
    @inject(DI.Ports.FileContentsPreparer) private readonly preparer: FileContentsPreparerPort,
    @inject(DI.Ports.BasenamePrompt) private readonly prompt: BasenamePromptPort,
    @inject(DI.Services.ToastLog) private readonly toastLog: ToastLog,
    @inject(DI.Services.ToastFactory) private readonly toasts: ToastFactory,
    @inject(DI.Infra.LoggerFactory) loggers: ILoggerFactory
  ) {
    this.logger = loggers.create('SyncCoordinator');
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getState(): SyncState {
    return this.state;
  }

  isDirty(): boolean {
    return isDirty(this.state.live, this.state.snapshot);
  }

  phase(): SyncPhase {
    const { activity } = this.state;
    if (activity.kind === 'load_pending') return 'load_pending';
    if (activity.kind === 'save_pending') return 'save_pending';
    if (this.state.loadFailure !== null) return 'load_failed';
    return this.isDirty() ? 'dirty' : 'clean';
  }

  status(): SyncStatus {
    const { kind } = this.state.activity;
    return kind === 'save_pending' || kind === 'load_pending' ? 'pending' : 'idle';
  }

  /** Web URL of the published gist, if any. */
  sharedLink(): string | null {
    return this.state.remoteId === null ? null : this.toasts.gistUrl(this.state.remoteId);
  }

  subscribe(listener: (state: SyncState) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Edits
  // ---------------------------------------------------------------------------

  updateMarkup(markup: string): void {
    this.replaceLive({ markup, variables: this.state.live.variables });
  }

  updateVariables(variables: readonly Variable[]): void {
    this.replaceLive({ markup: this.state.live.markup, variables });
  }

  // ---------------------------------------------------------------------------
  // Save
  // ---------------------------------------------------------------------------

  async requestSave(options: SaveOptions = {}): Promise<SaveOutcome> {
    const { activity } = this.state;
    if (activity.kind !== 'idle') {
      this.logger.debug({ activity: activity.kind }, 'Save requested while busy; ignoring');
      return { kind: 'rejected_in_progress' };
    }
    if (!options.force && this.state.remoteId !== null && this.state.snapshot !== null && !this.isDirty()) {
      return { kind: 'skipped_clean' };
    }

    const generation = this.generations.issue('save');
    this.update({ activity: { kind: 'preparing_save' } });

    let prepared = await this.ensureFileContents();
    if (!this.generations.isCurrent('save', generation)) return { kind: 'superseded' };
    if (prepared.isErr()) return this.abortSave({ kind: 'failed', reason: 'file_contents', toast: prepared.error });

    let resourceName = this.state.resourceName;
    if (resourceName === null) {
      const chosen = await this.askForResourceName();
      if (!this.generations.isCurrent('save', generation)) return { kind: 'superseded' };
      if (chosen === null) return this.abortSave({ kind: 'cancelled' });
      resourceName = chosen;
      this.update({ resourceName });

      // The dialog may have outlived edits; never upload what was prepared before it.
      this.fileContents = null;
      prepared = await this.ensureFileContents();
      if (!this.generations.isCurrent('save', generation)) return { kind: 'superseded' };
      if (prepared.isErr()) return this.abortSave({ kind: 'failed', reason: 'file_contents', toast: prepared.error });
    }

    const submitted = prepared.value;
    const remoteId = this.state.ownsRemote ? this.state.remoteId : null;
    this.update({ activity: { kind: 'save_pending', mode: remoteId === null ? 'create' : 'update' } });

    const result = await this.remote.createOrUpdate({
      resourceName,
      content: submitted.payload,
      token: this.auth.currentToken(),
      remoteId,
    });
    if (!this.generations.isCurrent('save', generation)) {
      if (result.isOk()) {
        this.logger.info(
          { remoteId: result.value, resourceName, generation },
          'Gist saved after a load superseded the save'
        );
      } else {
        this.logger.debug({ generation }, 'Dropping stale save response');
      }
      return { kind: 'superseded' };
    }

    if (result.isErr()) {
      this.logger.warn({ code: result.error.code }, 'Save failed');
      return this.abortSave({ kind: 'failed', reason: 'remote', error: result.error });
    }

    this.logger.info({ remoteId: result.value, resourceName }, 'Saved');
    this.update({
      snapshot: submitted.document,
      remoteId: result.value,
      ownsRemote: true,
      resourceName,
      activity: IDLE,
      loadFailure: null,
    });
    return { kind: 'saved', remoteId: result.value };
  }

  // ---------------------------------------------------------------------------
  // Load
  // ---------------------------------------------------------------------------

  async loadFromId(remoteId: RemoteId, resourceName: ResourceName): Promise<LoadOutcome> {
    this.generations.invalidate('save');
    const generation = this.generations.issue('load');
    this.update({ activity: { kind: 'load_pending', remoteId }, loadFailure: null });

    const result = await this.remote.fetch(remoteId, resourceName);
    if (!this.generations.isCurrent('load', generation)) {
      this.logger.debug({ remoteId, generation }, 'Dropping stale load response');
      return { kind: 'superseded' };
    }

    if (result.isErr()) {
      this.logger.warn({ remoteId, code: result.error.code }, 'Load failed');
      this.update({ activity: IDLE, loadFailure: result.error });
      this.toastLog.push(this.toasts.forFetchError(result.error));
      return { kind: 'failed', error: result.error };
    }

    const document = freezeDocument(parseFileContents(result.value.content));
    this.revision++;
    this.fileContents = null;
    this.update({
      live: document,
      snapshot: document,
      remoteId,
      ownsRemote: false,
      resourceName,
      activity: IDLE,
      loadFailure: null,
    });
    this.logger.info({ remoteId, resourceName, variables: document.variables.length }, 'Loaded');
    return { kind: 'loaded', document };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private replaceLive(next: EditorDocument): void {
    if (documentsEqual(next, this.state.live)) return;
    this.revision++;
    this.fileContents = null;
    this.update({ live: freezeDocument(next), loadFailure: null });
  }

  /** Reuses contents prepared for the current revision, else asks the collaborator. */
  private async ensureFileContents(): Promise<Result<PreparedContents, ToastEntry>> {
    const cached = this.fileContents;
    if (cached !== null && cached.revision === this.revision) return ok(cached);

    const revision = this.revision;
    const document = this.state.live;
    const result = await this.preparer.prepare(document);
    return result.map((payload) => {
      const prepared: PreparedContents = { revision, document, payload };
      if (revision === this.revision) this.fileContents = prepared;
      return prepared;
    });
  }

  private async askForResourceName(): Promise<ResourceName | null> {
    const answer = await ResultAsync.fromPromise(this.prompt.requestBasename(DEFAULT_BASENAME), (e) => e);
    if (answer.isErr()) {
      this.logger.warn({ err: answer.error }, 'Basename dialog failed');
      return null;
    }
    if (answer.value === null) return null;

    const name = toResourceName(answer.value);
    if (name.isErr()) {
      this.logger.info({ reason: name.error.code }, 'Rejected basename');
      return null;
    }
    return name.value;
  }

  private abortSave(outcome: SaveOutcome): SaveOutcome {
    if (outcome.kind === 'failed') {
      this.toastLog.push(outcome.reason === 'remote' ? this.toasts.forSaveError(outcome.error) : outcome.toast);
    }
    this.update({ activity: IDLE });
    return outcome;
  }

  private update(patch: Partial<SyncState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
