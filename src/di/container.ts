import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { BasenamePromptPort } from '../ports/basename-prompt.port.js';
import type { CredentialStorePort } from '../ports/credential-store.port.js';
import type { HttpClientPort } from '../ports/http-client.port.js';
import type { FileContentsPreparerPort } from '../ports/file-contents-preparer.port.js';
import type { RemoteSnapshotPort } from '../ports/remote-snapshot.port.js';
import type { KeyValueStorage } from '../infra/web-storage-credential-store/index.js';
import { WebStorageCredentialStore, detectWebStorage } from '../infra/web-storage-credential-store/index.js';
import { FetchHttpClient } from '../infra/fetch-http-client/index.js';
import { InProcessFileContentsPreparer } from '../infra/in-process-file-contents-preparer/index.js';
import { ToastLog } from '../application/services/toast-log.js';
import { ToastFactory } from '../application/services/toast-factory.js';
import { GistSnapshotClient } from '../application/services/gist-snapshot-client.js';
import { AuthSession } from '../application/services/auth-session.js';
import { SyncCoordinator } from '../application/services/sync-coordinator.js';
import type { SyncControlsView } from '../presentation/sync-controls.js';
import { presentEditorShell } from '../presentation/sync-controls.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let shell: EditorShell | null = null;

export interface ContainerInitOptions {
  /** Environment record for loadConfig (bundler-provided in the browser). */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Token slot storage; defaults to `globalThis.localStorage` when present. */
  readonly storage?: KeyValueStorage | null;
  /** The basename dialog. Required unless already registered. */
  readonly basenamePrompt?: BasenamePromptPort;
}

/** The wired sync core handed to the view layer. */
export interface EditorShell {
  readonly auth: AuthSession;
  readonly sync: SyncCoordinator;
  readonly toasts: ToastLog;
  present(): SyncControlsView;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, AppError> {
  // Tests register a validated config up front; do not overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env: options.env ?? {} });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// PORT REGISTRATION (platform adapters; tests pre-register fakes)
// ═══════════════════════════════════════════════════════════════════════════

function registerPorts(options: ContainerInitOptions): Result<void, AppError> {
  if (!container.isRegistered(DI.Infra.LoggerFactory)) {
    container.register<ILoggerFactory>(DI.Infra.LoggerFactory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Ports.CredentialStore)) {
    const storage = options.storage === undefined ? detectWebStorage() : options.storage;
    container.register<CredentialStorePort>(DI.Ports.CredentialStore, {
      useValue: new WebStorageCredentialStore(storage),
    });
  }

  if (!container.isRegistered(DI.Ports.HttpClient)) {
    container.register<HttpClientPort>(DI.Ports.HttpClient, {
      useFactory: instanceCachingFactory((c: DependencyContainer) => {
        const config = c.resolve<ValidatedConfig>(DI.Config.App);
        const loggers = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
        return new FetchHttpClient(config.http.timeoutMs, loggers.create('HttpClient'));
      }),
    });
  }

  if (!container.isRegistered(DI.Ports.BasenamePrompt)) {
    if (options.basenamePrompt === undefined) {
      return err(Err.startupFailed('container', 'No basename prompt was provided'));
    }
    container.register<BasenamePromptPort>(DI.Ports.BasenamePrompt, { useValue: options.basenamePrompt });
  }

  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  // Dependencies before dependents.
  container.register(DI.Services.ToastLog, {
    useFactory: instanceCachingFactory((c) => c.resolve(ToastLog)),
  });
  container.register(DI.Services.ToastFactory, {
    useFactory: instanceCachingFactory((c) => c.resolve(ToastFactory)),
  });

  if (!container.isRegistered(DI.Ports.FileContentsPreparer)) {
    container.register<FileContentsPreparerPort>(DI.Ports.FileContentsPreparer, {
      useFactory: instanceCachingFactory(
        (c) => new InProcessFileContentsPreparer(c.resolve<ToastFactory>(DI.Services.ToastFactory))
      ),
    });
  }
  if (!container.isRegistered(DI.Ports.RemoteSnapshots)) {
    container.register<RemoteSnapshotPort>(DI.Ports.RemoteSnapshots, {
      useFactory: instanceCachingFactory((c) => c.resolve(GistSnapshotClient)),
    });
  }

  container.register(DI.Services.AuthSession, {
    useFactory: instanceCachingFactory((c) => c.resolve(AuthSession)),
  });
  container.register(DI.Services.SyncCoordinator, {
    useFactory: instanceCachingFactory((c) => c.resolve(SyncCoordinator)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire config, ports and services, and hand back the sync core.
 *
 * Idempotent: later calls return the shell built by the first successful one.
 * Errors are data; nothing here throws for a bad config.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<EditorShell, AppError> {
  if (shell !== null) return ok(shell);

  const log = createBootstrapLogger('container');

  const wired = registerConfig(options).andThen(() => registerPorts(options));
  if (wired.isErr()) {
    log.error({ tag: wired.error._tag }, formatAppError(wired.error));
    return err(wired.error);
  }

  try {
    registerServices();
    const auth = container.resolve<AuthSession>(DI.Services.AuthSession);
    const sync = container.resolve<SyncCoordinator>(DI.Services.SyncCoordinator);
    const toasts = container.resolve<ToastLog>(DI.Services.ToastLog);
    shell = { auth, sync, toasts, present: () => presentEditorShell(sync, auth, toasts) };
  } catch (e) {
    const failure = Err.unexpected('Container wiring failed', e);
    log.error({ err: e }, formatAppError(failure));
    return err(failure);
  }

  log.debug('Container initialized');
  return ok(shell);
}

/**
 * Full startup: wire the container, then restore the cached token.
 * Use this from the page entry point.
 */
export async function bootstrap(options: ContainerInitOptions = {}): Promise<Result<EditorShell, AppError>> {
  const initialized = initializeContainer(options);
  if (initialized.isOk()) {
    await initialized.value.auth.init();
  }
  return initialized;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  shell = null;
}

export function isInitialized(): boolean {
  return shell !== null;
}

export { container };
