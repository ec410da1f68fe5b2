// DI Container exports
export { bootstrap, initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions, EditorShell } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';

// Errors
export { Err, formatAppError } from './errors/index.js';
export type { AppError } from './errors/index.js';

// Domain
export type {
  AuthToken,
  AuthCode,
  RemoteId,
  ResourceName,
  Variable,
  EditorDocument,
  Snapshot,
  ToastEntry,
  Unsubscribe,
} from './domain/types.js';
export { asRemoteId, EMPTY_DOCUMENT } from './domain/types.js';
export { toResourceName, basenameOf, RESOURCE_SUFFIX } from './domain/resource-name.js';
export { serializeFileContents, parseFileContents } from './domain/file-contents.js';
export { documentsEqual, isDirty } from './domain/document-equality.js';

// Ports
export type { CredentialStorePort, CredentialStoreError } from './ports/credential-store.port.js';
export type { HttpClientPort, HttpError, HttpRequest } from './ports/http-client.port.js';
export type { FileContentsPreparerPort } from './ports/file-contents-preparer.port.js';
export type { BasenamePromptPort } from './ports/basename-prompt.port.js';
export type { RemoteSnapshotPort, SaveError, FetchError, SaveRequest } from './ports/remote-snapshot.port.js';

// Services
export { AuthSession, NO_CODE_FAILURE } from './application/services/auth-session.js';
export type { AuthSessionState, CodeExchangeOutcome } from './application/services/auth-session.js';
export { SyncCoordinator } from './application/services/sync-coordinator.js';
export type {
  SyncState,
  SyncActivity,
  SyncPhase,
  SyncStatus,
  SaveOutcome,
  LoadOutcome,
} from './application/services/sync-coordinator.js';
export { ToastLog } from './application/services/toast-log.js';
export { GistSnapshotClient } from './application/services/gist-snapshot-client.js';

// Infrastructure
export { WebStorageCredentialStore, detectWebStorage } from './infra/web-storage-credential-store/index.js';
export type { KeyValueStorage } from './infra/web-storage-credential-store/index.js';
export { FetchHttpClient } from './infra/fetch-http-client/index.js';

// Presentation
export { presentSyncControls, presentEditorShell, selectControl } from './presentation/sync-controls.js';
export type { SyncControl, SyncControlsInput, SyncControlsView } from './presentation/sync-controls.js';
