/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the right namespace
 * 2. Decorate the class with @singleton() and its constructor params with @inject(DI.…)
 * 3. Register the token alias in container.ts
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // PORTS (platform collaborators, swapped for fakes in tests)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    /** Persistent slot for the cached auth token */
    CredentialStore: Symbol('Ports.CredentialStore'),
    /** JSON-over-HTTP transport */
    HttpClient: Symbol('Ports.HttpClient'),
    /** Upload-ready file text for a document */
    FileContentsPreparer: Symbol('Ports.FileContentsPreparer'),
    /** Basename dialog shown before the first save */
    BasenamePrompt: Symbol('Ports.BasenamePrompt'),
    /** Remote snapshot store (gist API) */
    RemoteSnapshots: Symbol('Ports.RemoteSnapshots'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** OAuth code exchange and token cache */
    AuthSession: Symbol('Services.AuthSession'),
    /** Dirty/clean tracking and save/load orchestration */
    SyncCoordinator: Symbol('Services.SyncCoordinator'),
    /** Shared user-visible notice log */
    ToastLog: Symbol('Services.ToastLog'),
    /** Toast wording and links */
    ToastFactory: Symbol('Services.ToastFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    LoggerFactory: Symbol('Infra.LoggerFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete validated configuration */
    App: Symbol('Config.App'),
  },
} as const;

