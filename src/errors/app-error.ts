import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: 'config' | 'container' | 'session_restore';
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/** Errors of the shell itself (wiring, config). Sync failures are port errors, not these. */
export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/** A config object that went through `loadConfig` (or an explicit test constructor). */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
