import type { Brand } from '../runtime/brand.js';

// Branded primitives
export type AuthToken = Brand<string, 'AuthToken'>;
export type AuthCode = Brand<string, 'AuthCode'>;
export type RemoteId = Brand<string, 'RemoteId'>; // gist id
export type ResourceName = Brand<string, 'ResourceName'>; // `<basename>.parametric.svg`

export function asAuthToken(value: string): AuthToken {
  return value as AuthToken;
}

export function asAuthCode(value: string): AuthCode {
  return value as AuthCode;
}

export function asRemoteId(value: string): RemoteId {
  return value as RemoteId;
}

/**
 * A named numeric parameter of the drawing.
 *
 * Values stay strings: the editor keeps whatever the user typed and the
 * renderer decides how to evaluate it. Names are not required to be unique.
 */
export interface Variable {
  readonly name: string;
  readonly value: string;
}

/** Live editor state: SVG markup plus the ordered parameter list. */
export interface EditorDocument {
  readonly markup: string;
  readonly variables: readonly Variable[];
}

/**
 * Last document known to be persisted remotely.
 *
 * Only ever built from a payload the remote store accepted or returned,
 * never from an optimistic local value.
 */
export type Snapshot = EditorDocument;

/** User-visible notice. The log is append-only and never deduplicated. */
export interface ToastEntry {
  readonly message: string;
  readonly actionLabel: string;
  readonly actionUrl: string;
  readonly openInNewTab: boolean;
}

export type Unsubscribe = () => void;

export const EMPTY_DOCUMENT: EditorDocument = { markup: '', variables: [] };
