import type { EditorDocument, Snapshot, Variable } from './types.js';

function variablesEqual(a: readonly Variable[], b: readonly Variable[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((v, i) => {
    const other = b[i];
    return other !== undefined && v.name === other.name && v.value === other.value;
  });
}

/** Structural equality; the variable sequence is compared in order. */
export function documentsEqual(a: EditorDocument, b: EditorDocument): boolean {
  return a.markup === b.markup && variablesEqual(a.variables, b.variables);
}

/**
 * Dirty means "there is a snapshot and the live document moved away from it".
 * Without a snapshot there is nothing to be dirty against.
 */
export function isDirty(live: EditorDocument, snapshot: Snapshot | null): boolean {
  return snapshot !== null && !documentsEqual(live, snapshot);
}

/** Detached copy so callers can never share arrays with coordinator state. */
export function freezeDocument(doc: EditorDocument): EditorDocument {
  return Object.freeze({
    markup: doc.markup,
    variables: Object.freeze(doc.variables.map((v) => Object.freeze({ name: v.name, value: v.value }))),
  });
}
