import type { ResultAsync } from 'neverthrow';
import type { EditorDocument, ToastEntry } from '../domain/types.js';

/**
 * Port: one-shot request for the upload-ready file text of a document.
 *
 * The answer arrives asynchronously. A failure carries the toast the user
 * should see, already worded by the collaborator.
 */
export interface FileContentsPreparerPort {
  prepare(document: EditorDocument): ResultAsync<string, ToastEntry>;
}
