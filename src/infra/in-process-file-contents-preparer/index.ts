import type { Result } from 'neverthrow';
import { ResultAsync } from 'neverthrow';
import type { FileContentsPreparerPort } from '../../ports/file-contents-preparer.port.js';
import type { EditorDocument, ToastEntry } from '../../domain/types.js';
import { serializeFileContents } from '../../domain/file-contents.js';
import type { ToastFactory } from '../../application/services/toast-factory.js';

/**
 * Answers file-contents requests in the same page, one macrotask later,
 * the way a message-channel round trip would.
 */
export class InProcessFileContentsPreparer implements FileContentsPreparerPort {
  constructor(private readonly toasts: ToastFactory) {}

  prepare(document: EditorDocument): ResultAsync<string, ToastEntry> {
    const answer = new Promise<Result<string, ToastEntry>>((resolve) => {
      setTimeout(() => {
        resolve(serializeFileContents(document).mapErr((e) => this.toasts.forFileContentsError(e)));
      }, 0);
    });
    return new ResultAsync(answer);
  }
}
