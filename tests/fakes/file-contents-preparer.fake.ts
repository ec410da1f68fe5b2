import type { Result } from 'neverthrow';
import { ResultAsync, errAsync } from 'neverthrow';
import type { FileContentsPreparerPort } from '../../src/ports/file-contents-preparer.port.js';
import type { EditorDocument, ToastEntry } from '../../src/domain/types.js';
import { serializeFileContents } from '../../src/domain/file-contents.js';

type Answer = Result<string, ToastEntry>;

export const PREPARE_FAILED_TOAST: ToastEntry = {
  message: 'We couldn\'t prepare the file for upload: test failure.',
  actionLabel: 'Open an issue',
  actionUrl: 'https://issues.example.test',
  openInNewTab: true,
};

/**
 * File-contents collaborator that answers with the real serialization.
 *
 * `hold()` parks requests until `release()`, to model the window in which
 * the save flow is waiting on contents.
 */
export class FakeFileContentsPreparer implements FileContentsPreparerPort {
  readonly requested: EditorDocument[] = [];
  private readonly parked: Array<{ document: EditorDocument; resolve: (answer: Answer) => void }> = [];
  private holding = false;
  private failNext = false;

  prepare(document: EditorDocument): ResultAsync<string, ToastEntry> {
    this.requested.push(document);
    if (this.failNext) {
      this.failNext = false;
      return errAsync(PREPARE_FAILED_TOAST);
    }
    if (!this.holding) {
      return new ResultAsync(Promise.resolve(answerFor(document)));
    }
    return new ResultAsync(
      new Promise<Answer>((resolve) => {
        this.parked.push({ document, resolve });
      })
    );
  }

  // Test utilities
  hold(): void {
    this.holding = true;
  }

  failOnce(): void {
    this.failNext = true;
  }

  /** Answer the oldest parked request with the serialization of its document. */
  release(): void {
    const entry = this.parked.shift();
    if (entry === undefined) throw new Error('No parked file-contents request');
    entry.resolve(answerFor(entry.document));
  }

  get parkedCount(): number {
    return this.parked.length;
  }
}

function answerFor(document: EditorDocument): Answer {
  return serializeFileContents(document).mapErr(() => PREPARE_FAILED_TOAST);
}
