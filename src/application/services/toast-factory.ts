import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { HttpError } from '../../ports/http-client.port.js';
import type { FetchError, SaveError } from '../../ports/remote-snapshot.port.js';
import type { CredentialStoreError } from '../../ports/credential-store.port.js';
import type { RemoteId, ToastEntry } from '../../domain/types.js';
import type { FileContentsError } from '../../domain/file-contents.js';
import { assertNever } from '../../runtime/assert-never.js';

const NEVER_HAPPENS = 'Oops! This should never happen.';
const OPEN_AN_ISSUE = 'Open an issue';
const VIEW_ON_GITHUB = 'View on GitHub';

/**
 * Turns every failure the sync core can hit into a user-facing toast.
 *
 * Precondition failures (missing file contents, missing token, storage) are
 * bugs from the user's point of view, so they link to the issue tracker.
 * Remote-side conditions (not found, too large) link to the gist itself.
 */
@singleton()
export class ToastFactory {
  private readonly issuesUrl: string;
  private readonly gistWebUrl: string;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this.issuesUrl = config.issuesUrl;
    this.gistWebUrl = config.gist.webUrl;
  }

  gistUrl(remoteId: RemoteId): string {
    return `${this.gistWebUrl}/${encodeURIComponent(remoteId)}`;
  }

  forSaveError(error: SaveError): ToastEntry {
    switch (error.code) {
      case 'NO_FILE_CONTENTS':
        return this.reportIssue(`${NEVER_HAPPENS} There were no file contents ready to save.`);
      case 'NO_GITHUB_TOKEN':
        return this.reportIssue(`${NEVER_HAPPENS} You are not signed in to GitHub, so the gist cannot be saved.`);
      case 'TRANSPORT':
        return this.forHttpError('saving your gist', error.cause);
      default:
        return assertNever(error);
    }
  }

  forFetchError(error: FetchError): ToastEntry {
    switch (error.code) {
      case 'NOT_FOUND':
        return {
          message: `We couldn't find the gist ${error.remoteId}. Make sure the link is right.`,
          actionLabel: VIEW_ON_GITHUB,
          actionUrl: this.gistUrl(error.remoteId),
          openInNewTab: true,
        };
      case 'TRUNCATED':
        return {
          message: `The file ${error.resourceName} is too large to load here.`,
          actionLabel: VIEW_ON_GITHUB,
          actionUrl: this.gistUrl(error.remoteId),
          openInNewTab: true,
        };
      case 'TRANSPORT':
        return this.forHttpError('loading the gist', error.cause);
      default:
        return assertNever(error);
    }
  }

  forHttpError(activity: string, error: HttpError): ToastEntry {
    switch (error.code) {
      case 'HTTP_TIMEOUT':
        return this.reportIssue(`The request timed out while ${activity}. Check your connection and try again.`);
      case 'HTTP_NETWORK_ERROR':
        return this.reportIssue(`A network error occurred while ${activity}. Check your connection and try again.`);
      case 'HTTP_BAD_STATUS':
        return this.reportIssue(`GitHub answered with status ${error.status} while ${activity}: ${error.body}`);
      case 'HTTP_UNEXPECTED_PAYLOAD':
        return this.reportIssue(`Got an unexpected response while ${activity}: ${error.detail}`);
      default:
        return assertNever(error);
    }
  }

  forFileContentsError(error: FileContentsError): ToastEntry {
    return this.reportIssue(`We couldn't prepare the file for upload: ${error.message}.`);
  }

  forSignInFailure(message: string): ToastEntry {
    return this.reportIssue(message);
  }

  forTokenCacheFailure(error: CredentialStoreError): ToastEntry {
    return this.reportIssue(
      `We couldn't remember your GitHub login (${error.message}). You'll need to sign in again next time.`
    );
  }

  private reportIssue(message: string): ToastEntry {
    return { message, actionLabel: OPEN_AN_ISSUE, actionUrl: this.issuesUrl, openInNewTab: true };
  }
}
