import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ResourceName } from './types.js';

export const RESOURCE_SUFFIX = '.parametric.svg';

export type ResourceNameError = { readonly code: 'RESOURCE_NAME_EMPTY'; readonly message: string };

/**
 * Build the gist file key from a user-supplied basename.
 *
 * The basename is trimmed; a user who already typed the suffix does not get it twice.
 */
export function toResourceName(basename: string): Result<ResourceName, ResourceNameError> {
  const trimmed = basename.trim();
  const stem = trimmed.endsWith(RESOURCE_SUFFIX) ? trimmed.slice(0, -RESOURCE_SUFFIX.length) : trimmed;
  if (stem.length === 0) {
    return err({ code: 'RESOURCE_NAME_EMPTY', message: 'File name cannot be empty' });
  }
  return ok(`${stem}${RESOURCE_SUFFIX}` as ResourceName);
}

export function basenameOf(name: ResourceName): string {
  return name.slice(0, -RESOURCE_SUFFIX.length);
}
