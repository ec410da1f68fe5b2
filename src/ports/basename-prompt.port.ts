/**
 * Port: ask the user for a file basename before the first save.
 *
 * Resolves with the typed basename, or null when the dialog is dismissed.
 * The editor state may change while the dialog is open.
 */
export interface BasenamePromptPort {
  requestBasename(suggestion: string): Promise<string | null>;
}
