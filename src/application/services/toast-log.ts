import { singleton } from 'tsyringe';
import type { ToastEntry, Unsubscribe } from '../../domain/types.js';

/**
 * Append-only log of user-visible notices, shared by the auth session and the
 * sync coordinator.
 *
 * Stored newest-first; the presentation layer reverses it for display.
 * Identical messages are kept (a repeated failure is a new event).
 */
@singleton()
export class ToastLog {
  private entries: readonly ToastEntry[] = [];
  private readonly listeners = new Set<(entries: readonly ToastEntry[]) => void>();

  push(entry: ToastEntry): void {
    this.entries = [entry, ...this.entries];
    for (const listener of this.listeners) {
      listener(this.entries);
    }
  }

  /** Newest first. */
  list(): readonly ToastEntry[] {
    return this.entries;
  }

  subscribe(listener: (entries: readonly ToastEntry[]) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
