/**
 * Per-document presentation state.
 *
 * The engine receives a store rather than owning a hidden singleton, so
 * an integration can scope it to a window, a workspace, or a test.
 */

import type { DocumentId } from "../buffer/types.ts";
import type { PresentationState } from "./types.ts";

export interface PresentationStore {
  readonly size: number;
  get(id: DocumentId): PresentationState | undefined;
  has(id: DocumentId): boolean;
  /** Replaces any state the document already had. */
  set(id: DocumentId, state: PresentationState): void;
  /** Returns true if the document had state. */
  delete(id: DocumentId): boolean;
  clear(): void;
}

class MapPresentationStore implements PresentationStore {
  private readonly _states = new Map<DocumentId, PresentationState>();

  get size(): number {
    return this._states.size;
  }

  get(id: DocumentId): PresentationState | undefined {
    return this._states.get(id);
  }

  has(id: DocumentId): boolean {
    return this._states.has(id);
  }

  set(id: DocumentId, state: PresentationState): void {
    this._states.set(id, state);
  }

  delete(id: DocumentId): boolean {
    return this._states.delete(id);
  }

  clear(): void {
    this._states.clear();
  }
}

export function createPresentationStore(): PresentationStore {
  return new MapPresentationStore();
}
