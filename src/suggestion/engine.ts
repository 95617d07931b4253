/**
 * SuggestionEngine: the command dispatcher that ties presentation,
 * resolution, and per-document state together.
 *
 * Each call computes the new buffer, cursor and state first and only then
 * commits the state, so a failing call leaves the store as it was.
 */

import { joinLines } from "../buffer/line_buffer.ts";
import type { DocumentId, EditorSnapshot } from "../buffer/types.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { diffLines } from "../patch/diff.ts";
import { resolveEngineConfig } from "./config.ts";
import { type PresentedSuggestion, toPresentedSuggestion } from "./panel.ts";
import { presentSuggestions } from "./presenter.ts";
import {
  acceptSuggestion,
  cycleSuggestion,
  locateBlock,
  rejectSuggestion,
  stripBlock,
} from "./resolver.ts";
import { createPresentationStore, type PresentationStore } from "./session.ts";
import type {
  CompletionCandidate,
  CycleDirection,
  EngineConfig,
  PresentationState,
  SuggestionCommand,
  Transition,
  UpdatedContent,
} from "./types.ts";

export interface SuggestionEngineOptions {
  readonly store?: PresentationStore;
  readonly logger?: Logger;
  /** Validated with engineConfigSchema; missing fields take defaults */
  readonly config?: unknown;
}

export type ChangeListener = (
  documentId: DocumentId,
  presented: PresentedSuggestion | undefined,
) => void;

export class SuggestionEngine {
  readonly config: EngineConfig;
  private readonly _store: PresentationStore;
  private readonly _logger: Logger;
  private _onChange: ChangeListener | null = null;

  constructor(options: SuggestionEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this._store = options.store ?? createPresentationStore();
    this._logger = options.logger ?? silentLogger;
  }

  /** Set a callback to be notified after a document's presentation changes. */
  onChange(cb: ChangeListener): void {
    this._onChange = cb;
  }

  presentation(id: DocumentId): PresentationState | undefined {
    return this._store.get(id);
  }

  presentedSuggestion(id: DocumentId): PresentedSuggestion | undefined {
    const state = this._store.get(id);
    return state ? toPresentedSuggestion(state) : undefined;
  }

  /** Execute a command. */
  dispatch(command: SuggestionCommand): UpdatedContent | undefined {
    switch (command.type) {
      case "present":
        return this.presentSuggestions(command.snapshot, command.candidates);
      case "accept":
        return this.acceptSuggestion(command.snapshot);
      case "reject":
        return this.rejectSuggestion(command.snapshot);
      case "next":
        return this.nextSuggestion(command.snapshot);
      case "previous":
        return this.previousSuggestion(command.snapshot);
    }
  }

  /**
   * Show the first candidate. A block already on screen for this document
   * is removed first, and the result is one diff against the snapshot.
   */
  presentSuggestions(
    snapshot: EditorSnapshot,
    candidates: readonly CompletionCandidate[],
  ): UpdatedContent | undefined {
    const id = snapshot.documentId;
    if (candidates.length === 0) {
      this._logger.debug(`No candidates to present for ${id}`);
      return undefined;
    }

    const transition = this._attempt("present", id, () => {
      const existing = this._store.get(id);
      const block = existing
        ? locateBlock(snapshot.lines, existing, this.config)
        : undefined;
      if (!block) return presentSuggestions(snapshot, candidates, this.config);

      const stripped = stripBlock(snapshot.lines, snapshot.cursorPosition, block);
      const presented = presentSuggestions(
        {
          ...snapshot,
          content: joinLines(stripped.lines),
          lines: stripped.lines,
          cursorPosition: stripped.cursor,
        },
        candidates,
        this.config,
      );
      if (!presented) return undefined;
      return {
        ...presented,
        result: {
          ...presented.result,
          modifications: diffLines(snapshot.lines, presented.lines),
        },
      };
    });
    if (!transition) return undefined;

    this._logger.debug(
      `Presented ${candidates.length} candidate(s) for ${id} at line ${transition.state.anchorLineIndex}`,
    );
    return this._commit(id, transition);
  }

  rejectSuggestion(snapshot: EditorSnapshot): UpdatedContent | undefined {
    return this._resolve("reject", snapshot, (state) =>
      rejectSuggestion(snapshot, state, this.config),
    );
  }

  acceptSuggestion(snapshot: EditorSnapshot): UpdatedContent | undefined {
    return this._resolve("accept", snapshot, (state) =>
      acceptSuggestion(snapshot, state, this.config),
    );
  }

  nextSuggestion(snapshot: EditorSnapshot): UpdatedContent | undefined {
    return this._cycle(snapshot, "next");
  }

  previousSuggestion(snapshot: EditorSnapshot): UpdatedContent | undefined {
    return this._cycle(snapshot, "previous");
  }

  private _cycle(
    snapshot: EditorSnapshot,
    direction: CycleDirection,
  ): UpdatedContent | undefined {
    return this._resolve("cycle", snapshot, (state) =>
      cycleSuggestion(snapshot, state, direction, this.config),
    );
  }

  private _resolve(
    action: string,
    snapshot: EditorSnapshot,
    step: (state: PresentationState) => Transition,
  ): UpdatedContent | undefined {
    const id = snapshot.documentId;
    const state = this._store.get(id);
    if (!state) {
      this._logger.debug(`No active presentation to ${action} for ${id}`);
      return undefined;
    }

    const transition = this._attempt(action, id, () => step(state));
    if (transition.state === undefined && transition.result.modifications.length === 0) {
      this._logger.warn(`Suggestion block no longer in ${id}; dropping presentation`);
    } else {
      this._logger.debug(`Completed ${action} for ${id}`);
    }
    return this._commit(id, transition);
  }

  private _attempt<T>(action: string, id: DocumentId, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this._logger.error(`Failed to ${action} suggestion for ${id}`, err);
      throw err;
    }
  }

  private _commit(id: DocumentId, transition: Transition): UpdatedContent {
    if (transition.state) {
      this._store.set(id, transition.state);
    } else {
      this._store.delete(id);
    }
    this._onChange?.(
      id,
      transition.state ? toPresentedSuggestion(transition.state) : undefined,
    );
    return transition.result;
  }
}
