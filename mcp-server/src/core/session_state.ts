// src/core/session_state.ts
import type { UserId } from "../contracts/events.js";
import type { FieldName } from "./fields.js";

export type CollectedAnswers = Partial<Record<FieldName, string>>;

export type AwaitingFieldSession = {
  kind: "awaiting_field";
  index: number;
  collected: CollectedAnswers;
  pending: string | null;
};

export type ReadyToSaveSession = {
  kind: "ready_to_save";
  collected: CollectedAnswers;
};

export type WizardSession = AwaitingFieldSession | ReadyToSaveSession;
export type WizardState = { kind: "idle" } | WizardSession;

const IDLE: WizardState = Object.freeze({ kind: "idle" });

/**
 * In-memory session store. Only code running inside the user's queue slot
 * may write to it.
 */
export class SessionRegistry {
  private readonly sessions = new Map<UserId, WizardSession>();

  get(userId: UserId): WizardState {
    return this.sessions.get(userId) ?? IDLE;
  }

  set(userId: UserId, session: WizardSession): void {
    this.sessions.set(userId, session);
  }

  clear(userId: UserId): boolean {
    return this.sessions.delete(userId);
  }

  activeCount(): number {
    return this.sessions.size;
  }
}

export function describeState(state: WizardState): string {
  switch (state.kind) {
    case "idle":
      return "idle";
    case "awaiting_field":
      return `awaiting_field(index=${state.index}, collected=${Object.keys(state.collected).length}, pending=${state.pending === null ? "none" : "set"})`;
    case "ready_to_save":
      return `ready_to_save(collected=${Object.keys(state.collected).length})`;
  }
}
