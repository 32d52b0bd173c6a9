// src/core/wizard.ts
import type { Directive } from "../contracts/directives.js";
import type { UserId } from "../contracts/events.js";
import { logPreview } from "../server_safe_string.js";
import type { EntryCommitter } from "./entry_committer.js";
import { ConfigurationError, ProtocolError } from "./errors.js";
import { PRACTICE_FIELDS, fieldAt, type FieldDefinition } from "./fields.js";
import {
  describeState,
  type AwaitingFieldSession,
  type CollectedAnswers,
  type SessionRegistry,
  type WizardSession,
  type WizardState,
} from "./session_state.js";

/** The part of the input accumulator the wizard needs to keep buffers in step with navigation. */
export type PendingInputPort = {
  cancel(userId: UserId): boolean;
  take(userId: UserId): string | null;
};

export type FieldWizardDeps = {
  sessions: SessionRegistry;
  committer: EntryCommitter;
  input: PendingInputPort;
};

/**
 * Five-field guided practice as a per-user state machine.
 *
 * Every method assumes it runs inside the user's queue slot and returns the
 * directives for the presentation layer. Events that make no sense in the
 * current state throw ProtocolError; a session pointing outside the field
 * list throws ConfigurationError. Input problems come back as directives.
 */
export class FieldWizard {
  constructor(private readonly deps: FieldWizardDeps) {}

  state(userId: UserId): WizardState {
    return this.deps.sessions.get(userId);
  }

  pendingAnswer(userId: UserId): string | null {
    const state = this.deps.sessions.get(userId);
    return state.kind === "awaiting_field" ? state.pending : null;
  }

  isCollecting(userId: UserId): boolean {
    return this.deps.sessions.get(userId).kind === "awaiting_field";
  }

  start(userId: UserId): Directive[] {
    const previous = this.deps.sessions.get(userId);
    if (previous.kind !== "idle") {
      console.log(`[wizard] user_id=${userId} restart discards ${describeState(previous)}`);
    }
    this.deps.input.cancel(userId);
    console.log(`[wizard] user_id=${userId} practice started`);
    return [this.enterField(userId, 0, {})];
  }

  cancel(userId: UserId): Directive[] {
    this.requireSession(userId, "cancel");
    this.reset(userId);
    return [{ type: "SHOW_NOTICE", notice: "practice_cancelled" }];
  }

  reset(userId: UserId): void {
    this.deps.input.cancel(userId);
    this.deps.sessions.clear(userId);
  }

  answerReady(userId: UserId, text: string): Directive[] {
    const session = this.requireAwaiting(userId, "answerReady");
    const field = this.fieldOf(session);
    const answer = text.trim();
    if (!answer) return [{ type: "SHOW_VALIDATION_ERROR", reason: "empty_answer" }];

    this.deps.sessions.set(userId, { ...session, pending: answer });
    console.log(`[wizard] user_id=${userId} field=${field.name} answer="${logPreview(answer)}"`);
    return [this.confirmation(session.index, field, answer, false)];
  }

  selectChoice(userId: UserId, value: string): Directive[] {
    const session = this.requireAwaiting(userId, "selectChoice");
    const field = this.fieldOf(session);
    if (!field.choices) return [{ type: "SHOW_VALIDATION_ERROR", reason: "not_a_choice_field" }];
    if (!field.choices.includes(value)) return [{ type: "SHOW_VALIDATION_ERROR", reason: "unknown_choice" }];

    // a button press replaces whatever was typed but not yet flushed
    this.deps.input.cancel(userId);
    return this.answerReady(userId, value);
  }

  replaceAnswer(userId: UserId): Directive[] {
    const session = this.requireAwaiting(userId, "replaceAnswer");
    this.fieldOf(session);
    this.deps.input.cancel(userId);
    this.deps.sessions.set(userId, { ...session, pending: null });
    return [this.prompt(session.index)];
  }

  confirm(userId: UserId): Directive[] {
    const session = this.requireAwaiting(userId, "confirm");
    const field = this.fieldOf(session);

    // unflushed input goes on screen first; the user confirms what they saw
    const buffered = this.deps.input.take(userId);
    if (buffered) return this.answerReady(userId, buffered);

    const answer = session.pending?.trim() ?? "";
    if (!answer) return [{ type: "SHOW_VALIDATION_ERROR", reason: "empty_answer" }];

    const collected: CollectedAnswers = { ...session.collected, [field.name]: answer };
    const next = session.index + 1;
    if (next >= PRACTICE_FIELDS.length) {
      this.deps.sessions.set(userId, { kind: "ready_to_save", collected });
      console.log(`[wizard] user_id=${userId} all fields confirmed`);
      return [{ type: "SHOW_READY_TO_SAVE" }];
    }
    return [this.enterField(userId, next, collected)];
  }

  goBack(userId: UserId): Directive[] {
    const session = this.requireSession(userId, "goBack");
    let target: number;
    if (session.kind === "ready_to_save") {
      target = PRACTICE_FIELDS.length - 1;
    } else {
      this.fieldOf(session);
      if (session.index === 0) return [{ type: "SHOW_NOTICE", notice: "at_first_field" }];
      target = session.index - 1;
    }
    this.deps.input.cancel(userId);
    return [this.enterField(userId, target, session.collected)];
  }

  async save(userId: UserId): Promise<Directive[]> {
    const session = this.requireSession(userId, "save");
    if (session.kind !== "ready_to_save") {
      return [{ type: "SHOW_VALIDATION_ERROR", reason: "not_ready" }];
    }
    const entryId = await this.deps.committer.commit(userId, session.collected);
    return [{ type: "SHOW_SAVED", entryId }];
  }

  private enterField(userId: UserId, index: number, collected: CollectedAnswers): Directive {
    const field = fieldAt(index);
    if (!field) throw new ConfigurationError(`Field index ${index} is out of range`, { userId, index });

    const prior = collected[field.name] ?? null;
    this.deps.sessions.set(userId, { kind: "awaiting_field", index, collected, pending: prior });
    return prior === null ? this.prompt(index) : this.confirmation(index, field, prior, true);
  }

  private prompt(index: number): Directive {
    const field = fieldAt(index);
    if (!field) throw new ConfigurationError(`Field index ${index} is out of range`, { index });
    const canGoBack = index > 0;
    if (field.choices) {
      return { type: "SHOW_CHOICE", fieldIndex: index, field: field.name, choices: [...field.choices], canGoBack };
    }
    return { type: "SHOW_PROMPT", fieldIndex: index, field: field.name, canGoBack };
  }

  private confirmation(index: number, field: FieldDefinition, text: string, revisiting: boolean): Directive {
    return {
      type: "SHOW_CONFIRMATION",
      fieldIndex: index,
      field: field.name,
      text,
      canGoBack: index > 0,
      revisiting,
    };
  }

  private fieldOf(session: AwaitingFieldSession): FieldDefinition {
    const field = fieldAt(session.index);
    if (!field) {
      throw new ConfigurationError(`Session points at field index ${session.index}`, { index: session.index });
    }
    return field;
  }

  private requireSession(userId: UserId, event: string): WizardSession {
    const state = this.deps.sessions.get(userId);
    if (state.kind === "idle") throw new ProtocolError(`${event} without an active practice`, { userId });
    return state;
  }

  private requireAwaiting(userId: UserId, event: string): AwaitingFieldSession {
    const state = this.requireSession(userId, event);
    if (state.kind !== "awaiting_field") {
      throw new ProtocolError(`${event} while ${state.kind}`, { userId });
    }
    return state;
  }
}
