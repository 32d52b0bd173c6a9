// src/handlers/practice_agent.ts
import type { Directive } from "../contracts/directives.js";
import type { PracticeEvent, UserId } from "../contracts/events.js";
import type { PracticeStorage } from "../db/storage.js";
import { EntryCommitter } from "../core/entry_committer.js";
import { ConfigurationError, ProtocolError, ValidationError, isPracticeError } from "../core/errors.js";
import { InputAccumulator } from "../core/input_accumulator.js";
import type { DirectiveSink } from "../core/outbox.js";
import { SessionRegistry, describeState, type WizardState } from "../core/session_state.js";
import { KeyedSerialQueue } from "../core/user_queue.js";
import { FieldWizard } from "../core/wizard.js";
import { safeString } from "../server_safe_string.js";
import type { TranscribeFn } from "../services/transcription.js";

export type PracticeAgentDeps = {
  storage: Pick<PracticeStorage, "createEntry" | "createRefusal">;
  isAuthenticated: (userId: UserId) => Promise<boolean>;
  transcribe: TranscribeFn;
  sink: DirectiveSink;
  debounceMs?: number;
  voiceLanguage?: string;
  now?: () => Date;
};

/**
 * Single entry point for practice events. Every event and every debounced
 * flush for a user runs in that user's queue slot, so the session has one
 * writer at a time. Events are admitted in arrival order through a separate
 * per-user chain that checks authentication; rejected events never enter the
 * queue. Failures stop here: they are logged with the user and event and
 * turned into directives.
 */
export class PracticeAgent {
  readonly sessions = new SessionRegistry();
  readonly queue = new KeyedSerialQueue<UserId>();
  private readonly admission = new KeyedSerialQueue<UserId>();
  readonly accumulator: InputAccumulator;
  readonly wizard: FieldWizard;

  constructor(private readonly deps: PracticeAgentDeps) {
    this.accumulator = new InputAccumulator({
      queue: this.queue,
      delayMs: deps.debounceMs,
      seed: (userId) => this.wizard.pendingAnswer(userId),
      onFlush: (userId, text) => this.apply(userId, "ANSWER_READY", () => this.wizard.answerReady(userId, text)),
    });
    this.wizard = new FieldWizard({
      sessions: this.sessions,
      input: this.accumulator,
      committer: new EntryCommitter({ storage: deps.storage, sessions: this.sessions, now: deps.now }),
    });
  }

  dispatch(userId: UserId, event: PracticeEvent): Promise<Directive[]> {
    // the queued promise is wrapped so admission does not wait for the work itself
    return this.admission
      .run(userId, async () => {
        const rejection = await this.apply(userId, event.type, () => this.authGate(userId));
        if (rejection.length) return { result: Promise.resolve(rejection) };
        return { result: this.queue.run(userId, () => this.apply(userId, event.type, () => this.handle(userId, event))) };
      })
      .then(({ result }) => result);
  }

  /** Drops the user's session and buffered input, in queue order. */
  resetUser(userId: UserId): Promise<void> {
    return this.queue.run(userId, () => this.wizard.reset(userId));
  }

  /** Resolves once the user's queued work, including a pending flush already fired, has finished. */
  async settle(userId: UserId): Promise<void> {
    await this.admission.drain(userId);
    await this.queue.drain(userId);
  }

  state(userId: UserId): WizardState {
    return this.sessions.get(userId);
  }

  shutdown(): void {
    this.accumulator.shutdown();
  }

  private async authGate(userId: UserId): Promise<Directive[]> {
    return (await this.deps.isAuthenticated(userId)) ? [] : [{ type: "AUTH_REQUIRED" }];
  }

  private async handle(userId: UserId, event: PracticeEvent): Promise<Directive[]> {
    switch (event.type) {
      case "START_PRACTICE":
        return this.wizard.start(userId);
      case "SUBMIT_TEXT":
        this.requireCollecting(userId, event.type);
        this.accumulator.submit(userId, event.text);
        return [];
      case "SUBMIT_VOICE": {
        this.requireCollecting(userId, event.type);
        const text = await this.deps.transcribe(event.audio, this.deps.voiceLanguage ?? "ru");
        if (!text || !text.trim()) return [{ type: "SHOW_NOTICE", notice: "transcription_failed" }];
        this.accumulator.submit(userId, text);
        return [];
      }
      case "SELECT_CHOICE":
        return this.wizard.selectChoice(userId, event.value);
      case "CONFIRM":
        return this.wizard.confirm(userId);
      case "REPLACE_ANSWER":
        return this.wizard.replaceAnswer(userId);
      case "GO_BACK":
        return this.wizard.goBack(userId);
      case "SAVE":
        return this.wizard.save(userId);
      case "CANCEL_PRACTICE":
        return this.wizard.cancel(userId);
      case "REMINDER_RESPONSE":
        if (event.accept) return this.wizard.start(userId);
        this.recordRefusal(userId);
        return [];
    }
  }

  private async apply(
    userId: UserId,
    eventType: string,
    step: () => Directive[] | Promise<Directive[]>
  ): Promise<Directive[]> {
    let directives: Directive[];
    try {
      directives = await step();
    } catch (err) {
      directives = this.recover(userId, eventType, err);
    }
    if (directives.length) {
      try {
        this.deps.sink.deliver(userId, directives);
      } catch (err) {
        console.error(`[dispatch] user_id=${userId} event=${eventType} delivery failed`, safeString(err));
      }
    }
    return directives;
  }

  private recover(userId: UserId, eventType: string, err: unknown): Directive[] {
    if (err instanceof ProtocolError) {
      console.warn(`[dispatch] user_id=${userId} event=${eventType} ignored: ${err.message}`);
      return [];
    }
    if (err instanceof ValidationError) {
      console.warn(`[dispatch] user_id=${userId} event=${eventType} rejected: ${err.message}`);
      return [{ type: "SHOW_VALIDATION_ERROR", reason: err.reason }];
    }
    if (err instanceof ConfigurationError) {
      console.error(
        `[dispatch] user_id=${userId} event=${eventType} state=${describeState(this.sessions.get(userId))} reset:`,
        safeString(err)
      );
      this.wizard.reset(userId);
      return [{ type: "SHOW_ERROR", reason: "apology" }];
    }
    const kind = isPracticeError(err) ? err.type : "unexpected";
    console.error(`[dispatch] user_id=${userId} event=${eventType} ${kind} error:`, safeString(err));
    return [{ type: "SHOW_ERROR", reason: "retry" }];
  }

  private requireCollecting(userId: UserId, eventType: string): void {
    if (!this.wizard.isCollecting(userId)) {
      throw new ProtocolError(`${eventType} outside an open field`, { userId });
    }
  }

  private recordRefusal(userId: UserId): void {
    void this.deps.storage
      .createRefusal(userId)
      .then(() => console.log(`[dispatch] user_id=${userId} declined reminder`))
      .catch((err: unknown) => console.error(`[dispatch] user_id=${userId} refusal not recorded`, safeString(err)));
  }
}
