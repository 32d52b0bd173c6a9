// src/app.ts
import { actionCodeToCommand } from "./adapters/actioncode_to_command.js";
import type { AppConfig } from "./config.js";
import type { Directive } from "./contracts/directives.js";
import type { AccountAction, PracticeEvent, ReminderAction, SurfaceCommand, UserId } from "./contracts/events.js";
import { openDatabase, type DatabaseHandle } from "./db/client.js";
import { DatabaseStorage } from "./db/storage.js";
import { Outbox, type OutboxMessage } from "./core/outbox.js";
import type { WizardState } from "./core/session_state.js";
import { AuthGate } from "./handlers/auth.js";
import { UserDataService } from "./handlers/data.js";
import { PracticeAgent } from "./handlers/practice_agent.js";
import { ReminderSettings } from "./handlers/reminders.js";
import { createScheduleParser, type ScheduleParseFn } from "./services/schedule_parser.js";
import { ReminderScheduler } from "./services/scheduler.js";
import { createTranscriber, type TranscribeFn } from "./services/transcription.js";

export type AppOverrides = {
  database?: DatabaseHandle;
  parseSchedule?: ScheduleParseFn;
  transcribe?: TranscribeFn;
  now?: () => Date;
};

export type PracticeApp = {
  readonly storage: DatabaseStorage;
  readonly auth: AuthGate;
  readonly agent: PracticeAgent;
  readonly reminders: ReminderSettings;
  readonly data: UserDataService;
  readonly scheduler: ReminderScheduler;
  readonly outbox: Outbox;
  practice(userId: UserId, event: PracticeEvent): Promise<Directive[]>;
  configureReminders(userId: UserId, action: ReminderAction): Promise<Directive[]>;
  account(userId: UserId, action: AccountAction): Promise<Directive[]>;
  pressButton(userId: UserId, actionCode: string): Promise<Directive[]>;
  execute(userId: UserId, command: SurfaceCommand): Promise<Directive[]>;
  pullUpdates(userId: UserId): OutboxMessage[];
  session(userId: UserId): WizardState;
  start(): Promise<void>;
  close(): void;
};

/** Wires storage, handlers, the reminder scheduler and the outbox into one application. */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): PracticeApp {
  const database = overrides.database ?? openDatabase(config.databasePath);
  const storage = new DatabaseStorage(database.db, overrides.now);
  const outbox = new Outbox();
  const auth = new AuthGate(storage, config.botPassword);
  const isAuthenticated = (userId: UserId) => auth.isAuthenticated(userId);

  const transcribe =
    overrides.transcribe ??
    createTranscriber({ model: config.transcriptionModel, fallbackModel: config.transcriptionFallbackModel });
  const parseSchedule =
    overrides.parseSchedule ??
    createScheduleParser({ model: config.scheduleModel, timeoutMs: config.llmTimeoutMs, now: overrides.now });

  const scheduler = new ReminderScheduler({
    onReminder: (userId) => outbox.deliver(userId, [{ type: "REMINDER_PROMPT" }]),
  });

  const agent = new PracticeAgent({
    storage,
    isAuthenticated,
    transcribe,
    sink: outbox,
    debounceMs: config.inputDebounceMs,
    now: overrides.now,
  });

  const reminders = new ReminderSettings({
    storage,
    scheduler,
    parseSchedule,
    transcribe,
    isAuthenticated,
    sink: outbox,
    defaultTimezone: config.defaultTimezone,
  });

  const data = new UserDataService({
    storage,
    isAuthenticated,
    sink: outbox,
    now: overrides.now,
    forgetUser: async (userId) => {
      scheduler.cancelForUser(userId);
      reminders.forget(userId);
      await agent.resetUser(userId);
    },
  });

  async function account(userId: UserId, action: AccountAction): Promise<Directive[]> {
    let directives: Directive[];
    switch (action.type) {
      case "START":
        directives = await auth.start(userId);
        break;
      case "AUTHENTICATE":
        directives = await auth.authenticate(userId, action.password);
        break;
      default:
        return data.handle(userId, action);
    }
    outbox.deliver(userId, directives);
    return directives;
  }

  function execute(userId: UserId, command: SurfaceCommand): Promise<Directive[]> {
    switch (command.surface) {
      case "practice":
        return agent.dispatch(userId, command.event);
      case "reminders":
        return reminders.handle(userId, command.action);
      case "account":
        return account(userId, command.action);
    }
  }

  return {
    storage,
    auth,
    agent,
    reminders,
    data,
    scheduler,
    outbox,
    practice: (userId, event) => agent.dispatch(userId, event),
    configureReminders: (userId, action) => reminders.handle(userId, action),
    account,
    execute,
    async pressButton(userId, actionCode) {
      const command = actionCodeToCommand(actionCode);
      if (!command) {
        console.warn(`[app] user_id=${userId} unknown action code "${actionCode}"`);
        const directives: Directive[] = [{ type: "SHOW_NOTICE", notice: "unknown_command" }];
        outbox.deliver(userId, directives);
        return directives;
      }
      return execute(userId, command);
    },
    pullUpdates: (userId) => outbox.drain(userId),
    session: (userId) => agent.state(userId),
    async start() {
      await scheduler.restoreAll(storage);
    },
    close() {
      agent.shutdown();
      scheduler.shutdown();
      database.close();
    },
  };
}
