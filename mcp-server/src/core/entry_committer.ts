// src/core/entry_committer.ts
import { z } from "zod";
import type { UserId } from "../contracts/events.js";
import type { PracticeStorage } from "../db/storage.js";
import { TransientIOError, ValidationError } from "./errors.js";
import type { CollectedAnswers, SessionRegistry } from "./session_state.js";

const AnswerZod = z.string().trim().min(1);

export const PracticeAnswersZod = z.object({
  content: AnswerZod,
  attitude: AnswerZod,
  form: AnswerZod,
  body: AnswerZod,
  response: AnswerZod,
});

export type PracticeAnswers = z.infer<typeof PracticeAnswersZod>;

export type EntryCommitterDeps = {
  storage: Pick<PracticeStorage, "createEntry">;
  sessions: SessionRegistry;
  now?: () => Date;
};

/**
 * Turns a finished session into one persisted entry. The session is cleared
 * only after the write succeeded, so a failed save can be retried as is.
 */
export class EntryCommitter {
  constructor(private readonly deps: EntryCommitterDeps) {}

  async commit(userId: UserId, collected: CollectedAnswers): Promise<number> {
    const parsed = PracticeAnswersZod.safeParse(collected);
    if (!parsed.success) {
      const missing = parsed.error.issues.map((issue) => issue.path.join("."));
      throw new ValidationError("missing_field", `Practice entry is incomplete: ${missing.join(", ")}`, {
        missing,
      });
    }

    const date = (this.deps.now ?? (() => new Date()))().toISOString();
    let entryId: number;
    try {
      entryId = await this.deps.storage.createEntry({ userId, date, ...parsed.data });
    } catch (err) {
      throw new TransientIOError("Failed to persist practice entry", { cause: err, meta: { userId } });
    }

    this.deps.sessions.clear(userId);
    console.log(`[committer] saved entry_id=${entryId} user_id=${userId}`);
    return entryId;
  }
}
