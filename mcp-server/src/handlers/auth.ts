// src/handlers/auth.ts
import { createHash, timingSafeEqual } from "node:crypto";
import type { Directive } from "../contracts/directives.js";
import type { UserId } from "../contracts/events.js";
import type { PracticeStorage } from "../db/storage.js";

type AuthStorage = Pick<PracticeStorage, "ensureUser" | "setAuthenticated" | "isAuthenticated" | "touchActivity">;

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/** Shared-password gate. Authentication is persisted per user. */
export class AuthGate {
  private readonly expected: Buffer;

  constructor(
    private readonly storage: AuthStorage,
    password: string
  ) {
    this.expected = digest(password);
  }

  async start(userId: UserId): Promise<Directive[]> {
    const user = await this.storage.ensureUser(userId);
    if (user.isAuthenticated) {
      await this.storage.touchActivity(userId);
      return [{ type: "READY" }];
    }
    console.log(`[auth] user ${userId} asked for password`);
    return [{ type: "AUTH_REQUIRED" }];
  }

  async authenticate(userId: UserId, attempt: string): Promise<Directive[]> {
    if (!this.matches(attempt)) {
      console.warn(`[auth] user ${userId} failed authentication`);
      return [{ type: "AUTH_FAILED" }];
    }
    await this.storage.setAuthenticated(userId, true);
    console.log(`[auth] user ${userId} authenticated`);
    return [{ type: "AUTH_SUCCESS" }];
  }

  async isAuthenticated(userId: UserId): Promise<boolean> {
    const ok = await this.storage.isAuthenticated(userId);
    if (ok) await this.storage.touchActivity(userId);
    return ok;
  }

  private matches(attempt: string): boolean {
    return timingSafeEqual(digest(attempt.trim()), this.expected);
  }
}
