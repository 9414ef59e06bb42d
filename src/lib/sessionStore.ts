import { randomUUID } from "node:crypto";

import { and, eq, gt, lte } from "drizzle-orm";

import type { AppDatabase } from "./db.js";
import type { LaunchContext, LaunchParams } from "./lti.js";
import { ltiNonces, sessions, type Session } from "./tables.js";

export function createSession(
  db: AppDatabase,
  launch: LaunchContext,
  launchParams: LaunchParams,
  ttlHours: number
): Session {
  const expiresAt = new Date(Date.now() + ttlHours * 60 * 60 * 1000);

  return db
    .insert(sessions)
    .values({
      id: randomUUID(),
      canvasUserId: launch.canvasUserId,
      canvasCourseId: launch.canvasCourseId,
      isAdmin: launch.isAdmin,
      launchParams,
      expiresAt
    })
    .returning()
    .get();
}

export function findSession(db: AppDatabase, sessionId: string): Session | undefined {
  return db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
}

export function deleteSession(db: AppDatabase, sessionId: string): void {
  db.delete(sessions).where(eq(sessions.id, sessionId)).run();
}

export function touchSession(db: AppDatabase, sessionId: string): void {
  db.update(sessions).set({ lastSeenAt: new Date() }).where(eq(sessions.id, sessionId)).run();
}

/**
 * Records a launch nonce. Returns false when the same nonce was already used
 * inside the window; nonces older than the window are pruned first.
 */
export function claimNonce(
  db: AppDatabase,
  input: { nonce: string; consumerKey: string; windowSeconds: number; now?: Date }
): boolean {
  const now = input.now ?? new Date();
  const windowStart = new Date(now.getTime() - input.windowSeconds * 1000);

  db.delete(ltiNonces).where(lte(ltiNonces.usedAt, windowStart)).run();

  const reused = db
    .select()
    .from(ltiNonces)
    .where(and(eq(ltiNonces.nonce, input.nonce), gt(ltiNonces.usedAt, windowStart)))
    .get();

  if (reused) {
    return false;
  }

  db.insert(ltiNonces)
    .values({ nonce: input.nonce, consumerKey: input.consumerKey, usedAt: now })
    .run();

  return true;
}
