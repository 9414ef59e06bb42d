import { and, asc, desc, eq } from "drizzle-orm";

import type { AppDatabase } from "./db.js";
import {
  courses,
  extensions,
  quizzes,
  users,
  type Course,
  type Extension,
  type Quiz,
  type User
} from "./tables.js";

// Lookup-then-write helpers. Canvas ids are not unique in the schema; the
// first matching row wins, the same way every caller looks rows up.

export function findCourseByCanvasId(db: AppDatabase, canvasId: number): Course | undefined {
  return db.select().from(courses).where(eq(courses.canvasId, canvasId)).orderBy(asc(courses.id)).get();
}

export function upsertCourse(
  db: AppDatabase,
  input: { canvasId: number; courseName: string; canvasTermId?: number | null }
): Course {
  const existing = findCourseByCanvasId(db, input.canvasId);

  if (!existing) {
    return db
      .insert(courses)
      .values({
        canvasId: input.canvasId,
        courseName: input.courseName,
        canvasTermId: input.canvasTermId ?? null
      })
      .returning()
      .get();
  }

  const changes = {
    courseName: input.courseName,
    ...(input.canvasTermId !== undefined ? { canvasTermId: input.canvasTermId } : {}),
    updatedAt: new Date()
  };

  const updated = db.update(courses).set(changes).where(eq(courses.id, existing.id)).returning().get();
  return updated ?? { ...existing, ...changes };
}

export function setCourseTerm(db: AppDatabase, courseId: number, canvasTermId: number | null): void {
  db.update(courses)
    .set({ canvasTermId, updatedAt: new Date() })
    .where(eq(courses.id, courseId))
    .run();
}

export function findUserByCanvasId(db: AppDatabase, canvasId: number): User | undefined {
  return db.select().from(users).where(eq(users.canvasId, canvasId)).orderBy(asc(users.id)).get();
}

export function upsertUser(
  db: AppDatabase,
  input: { canvasId: number; sortableName: string; sisId: string | null }
): User {
  const existing = findUserByCanvasId(db, input.canvasId);

  if (!existing) {
    return db.insert(users).values(input).returning().get();
  }

  const changes = {
    sortableName: input.sortableName,
    sisId: input.sisId,
    updatedAt: new Date()
  };

  const updated = db.update(users).set(changes).where(eq(users.id, existing.id)).returning().get();
  return updated ?? { ...existing, ...changes };
}

/**
 * Sets the user's percent for the course, reusing the existing row (active
 * rows first) so a pair never gains a second active extension.
 */
export function upsertExtension(
  db: AppDatabase,
  input: { courseId: number; userId: number; percent: number }
): Extension {
  const existing = db
    .select()
    .from(extensions)
    .where(and(eq(extensions.courseId, input.courseId), eq(extensions.userId, input.userId)))
    .orderBy(desc(extensions.active), asc(extensions.id))
    .get();

  if (!existing) {
    return db
      .insert(extensions)
      .values({ courseId: input.courseId, userId: input.userId, percent: input.percent })
      .returning()
      .get();
  }

  const changes = { percent: input.percent, active: true, updatedAt: new Date() };
  const updated = db
    .update(extensions)
    .set(changes)
    .where(eq(extensions.id, existing.id))
    .returning()
    .get();

  return updated ?? { ...existing, ...changes };
}

export interface ExtensionWithUser {
  extension: Extension;
  user: User;
}

export function listActiveExtensions(db: AppDatabase, courseId: number): ExtensionWithUser[] {
  return db
    .select({ extension: extensions, user: users })
    .from(extensions)
    .innerJoin(users, eq(extensions.userId, users.id))
    .where(and(eq(extensions.courseId, courseId), eq(extensions.active, true)))
    .orderBy(asc(extensions.id))
    .all();
}

export function deactivateExtension(db: AppDatabase, extensionId: number): void {
  db.update(extensions)
    .set({ active: false, updatedAt: new Date() })
    .where(eq(extensions.id, extensionId))
    .run();
}

export function findQuizByCanvasId(db: AppDatabase, canvasId: number): Quiz | undefined {
  return db.select().from(quizzes).where(eq(quizzes.canvasId, canvasId)).orderBy(asc(quizzes.id)).get();
}

export function getOrCreateQuiz(
  db: AppDatabase,
  input: { canvasId: number; courseId: number; title: string }
): { quiz: Quiz; created: boolean } {
  const existing = db
    .select()
    .from(quizzes)
    .where(and(eq(quizzes.canvasId, input.canvasId), eq(quizzes.courseId, input.courseId)))
    .get();

  if (existing) {
    return { quiz: existing, created: false };
  }

  return { quiz: db.insert(quizzes).values(input).returning().get(), created: true };
}

export function upsertQuiz(
  db: AppDatabase,
  input: { canvasId: number; courseId: number; title: string }
): Quiz {
  const existing = findQuizByCanvasId(db, input.canvasId);

  if (!existing) {
    return db.insert(quizzes).values(input).returning().get();
  }

  const changes = { courseId: input.courseId, title: input.title };
  const updated = db.update(quizzes).set(changes).where(eq(quizzes.id, existing.id)).returning().get();
  return updated ?? { ...existing, ...changes };
}
