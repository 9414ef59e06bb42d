import type { BaseLogger } from "pino";

import type { CanvasClient } from "./canvasClient.js";
import type { AppDatabase } from "./db.js";
import { AppError, CanvasApiError, isCanvasNotFound } from "./errors.js";
import { extendQuiz } from "./extensions.js";
import {
  deactivateExtension,
  findCourseByCanvasId,
  findQuizByCanvasId,
  getOrCreateQuiz,
  listActiveExtensions,
  upsertCourse,
  upsertExtension,
  upsertQuiz,
  upsertUser
} from "./store.js";
import type { Course } from "./tables.js";
import type { CanvasQuiz, CanvasUser } from "./types.js";

export interface ReconcileContext {
  db: AppDatabase;
  canvas: CanvasClient;
  log: BaseLogger;
}

export interface UpdateRequest {
  percent: number;
  userIds: number[];
}

export interface UpdateResult {
  message: string;
  quizList: Array<{ title: string; addedTime: number }>;
  unchangedList: Array<{ title: string }>;
}

export interface RefreshResult {
  message: string;
  quizzesUpdated: number;
}

const REFRESH_FAILURE_PREFIX = "Some quizzes couldn't be updated. ";

function pluralQuizzes(count: number): string {
  return count === 1 ? "quiz has" : "quizzes have";
}

function courseNotFound(): AppError {
  return new AppError(404, "Course not found.", "course_not_found");
}

async function syncCourse(ctx: ReconcileContext, courseId: number): Promise<Course> {
  try {
    const canvasCourse = await ctx.canvas.getCourse(courseId);
    return upsertCourse(ctx.db, {
      canvasId: courseId,
      courseName: canvasCourse.name,
      canvasTermId: canvasCourse.enrollment_term_id
    });
  } catch (error) {
    if (isCanvasNotFound(error)) {
      throw courseNotFound();
    }

    throw error;
  }
}

/**
 * Quizzes present in Canvas but absent from the local quiz table, in Canvas
 * order. `quickCheck` stops at the first one found.
 */
export async function missingQuizzes(
  ctx: ReconcileContext,
  courseId: number,
  options: { quickCheck?: boolean } = {}
): Promise<CanvasQuiz[]> {
  const canvasQuizzes = await ctx.canvas.listQuizzes(courseId);
  const missing: CanvasQuiz[] = [];

  for (const canvasQuiz of canvasQuizzes) {
    if (findQuizByCanvasId(ctx.db, canvasQuiz.id)) {
      continue;
    }

    missing.push(canvasQuiz);

    if (options.quickCheck) {
      break;
    }
  }

  return missing;
}

/**
 * Groups the course's active extensions by percent, deactivating any whose
 * user Canvas no longer knows.
 */
async function groupActiveExtensions(
  ctx: ReconcileContext,
  course: Course
): Promise<Map<number, number[]>> {
  const groups = new Map<number, number[]>();

  for (const { extension, user } of listActiveExtensions(ctx.db, course.id)) {
    try {
      await ctx.canvas.getUser(course.canvasId, user.canvasId);
    } catch (error) {
      if (!isCanvasNotFound(error)) {
        throw error;
      }

      ctx.log.warn(
        { courseId: course.canvasId, userId: user.canvasId, extensionId: extension.id },
        "user no longer in course, deactivating extension"
      );
      deactivateExtension(ctx.db, extension.id);
      continue;
    }

    const group = groups.get(extension.percent) ?? [];
    group.push(user.canvasId);
    groups.set(extension.percent, group);
  }

  return groups;
}

/**
 * Applies the course's standing extensions to every quiz Canvas has that we
 * have not seen yet. A quiz is recorded locally only after all of its
 * percent groups were pushed.
 */
export async function refreshExtensions(
  ctx: ReconcileContext,
  course: Course
): Promise<RefreshResult> {
  const percentGroups = await groupActiveExtensions(ctx, course);
  if (percentGroups.size === 0) {
    return { message: "No quizzes require updates.", quizzesUpdated: 0 };
  }

  const missing = await missingQuizzes(ctx, course.canvasId);

  if (missing.length === 0) {
    return { message: "No quizzes require updates.", quizzesUpdated: 0 };
  }

  for (const quiz of missing) {
    for (const [percent, userIds] of percentGroups) {
      const result = await extendQuiz(ctx.canvas, course.canvasId, quiz, percent, userIds);

      if (!result.success) {
        ctx.log.warn({ courseId: course.canvasId, quizId: quiz.id, percent }, result.message);
        throw new AppError(502, `${REFRESH_FAILURE_PREFIX}${result.message}`, "extension_failed");
      }

      ctx.log.info({ courseId: course.canvasId, quizId: quiz.id, percent }, result.message);
    }

    getOrCreateQuiz(ctx.db, { canvasId: quiz.id, courseId: course.id, title: quiz.title });
  }

  return {
    message: `${missing.length} ${pluralQuizzes(missing.length)} been updated.`,
    quizzesUpdated: missing.length
  };
}

export async function refreshCourse(ctx: ReconcileContext, courseId: number): Promise<RefreshResult> {
  const course = await syncCourse(ctx, courseId);
  return refreshExtensions(ctx, course);
}

async function findCanvasUser(
  ctx: ReconcileContext,
  courseId: number,
  userId: number
): Promise<CanvasUser | null> {
  try {
    return await ctx.canvas.getUser(courseId, userId);
  } catch (error) {
    if (error instanceof CanvasApiError) {
      ctx.log.warn({ courseId, userId, status: error.canvasStatus }, "skipping user canvas could not return");
      return null;
    }

    if (error instanceof AppError && error.code === "canvas_unavailable") {
      ctx.log.warn({ courseId, userId }, "skipping user canvas could not be reached for");
      return null;
    }

    throw error;
  }
}

/**
 * Records `percent` for every requested user and pushes it to every quiz in
 * the course. Stops at the first rejected push; earlier pushes stay applied.
 */
export async function applyUpdate(
  ctx: ReconcileContext,
  courseId: number,
  request: UpdateRequest
): Promise<UpdateResult> {
  const course = await syncCourse(ctx, courseId);

  for (const userId of request.userIds) {
    const canvasUser = await findCanvasUser(ctx, courseId, userId);
    if (!canvasUser) {
      continue;
    }

    const user = upsertUser(ctx.db, {
      canvasId: canvasUser.id,
      sortableName: canvasUser.sortable_name,
      sisId: canvasUser.sis_user_id
    });

    upsertExtension(ctx.db, { courseId: course.id, userId: user.id, percent: request.percent });
  }

  const quizzes = await ctx.canvas.listQuizzes(courseId);
  if (quizzes.length < 1) {
    throw new AppError(404, "Sorry, there are no quizzes for this course.", "no_quizzes");
  }

  const quizList: UpdateResult["quizList"] = [];
  const unchangedList: UpdateResult["unchangedList"] = [];

  for (const quiz of quizzes) {
    upsertQuiz(ctx.db, { canvasId: quiz.id, courseId: course.id, title: quiz.title });

    const result = await extendQuiz(ctx.canvas, courseId, quiz, request.percent, request.userIds);

    if (!result.success) {
      ctx.log.warn({ courseId, quizId: quiz.id }, result.message);
      throw new AppError(502, result.message, "extension_failed");
    }

    if (result.addedTime === null) {
      unchangedList.push({ title: quiz.title });
    } else {
      quizList.push({ title: quiz.title, addedTime: result.addedTime });
    }
  }

  return {
    message:
      `Success! ${quizList.length} ${pluralQuizzes(quizList.length)} been updated for ` +
      `${request.userIds.length} student(s) to have ${request.percent}% time. ` +
      `${unchangedList.length} ${pluralQuizzes(unchangedList.length)} no time limit ` +
      "and were left unchanged.",
    quizList,
    unchangedList
  };
}

/**
 * Cheap poll: does the course have standing extensions and at least one
 * quiz they have not been applied to?
 */
export async function hasMissingQuizzes(ctx: ReconcileContext, courseId: number): Promise<boolean> {
  const course = findCourseByCanvasId(ctx.db, courseId);
  if (!course) {
    return false;
  }

  if (listActiveExtensions(ctx.db, course.id).length === 0) {
    return false;
  }

  const missing = await missingQuizzes(ctx, courseId, { quickCheck: true });
  return missing.length > 0;
}
