import { courseParamsSchema } from "../schema.js";
import type { CanvasClient } from "./canvasClient.js";
import { AppError } from "./errors.js";
import type { Session } from "./tables.js";

export type AccessDecision =
  | { allowed: true; courseId: number }
  | { allowed: false; reason: string };

/**
 * Decides whether the launched user may manage extensions in `courseId`.
 * Administrators pass; everyone else needs a Teacher, TA or Designer
 * enrollment in the course.
 */
export async function checkValidUser(
  canvas: CanvasClient,
  session: Session | null,
  courseId: number | null
): Promise<AccessDecision> {
  if (!session) {
    return { allowed: false, reason: "Not allowed!" };
  }

  if (courseId === null) {
    return { allowed: false, reason: "No course_id provided." };
  }

  if (session.isAdmin) {
    return { allowed: true, courseId };
  }

  const enrollments = await canvas.listStaffEnrollments(courseId, session.canvasUserId);
  if (enrollments.length === 0) {
    return {
      allowed: false,
      reason: "You are not enrolled in this course as a Teacher, TA, or Designer."
    };
  }

  return { allowed: true, courseId };
}

/**
 * Route-level wrapper around `checkValidUser`: resolves the course id from
 * the path params or throws the denial as a 401/403.
 */
export async function requireCourseAccess(
  canvas: CanvasClient,
  session: Session | null,
  params: unknown
): Promise<number> {
  const parsedParams = courseParamsSchema.safeParse(params);
  const decision = await checkValidUser(
    canvas,
    session,
    parsedParams.success ? parsedParams.data.courseId : null
  );

  if (!decision.allowed) {
    throw new AppError(session ? 403 : 401, decision.reason, session ? "forbidden" : "unauthorized");
  }

  return decision.courseId;
}
