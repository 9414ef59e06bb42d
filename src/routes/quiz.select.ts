import type { FastifyPluginAsync } from "fastify";

import { requireCourseAccess } from "../lib/guard.js";
import { findCourseByCanvasId, listActiveExtensions } from "../lib/store.js";

const quizSelectRoute: FastifyPluginAsync = async (fastify) => {
  fastify.get("/quiz/:courseId", async (request) => {
    const courseId = await requireCourseAccess(
      fastify.canvas,
      request.auth?.session ?? null,
      request.params
    );

    const course = findCourseByCanvasId(fastify.db, courseId);
    const extensions = course ? listActiveExtensions(fastify.db, course.id) : [];

    return {
      courseId,
      courseName: course?.courseName ?? null,
      currentPageNumber: 1,
      extensions: extensions.map(({ extension, user }) => ({
        userId: user.canvasId,
        sortableName: user.sortableName,
        percent: extension.percent
      }))
    };
  });
};

export default quizSelectRoute;
