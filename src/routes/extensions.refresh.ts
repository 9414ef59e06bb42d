import type { FastifyPluginAsync } from "fastify";

import { requireCourseAccess } from "../lib/guard.js";
import { refreshCourse } from "../lib/reconcile.js";

const extensionsRefreshRoute: FastifyPluginAsync = async (fastify) => {
  fastify.post("/refresh/:courseId", async (request) => {
    const courseId = await requireCourseAccess(
      fastify.canvas,
      request.auth?.session ?? null,
      request.params
    );

    const result = await refreshCourse(request.reconcileContext(), courseId);

    return {
      success: true,
      ...result
    };
  });
};

export default extensionsRefreshRoute;
