import type { FastifyPluginAsync } from "fastify";

import { AppError } from "../lib/errors.js";
import { requireCourseAccess } from "../lib/guard.js";
import { applyUpdate } from "../lib/reconcile.js";
import { updateBodySchema } from "../schema.js";

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const extensionsUpdateRoute: FastifyPluginAsync = async (fastify) => {
  /**
   * Body: `{ "percent": "300", "user_ids": ["0123456", "1234567"] }`.
   * Sets the percent for each user and applies it to every quiz in the course.
   */
  fastify.post("/update/:courseId", async (request) => {
    const courseId = await requireCourseAccess(
      fastify.canvas,
      request.auth?.session ?? null,
      request.params
    );

    if (!isJsonObject(request.body)) {
      throw new AppError(400, "invalid request", "invalid_request");
    }

    const body = updateBodySchema.parse(request.body);
    if (!body.percent) {
      throw new AppError(400, "percent required", "percent_required");
    }

    const result = await applyUpdate(request.reconcileContext(), courseId, {
      percent: body.percent,
      userIds: body.user_ids
    });

    return {
      success: true,
      ...result
    };
  });
};

export default extensionsUpdateRoute;
