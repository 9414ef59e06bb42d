import type { FastifyPluginAsync } from "fastify";

import { hasMissingQuizzes } from "../lib/reconcile.js";
import { courseParamsSchema } from "../schema.js";

const quizzesMissingRoute: FastifyPluginAsync = async (fastify) => {
  // unguarded: polled from the course page outside an lti launch
  fastify.get("/missing_quizzes/:courseId", async (request) => {
    const { courseId } = courseParamsSchema.parse(request.params);

    return {
      missingQuizzes: await hasMissingQuizzes(request.reconcileContext(), courseId)
    };
  });
};

export default quizzesMissingRoute;
