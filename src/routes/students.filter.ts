import type { FastifyPluginAsync } from "fastify";

import { requireCourseAccess } from "../lib/guard.js";
import { filterQuerySchema } from "../schema.js";

const studentsFilterRoute: FastifyPluginAsync = async (fastify) => {
  fastify.get("/filter/:courseId", async (request) => {
    const courseId = await requireCourseAccess(
      fastify.canvas,
      request.auth?.session ?? null,
      request.params
    );
    const query = filterQuerySchema.parse(request.query);

    const result = await fastify.canvas.searchUsers(courseId, {
      page: query.page,
      perPage: query.per_page ?? fastify.config.DEFAULT_PER_PAGE,
      searchTerm: query.query
    });

    return {
      users: result.users.map((user) => ({
        id: user.id,
        name: user.name ?? user.sortable_name,
        sortableName: user.sortable_name,
        sisUserId: user.sis_user_id
      })),
      currentPageNumber: query.page,
      maxPages: Math.max(result.pageCount, 1)
    };
  });
};

export default studentsFilterRoute;
