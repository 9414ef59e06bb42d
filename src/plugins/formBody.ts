import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

// LTI launches arrive as url-encoded form posts; repeated fields keep the last value.
const formBodyPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.addContentTypeParser<string>(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    (_request, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(body)));
    }
  );
};

export default fp(formBodyPlugin);
