import cookie from "@fastify/cookie";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

const cookiePlugin: FastifyPluginAsync = async (fastify) => {
  await fastify.register(cookie, {
    secret: fastify.config.SESSION_SECRET,
    hook: "onRequest"
  });
};

export default fp(cookiePlugin);
