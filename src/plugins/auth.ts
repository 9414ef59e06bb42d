import type { FastifyPluginAsync, FastifyReply } from "fastify";
import fp from "fastify-plugin";

import { deleteSession, findSession, touchSession } from "../lib/sessionStore.js";
import type { Session } from "../lib/tables.js";
import { SESSION_COOKIE_NAME } from "../lib/types.js";

export interface AuthContext {
  session: Session;
}

declare module "fastify" {
  interface FastifyRequest {
    auth: AuthContext | null;
  }
}

export function clearSessionCookie(reply: FastifyReply): void {
  reply.clearCookie(SESSION_COOKIE_NAME, { path: "/" });
}

const authPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest("auth", null);

  fastify.addHook("preHandler", async (request, reply) => {
    request.auth = null;

    const signedSessionCookie = request.cookies[SESSION_COOKIE_NAME];
    if (!signedSessionCookie) {
      return;
    }

    const unsignedCookie = request.unsignCookie(signedSessionCookie);
    if (!unsignedCookie.valid || !unsignedCookie.value) {
      clearSessionCookie(reply);
      return;
    }

    const session = findSession(fastify.db, unsignedCookie.value);
    if (!session) {
      return;
    }

    if (session.expiresAt.getTime() <= Date.now()) {
      deleteSession(fastify.db, session.id);
      clearSessionCookie(reply);
      return;
    }

    request.auth = { session };
    touchSession(fastify.db, session.id);
  });
};

export default fp(authPlugin);
