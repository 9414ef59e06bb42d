import type { FastifyPluginAsync } from "fastify";

import { AppError } from "../lib/errors.js";
import { validateLaunch } from "../lib/lti.js";
import { claimNonce, createSession } from "../lib/sessionStore.js";
import { SESSION_COOKIE_NAME } from "../lib/types.js";
import { launchBodySchema } from "../schema.js";

const ltiLaunchRoute: FastifyPluginAsync = async (fastify) => {
  fastify.get("/", async () => "Please contact your System Administrator.");

  fastify.post("/launch", async (request, reply) => {
    const params = launchBodySchema.parse(request.body ?? {});
    const { config, db } = fastify;

    const validation = validateLaunch(params, {
      consumerKey: config.LTI_KEY,
      consumerSecret: config.LTI_SECRET,
      launchUrl: config.LTI_LAUNCH_URL,
      maxAgeSeconds: config.LTI_MAX_AGE_SECONDS
    });

    if (!validation.valid) {
      request.log.info({ reason: validation.message }, "lti launch rejected");
      throw new AppError(validation.statusCode, validation.message, "launch_rejected");
    }

    const { launch } = validation;

    const fresh = claimNonce(db, {
      nonce: launch.nonce,
      consumerKey: launch.consumerKey,
      windowSeconds: config.LTI_MAX_AGE_SECONDS
    });
    if (!fresh) {
      throw new AppError(401, "Why are you reusing the nonce?", "launch_rejected");
    }

    if (launch.canvasCourseId === null) {
      throw new AppError(400, "No course_id provided.", "launch_rejected");
    }

    const { oauth_signature: _signature, ...launchParams } = params;
    const session = createSession(db, launch, launchParams, config.SESSION_TTL_HOURS);

    // the tool runs inside a canvas iframe, so the cookie has to be cross-site
    reply.setCookie(SESSION_COOKIE_NAME, session.id, {
      path: "/",
      httpOnly: true,
      secure: true,
      sameSite: "none",
      signed: true,
      expires: session.expiresAt
    });

    request.log.info(
      { canvasUserId: launch.canvasUserId, courseId: launch.canvasCourseId, isAdmin: launch.isAdmin },
      "lti launch accepted"
    );

    return reply.redirect(`/quiz/${launch.canvasCourseId}`);
  });
};

export default ltiLaunchRoute;
