import Fastify, { type FastifyServerOptions } from "fastify";

import { CanvasClient } from "./lib/canvasClient.js";
import type { AppDatabase } from "./lib/db.js";
import type { AppConfig } from "./lib/env.js";
import { toHttpError } from "./lib/errors.js";
import authPlugin from "./plugins/auth.js";
import contextPlugin from "./plugins/context.js";
import cookiePlugin from "./plugins/cookies.js";
import formBodyPlugin from "./plugins/formBody.js";
import extensionsRefreshRoute from "./routes/extensions.refresh.js";
import extensionsUpdateRoute from "./routes/extensions.update.js";
import ltiConfigRoute from "./routes/lti.config.js";
import ltiLaunchRoute from "./routes/lti.launch.js";
import quizSelectRoute from "./routes/quiz.select.js";
import quizzesMissingRoute from "./routes/quizzes.missing.js";
import studentsFilterRoute from "./routes/students.filter.js";

export interface BuildAppOptions {
  config: AppConfig;
  db: AppDatabase;
  canvas?: CanvasClient;
  logger?: FastifyServerOptions["logger"];
  /** runs when the server closes, after in-flight requests finish */
  onClose?: () => void;
}

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: options.logger ?? true,
    ignoreTrailingSlash: true
  });

  const canvas =
    options.canvas ??
    new CanvasClient({
      apiUrl: options.config.CANVAS_API_URL,
      apiKey: options.config.CANVAS_API_KEY,
      maxPerPage: options.config.MAX_PER_PAGE,
      defaultPerPage: options.config.DEFAULT_PER_PAGE,
      log: app.log
    });

  if (options.onClose) {
    const onClose = options.onClose;
    app.addHook("onClose", async () => {
      onClose();
    });
  }

  app.setErrorHandler((error, request, reply) => {
    const mappedError = toHttpError(error);

    if (mappedError.statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
    }

    reply.code(mappedError.statusCode).send(mappedError.body);
  });

  await app.register(contextPlugin, { config: options.config, db: options.db, canvas });
  await app.register(formBodyPlugin);
  await app.register(cookiePlugin);
  await app.register(authPlugin);

  await app.register(ltiLaunchRoute);
  await app.register(ltiConfigRoute);
  await app.register(quizSelectRoute);
  await app.register(studentsFilterRoute);
  await app.register(extensionsUpdateRoute);
  await app.register(extensionsRefreshRoute);
  await app.register(quizzesMissingRoute);

  return app;
}
