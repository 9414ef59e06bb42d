import "dotenv/config";

import pino from "pino";

import { CanvasClient } from "../lib/canvasClient.js";
import { openDatabase } from "../lib/db.js";
import { readEnv } from "../lib/env.js";
import { isCanvasNotFound } from "../lib/errors.js";
import { setCourseTerm } from "../lib/store.js";
import { courses } from "../lib/tables.js";

const log = pino({ name: "add-term" });

async function main(): Promise<void> {
  const config = readEnv();
  const { db, close } = openDatabase(config.DATABASE_URL);
  const canvas = new CanvasClient({
    apiUrl: config.CANVAS_API_URL,
    apiKey: config.CANVAS_API_KEY,
    maxPerPage: config.MAX_PER_PAGE,
    defaultPerPage: config.DEFAULT_PER_PAGE,
    log
  });

  try {
    const stored = db.select().from(courses).all();
    log.info({ count: stored.length }, "updating course terms");

    for (const course of stored) {
      try {
        const canvasCourse = await canvas.getCourse(course.canvasId);
        setCourseTerm(db, course.id, canvasCourse.enrollment_term_id);
        log.info(
          { canvasId: course.canvasId, termId: canvasCourse.enrollment_term_id },
          "course term updated"
        );
      } catch (error) {
        if (!isCanvasNotFound(error)) {
          throw error;
        }

        setCourseTerm(db, course.id, null);
        log.warn({ canvasId: course.canvasId }, "course not found in canvas");
      }
    }
  } finally {
    close();
  }
}

try {
  await main();
} catch (error) {
  log.error({ err: error }, "add-term failed");
  process.exitCode = 1;
}
