import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One row per Canvas course the tool has touched. Mirrors Canvas, which stays
 * the source of truth for names and terms.
 */
export const courses = sqliteTable(
  "courses",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    canvasId: integer("canvas_id").notNull(),
    courseName: text("course_name").notNull(),
    canvasTermId: integer("canvas_term_id"),
    createdAt: integer("created_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull()
  },
  (table) => ({
    canvasIdIdx: index("courses_canvas_id_idx").on(table.canvasId)
  })
);

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    canvasId: integer("canvas_id").notNull(),
    sortableName: text("sortable_name").notNull(),
    sisId: text("sis_id"),
    createdAt: integer("created_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull()
  },
  (table) => ({
    canvasIdIdx: index("users_canvas_id_idx").on(table.canvasId)
  })
);

export const quizzes = sqliteTable(
  "quizzes",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    canvasId: integer("canvas_id").notNull(),
    courseId: integer("course_id")
      .notNull()
      .references(() => courses.id),
    title: text("title").notNull().default(""),
    createdAt: integer("created_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull()
  },
  (table) => ({
    canvasIdIdx: index("quizzes_canvas_id_idx").on(table.canvasId),
    courseIdx: index("quizzes_course_id_idx").on(table.courseId)
  })
);

/**
 * A standing policy: the user gets `percent`% of the time limit on every quiz
 * in the course. Deactivated rather than deleted when Canvas loses the user.
 */
export const extensions = sqliteTable(
  "extensions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    courseId: integer("course_id")
      .notNull()
      .references(() => courses.id),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    percent: integer("percent").notNull().default(100),
    active: integer("active", { mode: "boolean" }).notNull().default(true),
    createdAt: integer("created_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull()
  },
  (table) => ({
    courseUserIdx: index("extensions_course_user_idx").on(table.courseId, table.userId)
  })
);

export const sessions = sqliteTable("sessions", {
  id: text("id").primaryKey(),
  canvasUserId: integer("canvas_user_id").notNull(),
  canvasCourseId: integer("canvas_course_id"),
  isAdmin: integer("is_admin", { mode: "boolean" }).notNull().default(false),
  launchParams: text("launch_params", { mode: "json" }).$type<Record<string, string>>(),
  expiresAt: integer("expires_at", { mode: "timestamp" }).notNull(),
  lastSeenAt: integer("last_seen_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull(),
  createdAt: integer("created_at", { mode: "timestamp" }).default(sql`(unixepoch())`).notNull()
});

export const ltiNonces = sqliteTable("lti_nonces", {
  nonce: text("nonce").primaryKey(),
  consumerKey: text("consumer_key").notNull(),
  usedAt: integer("used_at", { mode: "timestamp" }).notNull()
});

export type Course = typeof courses.$inferSelect;
export type User = typeof users.$inferSelect;
export type Quiz = typeof quizzes.$inferSelect;
export type Extension = typeof extensions.$inferSelect;
export type Session = typeof sessions.$inferSelect;
