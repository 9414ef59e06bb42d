import { asc, eq } from "drizzle-orm";
import { z } from "zod";

import { MISSING_NAME } from "./canvasPayloads.js";
import type { AppDatabase } from "./db.js";
import { courses, extensions, quizzes, users, type Extension } from "./tables.js";

export interface ReportOptions {
  /** canvas term ids whose courses are reported */
  terms: number[];
  /** count extensions at exactly 100% */
  includeFull: boolean;
  /** canvas user ids left out of the per-user breakdown */
  excludedUserIds: number[];
}

export interface CourseReportEntry {
  canvasId: number;
  courseName: string;
  quizCount: number;
  extensionCount: number;
  extensions: Array<{ percent: number; sortableName: string }>;
}

export interface FrequencyRow {
  extensionCount: number;
  total: number;
}

export interface ExtensionReport {
  courses: CourseReportEntry[];
  courseFrequencies: FrequencyRow[];
  userFrequencies: FrequencyRow[];
  largestCourse: { canvasId: number; courseName: string; size: number } | null;
  largestUser: { canvasId: number; sortableName: string; size: number } | null;
}

const idSchema = z.coerce.number().int().positive();

export function parseReportArgs(argv: string[]): ReportOptions {
  const options: ReportOptions = { terms: [], includeFull: false, excludedUserIds: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (arg === "--include-full") {
      options.includeFull = true;
      continue;
    }

    if (arg === "--term" || arg === "--exclude-user") {
      const value = idSchema.parse(argv[index + 1]);
      index += 1;
      if (arg === "--term") {
        options.terms.push(value);
      } else {
        options.excludedUserIds.push(value);
      }
      continue;
    }

    throw new Error(`unknown argument: ${arg}`);
  }

  if (options.terms.length === 0) {
    throw new Error("at least one --term is required");
  }

  return options;
}

function toFrequencyRows(counts: Map<number, number>): FrequencyRow[] {
  return [...counts.entries()]
    .sort(([left], [right]) => left - right)
    .map(([extensionCount, total]) => ({ extensionCount, total }));
}

function increment(counts: Map<number, number>, key: number): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function buildExtensionReport(db: AppDatabase, options: ReportOptions): ExtensionReport {
  const counts = (rows: Extension[]) =>
    options.includeFull ? rows : rows.filter((row) => row.percent !== 100);

  const courseEntries: CourseReportEntry[] = [];
  const courseFrequencies = new Map<number, number>();
  let largestCourse: ExtensionReport["largestCourse"] = null;

  const termCourses = db
    .select()
    .from(courses)
    .orderBy(asc(courses.id))
    .all()
    .filter((course) => course.canvasTermId !== null && options.terms.includes(course.canvasTermId));

  for (const course of termCourses) {
    const quizCount = db.select().from(quizzes).where(eq(quizzes.courseId, course.id)).all().length;
    const counted = counts(
      db.select().from(extensions).where(eq(extensions.courseId, course.id)).orderBy(asc(extensions.id)).all()
    );

    const entry: CourseReportEntry = {
      canvasId: course.canvasId,
      courseName: course.courseName,
      quizCount,
      extensionCount: counted.length,
      extensions: []
    };
    courseEntries.push(entry);

    if (counted.length === 0) {
      continue;
    }

    increment(courseFrequencies, counted.length);

    if (!largestCourse || counted.length > largestCourse.size) {
      largestCourse = { canvasId: course.canvasId, courseName: course.courseName, size: counted.length };
    }

    for (const extension of counted) {
      const user = db.select().from(users).where(eq(users.id, extension.userId)).get();
      entry.extensions.push({
        percent: extension.percent,
        sortableName: user?.sortableName ?? MISSING_NAME
      });
    }
  }

  const userFrequencies = new Map<number, number>();
  let largestUser: ExtensionReport["largestUser"] = null;

  const reportedUsers = db
    .select()
    .from(users)
    .orderBy(asc(users.id))
    .all()
    .filter((user) => !options.excludedUserIds.includes(user.canvasId));

  for (const user of reportedUsers) {
    const counted = counts(db.select().from(extensions).where(eq(extensions.userId, user.id)).all());
    if (counted.length === 0) {
      continue;
    }

    increment(userFrequencies, counted.length);

    if (!largestUser || counted.length > largestUser.size) {
      largestUser = { canvasId: user.canvasId, sortableName: user.sortableName, size: counted.length };
    }
  }

  return {
    courses: courseEntries,
    courseFrequencies: toFrequencyRows(courseFrequencies),
    userFrequencies: toFrequencyRows(userFrequencies),
    largestCourse,
    largestUser
  };
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function formatExtensionReport(report: ExtensionReport): string[] {
  const lines = ["Breakdown by course:", "", `Number of Courses: ${report.courses.length}`];

  for (const course of report.courses) {
    lines.push(`  - ${course.courseName} (${course.canvasId})`);
    lines.push(`    ${plural(course.quizCount, "quiz", "quizzes")}`);

    if (course.extensionCount === 0) {
      continue;
    }

    lines.push(`    ${plural(course.extensionCount, "extension", "extensions")}:`);
    for (const extension of course.extensions) {
      lines.push(`      - ${extension.percent}% ${extension.sortableName}`);
    }
  }

  lines.push("", "------------------", "", "Summary:", "");
  lines.push("Course extensions frequency distribution:");
  lines.push("Num Ext | Num Courses", "------- | -----------");
  for (const row of report.courseFrequencies) {
    lines.push(`${String(row.extensionCount).padEnd(8)}| ${row.total}`);
  }

  lines.push("Course with the most extensions:");
  lines.push(
    report.largestCourse
      ? `${report.largestCourse.courseName} with ${report.largestCourse.size} extensions`
      : "none"
  );

  lines.push("", "User extensions frequency distribution:");
  lines.push("Num Ext | Num Users", "------- | ---------");
  for (const row of report.userFrequencies) {
    lines.push(`${String(row.extensionCount).padEnd(8)}| ${row.total}`);
  }

  lines.push("User with the most extensions:");
  lines.push(
    report.largestUser
      ? `${report.largestUser.sortableName} with ${report.largestUser.size} extensions`
      : "none"
  );

  return lines;
}
