import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DatabaseHandle } from "../src/lib/db.js";
import {
  buildExtensionReport,
  formatExtensionReport,
  parseReportArgs
} from "../src/lib/reports.js";
import { upsertCourse, upsertExtension, upsertQuiz, upsertUser } from "../src/lib/store.js";
import { createTestDb } from "./helpers.js";

describe("extension report", () => {
  let handle: DatabaseHandle;

  beforeEach(() => {
    handle = createTestDb();
    const { db } = handle;

    const courseA = upsertCourse(db, { canvasId: 1, courseName: "Course A", canvasTermId: 10 });
    const courseB = upsertCourse(db, { canvasId: 2, courseName: "Course B", canvasTermId: 10 });
    const courseC = upsertCourse(db, { canvasId: 3, courseName: "Course C", canvasTermId: 11 });
    const jane = upsertUser(db, { canvasId: 100, sortableName: "Doe, Jane", sisId: null });
    const rick = upsertUser(db, { canvasId: 101, sortableName: "Roe, Rick", sisId: null });

    upsertQuiz(db, { canvasId: 900, courseId: courseA.id, title: "Quiz 1" });
    upsertQuiz(db, { canvasId: 901, courseId: courseA.id, title: "Quiz 2" });

    upsertExtension(db, { courseId: courseA.id, userId: jane.id, percent: 150 });
    upsertExtension(db, { courseId: courseA.id, userId: rick.id, percent: 100 });
    upsertExtension(db, { courseId: courseB.id, userId: jane.id, percent: 200 });
    upsertExtension(db, { courseId: courseC.id, userId: rick.id, percent: 300 });
  });

  afterEach(() => {
    handle.close();
  });

  it("skips full-time extensions by default", () => {
    const report = buildExtensionReport(handle.db, { terms: [10], includeFull: false, excludedUserIds: [] });

    expect(report.courses).toEqual([
      {
        canvasId: 1,
        courseName: "Course A",
        quizCount: 2,
        extensionCount: 1,
        extensions: [{ percent: 150, sortableName: "Doe, Jane" }]
      },
      {
        canvasId: 2,
        courseName: "Course B",
        quizCount: 0,
        extensionCount: 1,
        extensions: [{ percent: 200, sortableName: "Doe, Jane" }]
      }
    ]);
    expect(report.courseFrequencies).toEqual([{ extensionCount: 1, total: 2 }]);
    expect(report.largestCourse).toEqual({ canvasId: 1, courseName: "Course A", size: 1 });
    expect(report.userFrequencies).toEqual([
      { extensionCount: 1, total: 1 },
      { extensionCount: 2, total: 1 }
    ]);
    expect(report.largestUser).toEqual({ canvasId: 100, sortableName: "Doe, Jane", size: 2 });
  });

  it("counts full-time extensions and leaves out excluded users on request", () => {
    const report = buildExtensionReport(handle.db, { terms: [10], includeFull: true, excludedUserIds: [100] });

    expect(report.courses.map((course) => course.extensionCount)).toEqual([2, 1]);
    expect(report.largestCourse).toEqual({ canvasId: 1, courseName: "Course A", size: 2 });
    expect(report.userFrequencies).toEqual([{ extensionCount: 2, total: 1 }]);
    expect(report.largestUser).toEqual({ canvasId: 101, sortableName: "Roe, Rick", size: 2 });
  });

  it("renders the breakdown", () => {
    const lines = formatExtensionReport(
      buildExtensionReport(handle.db, { terms: [10], includeFull: false, excludedUserIds: [] })
    );

    expect(lines.slice(0, 8)).toEqual([
      "Breakdown by course:",
      "",
      "Number of Courses: 2",
      "  - Course A (1)",
      "    2 quizzes",
      "    1 extension:",
      "      - 150% Doe, Jane",
      "  - Course B (2)"
    ]);
    expect(lines).toContain("1       | 2");
    expect(lines).toContain("Course A with 1 extensions");
    expect(lines).toContain("Doe, Jane with 2 extensions");
  });
});

describe("parseReportArgs", () => {
  it("reads terms, flags and exclusions", () => {
    expect(
      parseReportArgs(["--term", "10", "--term", "11", "--include-full", "--exclude-user", "100"])
    ).toEqual({ terms: [10, 11], includeFull: true, excludedUserIds: [100] });
  });

  it("needs a term", () => {
    expect(() => parseReportArgs(["--include-full"])).toThrow("at least one --term is required");
  });

  it("rejects unknown arguments", () => {
    expect(() => parseReportArgs(["--term", "10", "--verbose"])).toThrow("unknown argument: --verbose");
  });
});
