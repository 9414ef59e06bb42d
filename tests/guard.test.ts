import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { checkValidUser, requireCourseAccess } from "../src/lib/guard.js";
import type { Session } from "../src/lib/tables.js";
import { createTestCanvas, FakeCanvasApi } from "./helpers.js";

function buildSession(overrides: Partial<Session> = {}): Session {
  return {
    id: "session-1",
    canvasUserId: 42,
    canvasCourseId: 7,
    isAdmin: false,
    launchParams: null,
    expiresAt: new Date("2030-01-01T00:00:00Z"),
    lastSeenAt: new Date("2026-01-15T12:00:00Z"),
    createdAt: new Date("2026-01-15T12:00:00Z"),
    ...overrides
  };
}

describe("course access", () => {
  let api: FakeCanvasApi;

  beforeEach(() => {
    api = new FakeCanvasApi();
    api.install();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("turns away requests without a launch", async () => {
    await expect(checkValidUser(createTestCanvas(), null, 7)).resolves.toEqual({
      allowed: false,
      reason: "Not allowed!"
    });
  });

  it("needs a course id", async () => {
    await expect(checkValidUser(createTestCanvas(), buildSession(), null)).resolves.toEqual({
      allowed: false,
      reason: "No course_id provided."
    });
  });

  it("lets administrators in without asking canvas", async () => {
    await expect(checkValidUser(createTestCanvas(), buildSession({ isAdmin: true }), 7)).resolves.toEqual({
      allowed: true,
      courseId: 7
    });
    expect(api.calls).toHaveLength(0);
  });

  it("lets course staff in", async () => {
    api.json("GET", "/courses/7/enrollments", [{ id: 1, user_id: 42, type: "TaEnrollment" }]);

    await expect(checkValidUser(createTestCanvas(), buildSession(), 7)).resolves.toEqual({
      allowed: true,
      courseId: 7
    });
  });

  it("turns away instructors of other courses", async () => {
    api.json("GET", "/courses/7/enrollments", []);

    await expect(checkValidUser(createTestCanvas(), buildSession(), 7)).resolves.toEqual({
      allowed: false,
      reason: "You are not enrolled in this course as a Teacher, TA, or Designer."
    });
  });

  describe("requireCourseAccess", () => {
    it("answers 401 without a session", async () => {
      await expect(requireCourseAccess(createTestCanvas(), null, { courseId: "7" })).rejects.toMatchObject({
        statusCode: 401,
        code: "unauthorized",
        message: "Not allowed!"
      });
    });

    it("answers 403 for a non-numeric course", async () => {
      await expect(requireCourseAccess(createTestCanvas(), buildSession(), { courseId: "abc" })).rejects.toMatchObject({
        statusCode: 403,
        code: "forbidden",
        message: "No course_id provided."
      });
    });

    it("returns the parsed course id", async () => {
      await expect(
        requireCourseAccess(createTestCanvas(), buildSession({ isAdmin: true }), { courseId: "7" })
      ).resolves.toBe(7);
    });
  });
});
