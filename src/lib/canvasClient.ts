import type { BaseLogger } from "pino";

import {
  mapList,
  parseLinkHeader,
  readPageNumber,
  toCanvasCourse,
  toCanvasEnrollment,
  toCanvasQuiz,
  toCanvasUser
} from "./canvasPayloads.js";
import { AppError, CanvasApiError } from "./errors.js";
import {
  STAFF_ENROLLMENT_TYPES,
  type CanvasCourse,
  type CanvasEnrollment,
  type CanvasQuiz,
  type CanvasUser,
  type QuizExtension,
  type UserSearchPage
} from "./types.js";

const DEFAULT_CANVAS_TIMEOUT_MS = 30000;
const MAX_PAGES = 100;

export interface CanvasClientOptions {
  apiUrl: string;
  apiKey: string;
  maxPerPage: number;
  defaultPerPage: number;
  timeoutMs?: number;
  log?: BaseLogger;
}

export interface SearchUsersOptions {
  page?: number;
  perPage?: number;
  searchTerm?: string;
}

interface SendInit {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

export class CanvasClient {
  private readonly apiUrl: string;
  private readonly apiOrigin: string;
  private readonly apiKey: string;
  private readonly maxPerPage: number;
  private readonly defaultPerPage: number;
  private readonly timeoutMs: number;
  private readonly log: BaseLogger | undefined;

  constructor(options: CanvasClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/$/, "");
    this.apiOrigin = new URL(this.apiUrl).origin;
    this.apiKey = options.apiKey;
    this.maxPerPage = options.maxPerPage;
    this.defaultPerPage = options.defaultPerPage;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CANVAS_TIMEOUT_MS;
    this.log = options.log;
  }

  async getCourse(courseId: number): Promise<CanvasCourse> {
    const body = await this.getResource(`/courses/${courseId}`, `course #${courseId}`);
    const course = toCanvasCourse(body);
    if (!course) {
      throw new AppError(502, "canvas returned an invalid course", "canvas_invalid_response");
    }

    return course;
  }

  async getUser(courseId: number, userId: number): Promise<CanvasUser> {
    const body = await this.getResource(
      `/courses/${courseId}/users/${userId}`,
      `user #${userId}`
    );
    const user = toCanvasUser(body);
    if (!user) {
      throw new AppError(502, "canvas returned an invalid user", "canvas_invalid_response");
    }

    return user;
  }

  /**
   * Every quiz in the course, following `rel="next"` links. A 404 or an
   * error object in place of a list ends the walk with what was collected.
   */
  async listQuizzes(courseId: number): Promise<CanvasQuiz[]> {
    const quizzes: CanvasQuiz[] = [];
    let url: string | null = this.buildUrl(`/courses/${courseId}/quizzes`, {
      per_page: this.maxPerPage
    });
    let pageCount = 0;

    while (url) {
      if (++pageCount > MAX_PAGES) {
        this.log?.warn({ courseId }, "quiz pagination limit reached");
        break;
      }

      const response = await this.send(url, { method: "GET" });
      const body = await readJson(response);

      if (!response.ok || !Array.isArray(body)) {
        this.log?.warn(
          { courseId, status: response.status },
          "quiz list returned no results"
        );
        break;
      }

      quizzes.push(...mapList(body, toCanvasQuiz));
      url = this.followable(parseLinkHeader(response.headers.get("link"))["next"]);
    }

    return quizzes;
  }

  async searchUsers(courseId: number, options: SearchUsersOptions = {}): Promise<UserSearchPage> {
    const searchTerm = options.searchTerm?.trim();
    const url = this.buildUrl(`/courses/${courseId}/search_users`, {
      per_page: options.perPage ?? this.defaultPerPage,
      page: options.page ?? 1,
      enrollment_type: "student",
      // canvas rejects search terms shorter than two characters
      search_term: searchTerm && searchTerm.length > 1 ? searchTerm : undefined
    });

    const response = await this.send(url, { method: "GET" });
    const body = await readJson(response);

    if (!response.ok || !Array.isArray(body)) {
      return { users: [], pageCount: 0 };
    }

    const links = parseLinkHeader(response.headers.get("link"));

    return {
      users: mapList(body, toCanvasUser),
      pageCount: readPageNumber(links["last"]) ?? 0
    };
  }

  /**
   * Posts the extension batch for one quiz and returns the status Canvas answered with.
   */
  async createQuizExtensions(
    courseId: number,
    quizId: number,
    extensions: QuizExtension[]
  ): Promise<number> {
    const response = await this.send(
      this.buildUrl(`/courses/${courseId}/quizzes/${quizId}/extensions`),
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ quiz_extensions: extensions })
      }
    );

    await response.text();
    return response.status;
  }

  async listStaffEnrollments(courseId: number, userId: number): Promise<CanvasEnrollment[]> {
    const url = this.buildUrl(`/courses/${courseId}/enrollments`, {
      user_id: userId,
      "type[]": [...STAFF_ENROLLMENT_TYPES]
    });

    const response = await this.send(url, { method: "GET" });
    const body = await readJson(response);

    if (!response.ok) {
      return [];
    }

    return mapList(body, toCanvasEnrollment);
  }

  private async getResource(path: string, label: string): Promise<unknown> {
    const response = await this.send(this.buildUrl(path), { method: "GET" });
    const body = await readJson(response);

    if (!response.ok) {
      throw new CanvasApiError(
        response.status,
        response.status === 404
          ? `${label} not found in canvas`
          : `canvas request for ${label} failed with status ${response.status}`,
        response.status === 404 ? "canvas_not_found" : "canvas_request_failed"
      );
    }

    return body;
  }

  private buildUrl(
    path: string,
    query: Record<string, string | number | string[] | undefined> = {}
  ): string {
    const url = new URL(`${this.apiUrl}${path}`);

    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) {
        continue;
      }

      if (Array.isArray(value)) {
        value.forEach((item) => url.searchParams.append(key, item));
      } else {
        url.searchParams.set(key, String(value));
      }
    }

    return url.toString();
  }

  private followable(url: string | undefined): string | null {
    if (!url) {
      return null;
    }

    try {
      if (new URL(url).origin === this.apiOrigin) {
        return url;
      }
    } catch {
      return null;
    }

    this.log?.warn({ url }, "pagination link points outside the canvas instance");
    return null;
  }

  private async send(url: string, init: SendInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        ...init,
        headers: {
          ...init.headers,
          authorization: `Bearer ${this.apiKey}`
        },
        signal: controller.signal
      });
    } catch (error) {
      this.log?.error({ err: error, url }, "canvas request failed");
      throw new AppError(502, "canvas unavailable", "canvas_unavailable");
    } finally {
      clearTimeout(timeout);
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return null;
  }

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}
