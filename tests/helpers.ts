import pino from "pino";
import { vi } from "vitest";

import { CanvasClient } from "../src/lib/canvasClient.js";
import { openDatabase, type DatabaseHandle } from "../src/lib/db.js";
import type { AppConfig } from "../src/lib/env.js";
import type { ReconcileContext } from "../src/lib/reconcile.js";

export const CANVAS_API_URL = "https://canvas.test/api/v1";
const CANVAS_API_PATH = new URL(CANVAS_API_URL).pathname;

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    PORT: 8080,
    HOST: "127.0.0.1",
    DATABASE_URL: ":memory:",
    SESSION_SECRET: "test-secret-for-cookie-signing",
    SESSION_TTL_HOURS: 12,
    CANVAS_API_URL,
    CANVAS_API_KEY: "test-canvas-token",
    MAX_PER_PAGE: 100,
    DEFAULT_PER_PAGE: 10,
    LTI_KEY: "test-key",
    LTI_SECRET: "test-secret",
    LTI_LAUNCH_URL: "https://tool.test/launch",
    LTI_TOOL_ID: "quiz_extensions",
    LTI_TITLE: "Quiz Extensions",
    LTI_DOMAIN: "tool.test",
    LTI_MAX_AGE_SECONDS: 3600,
    ...overrides
  };
}

export function createTestDb(): DatabaseHandle {
  return openDatabase(":memory:");
}

export function createTestCanvas(): CanvasClient {
  return new CanvasClient({
    apiUrl: CANVAS_API_URL,
    apiKey: "test-canvas-token",
    maxPerPage: 100,
    defaultPerPage: 10
  });
}

export const silentLogger = pino({ level: "silent" });

export function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "content-type": "application/json", ...init.headers }
  });
}

export interface RecordedCall {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

type ResponseFactory = () => Response | Promise<Response>;

/**
 * In-process stand-in for the Canvas REST API. Responses are queued per
 * "METHOD /path" (path relative to the API root, query ignored); the last
 * queued response keeps answering once the others are used up. Anything
 * unrouted gets a Canvas-style 404.
 */
export class FakeCanvasApi {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, ResponseFactory[]>();

  readonly fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const method = (init?.method ?? "GET").toUpperCase();
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;

    this.calls.push({ method, url, headers: new Headers(init?.headers), body });

    const path = url.pathname.startsWith(CANVAS_API_PATH)
      ? url.pathname.slice(CANVAS_API_PATH.length)
      : url.pathname;
    const queue = this.routes.get(`${method} ${path}`);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (!next) {
      return jsonResponse({ errors: [{ message: "The specified resource does not exist." }] }, { status: 404 });
    }

    return next();
  });

  on(method: string, path: string, ...responses: ResponseFactory[]): this {
    const key = `${method} ${path}`;
    this.routes.set(key, [...(this.routes.get(key) ?? []), ...responses]);
    return this;
  }

  json(method: string, path: string, body: unknown, init?: { status?: number; headers?: Record<string, string> }): this {
    return this.on(method, path, () => jsonResponse(body, init));
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter(
      (call) => call.method === method && call.url.pathname === `${CANVAS_API_PATH}${path}`
    );
  }

  install(): void {
    vi.stubGlobal("fetch", this.fetch);
  }
}

export function createReconcileContext(handle: DatabaseHandle): ReconcileContext {
  return { db: handle.db, canvas: createTestCanvas(), log: silentLogger };
}
