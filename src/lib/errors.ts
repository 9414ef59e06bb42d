import { ZodError } from "zod";

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly publicMessage: string;

  constructor(statusCode: number, publicMessage: string, code = "app_error") {
    super(publicMessage);
    this.statusCode = statusCode;
    this.code = code;
    this.publicMessage = publicMessage;
  }
}

/**
 * A direct Canvas resource request that came back with a non-2xx status.
 * `canvasStatus` keeps the status Canvas sent; `statusCode` is what we answer with.
 */
export class CanvasApiError extends AppError {
  readonly canvasStatus: number;

  constructor(canvasStatus: number, publicMessage: string, code = "canvas_request_failed") {
    super(canvasStatus === 404 ? 404 : 502, publicMessage, code);
    this.canvasStatus = canvasStatus;
  }

  isNotFound(): boolean {
    return this.canvasStatus === 404;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isCanvasNotFound(error: unknown): error is CanvasApiError {
  return error instanceof CanvasApiError && error.isNotFound();
}

function readStatusCode(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return null;
  }

  return typeof error.statusCode === "number" ? error.statusCode : null;
}

export function toHttpError(error: unknown): {
  statusCode: number;
  body: { error: string; message: string };
} {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: "invalid_request",
        message: error.issues[0]?.message ?? "invalid request payload"
      }
    };
  }

  if (isAppError(error)) {
    return {
      statusCode: error.statusCode,
      body: {
        error: error.code,
        message: error.publicMessage
      }
    };
  }

  // framework errors (unparseable or empty bodies, unsupported media types)
  const frameworkStatus = readStatusCode(error);
  if (frameworkStatus !== null && frameworkStatus >= 400 && frameworkStatus < 500) {
    return {
      statusCode: frameworkStatus,
      body: {
        error: "invalid_request",
        message: "invalid request"
      }
    };
  }

  return {
    statusCode: 500,
    body: {
      error: "internal_error",
      message: "unexpected server error"
    }
  };
}
