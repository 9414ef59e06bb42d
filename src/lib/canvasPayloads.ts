import type { CanvasCourse, CanvasEnrollment, CanvasQuiz, CanvasUser } from "./types.js";

export const UNNAMED_COURSE = "<UNNAMED COURSE>";
export const MISSING_NAME = "<MISSING NAME>";
export const UNTITLED_QUIZ = "[UNTITLED QUIZ]";

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }

  return value as Record<string, unknown>;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function readInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }

  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }

  return undefined;
}

function readIdentifier(value: unknown): string | undefined {
  if (typeof value === "number") {
    return value.toString();
  }

  return readString(value);
}

export function toCanvasCourse(value: unknown): CanvasCourse | null {
  const record = asRecord(value);
  const id = readInteger(record?.["id"]);
  if (!record || id === undefined) {
    return null;
  }

  return {
    id,
    name: readString(record["name"]) ?? UNNAMED_COURSE,
    enrollment_term_id: readInteger(record["enrollment_term_id"]) ?? null
  };
}

export function toCanvasUser(value: unknown): CanvasUser | null {
  const record = asRecord(value);
  const id = readInteger(record?.["id"]);
  if (!record || id === undefined) {
    return null;
  }

  return {
    id,
    name: readString(record["name"]) ?? null,
    sortable_name: readString(record["sortable_name"]) ?? MISSING_NAME,
    sis_user_id: readIdentifier(record["sis_user_id"]) ?? null
  };
}

export function toCanvasQuiz(value: unknown): CanvasQuiz | null {
  const record = asRecord(value);
  const id = readInteger(record?.["id"]);
  if (!record || id === undefined) {
    return null;
  }

  const timeLimit = record["time_limit"];

  return {
    id,
    title: readString(record["title"]) ?? UNTITLED_QUIZ,
    time_limit: typeof timeLimit === "number" && Number.isFinite(timeLimit) ? timeLimit : null
  };
}

export function toCanvasEnrollment(value: unknown): CanvasEnrollment | null {
  const record = asRecord(value);
  const id = readInteger(record?.["id"]);
  const userId = readInteger(record?.["user_id"]);
  const type = readString(record?.["type"]);
  if (id === undefined || userId === undefined || type === undefined) {
    return null;
  }

  return { id, user_id: userId, type };
}

export function mapList<T>(data: unknown, mapItem: (value: unknown) => T | null): T[] {
  if (!Array.isArray(data)) {
    return [];
  }

  return data.map((item) => mapItem(item)).filter((item): item is T => item !== null);
}

/**
 * Splits an RFC 8288 `Link` header into a rel -> url map.
 */
export function parseLinkHeader(header: string | null): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) {
    return links;
  }

  for (const part of header.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
    if (match?.[1] && match[2]) {
      links[match[2].trim()] = match[1];
    }
  }

  return links;
}

export function readPageNumber(url: string | undefined): number | null {
  if (!url) {
    return null;
  }

  try {
    const page = new URL(url).searchParams.get("page");
    return page !== null && /^\d+$/.test(page) ? Number(page) : null;
  } catch {
    return null;
  }
}
