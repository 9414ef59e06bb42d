import { timingSafeEqual } from "node:crypto";

import CryptoJS from "crypto-js";

export type LaunchParams = Record<string, string>;

export interface LaunchContext {
  canvasUserId: number;
  canvasCourseId: number | null;
  isAdmin: boolean;
  nonce: string;
  consumerKey: string;
}

export type LaunchValidation =
  | { valid: true; launch: LaunchContext }
  | { valid: false; statusCode: number; message: string };

export interface LaunchCredentials {
  consumerKey: string;
  consumerSecret: string;
  launchUrl: string;
  maxAgeSeconds: number;
}

/** RFC 3986 percent-encoding, as OAuth 1.0a requires. */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function normalizeBaseUrl(url: URL): string {
  const protocol = url.protocol.toLowerCase();
  const host = url.hostname.toLowerCase();
  const isDefaultPort =
    url.port === "" ||
    (protocol === "http:" && url.port === "80") ||
    (protocol === "https:" && url.port === "443");

  return `${protocol}//${host}${isDefaultPort ? "" : `:${url.port}`}${url.pathname}`;
}

export function buildSignatureBaseString(
  method: string,
  launchUrl: string,
  params: LaunchParams
): string {
  const url = new URL(launchUrl);
  const pairs: Array<[string, string]> = [];

  url.searchParams.forEach((value, key) => {
    pairs.push([percentEncode(key), percentEncode(value)]);
  });

  for (const [key, value] of Object.entries(params)) {
    if (key === "oauth_signature") {
      continue;
    }

    pairs.push([percentEncode(key), percentEncode(value)]);
  }

  pairs.sort(([leftKey, leftValue], [rightKey, rightValue]) => {
    if (leftKey !== rightKey) {
      return leftKey < rightKey ? -1 : 1;
    }

    if (leftValue === rightValue) {
      return 0;
    }

    return leftValue < rightValue ? -1 : 1;
  });

  const parameterString = pairs.map(([key, value]) => `${key}=${value}`).join("&");

  return [
    method.toUpperCase(),
    percentEncode(normalizeBaseUrl(url)),
    percentEncode(parameterString)
  ].join("&");
}

export function signLaunch(
  method: string,
  launchUrl: string,
  params: LaunchParams,
  consumerSecret: string
): string {
  const baseString = buildSignatureBaseString(method, launchUrl, params);
  const signingKey = `${percentEncode(consumerSecret)}&`;

  return CryptoJS.HmacSHA1(baseString, signingKey).toString(CryptoJS.enc.Base64);
}

export function readRoles(params: LaunchParams): string {
  return params["ext_roles"] ?? params["roles"] ?? "";
}

export function signaturesMatch(received: string, expected: string): boolean {
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  if (a.length !== b.length) {
    return false;
  }

  return timingSafeEqual(a, b);
}

function readInteger(value: string | undefined): number | null {
  return value !== undefined && /^\d+$/.test(value.trim()) ? Number(value.trim()) : null;
}

/**
 * Checks an LTI 1.1 basic launch: role, consumer key, HMAC-SHA1 signature and
 * timestamp. Nonce reuse is checked by the caller against stored nonces.
 */
export function validateLaunch(
  params: LaunchParams,
  credentials: LaunchCredentials,
  now: Date = new Date()
): LaunchValidation {
  const roles = readRoles(params);
  if (!roles.includes("Administrator") && !roles.includes("Instructor")) {
    return { valid: false, statusCode: 403, message: "Must be an Administrator or Instructor" };
  }

  const consumerKey = params["oauth_consumer_key"];
  if (!consumerKey) {
    return { valid: false, statusCode: 401, message: "No consumer key" };
  }

  if (consumerKey !== credentials.consumerKey) {
    return { valid: false, statusCode: 401, message: "Consumer key wasn't recognized" };
  }

  const signatureMethod = params["oauth_signature_method"];
  const signature = params["oauth_signature"];
  const expected = signLaunch("POST", credentials.launchUrl, params, credentials.consumerSecret);

  if (signatureMethod !== "HMAC-SHA1" || !signature || !signaturesMatch(signature, expected)) {
    return { valid: false, statusCode: 401, message: "The OAuth signature was invalid" };
  }

  const timestamp = readInteger(params["oauth_timestamp"]);
  const nowSeconds = Math.floor(now.getTime() / 1000);
  if (timestamp === null || nowSeconds - timestamp > credentials.maxAgeSeconds) {
    return { valid: false, statusCode: 401, message: "Your request is too old." };
  }

  const canvasUserId = readInteger(params["custom_canvas_user_id"]);
  const nonce = params["oauth_nonce"];
  if (canvasUserId === null || !nonce) {
    return { valid: false, statusCode: 400, message: "Launch is missing the Canvas user" };
  }

  return {
    valid: true,
    launch: {
      canvasUserId,
      canvasCourseId: readInteger(params["custom_canvas_course_id"]),
      isAdmin: roles.includes("Administrator"),
      nonce,
      consumerKey
    }
  };
}
