import { describe, expect, it } from "vitest";

import {
  buildSignatureBaseString,
  percentEncode,
  signLaunch,
  signaturesMatch,
  validateLaunch,
  type LaunchParams
} from "../src/lib/lti.js";

const credentials = {
  consumerKey: "test-key",
  consumerSecret: "test-secret",
  launchUrl: "https://tool.test/launch",
  maxAgeSeconds: 3600
};

const now = new Date("2026-01-15T12:00:00Z");
const nowSeconds = String(Math.floor(now.getTime() / 1000));

function signedParams(overrides: LaunchParams = {}): LaunchParams {
  const params: LaunchParams = {
    oauth_consumer_key: "test-key",
    oauth_nonce: "nonce-1",
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: nowSeconds,
    oauth_version: "1.0",
    roles: "Instructor",
    custom_canvas_user_id: "42",
    custom_canvas_course_id: "7",
    lis_person_name_full: "Ada Instructor",
    ...overrides
  };

  return { ...params, oauth_signature: signLaunch("POST", credentials.launchUrl, params, "test-secret") };
}

describe("oauth signing", () => {
  it("percent-encodes the reserved characters encodeURIComponent leaves alone", () => {
    expect(percentEncode("a b!*'()~")).toBe("a%20b%21%2A%27%28%29~");
  });

  it("builds the signature base string from sorted, encoded parameters", () => {
    const baseString = buildSignatureBaseString("post", "https://tool.test/launch", {
      oauth_nonce: "abc",
      oauth_consumer_key: "key",
      b: "x y",
      oauth_signature: "ignored"
    });

    expect(baseString).toBe(
      "POST&https%3A%2F%2Ftool.test%2Flaunch&b%3Dx%2520y%26oauth_consumer_key%3Dkey%26oauth_nonce%3Dabc"
    );
  });

  it("signs query parameters and normalizes the launch url", () => {
    expect(buildSignatureBaseString("POST", "HTTPS://Tool.TEST:443/launch?z=1", { a: "2" })).toBe(
      "POST&https%3A%2F%2Ftool.test%2Flaunch&a%3D2%26z%3D1"
    );
  });

  it("changes the signature when any parameter changes", () => {
    const params = { oauth_nonce: "abc" };

    expect(signLaunch("POST", credentials.launchUrl, params, "test-secret")).toBe(
      signLaunch("POST", credentials.launchUrl, { ...params }, "test-secret")
    );
    expect(signLaunch("POST", credentials.launchUrl, params, "test-secret")).not.toBe(
      signLaunch("POST", credentials.launchUrl, { oauth_nonce: "abd" }, "test-secret")
    );
  });
});

describe("signaturesMatch", () => {
  it("compares signatures of any length", () => {
    expect(signaturesMatch("abc=", "abc=")).toBe(true);
    expect(signaturesMatch("abc=", "abd=")).toBe(false);
    expect(signaturesMatch("abc", "abc=")).toBe(false);
    expect(signaturesMatch("", "abc=")).toBe(false);
  });
});

describe("validateLaunch", () => {
  it("accepts a signed instructor launch", () => {
    expect(validateLaunch(signedParams(), credentials, now)).toEqual({
      valid: true,
      launch: {
        canvasUserId: 42,
        canvasCourseId: 7,
        isAdmin: false,
        nonce: "nonce-1",
        consumerKey: "test-key"
      }
    });
  });

  it("flags administrators from ext_roles", () => {
    const result = validateLaunch(
      signedParams({ ext_roles: "urn:lti:instrole:ims/lis/Administrator", roles: "Learner" }),
      credentials,
      now
    );

    expect(result.valid && result.launch.isAdmin).toBe(true);
  });

  it("rejects students", () => {
    expect(validateLaunch(signedParams({ roles: "Learner" }), credentials, now)).toEqual({
      valid: false,
      statusCode: 403,
      message: "Must be an Administrator or Instructor"
    });
  });

  it("rejects a missing or unknown consumer key", () => {
    const { oauth_consumer_key: _key, ...withoutKey } = signedParams();

    expect(validateLaunch(withoutKey, credentials, now)).toMatchObject({ statusCode: 401, message: "No consumer key" });
    expect(validateLaunch(signedParams({ oauth_consumer_key: "other-key" }), credentials, now)).toMatchObject({
      statusCode: 401,
      message: "Consumer key wasn't recognized"
    });
  });

  it("rejects a tampered launch", () => {
    const tampered = { ...signedParams(), custom_canvas_user_id: "43" };

    expect(validateLaunch(tampered, credentials, now)).toEqual({
      valid: false,
      statusCode: 401,
      message: "The OAuth signature was invalid"
    });
  });

  it("rejects a signature of the wrong length", () => {
    const params = signedParams();

    expect(validateLaunch({ ...params, oauth_signature: `${params.oauth_signature}=` }, credentials, now)).toEqual({
      valid: false,
      statusCode: 401,
      message: "The OAuth signature was invalid"
    });
  });

  it("rejects other signature methods", () => {
    expect(validateLaunch(signedParams({ oauth_signature_method: "PLAINTEXT" }), credentials, now)).toMatchObject({
      message: "The OAuth signature was invalid"
    });
  });

  it("rejects a stale timestamp", () => {
    const stale = String(Math.floor(now.getTime() / 1000) - 3601);

    expect(validateLaunch(signedParams({ oauth_timestamp: stale }), credentials, now)).toEqual({
      valid: false,
      statusCode: 401,
      message: "Your request is too old."
    });
  });

  it("needs the canvas user id", () => {
    expect(validateLaunch(signedParams({ custom_canvas_user_id: "" }), credentials, now)).toEqual({
      valid: false,
      statusCode: 400,
      message: "Launch is missing the Canvas user"
    });
  });

  it("leaves the course empty when canvas sends none", () => {
    const result = validateLaunch(signedParams({ custom_canvas_course_id: "" }), credentials, now);

    expect(result.valid && result.launch.canvasCourseId).toBeNull();
  });
});
