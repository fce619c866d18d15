import { Buffer } from "node:buffer";
import assert from "node:assert/strict";
import test from "node:test";
import pino from "pino";
import { AUTH_USER_HEADER, encodeAuthUser, resolveAuthUser } from "./auth-context";

const silent = pino({ level: "silent" });

const encodeJson = (value: unknown) => Buffer.from(JSON.stringify(value), "utf8").toString("base64url");

test("resolveAuthUser decodes the forwarded user", () => {
  const header = encodeAuthUser({ id: "user-1", username: "ada", isStaff: true });

  assert.deepEqual(resolveAuthUser({ [AUTH_USER_HEADER]: header }, silent), {
    id: "user-1",
    username: "ada",
    isStaff: true
  });
});

test("resolveAuthUser defaults isStaff to false and trims identifiers", () => {
  const header = encodeJson({ id: " user-2 ", username: "bo" });

  assert.deepEqual(resolveAuthUser({ [AUTH_USER_HEADER]: header }, silent), {
    id: "user-2",
    username: "bo",
    isStaff: false
  });
});

test("resolveAuthUser returns null for missing or malformed headers", () => {
  assert.equal(resolveAuthUser({}, silent), null);
  assert.equal(resolveAuthUser({ [AUTH_USER_HEADER]: "" }, silent), null);
  assert.equal(resolveAuthUser({ [AUTH_USER_HEADER]: "not base64 json" }, silent), null);
  assert.equal(resolveAuthUser({ [AUTH_USER_HEADER]: encodeJson({ username: "no-id" }) }, silent), null);
  assert.equal(resolveAuthUser({ [AUTH_USER_HEADER]: encodeJson({ id: "x", username: "y", isStaff: "yes" }) }, silent), null);
});
