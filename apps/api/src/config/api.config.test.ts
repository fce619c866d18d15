import assert from "node:assert/strict";
import test from "node:test";
import { loadApiConfig, parseIntEnv, parseOriginList } from "./api.config";

test("loadApiConfig falls back to defaults for an empty environment", () => {
  assert.deepEqual(loadApiConfig({}), {
    port: 4000,
    host: "0.0.0.0",
    mongodbUri: "mongodb://localhost:27017/runfund",
    allowedOrigins: [],
    hstsMaxAgeSeconds: 31_536_000,
    referrerPolicy: "strict-origin-when-cross-origin",
    leaderboardSize: 10
  });
});

test("loadApiConfig reads overrides and clamps numeric values", () => {
  const config = loadApiConfig({
    PORT: "8080",
    HOST: " 127.0.0.1 ",
    MONGODB_URI: "mongodb://db:27017/runfund-test",
    ALLOWED_ORIGINS: "https://app.example.com",
    HSTS_MAX_AGE: "-5",
    REFERRER_POLICY: " same-origin ",
    LEADERBOARD_SIZE: "0"
  });

  assert.equal(config.port, 8080);
  assert.equal(config.host, "127.0.0.1");
  assert.equal(config.mongodbUri, "mongodb://db:27017/runfund-test");
  assert.deepEqual(config.allowedOrigins, ["https://app.example.com"]);
  assert.equal(config.hstsMaxAgeSeconds, 0);
  assert.equal(config.referrerPolicy, "same-origin");
  assert.equal(config.leaderboardSize, 1);
});

test("parseIntEnv ignores values that are not integers", () => {
  assert.equal(parseIntEnv("abc", 7), 7);
  assert.equal(parseIntEnv(undefined, 7), 7);
  assert.equal(parseIntEnv("-3", 7, 0), 0);
  assert.equal(parseIntEnv("12px", 7), 12);
});

test("loadApiConfig keeps the default referrer policy when the value is unknown", () => {
  assert.equal(loadApiConfig({ REFERRER_POLICY: "everywhere" }).referrerPolicy, "strict-origin-when-cross-origin");
});

test("parseOriginList normalizes origins, drops blanks and duplicates", () => {
  assert.deepEqual(parseOriginList("https://app.runfund.test/path?q=1, ,https://app.runfund.test,not a url"), [
    "https://app.runfund.test",
    "not a url"
  ]);
  assert.deepEqual(parseOriginList(undefined), []);
});
