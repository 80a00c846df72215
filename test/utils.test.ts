import assert from "node:assert/strict";
import test from "node:test";
import { AxiosError } from "axios";

import {
  clampInt,
  cleanText,
  deduplicateUrls,
  formatDuration,
  getErrorMessage,
  getErrorStatus,
  isTimeoutError,
  runInBatches,
  toAbsoluteUrl,
} from "../src/core/utils";
import { createConsoleLogger, parseLogLevel } from "../src/core/logger";

test("deduplicateUrls ignores a trailing slash and keeps first occurrence", () => {
  assert.deepEqual(
    deduplicateUrls(["https://a.com/x", "https://a.com/x/", "https://a.com/y", "https://a.com/x"]),
    ["https://a.com/x", "https://a.com/y"]
  );
});

test("cleanText collapses whitespace", () => {
  assert.equal(cleanText("  Stoneware \n\t Mug  "), "Stoneware Mug");
});

test("toAbsoluteUrl resolves relative links and rejects non-http ones", () => {
  assert.equal(
    toAbsoluteUrl("/pages/about", "https://demo.myshopify.com"),
    "https://demo.myshopify.com/pages/about"
  );
  assert.equal(
    toAbsoluteUrl("//cdn.shopify.com/a.jpg", "https://demo.myshopify.com"),
    "https://cdn.shopify.com/a.jpg"
  );
  assert.equal(toAbsoluteUrl("#top", "https://demo.myshopify.com"), null);
  assert.equal(toAbsoluteUrl("mailto:hi@demo.com", "https://demo.myshopify.com"), null);
  assert.equal(toAbsoluteUrl(undefined, "https://demo.myshopify.com"), null);
});

test("clampInt falls back on garbage and clamps into range", () => {
  assert.equal(clampInt("50", 3, 1, 10), 10);
  assert.equal(clampInt("0", 3, 1, 10), 1);
  assert.equal(clampInt("7.9", 3, 1, 10), 7);
  assert.equal(clampInt("abc", 3, 1, 10), 3);
  assert.equal(clampInt(undefined, 3, 1, 10), 3);
  assert.equal(clampInt(250, 500, 0, 60_000), 250);
});

test("formatDuration prints minutes only when needed", () => {
  assert.equal(formatDuration(5_400), "5s");
  assert.equal(formatDuration(65_000), "1m 5s");
});

test("getErrorMessage maps axios failures to readable text", () => {
  const message = (text: string, code: string) =>
    getErrorMessage(new AxiosError(text, code));

  assert.equal(message("timeout of 10ms exceeded", "ECONNABORTED"), "Request timed out");
  assert.equal(
    message("getaddrinfo ENOTFOUND", "ENOTFOUND"),
    "DNS lookup failed: unknown host"
  );
  assert.equal(message("connect ECONNREFUSED", "ECONNREFUSED"), "Connection refused");
  assert.equal(getErrorMessage(new Error("boom")), "boom");
  assert.equal(getErrorMessage("plain"), "plain");
});

test("isTimeoutError recognizes abort-signal timeouts", () => {
  const err = new Error("The operation was aborted due to timeout");
  err.name = "TimeoutError";
  assert.equal(isTimeoutError(err), true);
  assert.equal(isTimeoutError(new Error("nope")), false);
  assert.equal(getErrorStatus(new Error("nope")), null);
});

test("runInBatches keeps input order and reports every item", async () => {
  const progress: string[] = [];
  const results = await runInBatches(
    [1, 2, 3],
    2,
    0,
    async (n) => n * 2,
    (completed, total, item) => progress.push(`${completed}/${total}:${item}`)
  );

  assert.deepEqual(results, [2, 4, 6]);
  assert.equal(progress.length, 3);
  assert.equal(progress[2], "3/3:3");
});

test("parseLogLevel defaults to info", () => {
  assert.equal(parseLogLevel("DEBUG"), "debug");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});

test("console logger drops messages below its level", (t) => {
  const logged = t.mock.method(console, "log", () => undefined);
  const warned = t.mock.method(console, "warn", () => undefined);
  const logger = createConsoleLogger("warn");

  logger("info", "hidden");
  logger("warn", "shown");

  assert.equal(logged.mock.callCount(), 0);
  assert.equal(warned.mock.callCount(), 1);
  assert.deepEqual(warned.mock.calls[0].arguments, ["[insights] shown"]);
});
