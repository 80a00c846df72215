import assert from "node:assert/strict";
import test from "node:test";
import request from "supertest";

import { createApp, toErrorResponse } from "../src/app";
import { FetchError, ScrapeFailure, ValidationError } from "../src/errors";
import { demoStoreRoutes, FixtureFetcher, ThrowingFetcher } from "./helpers";

function appWith(fetcher: FixtureFetcher) {
  return createApp({ fetcher });
}

test("GET /api/health reports healthy", async () => {
  const res = await request(appWith(new FixtureFetcher())).get("/api/health");

  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { status: "healthy", service: "storefront-insights" });
});

test("POST /fetch_insights returns the extraction result", async () => {
  const res = await request(appWith(new FixtureFetcher(demoStoreRoutes())))
    .post("/fetch_insights")
    .send({ website_url: "demo.myshopify.com" });

  assert.equal(res.status, 200);
  assert.equal(res.body.store_name, "Demo Store");
  assert.equal(res.body.products.length, 3);
  assert.deepEqual(res.body.policies, { privacy: "Privacy Policy\nWe respect your privacy." });
});

test("a missing website_url is a 400", async () => {
  const fetcher = new FixtureFetcher();
  const res = await request(appWith(fetcher)).post("/fetch_insights").send({});

  assert.equal(res.status, 400);
  assert.deepEqual(res.body, {
    error: "validation_error",
    message: "Missing website_url parameter",
  });
  assert.equal(fetcher.calls.length, 0);
});

test("an unusable website_url is a 400 from validation", async () => {
  const res = await request(appWith(new FixtureFetcher()))
    .post("/fetch_insights")
    .send({ website_url: "intranet" });

  assert.equal(res.status, 400);
  assert.deepEqual(res.body, {
    error: "validation_error",
    message: "URL has no valid host: intranet",
  });
});

test("an unreachable store is a 502", async () => {
  const res = await request(appWith(new FixtureFetcher()))
    .post("/fetch_insights")
    .send({ website_url: "https://down.example.com" });

  assert.equal(res.status, 502);
  assert.deepEqual(res.body, {
    error: "website_not_accessible",
    message: "Website not accessible: https://down.example.com/ (HTTP 404: Not Found)",
  });
});

test("an unexpected error is a 500", async () => {
  const fetcher = new ThrowingFetcher({}, /down\.example\.com/, "socket exploded");
  const res = await request(appWith(fetcher))
    .post("/fetch_insights")
    .send({ website_url: "down.example.com" });

  assert.equal(res.status, 500);
  assert.deepEqual(res.body, { error: "internal_error", message: "socket exploded" });
});

test("malformed JSON bodies are a 400", async () => {
  const res = await request(appWith(new FixtureFetcher()))
    .post("/fetch_insights")
    .set("Content-Type", "application/json")
    .send('{"website_url": ');

  assert.equal(res.status, 400);
  assert.equal(res.body.message, "Request body is not valid JSON");
});

test("unknown routes are a JSON 404", async () => {
  const res = await request(appWith(new FixtureFetcher())).get("/nope");

  assert.equal(res.status, 404);
  assert.deepEqual(res.body, { error: "not_found", message: "No route for GET /nope" });
});

test("toErrorResponse maps the error taxonomy to status classes", () => {
  const fetchError = new FetchError("https://a.example.com/", "network", "Connection refused");

  assert.equal(toErrorResponse(new ValidationError("bad")).status, 400);
  const failure = new ScrapeFailure("https://a.example.com/", fetchError);

  assert.equal(toErrorResponse(failure).status, 502);
  assert.equal(toErrorResponse(new Error("boom")).status, 500);
});
