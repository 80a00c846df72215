import assert from "node:assert/strict";
import test from "node:test";

import { FetchError, ScrapeFailure, ValidationError } from "../src/errors";
import { buildInsights, normalizeStoreUrl } from "../src/orchestrator";
import type { BrandInfo } from "../src/types";
import { demoStoreRoutes, FixtureFetcher, ThrowingFetcher, url } from "./helpers";

test("normalizeStoreUrl adds a scheme and splits out the origin", () => {
  assert.deepEqual(normalizeStoreUrl("demo.myshopify.com"), {
    websiteUrl: "https://demo.myshopify.com/",
    baseUrl: "https://demo.myshopify.com",
  });
  assert.deepEqual(normalizeStoreUrl("  http://shop.example.com/collections/all#top "), {
    websiteUrl: "http://shop.example.com/collections/all",
    baseUrl: "http://shop.example.com",
  });
  assert.equal(normalizeStoreUrl("localhost:3000").baseUrl, "https://localhost:3000");
});

test("normalizeStoreUrl rejects input that cannot name a store", () => {
  for (const bad of ["", "   ", "intranet", "not a url", "ftp://files.example.com", 42]) {
    assert.throws(
      () => normalizeStoreUrl(bad),
      ValidationError,
      `expected rejection for ${String(bad)}`
    );
  }
});

test("malformed URLs fail before any fetch", async () => {
  const fetcher = new FixtureFetcher(demoStoreRoutes());

  await assert.rejects(buildInsights("", { fetcher }), ValidationError);
  await assert.rejects(buildInsights("https://", { fetcher }), ValidationError);
  await assert.rejects(buildInsights("no-host", { fetcher }), ValidationError);

  assert.equal(fetcher.calls.length, 0);
});

test("an unreachable home page is a ScrapeFailure carrying the fetch error", async () => {
  const fetcher = new FixtureFetcher({ "https://down.example.com/": { error: "timeout" } });

  await assert.rejects(buildInsights("down.example.com", { fetcher }), (err: unknown) => {
    assert.ok(err instanceof ScrapeFailure);
    assert.ok(err.fetchError instanceof FetchError);
    assert.equal(err.fetchError.kind, "timeout");
    assert.equal(
      err.message,
      "Website not accessible: https://down.example.com/ (Request timed out)"
    );
    return true;
  });
  assert.deepEqual(fetcher.calls, ["https://down.example.com/"]);
});

test("demo store: three products, one policy, one social, missing pages noted", async () => {
  const fetcher = new FixtureFetcher(demoStoreRoutes());

  const result = await buildInsights("https://demo.myshopify.com", { fetcher });

  assert.equal(result.store_name, "Demo Store");
  assert.equal(result.domain, "demo.myshopify.com");
  assert.equal(result.website_url, "https://demo.myshopify.com/");
  assert.equal(result.is_shopify, true);

  assert.equal(result.products.length, 3);
  assert.deepEqual(
    result.products.map((p) => [p.title, p.price, p.url]),
    [
      ["Stoneware Mug", "18.00", url("/products/stoneware-mug")],
      ["Serving Bowl", "32.50", url("/products/serving-bowl")],
      ["Bud Vase", "24.00", url("/products/bud-vase")],
    ]
  );
  assert.equal(result.products[2].image_url, "https://cdn.shopify.com/s/files/1/0001/vase.jpg");
  assert.equal(result.products[2].vendor, undefined);
  assert.deepEqual(result.products[1].price_range, { min_price: 32.5, max_price: 40 });
  assert.deepEqual(result.featured_products, []);

  assert.deepEqual(result.policies, { privacy: "Privacy Policy\nWe respect your privacy." });
  assert.deepEqual<BrandInfo>(result.brand_info, { faqs: [] });
  assert.equal(result.brand_info.about, undefined);
  assert.deepEqual(result.contact, {
    emails: [],
    phones: [],
    socials: ["https://instagram.com/demo"],
    social_handles: { instagram: "demo" },
  });
  assert.deepEqual(result.navigation, [
    { label: "Shop", url: url("/collections/all") },
    { label: "Contact", url: url("/pages/contact") },
  ]);
  assert.deepEqual(result.important_links, []);

  assert.deepEqual(result.warnings, [
    "No returns policy page found",
    "No shipping policy page found",
    "No terms policy page found",
    "No about page found",
    "No FAQ page found",
    "No contact page found",
  ]);
});

test("identical responses give byte-identical results", async () => {
  const run = () =>
    buildInsights("https://demo.myshopify.com", {
      fetcher: new FixtureFetcher(demoStoreRoutes()),
    });
  const first = await run();
  const second = await run();

  assert.equal(JSON.stringify(first), JSON.stringify(second));
});

test("non-Shopify sites are still extracted, with a warning", async () => {
  const fetcher = new FixtureFetcher({
    "https://plain.example.com/":
      "<html><head><title>Plain Goods</title></head><body></body></html>",
  });

  const result = await buildInsights("plain.example.com", { fetcher });

  assert.equal(result.is_shopify, false);
  assert.equal(result.store_name, "Plain Goods");
  assert.equal(result.warnings[0], "No Shopify signature found; extracting as an unknown platform");
  assert.deepEqual(result.products, []);
});

test("a stage that throws leaves its fields at defaults and the rest intact", async () => {
  const fetcher = new ThrowingFetcher(demoStoreRoutes(), /\/products\.json$/, "socket hang up");

  const result = await buildInsights("https://demo.myshopify.com", { fetcher });

  assert.deepEqual(result.products, []);
  assert.deepEqual(result.featured_products, []);
  assert.deepEqual(result.policies, { privacy: "Privacy Policy\nWe respect your privacy." });
  assert.equal(result.warnings[0], "catalog extraction failed: socket hang up");
  assert.equal(result.warnings.length, 7);
});

test("a store redirected to its own domain keeps its absolute links", async () => {
  const home = `<html><head><title>Demo Brand</title></head><body>
    <a href="https://www.demo-brand.com/pages/meet-the-maker">About us</a>
  </body></html>`;
  const fetcher = new FixtureFetcher({
    [url("/")]: {
      status: 200,
      body: home,
      finalUrl: "https://www.demo-brand.com/",
    },
    "https://www.demo-brand.com/pages/meet-the-maker":
      "<main><p>Made by one potter.</p></main>",
  });

  const result = await buildInsights("demo.myshopify.com", { fetcher });

  assert.equal(result.brand_info.about, "Made by one potter.");
  assert.equal(result.website_url, "https://demo.myshopify.com/");
});
