import assert from "node:assert/strict";
import test from "node:test";
import * as cheerio from "cheerio";

import { extractStoreIdentity, nameFromDomain } from "../src/store-identity";

const BASE = "https://www.acme-goods.com";

function identity(html: string, base = BASE) {
  return extractStoreIdentity(cheerio.load(html), base);
}

test("title wins, with shop suffixes removed", () => {
  assert.deepEqual(identity("<title>Acme Goods – Online Store</title>"), {
    name: "Acme Goods",
    domain: "www.acme-goods.com",
  });
  assert.equal(identity("<title>Acme Goods | Shop</title>").name, "Acme Goods");
  assert.equal(identity("<title>Acme Goods</title>").name, "Acme Goods");
});

test("og:site_name is used when the title is empty", () => {
  const html =
    '<html><head><title> </title><meta property="og:site_name" content="Acme Site"></head></html>';
  assert.equal(identity(html).name, "Acme Site");
});

test("logo alt text is used before the domain, skipping generic alts", () => {
  const html =
    '<html><body><img src="/a.png" alt="Logo"><img src="/b.png" alt="Acme Logo Mark"></body></html>';
  assert.equal(identity(html).name, "Acme Logo Mark");
});

test("the domain label is the last resort", () => {
  assert.deepEqual(identity("<html><body></body></html>"), {
    name: "Acme-Goods",
    domain: "www.acme-goods.com",
  });
  assert.equal(identity("<p></p>", "https://demo.myshopify.com").name, "Demo");
});

test("nameFromDomain title-cases each label part", () => {
  assert.equal(nameFromDomain("shop.example.co.uk"), "Shop.Example.Co.Uk");
  assert.equal(nameFromDomain("www.blue-fern.com"), "Blue-Fern");
});
