import assert from "node:assert/strict";
import test from "node:test";

import { extractPolicies } from "../src/policy-extractor";
import { siteContextFor, url } from "./helpers";

const PRIVACY_PAGE = `<html><body>
  <main class="shopify-policy__container">
    <h1>Privacy Policy</h1>
    <div class="shopify-policy__body"><p>We never sell your data.</p></div>
  </main>
</body></html>`;

const SHIPPING_PAGE =
  '<html><body><div class="rte"><p>Orders ship in 2 days.</p></div></body></html>';

test("only the policies that were found are present", async () => {
  const { ctx } = siteContextFor("<html><body></body></html>", {
    [url("/policies/privacy-policy")]: PRIVACY_PAGE,
    [url("/pages/shipping")]: SHIPPING_PAGE,
    // Reachable but empty: not a policy
    [url("/policies/terms-of-service")]: "<html><body><script>track()</script></body></html>",
  });

  const output = await extractPolicies(ctx);

  assert.equal(output.success, true);
  if (!output.success) return;
  assert.deepEqual(output.data, {
    privacy: "Privacy Policy\nWe never sell your data.",
    shipping: "Orders ship in 2 days.",
  });
  assert.equal("returns" in output.data, false);
  assert.equal("terms" in output.data, false);
  assert.deepEqual(output.warnings, ["No returns policy page found", "No terms policy page found"]);
});

test("a policy linked from the home page is found off the usual paths", async () => {
  const home =
    '<html><body><footer><a href="/pages/legal-refunds">Refunds</a></footer></body></html>';
  const { ctx, fetcher } = siteContextFor(home, {
    [url("/pages/legal-refunds")]: "<main><p>Returns accepted within 30 days.</p></main>",
  });

  const output = await extractPolicies(ctx);

  assert.equal(output.success, true);
  if (!output.success) return;
  assert.equal(output.data.returns, "Returns accepted within 30 days.");
  assert.equal(fetcher.calls.filter((c) => c === url("/pages/legal-refunds")).length, 1);
});

test("promotional links to collections are never taken for policies", async () => {
  const home = `<html><body>
    <div class="announcement-bar">
      <a href="/collections/all">Free shipping and free returns on orders over $50</a>
    </div>
    <a href="/products/return-gift-card">Return Gift Card</a>
  </body></html>`;
  const { ctx, fetcher } = siteContextFor(home, {
    [url("/collections/all")]:
      '<main><a href="/products/mug">Stoneware Mug</a><span>$18.00</span></main>',
    [url("/products/return-gift-card")]: "<main><p>A gift card.</p></main>",
  });

  const output = await extractPolicies(ctx);

  assert.equal(output.success, true);
  if (!output.success) return;
  assert.deepEqual(output.data, {});
  assert.equal(output.warnings.length, 4);
  assert.equal(fetcher.calls.includes(url("/collections/all")), false);
  assert.equal(
    fetcher.calls.includes(url("/products/return-gift-card")),
    false
  );
});

test("a whole-label match under /policies/ or /pages/ is followed", async () => {
  const home = `<html><body><footer>
    <a href="/pages/delivery-info">Shipping information</a>
    <a href="/pages/help-desk">Shipping questions? Ask our help desk</a>
  </footer></body></html>`;
  const { ctx, fetcher } = siteContextFor(home, {
    [url("/pages/delivery-info")]: "<main><p>Dispatched within 48 hours.</p></main>",
  });

  const output = await extractPolicies(ctx);

  assert.equal(output.success, true);
  if (!output.success) return;
  assert.deepEqual(output.data, { shipping: "Dispatched within 48 hours." });
  assert.equal(fetcher.calls.includes(url("/pages/help-desk")), false);
});
