import assert from "node:assert/strict";
import test from "node:test";
import { canonicalUrl, dedupeUrls, ensureScheme, isAllowedDomain, resolveUrl } from "./url";

test("canonicalUrl removes tracking params, fragments and trailing slashes", () => {
  const canonical = canonicalUrl("https://FPTShop.com.vn/dien-thoai/samsung-galaxy-a15/?utm_source=ads&color=den&gclid=x#specs");
  assert.equal(canonical, "https://fptshop.com.vn/dien-thoai/samsung-galaxy-a15?color=den");
  assert.equal(canonicalUrl("https://tiki.vn/?utm_medium=cpc"), "https://tiki.vn/");
});

test("canonicalUrl rejects non-http schemes", () => {
  assert.equal(canonicalUrl("ftp://example.com/file"), null);
  assert.equal(canonicalUrl("not a url"), null);
});

test("ensureScheme adds https to bare and protocol-relative URLs", () => {
  assert.equal(ensureScheme("cdn.tgdd.vn/a.jpg"), "https://cdn.tgdd.vn/a.jpg");
  assert.equal(ensureScheme("//cdn.tgdd.vn/a.jpg"), "https://cdn.tgdd.vn/a.jpg");
  assert.equal(ensureScheme("http://example.com"), "http://example.com");
});

test("resolveUrl resolves relative links and skips script links", () => {
  assert.equal(resolveUrl("/dtdd/iphone-15", "https://www.thegioididong.com/dtdd"), "https://www.thegioididong.com/dtdd/iphone-15");
  assert.equal(resolveUrl("javascript:void(0)", "https://www.thegioididong.com/"), null);
  assert.equal(resolveUrl("", "https://www.thegioididong.com/"), null);
});

test("dedupeUrls keeps the first occurrence in order", () => {
  const urls = dedupeUrls([
    "https://cellphones.com.vn/a",
    "https://cellphones.com.vn/b",
    "https://cellphones.com.vn/a?utm_source=x",
    "https://cellphones.com.vn/c"
  ]);
  assert.deepEqual(urls, ["https://cellphones.com.vn/a", "https://cellphones.com.vn/b", "https://cellphones.com.vn/c"]);
});

test("isAllowedDomain accepts exact hosts and subdomains only", () => {
  const allowed = ["fptshop.com.vn", "cellphones.com.vn"];
  assert.equal(isAllowedDomain("fptshop.com.vn", allowed), true);
  assert.equal(isAllowedDomain("www.fptshop.com.vn", allowed), true);
  assert.equal(isAllowedDomain("m.cellphones.com.vn", allowed), true);
  assert.equal(isAllowedDomain("notfptshop.com.vn", allowed), false);
  assert.equal(isAllowedDomain("example.com", allowed), false);
});
