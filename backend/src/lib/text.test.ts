import assert from "node:assert/strict";
import test from "node:test";
import {
  cleanText,
  collapseWhitespace,
  extractBrandFromTitle,
  extractDomain,
  extractModelFromTitle,
  extractPrice,
  formatVnd,
  htmlToText,
  normalizeBrandName,
  toAvailabilityBoolean
} from "./text";

test("extractPrice reads Vietnamese price strings as whole units", () => {
  assert.equal(extractPrice("12.990.000 VND"), 12990000);
  assert.equal(extractPrice("7.490.000₫"), 7490000);
  assert.equal(extractPrice("Giá: 1,250,000 đ"), 1250000);
  assert.equal(extractPrice("Liên hệ"), 0);
  assert.equal(extractPrice(""), 0);
  assert.equal(extractPrice(undefined), 0);
});

test("formatVnd groups thousands with dots", () => {
  assert.equal(formatVnd(12990000), "12.990.000");
  assert.equal(formatVnd(990), "990");
  assert.equal(formatVnd(1000.7), "1.000");
  assert.equal(formatVnd(0), "0");
});

test("normalizeBrandName maps aliases to canonical names", () => {
  assert.equal(normalizeBrandName("iPhone"), "Apple");
  assert.equal(normalizeBrandName("ip"), "Apple");
  assert.equal(normalizeBrandName("Apple"), "Apple");
  assert.equal(normalizeBrandName("ss"), "Samsung");
  assert.equal(normalizeBrandName("redmi note 13"), "Xiaomi");
  assert.equal(normalizeBrandName("vsmart"), "VinSmart");
  assert.equal(normalizeBrandName("Fooberry"), "Fooberry");
  assert.equal(normalizeBrandName("fooberry"), "Fooberry");
  assert.equal(normalizeBrandName("  "), "Unknown");
});

test("extractBrandFromTitle finds known brands anywhere in the title", () => {
  assert.equal(extractBrandFromTitle("Điện thoại Samsung Galaxy A15 8GB"), "Samsung");
  assert.equal(extractBrandFromTitle("iPhone 15 Pro Max 256GB"), "Apple");
  assert.equal(extractBrandFromTitle("Redmi Note 13"), "Xiaomi");
  assert.equal(extractBrandFromTitle("Điện thoại Tecno Spark 20"), "Tecno");
  assert.equal(extractBrandFromTitle(""), "Unknown");
});

test("extractModelFromTitle drops the brand and category prefix", () => {
  assert.equal(extractModelFromTitle("Điện thoại Samsung Galaxy A15 8GB", "Samsung"), "Galaxy A15 8GB");
  assert.equal(extractModelFromTitle("iPhone 15 Pro", "Apple"), "iPhone 15 Pro");
});

test("extractDomain strips www and lower-cases", () => {
  assert.equal(extractDomain("https://WWW.TheGioiDiDong.com/dtdd"), "thegioididong.com");
  assert.equal(extractDomain("fptshop.com.vn/dien-thoai"), "fptshop.com.vn");
});

test("cleanText collapses whitespace and decodes entities", () => {
  assert.equal(cleanText("  Galaxy&nbsp;A15 \n &amp; case  "), "Galaxy A15 & case");
  assert.equal(cleanText(null), "");
});

test("cleanText leaves references beyond the last code point as written", () => {
  assert.equal(cleanText("Phone &#x110000; &#1114112; &#x1F4F1;"), "Phone &#x110000; &#1114112; \u{1F4F1}");
});

test("collapseWhitespace does not decode entities", () => {
  assert.equal(collapseWhitespace("  A &amp;lt;b&amp;gt;\n x "), "A &amp;lt;b&amp;gt; x");
  assert.equal(collapseWhitespace(undefined), "");
});

test("toAvailabilityBoolean maps schema.org and Vietnamese strings", () => {
  assert.equal(toAvailabilityBoolean("https://schema.org/InStock"), true);
  assert.equal(toAvailabilityBoolean("Hết hàng"), false);
  assert.equal(toAvailabilityBoolean(1), true);
  assert.equal(toAvailabilityBoolean("maybe"), undefined);
});

test("htmlToText keeps block boundaries and drops scripts", () => {
  const text = htmlToText(
    "<html><body><script>var x = 1;</script><h1>Galaxy A15</h1><p>Giá <b>4.990.000₫</b></p><ul><li>RAM: 8GB</li><li>ROM: 128GB</li></ul></body></html>"
  );
  assert.equal(text, "Galaxy A15\nGiá 4.990.000₫\nRAM: 8GB\nROM: 128GB");
});
