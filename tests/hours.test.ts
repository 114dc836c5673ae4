import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { formatHours, parseHours, ratio, sumHundredths, toHundredths } from "@shared/hours";
import { isIsoDate, firstOfMonth } from "@shared/dates";

describe("parseHours", () => {
  it("reads whole and fractional hours as hundredths", () => {
    assert.deepEqual(parseHours("8"), { ok: true, hundredths: 800 });
    assert.deepEqual(parseHours("7.5"), { ok: true, hundredths: 750 });
    assert.deepEqual(parseHours(" 0.25 "), { ok: true, hundredths: 25 });
    assert.deepEqual(parseHours(3.75), { ok: true, hundredths: 375 });
  });

  it("reads a value with no leading zero", () => {
    assert.deepEqual(parseHours(".5"), { ok: true, hundredths: 50 });
  });

  it("rejects more than two decimals as a precision problem", () => {
    assert.deepEqual(parseHours("1.255"), { ok: false, reason: "precision" });
  });

  it("rejects non-numeric and negative values as a format problem", () => {
    assert.deepEqual(parseHours("abc"), { ok: false, reason: "format" });
    assert.deepEqual(parseHours("-1"), { ok: false, reason: "format" });
    assert.deepEqual(parseHours(""), { ok: false, reason: "format" });
    assert.deepEqual(parseHours("."), { ok: false, reason: "format" });
    assert.deepEqual(parseHours("5."), { ok: false, reason: "format" });
  });
});

describe("hour arithmetic", () => {
  it("sums decimal strings exactly", () => {
    assert.equal(sumHundredths(["0.10", "0.20", "0.30"]), 60);
    assert.equal(formatHours(sumHundredths(["0.10", "0.20"])), "0.30");
  });

  it("throws on a malformed persisted value", () => {
    assert.throws(() => toHundredths("n/a"), /Malformed hours value: n\/a/);
  });

  it("ratio is zero for a zero denominator and rounded otherwise", () => {
    assert.equal(ratio(0, 0), 0);
    assert.equal(ratio(6000, 10000), 0.6);
    assert.equal(ratio(1, 3), 0.3333);
    assert.equal(ratio(2, 3, 2), 0.67);
  });
});

describe("dates", () => {
  it("accepts only real calendar dates", () => {
    assert.equal(isIsoDate("2024-02-29"), true);
    assert.equal(isIsoDate("2023-02-29"), false);
    assert.equal(isIsoDate("2024-13-01"), false);
    assert.equal(isIsoDate("06/30/2024"), false);
  });

  it("firstOfMonth keeps year and month", () => {
    assert.equal(firstOfMonth("2024-06-30"), "2024-06-01");
  });
});
