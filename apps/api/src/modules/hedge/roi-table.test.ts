import { describe, expect, it } from "vitest";

import { AppConfigSchema, defaultAppConfig } from "@hedgebot/shared";

import { elapsedMinutes, roiThresholdAt, shouldExitOnRoi } from "./roi-table";

const table = AppConfigSchema.parse({ minimalRoi: { "0": 0.7, "10": 0.2, "120": 0 } }).minimalRoi;

describe("roi table", () => {
  it("picks the greatest threshold not above the elapsed time", () => {
    expect(roiThresholdAt(table, 0)).toBe(0.7);
    expect(roiThresholdAt(table, 9.99)).toBe(0.7);
    expect(roiThresholdAt(table, 10)).toBe(0.2);
    expect(roiThresholdAt(table, 119)).toBe(0.2);
    expect(roiThresholdAt(table, 5_000)).toBe(0);
  });

  it("does not exit at 119 minutes with zero profit but exits at 121", () => {
    expect(shouldExitOnRoi(table, 119, 0)).toBe(false);
    expect(shouldExitOnRoi(table, 121, 0)).toBe(true);
    expect(shouldExitOnRoi(table, 121, -0.01)).toBe(false);
  });

  it("never requires more profit as time passes", () => {
    const rows = defaultAppConfig().minimalRoi;
    let previous = Number.POSITIVE_INFINITY;
    for (let minute = 0; minute <= 200; minute += 1) {
      const threshold = roiThresholdAt(rows, minute);
      expect(threshold).not.toBeNull();
      const value = threshold ?? Number.NaN;
      expect(value).toBeLessThanOrEqual(previous);
      previous = value;
    }
  });

  it("applies no row before the first threshold", () => {
    const late = AppConfigSchema.parse({ minimalRoi: [{ minutes: 30, minProfit: 0.1 }] }).minimalRoi;
    expect(roiThresholdAt(late, 29)).toBeNull();
    expect(shouldExitOnRoi(late, 29, 5)).toBe(false);
  });

  it("measures elapsed minutes from the open time", () => {
    expect(elapsedMinutes("2026-01-01T00:00:00.000Z", new Date("2026-01-01T02:01:00.000Z"))).toBe(121);
    expect(elapsedMinutes("not a date", new Date())).toBe(0);
  });
});
