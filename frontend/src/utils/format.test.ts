import { describe, expect, it } from "vitest";
import { formatBytes, formatDateTime, formatPercent, isFinalStatus, progressPercent, shortId } from "./format";

describe("progressPercent", () => {
  it("counts failed files as done", () => {
    expect(progressPercent({ processed_files: 3, failed_files: 1, total_files: 8 })).toBe(50);
  });

  it("never exceeds 100 and handles an empty task", () => {
    expect(progressPercent({ processed_files: 10, failed_files: 2, total_files: 10 })).toBe(100);
    expect(progressPercent({ processed_files: 0, failed_files: 0, total_files: 0 })).toBe(0);
  });
});

describe("formatBytes", () => {
  it("uses russian units and a decimal comma", () => {
    expect(formatBytes(0)).toBe("0 Б");
    expect(formatBytes(512)).toBe("512 Б");
    expect(formatBytes(1536)).toBe("1,5 КБ");
    expect(formatBytes(2 * 1024 * 1024)).toBe("2 МБ");
    expect(formatBytes(1024 ** 4)).toBe("1024 ГБ");
  });
});

describe("misc", () => {
  it("formats confidence as percent", () => {
    expect(formatPercent(0.876)).toBe("88%");
  });

  it("formats local date and time", () => {
    expect(formatDateTime(new Date(2024, 2, 5, 9, 7).toISOString())).toBe("05.03.2024 09:07");
    expect(formatDateTime(null)).toBe("—");
    expect(formatDateTime("not a date")).toBe("—");
  });

  it("detects final statuses", () => {
    expect(isFinalStatus("completed")).toBe(true);
    expect(isFinalStatus("failed")).toBe(true);
    expect(isFinalStatus("processing")).toBe(false);
  });

  it("shortens ids", () => {
    expect(shortId("0f8fad5b-d9cb-469f-a165-70867728950e")).toBe("0f8fad5b");
  });
});
