import { describe, expect, it } from "vitest";
import type { TaskListItem } from "../types";
import { filterHistory, patchHistory } from "./history";

function task(id: string, over: Partial<TaskListItem> = {}): TaskListItem {
  return {
    id,
    status: "completed",
    route_name: null,
    total_files: 4,
    processed_files: 4,
    failed_files: 0,
    defects_found: 0,
    created_at: null,
    completed_at: null,
    ...over,
  };
}

const items = [
  task("aaa-1", { route_name: "ВЛ 110 кВ Северная", created_at: "2024-05-01T10:00:00Z", defects_found: 2 }),
  task("bbb-2", { status: "processing", created_at: "2024-05-03T10:00:00Z", defects_found: 2 }),
  task("ccc-3", { route_name: "ВЛ 35 кВ Южная", status: "failed", created_at: "2024-05-02T10:00:00Z", defects_found: 5 }),
];

const ids = (rows: TaskListItem[]) => rows.map((t) => t.id);

describe("filterHistory", () => {
  it("sorts newest first by default", () => {
    expect(ids(filterHistory(items, { status: "all", query: "", sort: "newest" }))).toEqual(["bbb-2", "ccc-3", "aaa-1"]);
  });

  it("sorts oldest first", () => {
    expect(ids(filterHistory(items, { status: "all", query: "", sort: "oldest" }))).toEqual(["aaa-1", "ccc-3", "bbb-2"]);
  });

  it("sorts by defects with newer tasks winning a tie", () => {
    expect(ids(filterHistory(items, { status: "all", query: "", sort: "defects" }))).toEqual(["ccc-3", "bbb-2", "aaa-1"]);
  });

  it("filters by status", () => {
    expect(ids(filterHistory(items, { status: "failed", query: "", sort: "newest" }))).toEqual(["ccc-3"]);
  });

  it("searches route names case-insensitively and ids", () => {
    expect(ids(filterHistory(items, { status: "all", query: "  северная ", sort: "newest" }))).toEqual(["aaa-1"]);
    expect(ids(filterHistory(items, { status: "all", query: "BBB", sort: "newest" }))).toEqual(["bbb-2"]);
  });

  it("does not reorder the input array", () => {
    filterHistory(items, { status: "all", query: "", sort: "oldest" });
    expect(ids(items)).toEqual(["aaa-1", "bbb-2", "ccc-3"]);
  });
});

describe("patchHistory", () => {
  it("updates counters of a known task", () => {
    const next = patchHistory(items, {
      task_id: "bbb-2",
      status: "completed",
      processed_files: 3,
      total_files: 4,
      failed_files: 1,
      defects_found: 7,
      message: null,
    });

    expect(next?.[1]).toEqual({ ...items[1], status: "completed", processed_files: 3, failed_files: 1, defects_found: 7 });
    expect(next?.[0]).toBe(items[0]);
    expect(items[1].status).toBe("processing");
  });

  it("asks for a reload when the task is unknown", () => {
    const msg = { task_id: "zzz", status: "queued" as const, processed_files: 0, total_files: 1, failed_files: 0, defects_found: 0, message: null };
    expect(patchHistory(items, msg)).toBeNull();
  });

  it("drops a deleted task without asking for a reload", () => {
    const base = { status: "queued" as const, processed_files: 0, total_files: 4, failed_files: 0, defects_found: 0, message: "Задача удалена" };
    expect(ids(patchHistory(items, { ...base, task_id: "bbb-2", deleted: true }) ?? [])).toEqual(["aaa-1", "ccc-3"]);
    expect(ids(patchHistory(items, { ...base, task_id: "zzz", deleted: true }) ?? [])).toEqual(["aaa-1", "bbb-2", "ccc-3"]);
  });
});
