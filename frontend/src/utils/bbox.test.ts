import { describe, expect, it } from "vitest";
import type { BBox, Detection } from "../types";
import {
  boxesToManual,
  boxLabel,
  clampBox,
  cloneBox,
  detectionsToBoxes,
  layoutLabels,
  manualToBoxes,
  nudgeBox,
  rectFromPoints,
  rectsOverlap,
  resizeBox,
} from "./bbox";

function box(over: Partial<BBox> = {}): BBox {
  return { id: "b1", x: 0.2, y: 0.2, w: 0.4, h: 0.4, name: "", isDefect: false, ...over };
}

describe("clampBox / nudgeBox", () => {
  it("keeps the box inside the frame", () => {
    const b = nudgeBox(box({ x: 0.9, y: 0, w: 0.2, h: 0.2 }), 0.05, -0.1);
    expect(b.x).toBeCloseTo(0.8);
    expect(b.y).toBe(0);
  });

  it("enforces the minimum size and replaces NaN", () => {
    const b = clampBox(box({ x: Number.NaN, w: 0, h: 0.001 }));
    expect(b.x).toBe(0);
    expect(b.w).toBe(0.01);
    expect(b.h).toBe(0.01);
  });
});

describe("resizeBox", () => {
  it("moves only the dragged corner", () => {
    const r = resizeBox(box(), "se", 0.1, -0.5);
    expect(r.x).toBeCloseTo(0.2);
    expect(r.y).toBeCloseTo(0.2);
    expect(r.w).toBeCloseTo(0.5);
    expect(r.h).toBeCloseTo(0.02);
  });

  it("stops at the frame edge", () => {
    const r = resizeBox(box(), "nw", -0.5, 0);
    expect(r.x).toBe(0);
    expect(r.w).toBeCloseTo(0.6);
  });
});

describe("rectFromPoints", () => {
  it("normalizes drag direction and clamps to the frame", () => {
    const r = rectFromPoints({ x: 0.5, y: 0.6 }, { x: 0.2, y: -0.1 });
    expect(r.x).toBeCloseTo(0.2);
    expect(r.y).toBe(0);
    expect(r.w).toBeCloseTo(0.3);
    expect(r.h).toBeCloseTo(0.6);
  });
});

describe("cloneBox", () => {
  it("offsets the copy and drops model confidence", () => {
    const c = cloneBox(box({ confidence: 0.9, name: "Траверса" }), "copy");
    expect(c.id).toBe("copy");
    expect(c.name).toBe("Траверса");
    expect(c.x).toBeCloseTo(0.21);
    expect(c.confidence).toBeUndefined();
  });
});

describe("pixel conversion", () => {
  const det: Detection = { class: "bad_insulator", class_ru: "", confidence: 0.87, bbox: [100, 50, 300, 250] };

  it("converts detections to normalized boxes", () => {
    const [b] = detectionsToBoxes([det], 1000, 500);
    expect(b.id).toBe("det_0");
    expect(b.x).toBeCloseTo(0.1);
    expect(b.y).toBeCloseTo(0.1);
    expect(b.w).toBeCloseTo(0.2);
    expect(b.h).toBeCloseTo(0.4);
    expect(b.name).toBe("Изолятор отсутствует");
    expect(b.isDefect).toBe(true);
    expect(b.confidence).toBe(0.87);
  });

  it("returns nothing until the image size is known", () => {
    expect(detectionsToBoxes([det], 0, 0)).toEqual([]);
    expect(manualToBoxes([{ x: 1, y: 1, width: 2, height: 2, is_defect: true }], 0, 10)).toEqual([]);
  });

  it("converts boxes back to whole pixels with a trimmed name", () => {
    const [m] = boxesToManual([box({ x: 0.1, y: 0.1, w: 0.2, h: 0.4, name: " Траверса " })], 1000, 500);
    expect(m).toEqual({ x: 100, y: 50, width: 200, height: 200, name: "Траверса", is_defect: false });
  });

  it("omits an empty name and cuts the box at the image edge", () => {
    const [m] = boxesToManual([box({ x: 0.95, y: 0, w: 0.2, h: 0.1, isDefect: true })], 1000, 500);
    expect(m).not.toHaveProperty("name");
    expect(m.x).toBe(950);
    expect(m.width).toBe(50);
    expect(m.height).toBe(50);
    expect(m.is_defect).toBe(true);
  });

  it("reads saved manual annotations", () => {
    const [b] = manualToBoxes([{ x: 250, y: 100, width: 500, height: 200, name: "Гнездо", is_defect: true }], 1000, 400);
    expect(b.id).toBe("manual_0");
    expect(b.x).toBeCloseTo(0.25);
    expect(b.y).toBeCloseTo(0.25);
    expect(b.w).toBeCloseTo(0.5);
    expect(b.h).toBeCloseTo(0.5);
    expect(b.name).toBe("Гнездо");
  });
});

describe("labels", () => {
  it("formats name with confidence", () => {
    expect(boxLabel(box({ name: "Траверса", confidence: 0.876 }))).toBe("Траверса • 88%");
    expect(boxLabel(box({ isDefect: true }))).toBe("дефект");
    expect(boxLabel(box())).toBe("объект");
  });

  it("treats touching rectangles as not overlapping", () => {
    expect(rectsOverlap({ x: 0, y: 0, w: 0.5, h: 0.5 }, { x: 0.5, y: 0, w: 0.5, h: 0.5 })).toBe(false);
    expect(rectsOverlap({ x: 0, y: 0, w: 0.5, h: 0.5 }, { x: 0.4, y: 0.4, w: 0.5, h: 0.5 })).toBe(true);
  });

  it("pushes a colliding label below the previous one", () => {
    const boxes = [box({ id: "a", x: 0.4, y: 0.5, w: 0.2, h: 0.2 }), box({ id: "b", x: 0.4, y: 0.5, w: 0.2, h: 0.2 })];
    const placed = layoutLabels(boxes, { width: () => 0.1, height: 0.05, gap: 0.01, pad: 0.01 });

    const a = placed.find((p) => p.id === "a");
    const b = placed.find((p) => p.id === "b");
    expect(a?.x).toBeCloseTo(0.45);
    expect(a?.y).toBeCloseTo(0.44);
    expect(b?.y).toBeCloseTo(0.5);
  });
});
