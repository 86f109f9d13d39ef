// src/components/ViewerCanvas.tsx
import React, { useEffect, useMemo, useRef, useState } from "react";
import type { BBox } from "../types";
import { cn } from "../utils/cn";
import {
  clamp,
  clampBox,
  cloneBox,
  layoutLabels,
  moveBox,
  newBoxId,
  nudgeBox,
  rectFromPoints,
  resizeBox,
  MIN_BOX,
  type Handle,
  type Point,
} from "../utils/bbox";

type Props = {
  src: string;
  bboxes: BBox[];
  selectedId?: string | null;
  onSelect?: (id: string | null) => void;
  onBBoxesChange?: (next: BBox[]) => void;
  /** просмотр без правок (страница результата) */
  readOnly?: boolean;
  /** ЛКМ по пустому месту рисует новую рамку */
  drawMode?: boolean;
  /** имя и флаг для нарисованной рамки */
  newBoxDefaults?: Pick<BBox, "name" | "isDefect">;
  colorOf?: (b: BBox) => string;
  /** натуральный размер картинки после загрузки */
  onImageSize?: (size: { w: number; h: number }) => void;
};

type Drag =
  | { kind: "move"; id: string; startMouse: Point; startBox: BBox }
  | { kind: "resize"; id: string; startMouse: Point; startBox: BBox; handle: Handle }
  | { kind: "draw"; start: Point; current: Point };

const HANDLES: readonly Handle[] = ["nw", "ne", "sw", "se"];

function isTypingTarget(el: EventTarget | null) {
  if (!(el instanceof HTMLElement)) return false;
  const tag = el.tagName.toLowerCase();
  return tag === "input" || tag === "textarea" || tag === "select" || el.isContentEditable;
}

const defaultColor = (b: BBox) => (b.isDefect ? "#EF4444" : "#10B981");

export default function ViewerCanvas({
  src,
  bboxes,
  selectedId,
  onSelect,
  onBBoxesChange,
  readOnly = false,
  drawMode = false,
  newBoxDefaults = { name: "", isDefect: true },
  colorOf = defaultColor,
  onImageSize,
}: Props) {
  const wrapRef = useRef<HTMLDivElement | null>(null);
  const imgRef = useRef<HTMLImageElement | null>(null);

  const [zoom, setZoom] = useState(1);
  const [pan, setPan] = useState<Point>({ x: 0, y: 0 });
  const [imgSize, setImgSize] = useState({ w: 1, h: 1 });
  const [drag, setDrag] = useState<Drag | null>(null);

  // хоткеи и window-listeners читают актуальное через ref
  const latest = useRef({ bboxes, selectedId, onSelect, onBBoxesChange, readOnly, zoom, pan, drag });
  latest.current = { bboxes, selectedId, onSelect, onBBoxesChange, readOnly, zoom, pan, drag };

  const selected = useMemo(() => bboxes.find((b) => b.id === selectedId) ?? null, [bboxes, selectedId]);

  function setBoxes(next: BBox[]) {
    latest.current.onBBoxesChange?.(next.map((b) => clampBox(b)));
  }

  function select(id: string | null) {
    latest.current.onSelect?.(id);
    if (id) window.dispatchEvent(new CustomEvent("viewer:scrollToBBox", { detail: { id } }));
  }

  // вписываем картинку при смене src
  useEffect(() => {
    const img = imgRef.current;
    const wrap = wrapRef.current;
    if (!img || !wrap) return;

    const onLoad = () => {
      const iw = img.naturalWidth || 1;
      const ih = img.naturalHeight || 1;
      setImgSize({ w: iw, h: ih });
      onImageSize?.({ w: iw, h: ih });

      const fit = Math.min(wrap.clientWidth / iw, wrap.clientHeight / ih);
      setZoom(clamp(Number.isFinite(fit) && fit > 0 ? fit : 1, 0.1, 2.5));
      setPan({ x: 0, y: 0 });
    };

    if (img.complete && img.naturalWidth) onLoad();
    img.addEventListener("load", onLoad);
    return () => img.removeEventListener("load", onLoad);
  }, [src]);

  // wheel-zoom: listener не пассивный, иначе preventDefault не сработает
  useEffect(() => {
    const el = wrapRef.current;
    if (!el) return;
    const onWheel = (e: WheelEvent) => {
      e.preventDefault();
      setZoom((z) => clamp(z * (e.deltaY < 0 ? 1.08 : 0.92), 0.1, 6));
    };
    el.addEventListener("wheel", onWheel, { passive: false });
    return () => el.removeEventListener("wheel", onWheel);
  }, []);

  /** экран -> 0..1 относительно картинки */
  function toNorm(clientX: number, clientY: number): Point {
    const wrap = wrapRef.current;
    if (!wrap) return { x: 0, y: 0 };
    const rect = wrap.getBoundingClientRect();
    const { zoom: z, pan: p } = latest.current;
    const cx = clientX - rect.left - rect.width / 2 - p.x;
    const cy = clientY - rect.top - rect.height / 2 - p.y;
    return { x: cx / (imgSize.w * z) + 0.5, y: cy / (imgSize.h * z) + 0.5 };
  }

  function trackMouse(onMove: (e: MouseEvent) => void, onUp?: () => void) {
    const move = (e: MouseEvent) => {
      e.preventDefault();
      onMove(e);
    };
    const up = () => {
      window.removeEventListener("mousemove", move);
      window.removeEventListener("mouseup", up);
      onUp?.();
    };
    window.addEventListener("mousemove", move);
    window.addEventListener("mouseup", up);
  }

  function onWrapMouseDown(e: React.MouseEvent) {
    // панорама: Shift+ЛКМ или средняя кнопка
    if (e.button === 1 || (e.button === 0 && e.shiftKey)) {
      e.preventDefault();
      const start = { x: e.clientX, y: e.clientY };
      const pan0 = latest.current.pan;
      trackMouse((ev) => setPan({ x: pan0.x + ev.clientX - start.x, y: pan0.y + ev.clientY - start.y }));
      return;
    }

    if (e.button !== 0) return;
    if (!drawMode || readOnly) {
      select(null);
      return;
    }

    e.preventDefault();
    const start = toNorm(e.clientX, e.clientY);
    let current = start;
    setDrag({ kind: "draw", start, current });
    trackMouse(
      (ev) => {
        current = toNorm(ev.clientX, ev.clientY);
        setDrag({ kind: "draw", start, current });
      },
      () => {
        setDrag(null);
        const r = rectFromPoints(start, current);
        if (r.w < MIN_BOX || r.h < MIN_BOX) return;
        const box: BBox = clampBox({ id: newBoxId(), ...r, ...newBoxDefaults });
        setBoxes([...latest.current.bboxes, box]);
        select(box.id);
      }
    );
  }

  function onBoxMouseDown(e: React.MouseEvent, id: string, handle?: Handle) {
    e.stopPropagation();
    e.preventDefault();
    if (e.button !== 0) return;

    const original = latest.current.bboxes.find((b) => b.id === id);
    if (!original) return;
    if (readOnly) {
      select(id);
      return;
    }

    let target = original;
    // Alt+drag: тащим копию, оригинал остаётся
    if (!handle && e.altKey) {
      target = cloneBox(original, newBoxId());
      setBoxes([...latest.current.bboxes, target]);
    }
    select(target.id);

    const startMouse = toNorm(e.clientX, e.clientY);
    const startBox = target;
    setDrag(handle ? { kind: "resize", id: target.id, startMouse, startBox, handle } : { kind: "move", id: target.id, startMouse, startBox });

    trackMouse(
      (ev) => {
        const p = toNorm(ev.clientX, ev.clientY);
        const dx = p.x - startMouse.x;
        const dy = p.y - startMouse.y;
        const next = handle ? resizeBox(startBox, handle, dx, dy) : moveBox(startBox, dx, dy);
        setBoxes(latest.current.bboxes.map((b) => (b.id === startBox.id ? next : b)));
      },
      () => setDrag(null)
    );
  }

  // Delete, Alt+D, стрелки, Esc
  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (isTypingTarget(e.target)) return;
      const cur = latest.current;
      if (cur.drag) return;

      if (e.code === "Escape") {
        cur.onSelect?.(null);
        return;
      }
      if (cur.readOnly || !cur.selectedId) return;

      const box = cur.bboxes.find((b) => b.id === cur.selectedId);
      if (!box) return;

      if (e.code === "Delete" || e.code === "Backspace") {
        e.preventDefault();
        setBoxes(cur.bboxes.filter((b) => b.id !== box.id));
        cur.onSelect?.(null);
        return;
      }

      if (e.altKey && e.code === "KeyD") {
        e.preventDefault();
        const copy = cloneBox(box, newBoxId());
        setBoxes([...cur.bboxes, copy]);
        select(copy.id);
        return;
      }

      const step = e.shiftKey ? 0.02 : 0.005;
      const delta: Record<string, [number, number]> = {
        ArrowLeft: [-step, 0],
        ArrowRight: [step, 0],
        ArrowUp: [0, -step],
        ArrowDown: [0, step],
      };
      const d = delta[e.code];
      if (d) {
        e.preventDefault();
        const moved = nudgeBox(box, d[0], d[1]);
        setBoxes(cur.bboxes.map((b) => (b.id === box.id ? moved : b)));
      }
    };

    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, []);

  const labels = useMemo(() => {
    const z = Math.max(zoom, 0.0001);
    const nx = (px: number) => px / (imgSize.w * z);
    const ny = (px: number) => px / (imgSize.h * z);
    return layoutLabels(bboxes, {
      width: (text) => nx(clamp(28 + text.length * 7.2, 70, 320)),
      height: ny(26),
      gap: ny(6),
      pad: nx(6),
    });
  }, [bboxes, imgSize.w, imgSize.h, zoom]);

  const draft = drag?.kind === "draw" ? rectFromPoints(drag.start, drag.current) : null;

  return (
    <div
      ref={wrapRef}
      data-testid="viewer-canvas"
      className={cn(
        "relative h-full w-full overflow-hidden rounded-3xl border border-white/10 bg-black/30",
        drawMode && !readOnly ? "cursor-crosshair" : "cursor-default"
      )}
      onMouseDown={onWrapMouseDown}
    >
      <div className="absolute left-1/2 top-1/2" style={{ transform: `translate(-50%, -50%) translate(${pan.x}px, ${pan.y}px)` }}>
        <div className="relative" style={{ transform: `scale(${zoom})`, transformOrigin: "center center" }}>
          <img
            ref={imgRef}
            src={src}
            alt="Изображение для анализа"
            draggable={false}
            className="pointer-events-none block max-w-none select-none"
          />

          {bboxes.map((b) => {
            const isSel = b.id === selectedId;
            const color = colorOf(b);
            return (
              <div
                key={b.id}
                data-testid="bbox"
                className={cn("absolute border-2", readOnly ? "" : "cursor-move")}
                style={{
                  left: `${b.x * 100}%`,
                  top: `${b.y * 100}%`,
                  width: `${b.w * 100}%`,
                  height: `${b.h * 100}%`,
                  borderColor: color,
                  borderStyle: b.isDefect ? "dashed" : "solid",
                  background: isSel ? `${color}1f` : "transparent",
                  boxShadow: isSel ? `0 0 0 1px ${color}, 0 0 24px ${color}66` : undefined,
                  zIndex: isSel ? 55 : 20,
                }}
                onMouseDown={(e) => onBoxMouseDown(e, b.id)}
              >
                {isSel && !readOnly
                  ? HANDLES.map((h) => (
                      <div
                        key={h}
                        className="absolute h-3 w-3 rounded-full border border-white/40 bg-orange-400"
                        style={{
                          left: h.includes("w") ? "-6px" : "calc(100% - 6px)",
                          top: h.includes("n") ? "-6px" : "calc(100% - 6px)",
                          cursor: h === "nw" || h === "se" ? "nwse-resize" : "nesw-resize",
                        }}
                        onMouseDown={(e) => onBoxMouseDown(e, b.id, h)}
                      />
                    ))
                  : null}
              </div>
            );
          })}

          {draft ? (
            <div
              className="absolute border-2 border-dashed border-orange-300 bg-orange-400/10"
              style={{ left: `${draft.x * 100}%`, top: `${draft.y * 100}%`, width: `${draft.w * 100}%`, height: `${draft.h * 100}%` }}
            />
          ) : null}

          {labels.map((it) => {
            const box = bboxes.find((b) => b.id === it.id);
            const isSel = it.id === selectedId;
            return (
              <button
                key={`lbl_${it.id}`}
                type="button"
                onMouseDown={(e) => {
                  e.stopPropagation();
                  e.preventDefault();
                  select(it.id);
                }}
                className="absolute flex items-center justify-center rounded-lg px-2 font-semibold text-white"
                style={{
                  left: `${it.x * 100}%`,
                  top: `${it.y * 100}%`,
                  width: `${it.w * 100}%`,
                  height: `${it.h * 100}%`,
                  background: box ? colorOf(box) : "#000",
                  opacity: isSel ? 1 : 0.85,
                  zIndex: isSel ? 80 : 45,
                  // подпись не должна масштабироваться вместе с картинкой
                  fontSize: `${13 / Math.max(zoom, 0.0001)}px`,
                }}
              >
                <span className="truncate">{it.text}</span>
              </button>
            );
          })}
        </div>
      </div>

      <div className="absolute left-4 top-4 flex items-center gap-2 rounded-2xl border border-white/10 bg-black/40 px-3 py-2 backdrop-blur">
        <span className="text-xs tabular-nums text-white/75">{Math.round(zoom * 100)}%</span>
        <button type="button" title="Уменьшить" className="h-7 w-7 rounded-lg border border-white/10 hover:bg-white/10" onClick={() => setZoom((z) => clamp(z * 0.9, 0.1, 6))}>
          −
        </button>
        <button type="button" title="Увеличить" className="h-7 w-7 rounded-lg border border-white/10 hover:bg-white/10" onClick={() => setZoom((z) => clamp(z * 1.1, 0.1, 6))}>
          +
        </button>
      </div>

      {!readOnly ? (
        <div className="absolute bottom-4 left-4 max-w-[90%] rounded-2xl border border-white/10 bg-black/40 px-3 py-2 text-xs text-white/65 backdrop-blur">
          {selected ? <span className="mr-2 text-orange-200">{selected.name || "без имени"}</span> : null}
          {drawMode ? "ЛКМ — нарисовать рамку • " : ""}Shift+ЛКМ — панорама • колесо — масштаб • Alt+перетаскивание / Alt+D — копия • стрелки — сдвиг • Del — удалить
        </div>
      ) : null}
    </div>
  );
}
