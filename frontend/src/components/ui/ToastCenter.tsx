// src/components/ui/ToastCenter.tsx
import React, { useEffect, useState } from "react";
import { AnimatePresence, motion, useReducedMotion } from "framer-motion";
import { AlertTriangle, CheckCircle2, Info, XCircle } from "lucide-react";

export type ToastKind = "success" | "info" | "warn" | "error";
type ToastItem = { id: number; kind: ToastKind; text: string };

let pushFn: ((t: Omit<ToastItem, "id">) => void) | null = null;

// вызывается из сторов и страниц; до монтирования ToastCenter сообщения теряются
export const toast = {
  success: (text: string) => pushFn?.({ kind: "success", text }),
  info: (text: string) => pushFn?.({ kind: "info", text }),
  warn: (text: string) => pushFn?.({ kind: "warn", text }),
  error: (text: string) => pushFn?.({ kind: "error", text }),
};

const META: Record<ToastKind, { label: string; border: string; icon: React.ReactNode; ttl: number }> = {
  success: { label: "Готово", border: "border-emerald-300/30", icon: <CheckCircle2 className="h-5 w-5 text-emerald-300" />, ttl: 2600 },
  info: { label: "Инфо", border: "border-orange-300/20", icon: <Info className="h-5 w-5 text-orange-300" />, ttl: 2600 },
  warn: { label: "Внимание", border: "border-yellow-300/25", icon: <AlertTriangle className="h-5 w-5 text-yellow-300" />, ttl: 4000 },
  error: { label: "Ошибка", border: "border-red-300/30", icon: <XCircle className="h-5 w-5 text-red-300" />, ttl: 5000 },
};

let seq = 0;

export default function ToastCenter() {
  const [items, setItems] = useState<ToastItem[]>([]);
  const reduceMotion = useReducedMotion();

  useEffect(() => {
    const timers = new Set<number>();
    pushFn = (t) => {
      seq += 1;
      const item: ToastItem = { id: seq, ...t };
      setItems((prev) => [item, ...prev].slice(0, 4));
      const timer = window.setTimeout(() => {
        timers.delete(timer);
        setItems((prev) => prev.filter((x) => x.id !== item.id));
      }, META[t.kind].ttl);
      timers.add(timer);
    };
    return () => {
      pushFn = null;
      timers.forEach((t) => window.clearTimeout(t));
    };
  }, []);

  return (
    <div className="pointer-events-none fixed bottom-5 right-5 z-[9999] w-[400px] max-w-[92vw]" aria-live="polite">
      <AnimatePresence>
        {items.map((t) => (
          <motion.div
            key={t.id}
            role="status"
            className={["fx-glass mb-2 flex items-start gap-3 rounded-[20px] px-4 py-3", META[t.kind].border].join(" ")}
            initial={reduceMotion ? false : { opacity: 0, y: 10, scale: 0.985 }}
            animate={{ opacity: 1, y: 0, scale: 1 }}
            exit={reduceMotion ? { opacity: 0 } : { opacity: 0, y: 10, scale: 0.985 }}
            transition={{ duration: reduceMotion ? 0 : 0.16 }}
          >
            <div className="mt-0.5 shrink-0">{META[t.kind].icon}</div>
            <div className="min-w-0 flex-1">
              <div className="text-[11px] uppercase tracking-wider text-white/50">{META[t.kind].label}</div>
              <div className="mt-0.5 whitespace-pre-wrap break-words text-sm leading-snug text-white/85">{t.text}</div>
            </div>
          </motion.div>
        ))}
      </AnimatePresence>
    </div>
  );
}
