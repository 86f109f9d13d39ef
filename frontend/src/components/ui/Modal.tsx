// src/components/ui/Modal.tsx
import React, { useEffect, useId } from "react";
import { createPortal } from "react-dom";
import { AnimatePresence, motion, useReducedMotion } from "framer-motion";
import { X } from "lucide-react";
import { cn } from "../../utils/cn";

type ModalProps = {
  open: boolean;
  onClose: () => void;
  title?: string;
  children: React.ReactNode;
  /** кнопки внизу панели */
  footer?: React.ReactNode;
  closeOnBackdrop?: boolean;
  maxWidthClassName?: string;
};

export default function Modal({ open, onClose, title, children, footer, closeOnBackdrop = true, maxWidthClassName }: ModalProps) {
  const reduceMotion = useReducedMotion();
  const titleId = useId();

  useEffect(() => {
    if (!open) return;

    const onKey = (e: KeyboardEvent) => {
      if (e.key === "Escape") onClose();
    };
    window.addEventListener("keydown", onKey);

    // фон не скроллится, пока открыто окно
    const prevOverflow = document.body.style.overflow;
    document.body.style.overflow = "hidden";

    return () => {
      window.removeEventListener("keydown", onKey);
      document.body.style.overflow = prevOverflow;
    };
  }, [open, onClose]);

  if (typeof document === "undefined") return null;

  return createPortal(
    <AnimatePresence>
      {open ? (
        <motion.div
          className="fixed inset-0 z-[1000] flex items-center justify-center p-4"
          initial={reduceMotion ? false : { opacity: 0 }}
          animate={{ opacity: 1 }}
          exit={{ opacity: 0 }}
        >
          <button
            type="button"
            aria-label="Закрыть"
            onClick={() => closeOnBackdrop && onClose()}
            className="absolute inset-0 bg-black/70 backdrop-blur-[6px]"
          />

          <motion.div
            className={cn("fx-frame relative w-full", maxWidthClassName ?? "max-w-[560px]")}
            initial={reduceMotion ? false : { opacity: 0, scale: 0.985, y: 18 }}
            animate={{ opacity: 1, scale: 1, y: 0 }}
            exit={reduceMotion ? { opacity: 0 } : { opacity: 0, scale: 0.99, y: 10 }}
            transition={reduceMotion ? { duration: 0 } : { type: "spring", stiffness: 260, damping: 22 }}
          >
            <div role="dialog" aria-modal="true" aria-labelledby={title ? titleId : undefined} className="fx-glass rounded-[23px]">
              <div className="flex items-center justify-between gap-3 border-b border-white/10 px-6 py-4">
                <div id={titleId} className="truncate text-base font-semibold text-white/90">
                  {title}
                </div>
                <button
                  type="button"
                  onClick={onClose}
                  title="Закрыть"
                  className="flex h-9 w-9 shrink-0 items-center justify-center rounded-2xl border border-white/10 bg-white/[0.03] transition hover:bg-white/[0.06]"
                >
                  <X className="h-4 w-4 text-white/75" />
                </button>
              </div>

              <div className="p-6">{children}</div>

              {footer ? <div className="flex justify-end gap-2 border-t border-white/10 px-6 py-4">{footer}</div> : null}
            </div>
          </motion.div>
        </motion.div>
      ) : null}
    </AnimatePresence>,
    document.body
  );
}
