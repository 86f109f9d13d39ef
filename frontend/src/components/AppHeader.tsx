// src/components/AppHeader.tsx
import React from "react";
import { Cpu, History, ScanSearch, Upload } from "lucide-react";
import { NavLink } from "react-router-dom";
import logo from "../brand/logo.svg";
import { useTaskProgressStore } from "../store/useTaskProgressStore";
import { cn } from "../utils/cn";
import { isFinalStatus } from "../utils/format";

type Props = { onHome: () => void };

const NAV = [
  { label: "Загрузка", to: "/upload", Icon: Upload },
  { label: "Результат", to: "/result", Icon: ScanSearch },
  { label: "История", to: "/history", Icon: History },
  { label: "Модель", to: "/model", Icon: Cpu },
] as const;

export default function AppHeader({ onHome }: Props) {
  // сколько отслеживаемых задач ещё в работе
  const running = useTaskProgressStore(
    (s) => s.followed.filter((id) => {
      const p = s.byTask[id];
      return !p || !isFinalStatus(p.status);
    }).length
  );

  return (
    <header className="sticky top-0 z-50 w-full border-b border-white/10 bg-[#070b12]/70 backdrop-blur-2xl">
      <div className="mx-auto flex max-w-[1400px] items-center gap-4 px-5 py-3">
        <button type="button" onClick={onHome} className="flex items-center gap-3" title="На загрузку">
          <img src={logo} alt="LineGuard" className="h-9 w-9" draggable={false} />
          <div className="text-left leading-tight">
            <div className="text-sm font-semibold text-white/90">LineGuard</div>
            <div className="text-[11px] text-white/45">дефекты ЛЭП по фото</div>
          </div>
        </button>

        <nav className="ml-auto flex items-center gap-1.5">
          {NAV.map(({ label, to, Icon }) => (
            <NavLink
              key={to}
              to={to}
              className={({ isActive }) =>
                cn(
                  "relative inline-flex items-center gap-2 rounded-2xl border px-3 py-2 text-sm transition",
                  isActive
                    ? "border-orange-300/30 bg-orange-500/15 text-white"
                    : "border-transparent text-white/65 hover:bg-white/[0.05] hover:text-white/85"
                )
              }
            >
              <Icon className="h-4 w-4" />
              <span className="hidden sm:inline">{label}</span>
              {to === "/history" && running > 0 ? (
                <span className="ml-0.5 rounded-full bg-orange-500/80 px-1.5 text-[10px] font-semibold tabular-nums text-white">
                  {running}
                </span>
              ) : null}
            </NavLink>
          ))}
        </nav>
      </div>
    </header>
  );
}
