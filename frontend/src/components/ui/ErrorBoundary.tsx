// src/components/ui/ErrorBoundary.tsx
import React from "react";
import { RotateCcw, TriangleAlert } from "lucide-react";
import Button from "./Button";

type Props = {
  children: React.ReactNode;
  title?: string;
  onGoHome?: () => void;
};

type State = { hasError: boolean; message?: string };

export default class ErrorBoundary extends React.Component<Props, State> {
  state: State = { hasError: false };

  static getDerivedStateFromError(err: unknown): State {
    return { hasError: true, message: err instanceof Error ? err.message : String(err) };
  }

  componentDidCatch(error: unknown, info: React.ErrorInfo) {
    console.error("UI ErrorBoundary:", error, info.componentStack);
  }

  private reset = () => {
    this.setState({ hasError: false, message: undefined });
    this.props.onGoHome?.();
  };

  render() {
    if (!this.state.hasError) return this.props.children;

    return (
      <div className="fx-frame mx-auto max-w-3xl">
        <div className="fx-card">
          <div className="flex items-start gap-4">
            <TriangleAlert className="mt-1 h-8 w-8 shrink-0 text-orange-300" />
            <div className="min-w-0 flex-1">
              <div className="text-lg font-semibold text-white/90">{this.props.title ?? "Страница упала при отрисовке"}</div>
              <div className="mt-1 text-sm text-white/60">Данные на сервере не затронуты. Сообщение:</div>
            </div>
          </div>

          <pre className="mt-4 whitespace-pre-wrap rounded-2xl border border-white/10 bg-black/25 p-4 text-xs text-white/80">
            {this.state.message || "—"}
          </pre>

          <div className="mt-5 flex flex-wrap gap-2">
            <Button variant="primary" leftIcon={<RotateCcw className="h-4 w-4" />} onClick={() => window.location.reload()}>
              Перезагрузить
            </Button>
            <Button onClick={this.reset}>На загрузку</Button>
          </div>
        </div>
      </div>
    );
  }
}
