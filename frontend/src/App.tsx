// src/App.tsx
import React from "react";
import { Navigate, Route, Routes, useLocation, useNavigate } from "react-router-dom";

import AppHeader from "./components/AppHeader";
import UploadPage from "./pages/UploadPage";
import ResultPage from "./pages/ResultPage";
import HistoryPage from "./pages/HistoryPage";
import TaskPage from "./pages/TaskPage";
import AnnotatePage from "./pages/AnnotatePage";
import ModelPage from "./pages/ModelPage";

import ToastCenter from "./components/ui/ToastCenter";
import ErrorBoundary from "./components/ui/ErrorBoundary";

export default function App() {
  const nav = useNavigate();
  const loc = useLocation();

  return (
    <div className="app-shell">
      <div className="app-bg-layer" aria-hidden />
      <div className="app-bg-lines" aria-hidden />

      <ToastCenter />

      <div className="app-scroll">
        <AppHeader onHome={() => nav("/upload")} />

        <div className="app-main">
          <ErrorBoundary onGoHome={() => nav("/upload")}>
            <div key={loc.pathname} className="page-fade">
              <Routes>
                <Route path="/" element={<Navigate to="/upload" replace />} />
                <Route path="/upload" element={<UploadPage />} />
                <Route path="/result" element={<ResultPage />} />
                <Route path="/history" element={<HistoryPage />} />
                <Route path="/tasks/:taskId" element={<TaskPage />} />
                <Route path="/tasks/:taskId/images/:imageId/annotate" element={<AnnotatePage />} />
                <Route path="/model" element={<ModelPage />} />
                <Route path="*" element={<Navigate to="/upload" replace />} />
              </Routes>
            </div>
          </ErrorBoundary>

          <footer className="app-footer">LineGuard · обследование воздушных линий электропередачи</footer>
        </div>
      </div>
    </div>
  );
}
