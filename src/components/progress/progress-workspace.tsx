"use client";

import { useState } from "react";
import type { FormEvent } from "react";
import { useMutation } from "@tanstack/react-query";
import { Download, KeyRound, Loader2, RefreshCw, TriangleAlert } from "lucide-react";

import { AdditionalGraphs } from "@/components/progress/additional-graphs";
import { AveragedInsights } from "@/components/progress/averaged-insights";
import { BestDays } from "@/components/progress/best-days";
import { DailyGoalProgress } from "@/components/progress/daily-goal-progress";
import { ExpectedMilestones } from "@/components/progress/expected-milestones";
import { ScorecardGrid } from "@/components/progress/metric-card";
import { ProjectedGrowth } from "@/components/progress/projected-growth";
import { SectionTitle } from "@/components/progress/section-title";
import { SurfaceCard } from "@/components/progress/surface-card";
import type { DashboardVisualModel } from "@/types/dashboard";

const TOKEN_MISSING_MESSAGE = "Please enter your bearer token to fetch data.";

async function readErrorMessage(response: Response, fallback: string): Promise<string> {
  const contentType = response.headers.get("content-type") ?? "";

  if (contentType.includes("application/json")) {
    try {
      const payload = (await response.json()) as { error?: string; details?: string };
      if (payload.error && payload.details) {
        return `${payload.error} (${payload.details})`;
      }
      return payload.error ?? fallback;
    } catch {
      return fallback;
    }
  }

  return fallback;
}

/** The browser's calendar day, so "today" matches what the viewer sees. */
function localIsoDate(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

function postJson(path: string, token: string): Promise<Response> {
  return fetch(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ token, today: localIsoDate() })
  });
}

export function ProgressWorkspace() {
  const [token, setToken] = useState("");
  const [warning, setWarning] = useState<string | null>(null);

  const progressMutation = useMutation({
    mutationFn: async (bearerToken: string) => {
      const response = await postJson("/api/progress", bearerToken);
      if (!response.ok) {
        throw new Error(await readErrorMessage(response, "Failed to fetch data from the provider API."));
      }
      return (await response.json()) as DashboardVisualModel;
    }
  });

  const exportMutation = useMutation({
    mutationFn: async (bearerToken: string) => {
      const response = await postJson("/api/progress/export", bearerToken);
      if (!response.ok) {
        throw new Error(await readErrorMessage(response, "Failed to export progress data."));
      }
      return response.blob();
    },
    onSuccess: (blob) => {
      const url = URL.createObjectURL(blob);
      const anchor = document.createElement("a");
      anchor.href = url;
      anchor.download = "immersion_progress.csv";
      anchor.click();
      URL.revokeObjectURL(url);
    }
  });

  const onSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const trimmed = token.trim();
    if (!trimmed) {
      setWarning(TOKEN_MISSING_MESSAGE);
      return;
    }
    setWarning(null);
    progressMutation.mutate(trimmed);
  };

  const onExport = () => {
    const trimmed = token.trim();
    if (!trimmed) {
      setWarning(TOKEN_MISSING_MESSAGE);
      return;
    }
    setWarning(null);
    exportMutation.mutate(trimmed);
  };

  const model = progressMutation.data;
  const errorMessage = progressMutation.error?.message ?? exportMutation.error?.message ?? null;

  return (
    <main className="workspace">
      <header className="workspace-header">
        <h1>Immersion Progress Dashboard</h1>
        {model?.dataRangeLabel ? <p className="workspace-caption">{model.dataRangeLabel}</p> : null}
      </header>

      <SurfaceCard soft>
        <form className="token-form" onSubmit={onSubmit}>
          <label htmlFor="bearer-token">
            <KeyRound className="inline-icon" /> Bearer token
          </label>
          <input
            id="bearer-token"
            type="password"
            autoComplete="off"
            value={token}
            onChange={(event) => setToken(event.target.value)}
          />
          <button type="submit" disabled={progressMutation.isPending}>
            {progressMutation.isPending ? <Loader2 className="inline-icon spin" /> : <RefreshCw className="inline-icon" />}
            Go
          </button>
          <button type="button" onClick={onExport} disabled={exportMutation.isPending || !model?.hasData}>
            <Download className="inline-icon" /> Export CSV
          </button>
        </form>
        {warning ? (
          <p className="notice notice-warning">
            <TriangleAlert className="inline-icon" /> {warning}
          </p>
        ) : null}
        {errorMessage ? <p className="notice notice-error">{errorMessage}</p> : null}
      </SurfaceCard>

      {model && !model.hasData ? (
        <SurfaceCard>
          <p className="empty-copy">No immersion data recorded yet.</p>
        </SurfaceCard>
      ) : null}

      {model?.hasData ? (
        <>
          <SurfaceCard>
            <SectionTitle title="Basic Stats" />
            <ScorecardGrid scorecards={model.basicStats} columns={4} />
          </SurfaceCard>
          <DailyGoalProgress model={model.dailyGoal} />
          <ProjectedGrowth model={model.projectedGrowth} />
          <AdditionalGraphs model={model} />
          <ExpectedMilestones rows={model.milestoneTable} progress={model.progressOverview} />
          <SurfaceCard>
            <SectionTitle title="Insights" />
            <ScorecardGrid scorecards={model.insights} columns={3} />
          </SurfaceCard>
          <BestDays rows={model.bestDays} />
          <AveragedInsights tabs={model.averagedInsights} />
        </>
      ) : null}
    </main>
  );
}
