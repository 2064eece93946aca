import { NextResponse } from "next/server";

import { buildDashboardVisualModel } from "@/lib/domain/dashboard-visual-mappers";
import { reloadProgressContext } from "@/lib/domain/progress-context";
import { ImmersionClient } from "@/lib/integrations/immersion-client";
import { progressErrorResponse, readProgressRequest } from "./request";

export const runtime = "nodejs";

export async function POST(request: Request) {
  const parsed = await readProgressRequest(request);
  if (!parsed.ok) {
    return parsed.response;
  }

  try {
    const context = await reloadProgressContext(new ImmersionClient(), parsed.data.token, { today: parsed.data.today });
    return NextResponse.json(buildDashboardVisualModel(context));
  } catch (error) {
    return progressErrorResponse(error, "/api/progress");
  }
}
