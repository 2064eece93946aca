import { NextResponse } from "next/server";
import { z } from "zod";

import { ProviderAuthError, ProviderRequestError } from "@/lib/integrations/immersion-client";
import { isIsoDate } from "@/lib/utils/calendar";
import { logError } from "@/lib/utils/logger";

export const progressRequestSchema = z.object({
  token: z.string().trim().min(1, "Please enter your bearer token to fetch data."),
  today: z.string().refine(isIsoDate, "today must be YYYY-MM-DD").optional()
});

export type ProgressRequest = z.infer<typeof progressRequestSchema>;

export async function readProgressRequest(
  request: Request
): Promise<{ ok: true; data: ProgressRequest } | { ok: false; response: NextResponse }> {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    payload = null;
  }

  const parsed = progressRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      response: NextResponse.json(
        {
          error: "Invalid request: a bearer token is required.",
          issues: parsed.error.issues
        },
        { status: 400 }
      )
    };
  }

  return { ok: true, data: parsed.data };
}

export function progressErrorResponse(error: unknown, route: string): NextResponse {
  if (error instanceof ProviderAuthError) {
    return NextResponse.json(
      {
        error:
          "Failed to fetch data from the provider API. Please check your bearer token, ensuring it doesn't contain anything extra such as 'token:' at the beginning.",
        details: error.message
      },
      { status: 401 }
    );
  }

  if (error instanceof ProviderRequestError) {
    logError(error, { route, endpoint: error.url, status: error.status ?? undefined });
    return NextResponse.json(
      {
        error: "Failed to fetch data from the provider API.",
        details: error.message
      },
      { status: 502 }
    );
  }

  const normalized = error instanceof Error ? error : new Error(String(error));
  logError(normalized, { route });
  return NextResponse.json(
    {
      error: "Failed to compute progress statistics.",
      details: normalized.message
    },
    { status: 500 }
  );
}
