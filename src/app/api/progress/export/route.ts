import { buildDerivedSeriesCsv, CSV_EXPORT_FILENAME } from "@/lib/export/csv-export";
import { reloadProgressContext } from "@/lib/domain/progress-context";
import { ImmersionClient } from "@/lib/integrations/immersion-client";
import { progressErrorResponse, readProgressRequest } from "../request";

export const runtime = "nodejs";

export async function POST(request: Request) {
  const parsed = await readProgressRequest(request);
  if (!parsed.ok) {
    return parsed.response;
  }

  try {
    const context = await reloadProgressContext(new ImmersionClient(), parsed.data.token, { today: parsed.data.today });
    return new Response(buildDerivedSeriesCsv(context.derived), {
      status: 200,
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": `attachment; filename="${CSV_EXPORT_FILENAME}"`
      }
    });
  } catch (error) {
    return progressErrorResponse(error, "/api/progress/export");
  }
}
