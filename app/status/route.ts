import { jsonOk, readJsonBody } from "@/lib/http";
import { errorMessage, logger } from "@/lib/observability/logger";
import { audioServiceRouter } from "@/lib/providers/registry";

export const runtime = "nodejs";

const log = logger.child({ route: "/status" });

// Always answers 200; failures travel in the body.
export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await readJsonBody(request);
  } catch (error) {
    const message = errorMessage(error);
    log.error("Status check failed", { jobId: null, error: message });
    return jsonOk({ success: false, status: "failed", job_id: null, error: message });
  }
  return jsonOk(await audioServiceRouter.checkStatus(body, { signal: request.signal }));
}
