import { jsonOk, readJsonBody, routeErrorToResponse } from "@/lib/http";
import { errorMessage, logger } from "@/lib/observability/logger";
import { parseProcessRequest } from "@/lib/providers/contracts";
import { audioServiceRouter } from "@/lib/providers/registry";

export const runtime = "nodejs";

const log = logger.child({ route: "/process" });

export async function POST(request: Request) {
  try {
    const body = parseProcessRequest(await readJsonBody(request));
    log.info("Processing audio", { serviceType: body.service_type });
    const job = await audioServiceRouter.process(body, { signal: request.signal });
    return jsonOk(job);
  } catch (error) {
    log.error("Audio processing failed", { error: errorMessage(error) });
    return routeErrorToResponse(error);
  }
}
