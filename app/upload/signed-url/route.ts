import { jsonOk, readJsonBody, routeErrorToResponse } from "@/lib/http";
import { errorMessage, logger } from "@/lib/observability/logger";
import { parseUploadUrlRequest } from "@/lib/providers/contracts";
import { audioServiceRouter } from "@/lib/providers/registry";

export const runtime = "nodejs";

const log = logger.child({ route: "/upload/signed-url" });

export async function POST(request: Request) {
  try {
    const body = parseUploadUrlRequest(await readJsonBody(request));
    const providerBody = await audioServiceRouter.createUploadUrl(body, { signal: request.signal });
    return jsonOk(providerBody);
  } catch (error) {
    log.error("Upload URL generation failed", { error: errorMessage(error) });
    return routeErrorToResponse(error);
  }
}
