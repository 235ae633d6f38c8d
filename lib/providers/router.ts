import { ZodError } from "zod";
import { ProviderResponseError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/observability/logger";
import { parseStatusRequest } from "@/lib/providers/contracts";
import { createServiceAdapters } from "@/lib/providers/runtime-adapters";
import type {
  JobCreatedResponse,
  JobStatusResponse,
  ProcessRequest,
  ProviderCallOptions,
  ProviderClient,
  ServiceAdapterTable,
  UploadUrlRequest
} from "@/lib/providers/types";

function readTaskId(body: Record<string, unknown>, field: string) {
  const value = body[field];
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function jobIdHint(input: unknown) {
  if (typeof input === "object" && input !== null && "job_id" in input) {
    const jobId = input.job_id;
    return typeof jobId === "string" ? jobId : null;
  }
  return null;
}

function describeFailure(error: unknown) {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return errorMessage(error);
}

export function createAudioServiceRouter(params: { client: ProviderClient; adapters?: ServiceAdapterTable }) {
  const adapters = params.adapters ?? createServiceAdapters();
  const client = params.client;

  async function processAudio(request: ProcessRequest, options?: ProviderCallOptions): Promise<JobCreatedResponse> {
    const adapter = adapters[request.service_type];
    const payload = adapter.buildPayload(request);
    logger.info("Dispatching audio job", {
      serviceType: request.service_type,
      path: adapter.createPath,
      webhookUrl: request.webhook_url ?? null
    });

    const body = await client.postJson(adapter.createPath, payload, options);
    const jobId = readTaskId(body, adapter.taskIdField);
    if (!jobId) {
      throw new ProviderResponseError(`Provider response missing ${adapter.taskIdField}`);
    }

    logger.info("Audio job created", { serviceType: request.service_type, jobId });
    return {
      success: true,
      job_id: jobId,
      service_type: request.service_type,
      status: "processing"
    };
  }

  /**
   * Reads the provider's view of a job and relabels it. Every failure, including
   * an invalid request, is folded into a `failed` result instead of thrown.
   */
  async function checkStatus(input: unknown, options?: ProviderCallOptions): Promise<JobStatusResponse> {
    const hintedJobId = jobIdHint(input);
    try {
      const request = parseStatusRequest(input);
      const adapter = adapters[request.service_type];
      logger.info("Checking job status", { jobId: request.job_id, serviceType: request.service_type });

      const reply = await client.get(adapter.statusPath(request.job_id), options);
      if (reply.status === 200) {
        return {
          success: true,
          status: "completed",
          job_id: request.job_id,
          service_type: request.service_type,
          result: reply.body,
          ...adapter.completedPayload(reply.body)
        };
      }
      if (reply.status === 202) {
        return { success: true, status: "processing", job_id: request.job_id };
      }
      return { success: false, status: "failed", job_id: request.job_id, error: `HTTP ${reply.status}` };
    } catch (error) {
      const message = describeFailure(error);
      logger.error("Status check failed", { jobId: hintedJobId, error: message });
      return { success: false, status: "failed", job_id: hintedJobId, error: message };
    }
  }

  async function createUploadUrl(request: UploadUrlRequest, options?: ProviderCallOptions) {
    logger.info("Requesting signed upload url", { fileName: request.file_name, contentType: request.content_type });
    return client.postForward("/upload", { filename: request.file_name, contentType: request.content_type }, options);
  }

  return { process: processAudio, checkStatus, createUploadUrl };
}

export type AudioServiceRouter = ReturnType<typeof createAudioServiceRouter>;
