export const SERVICE_TYPES = ["mastering_full", "mixing_full", "mix_enhance", "mix_analysis", "cleanup"] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

export type ProcessRequest = {
  service_type: ServiceType;
  file_url: string;
  musical_style: string;
  webhook_url?: string;
  parameters: Record<string, unknown>;
};

export type StatusRequest = {
  job_id: string;
  service_type: ServiceType;
};

export type UploadUrlRequest = {
  file_name: string;
  content_type: string;
};

export type JobCreatedResponse = {
  success: true;
  job_id: string;
  service_type: ServiceType;
  status: "processing";
};

export type CompletedPayload =
  | { download_url: string | null }
  | { analysis_data: Record<string, unknown> }
  | { cleanup_data: Record<string, unknown> };

export type JobStatusResponse =
  | ({
      success: true;
      status: "completed";
      job_id: string;
      service_type: ServiceType;
      result: Record<string, unknown>;
    } & CompletedPayload)
  | {
      success: true;
      status: "processing";
      job_id: string;
    }
  | {
      success: false;
      status: "failed";
      job_id: string | null;
      error: string;
    };

export type ProviderClientConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
};

export type ProviderCallOptions = {
  signal?: AbortSignal;
};

export type ProviderReply = {
  status: number;
  body: Record<string, unknown>;
  /** Decoded reply as sent: parsed JSON of any shape, or the text. */
  data: unknown;
};

export type ProviderClient = {
  /** Throws `ProviderHttpError` on non-2xx. */
  postJson: (path: string, payload: unknown, options?: ProviderCallOptions) => Promise<Record<string, unknown>>;
  /** Like `postJson`, but resolves to the reply exactly as decoded. */
  postForward: (path: string, payload: unknown, options?: ProviderCallOptions) => Promise<unknown>;
  /** Resolves on any HTTP status; the caller reads `status`. */
  get: (path: string, options?: ProviderCallOptions) => Promise<ProviderReply>;
};

export type ServiceAdapter<S extends ServiceType = ServiceType> = {
  serviceType: S;
  createPath: string;
  taskIdField: string;
  statusPath: (jobId: string) => string;
  buildPayload: (request: ProcessRequest) => Record<string, unknown>;
  completedPayload: (body: Record<string, unknown>) => CompletedPayload;
};

export type ServiceAdapterTable = {
  [S in ServiceType]: ServiceAdapter<S>;
};
