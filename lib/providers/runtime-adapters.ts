import type { CompletedPayload, ProcessRequest, ServiceAdapter, ServiceAdapterTable, ServiceType } from "@/lib/providers/types";
import { parseCleanupParameters, parseMasteringParameters, parseMixingParameters } from "@/lib/providers/contracts";

function stringField(body: Record<string, unknown>, field: string) {
  const value = body[field];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function createAdapter<S extends ServiceType>(params: {
  serviceType: S;
  basePath: string;
  taskIdField: string;
  buildPayload: (request: ProcessRequest) => Record<string, unknown>;
  completedPayload: (body: Record<string, unknown>) => CompletedPayload;
}): ServiceAdapter<S> {
  return {
    serviceType: params.serviceType,
    createPath: params.basePath,
    taskIdField: params.taskIdField,
    statusPath: (jobId) => `${params.basePath}/${encodeURIComponent(jobId)}`,
    buildPayload: params.buildPayload,
    completedPayload: params.completedPayload
  };
}

export function createMasteringAdapter() {
  return createAdapter({
    serviceType: "mastering_full",
    basePath: "/mastering/preview",
    taskIdField: "mastering_task_id",
    buildPayload(request) {
      const parameters = parseMasteringParameters(request.parameters);
      return {
        track_url: request.file_url,
        musical_style: request.musical_style,
        desired_loudness: parameters.desired_loudness ?? "MEDIUM",
        sample_rate: parameters.sample_rate ?? "44100"
      };
    },
    completedPayload: (body) => ({ download_url: stringField(body, "download_url_mastered_preview") })
  });
}

export function createMixingAdapter() {
  return createAdapter({
    serviceType: "mixing_full",
    basePath: "/mix/preview",
    taskIdField: "multitrack_task_id",
    buildPayload(request) {
      const parameters = parseMixingParameters(request.parameters);
      // single-track mix: the uploaded file is treated as the lead vocal
      return {
        track_data: [
          {
            track_url: request.file_url,
            instrument_group: parameters.instrument_group ?? "VOCAL_GROUP",
            presence_setting: parameters.presence_setting ?? "LEAD",
            pan_preference: parameters.pan_preference ?? "CENTRE",
            reverb_preference: parameters.reverb_preference ?? "LOW"
          }
        ],
        musical_style: request.musical_style,
        return_stems: parameters.return_stems ?? false
      };
    },
    completedPayload: (body) => ({ download_url: stringField(body, "preview_mix_url") })
  });
}

export function createEnhanceAdapter() {
  return createAdapter({
    serviceType: "mix_enhance",
    basePath: "/enhance",
    taskIdField: "enhance_task_id",
    buildPayload: (request) => ({ track_url: request.file_url }),
    completedPayload: (body) => ({ download_url: stringField(body, "download_url_enhanced_mix") })
  });
}

export function createAnalysisAdapter() {
  return createAdapter({
    serviceType: "mix_analysis",
    basePath: "/analysis",
    taskIdField: "analysis_task_id",
    buildPayload: (request) => ({ track_url: request.file_url }),
    completedPayload: (body) => ({ analysis_data: body })
  });
}

export function createCleanupAdapter() {
  return createAdapter({
    serviceType: "cleanup",
    basePath: "/cleanup",
    taskIdField: "cleanup_task_id",
    buildPayload(request) {
      const parameters = parseCleanupParameters(request.parameters);
      return {
        audio_file_location: request.file_url,
        sound_source: parameters.sound_source ?? "VOCAL_GROUP"
      };
    },
    completedPayload: (body) => ({ cleanup_data: body })
  });
}

export function createServiceAdapters(): ServiceAdapterTable {
  return {
    mastering_full: createMasteringAdapter(),
    mixing_full: createMixingAdapter(),
    mix_enhance: createEnhanceAdapter(),
    mix_analysis: createAnalysisAdapter(),
    cleanup: createCleanupAdapter()
  };
}
