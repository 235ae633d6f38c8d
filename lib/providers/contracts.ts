import { z } from "zod";
import { UnsupportedServiceTypeError } from "@/lib/errors";
import {
  SERVICE_TYPES,
  type ProcessRequest,
  type ServiceType,
  type StatusRequest,
  type UploadUrlRequest
} from "@/lib/providers/types";

export const DEFAULT_MUSICAL_STYLE = "POP";

const emptyToUndefined = (value: unknown) => (value === null || value === "" ? undefined : value);

const ProviderEnumValue = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toUpperCase());

const ProcessRequestSchema = z.object({
  service_type: z.string().trim().min(1),
  file_url: z.string().trim().url(),
  musical_style: z.preprocess(emptyToUndefined, ProviderEnumValue.default(DEFAULT_MUSICAL_STYLE)),
  webhook_url: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  parameters: z.preprocess(
    (value) => (value === null ? undefined : value),
    z.record(z.string(), z.unknown()).default({})
  )
});

const StatusRequestSchema = z.object({
  job_id: z.string().trim().min(1),
  service_type: z.string().trim().min(1)
});

const UploadUrlRequestSchema = z.object({
  file_name: z.string().trim().min(1).max(255),
  content_type: z.string().trim().min(3).max(255)
});

const MasteringParametersSchema = z.object({
  desired_loudness: ProviderEnumValue.optional(),
  sample_rate: z
    .union([z.string().trim().regex(/^\d+$/, "sample_rate must be numeric"), z.number().int().positive()])
    .transform((value) => String(value))
    .optional()
});

const MixingParametersSchema = z.object({
  instrument_group: ProviderEnumValue.optional(),
  presence_setting: ProviderEnumValue.optional(),
  pan_preference: ProviderEnumValue.optional(),
  reverb_preference: ProviderEnumValue.optional(),
  return_stems: z.boolean().optional()
});

const CleanupParametersSchema = z.object({
  sound_source: ProviderEnumValue.optional()
});

export type MasteringParameters = z.infer<typeof MasteringParametersSchema>;
export type MixingParameters = z.infer<typeof MixingParametersSchema>;
export type CleanupParameters = z.infer<typeof CleanupParametersSchema>;

export function isServiceType(value: string): value is ServiceType {
  return SERVICE_TYPES.some((serviceType) => serviceType === value);
}

export function parseServiceType(value: string): ServiceType {
  if (!isServiceType(value)) {
    throw new UnsupportedServiceTypeError(value);
  }
  return value;
}

export function parseProcessRequest(input: unknown): ProcessRequest {
  const parsed = ProcessRequestSchema.parse(input);
  return {
    ...parsed,
    service_type: parseServiceType(parsed.service_type)
  };
}

export function parseStatusRequest(input: unknown): StatusRequest {
  const parsed = StatusRequestSchema.parse(input);
  return {
    job_id: parsed.job_id,
    service_type: parseServiceType(parsed.service_type)
  };
}

export function parseUploadUrlRequest(input: unknown): UploadUrlRequest {
  return UploadUrlRequestSchema.parse(input);
}

export function parseMasteringParameters(parameters: Record<string, unknown>): MasteringParameters {
  return MasteringParametersSchema.parse(parameters);
}

export function parseMixingParameters(parameters: Record<string, unknown>): MixingParameters {
  return MixingParametersSchema.parse(parameters);
}

export function parseCleanupParameters(parameters: Record<string, unknown>): CleanupParameters {
  return CleanupParametersSchema.parse(parameters);
}
