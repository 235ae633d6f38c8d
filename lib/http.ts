import { ZodError } from "zod";
import { NextResponse } from "next/server";
import { InvalidRequestBodyError, UnsupportedServiceTypeError } from "@/lib/errors";

export function jsonError(message: string, status = 400, errors?: unknown) {
  return NextResponse.json(errors === undefined ? { detail: message } : { detail: message, errors }, { status });
}

export function jsonOk<T>(data: T, status = 200) {
  return NextResponse.json(data, { status });
}

export async function readJsonBody(request: Request): Promise<unknown> {
  const raw = await request.text();
  if (raw.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new InvalidRequestBodyError();
  }
}

export function routeErrorToResponse(error: unknown) {
  if (error instanceof ZodError) {
    return jsonError("Validation failed", 400, error.flatten());
  }
  if (error instanceof UnsupportedServiceTypeError || error instanceof InvalidRequestBodyError) {
    return jsonError(error.message, 400);
  }
  if (error instanceof Error) {
    return jsonError(error.message || "Unexpected error", 500);
  }
  return jsonError("Unexpected error", 500);
}
