import { z } from "zod";
import { describe, expect, it } from "vitest";
import { ProviderHttpError, ProviderTimeoutError, UnsupportedServiceTypeError } from "@/lib/errors";
import { readJsonBody, routeErrorToResponse } from "@/lib/http";

describe("http route error mapping", () => {
  it("maps validation errors to HTTP 400 with flattened details", async () => {
    const result = z.object({ file_url: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) {
      return;
    }

    const response = routeErrorToResponse(result.error);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      detail: "Validation failed",
      errors: { formErrors: [], fieldErrors: { file_url: ["Required"] } }
    });
  });

  it("maps unsupported service types to HTTP 400", async () => {
    const response = routeErrorToResponse(new UnsupportedServiceTypeError("stems"));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Unsupported service type: stems" });
  });

  it("maps upstream failures to HTTP 500 with the error text", async () => {
    const http = routeErrorToResponse(new ProviderHttpError(502, {}));
    expect(http.status).toBe(500);
    expect(await http.json()).toEqual({ detail: "Provider HTTP 502" });

    const timeout = routeErrorToResponse(new ProviderTimeoutError(1000));
    expect(await timeout.json()).toEqual({ detail: "Provider request timed out after 1000ms" });
  });

  it("maps non-error throwables to a generic HTTP 500", async () => {
    const response = routeErrorToResponse("boom");
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Unexpected error" });
  });

  it("reads an empty body as an empty object", async () => {
    const request = new Request("http://localhost/process", { method: "POST" });
    await expect(readJsonBody(request)).resolves.toEqual({});
  });
});
