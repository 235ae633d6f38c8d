import { afterEach, describe, expect, it, vi } from "vitest";
import { POST } from "@/app/upload/signed-url/route";

function uploadRequest(body: unknown) {
  return new Request("http://localhost/upload/signed-url", {
    method: "POST",
    headers: {
      "content-type": "application/json"
    },
    body: JSON.stringify(body)
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("POST /upload/signed-url", () => {
  it("returns the provider body unmodified", async () => {
    const providerBody = {
      signed_url: "https://storage.provider.test/put/take1.wav?sig=placeholder",
      readable_url: "https://storage.provider.test/get/take1.wav"
    };
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify(providerBody), {
        status: 200,
        headers: {
          "content-type": "application/json"
        }
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await POST(uploadRequest({ file_name: "take1.wav", content_type: "audio/wav" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(providerBody);
    const [url, options] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("https://provider.test/v1/upload");
    expect(JSON.parse(String(options.body))).toEqual({ filename: "take1.wav", contentType: "audio/wav" });
  });

  it("rejects a request without a file name", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const response = await POST(uploadRequest({ content_type: "audio/wav" }));

    expect(response.status).toBe(400);
    expect((await response.json()).detail).toBe("Validation failed");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps a provider failure to HTTP 500", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("denied", { status: 401 })));

    const response = await POST(uploadRequest({ file_name: "take1.wav", content_type: "audio/wav" }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Provider HTTP 401" });
  });

  it("passes a non-object reply through without wrapping it", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response(JSON.stringify(["https://storage.provider.test/put/take1.wav"]), {
          status: 200,
          headers: {
            "content-type": "application/json"
          }
        })
      )
    );

    const response = await POST(uploadRequest({ file_name: "take1.wav", content_type: "audio/wav" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(["https://storage.provider.test/put/take1.wav"]);
  });

  it("passes a text reply through as a json string", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("https://storage.provider.test/put/take1.wav", { status: 200 }))
    );

    const response = await POST(uploadRequest({ file_name: "take1.wav", content_type: "audio/wav" }));

    expect(await response.json()).toBe("https://storage.provider.test/put/take1.wav");
  });
});
