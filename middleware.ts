import { NextResponse, type NextRequest } from "next/server";

const DEFAULT_ALLOWED_METHODS = "GET, POST, OPTIONS";

function corsHeaders(request: NextRequest) {
  const origin = request.headers.get("origin");
  return {
    "Access-Control-Allow-Origin": origin ?? "*",
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": request.headers.get("access-control-request-method") ?? DEFAULT_ALLOWED_METHODS,
    "Access-Control-Allow-Headers": request.headers.get("access-control-request-headers") ?? "*",
    ...(origin ? { Vary: "Origin" } : {})
  };
}

export function middleware(request: NextRequest) {
  const headers = corsHeaders(request);
  if (request.method === "OPTIONS") {
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  for (const [name, value] of Object.entries(headers)) {
    response.headers.set(name, value);
  }
  return response;
}

export const config = {
  matcher: ["/health", "/process", "/status", "/upload/:path*"]
};
