import { jsonOk } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return jsonOk({
    status: "healthy",
    timestamp: new Date().toISOString()
  });
}
