import type { RouteArgs } from "~/lib/http/route";
import { requireAdmin } from "~/lib/http/route";
import { toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiTaskStats" });

export async function loader({ actor, runtime }: RouteArgs) {
  try {
    requireAdmin(actor);
    return Response.json(runtime.stats());
  } catch (error) {
    return toErrorResponse(error, log, "get task stats failed", "Failed to fetch task statistics");
  }
}
