import type { RouteArgs } from "~/lib/http/route";
import { requireAdmin } from "~/lib/http/route";
import { toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiWorkerStatus" });

export async function loader({ actor, runtime }: RouteArgs) {
  try {
    requireAdmin(actor);
    return Response.json(runtime.worker.status());
  } catch (error) {
    return toErrorResponse(error, log, "get worker status failed", "Failed to fetch worker status");
  }
}
