import type { RouteArgs } from "~/lib/http/route";
import { requireAdmin } from "~/lib/http/route";
import { toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiWorkerResume" });

export async function action({ actor, runtime }: RouteArgs) {
  try {
    requireAdmin(actor);
    runtime.worker.resume();

    return Response.json({
      success: true,
      status: runtime.worker.status(),
    });
  } catch (error) {
    return toErrorResponse(error, log, "resume worker failed", "Failed to resume worker");
  }
}
