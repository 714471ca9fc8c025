import type { RouteArgs } from "~/lib/http/route";
import { requireAdmin } from "~/lib/http/route";
import { toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiWorkerPause" });

export async function action({ actor, runtime }: RouteArgs) {
  try {
    requireAdmin(actor);
    runtime.worker.pause();

    return Response.json({
      success: true,
      status: runtime.worker.status(),
    });
  } catch (error) {
    return toErrorResponse(error, log, "pause worker failed", "Failed to pause worker");
  }
}
