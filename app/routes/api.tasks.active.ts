import type { RouteArgs } from "~/lib/http/route";
import { serializeTask, toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiActiveTasks" });

export async function loader({ actor, runtime }: RouteArgs) {
  try {
    const tasks = runtime.dispatcher.listActive(actor).map(serializeTask);
    return Response.json({ tasks, total: tasks.length });
  } catch (error) {
    return toErrorResponse(error, log, "list active tasks failed", "Failed to fetch active tasks");
  }
}
