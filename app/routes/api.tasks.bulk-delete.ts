import type { RouteArgs } from "~/lib/http/route";
import { readJsonObject } from "~/lib/http/route";
import { acceptedJson, toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiBulkDelete" });

export async function action({ body, actor, runtime }: RouteArgs) {
  try {
    const started = await runtime.dispatcher.start("bulk-delete", readJsonObject(body), actor);
    return acceptedJson(started);
  } catch (error) {
    return toErrorResponse(error, log, "start bulk delete failed", "Failed to start bulk deletion");
  }
}
