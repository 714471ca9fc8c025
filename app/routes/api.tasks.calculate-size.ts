import type { RouteArgs } from "~/lib/http/route";
import { readJsonObject } from "~/lib/http/route";
import { acceptedJson, toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiCalculateSize" });

export async function action({ body, actor, runtime }: RouteArgs) {
  try {
    const started = await runtime.dispatcher.start("calculate-size", readJsonObject(body), actor);
    return acceptedJson(started);
  } catch (error) {
    return toErrorResponse(error, log, "start size calculation failed", "Failed to start size calculation");
  }
}
