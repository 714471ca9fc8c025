import { route, type RouteConfig } from "~/lib/http/route";
import * as bucketDelete from "./routes/api.tasks.bucket-delete.$bucket";
import * as prefixDelete from "./routes/api.tasks.prefix-delete.$bucket";
import * as bulkDelete from "./routes/api.tasks.bulk-delete";
import * as calculateSize from "./routes/api.tasks.calculate-size";
import * as activeTasks from "./routes/api.tasks.active";
import * as taskStats from "./routes/api.tasks.stats";
import * as workerStatus from "./routes/api.tasks.worker.status";
import * as workerPause from "./routes/api.tasks.worker.pause";
import * as workerResume from "./routes/api.tasks.worker.resume";
import * as taskProgress from "./routes/api.tasks.$id.progress";
import * as taskCancel from "./routes/api.tasks.$id.cancel";

export default [
  // Task starts
  route("post", "/api/tasks/bucket-delete/:bucket", bucketDelete.action),
  route("post", "/api/tasks/prefix-delete/:bucket", prefixDelete.action),
  route("post", "/api/tasks/bulk-delete", bulkDelete.action),
  route("post", "/api/tasks/calculate-size", calculateSize.action),

  // Polling and cancellation
  route("get", "/api/tasks/active", activeTasks.loader),
  route("get", "/api/tasks/:id/progress", taskProgress.loader),
  route("delete", "/api/tasks/:id/cancel", taskCancel.action),

  // Admin
  route("get", "/api/tasks/stats", taskStats.loader),
  route("get", "/api/tasks/worker/status", workerStatus.loader),
  route("post", "/api/tasks/worker/pause", workerPause.action),
  route("post", "/api/tasks/worker/resume", workerResume.action),
] satisfies RouteConfig;
