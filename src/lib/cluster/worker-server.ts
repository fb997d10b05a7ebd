import * as http from "node:http";
import { z } from "zod";
import { ClusterError, ConfigurationError, errorMessage } from "../errors";
import { createLogger } from "../utils/logger";
import type { DistributedCoordinator } from "./coordinator";

const log = createLogger("worker-node");

const MAX_BODY_BYTES = 1_000_000;

const submitSchema = z.object({
  jobId: z.string().min(1).optional(),
  inputDir: z.string().min(1),
  outputDir: z.string().min(1).optional(),
});

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown) {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new ConfigurationError("payload_too_large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      try {
        resolve(chunks.length ? JSON.parse(Buffer.concat(chunks).toString("utf-8")) : {});
      } catch (err) {
        reject(new ConfigurationError(`invalid JSON body: ${errorMessage(err)}`));
      }
    });
    req.on("error", reject);
  });
}

function statusFor(err: unknown): number {
  if (err instanceof ConfigurationError) return 400;
  if (err instanceof ClusterError) return 503;
  return 500;
}

/**
 * HTTP face of a worker node. Jobs run on the node's own local cluster and
 * paths are resolved on the node's filesystem.
 */
export function createWorkerServer(coordinator: DistributedCoordinator): http.Server {
  return http.createServer((req, res) => {
    handle(coordinator, req, res).catch((err) => {
      log.error(`${req.method} ${req.url} failed`, err);
      if (!res.headersSent) sendJson(res, statusFor(err), { error: errorMessage(err) });
    });
  });
}

async function handle(
  coordinator: DistributedCoordinator,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) {
  const url = new URL(req.url ?? "/", "http://localhost");
  const jobMatch = /^\/jobs\/([^/]+)$/.exec(url.pathname);

  if (req.method === "GET" && url.pathname === "/health") {
    const cluster = coordinator.getClusterInfo();
    sendJson(res, 200, {
      status: "ok",
      cluster: cluster
        ? {
            workers: cluster.workers,
            threadsPerWorker: cluster.threadsPerWorker,
            memoryLimitMb: cluster.memoryLimitMb,
          }
        : undefined,
      usage: coordinator.getResourceUsage(),
    });
    return;
  }

  if (req.method === "GET" && url.pathname === "/jobs") {
    sendJson(res, 200, { jobs: coordinator.listJobs() });
    return;
  }

  if (req.method === "POST" && url.pathname === "/jobs") {
    const parsed = submitSchema.safeParse(await readBody(req));
    if (!parsed.success) {
      sendJson(res, 400, { error: parsed.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    const { jobId, inputDir, outputDir } = parsed.data;
    const job = await coordinator.submitJob(inputDir, outputDir, { jobId });
    sendJson(res, 202, job);
    return;
  }

  if (jobMatch) {
    const jobId = decodeURIComponent(jobMatch[1] ?? "");
    if (req.method === "GET") {
      const job = coordinator.getJobStatus(jobId);
      if (!job) sendJson(res, 404, { error: "not_found" });
      else sendJson(res, 200, job);
      return;
    }
    if (req.method === "DELETE") {
      if (!coordinator.getJobStatus(jobId)) {
        sendJson(res, 404, { error: "not_found" });
        return;
      }
      sendJson(res, 200, { cancelled: await coordinator.cancelJob(jobId) });
      return;
    }
  }

  res.statusCode = 404;
  res.end();
}
