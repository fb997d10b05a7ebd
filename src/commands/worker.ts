import { Command } from "commander";
import { DistributedCoordinator } from "../lib/cluster/coordinator";
import { createWorkerServer } from "../lib/cluster/worker-server";
import { fail, parsePositiveInt, resolveSettings } from "./shared";

export const worker = new Command("worker")
  .description("Serve conversion jobs over HTTP for remote clusters")
  .option("-p, --port <port>", "Port to listen on", parsePositiveInt, 4444)
  .option("--host <host>", "Interface to bind", "127.0.0.1")
  .option("--workers <n>", "Worker processes", parsePositiveInt)
  .option("--threads <n>", "Concurrent files per worker", parsePositiveInt)
  .action(async (_opts, cmd: Command) => {
    const options: { port: number; host: string; workers?: number; threads?: number } = cmd.opts();

    try {
      // A worker node always runs jobs on its own machine.
      const settings = resolveSettings(cmd, {
        clusterType: "local",
        clusterWorkers: options.workers,
        threadsPerWorker: options.threads,
      });
      const coordinator = new DistributedCoordinator(settings);
      const handle = await coordinator.startCluster();
      const server = createWorkerServer(coordinator);

      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(options.port, options.host, () => resolve());
      });
      console.log(
        `Worker node listening on http://${options.host}:${options.port} (${handle.workers} workers × ${handle.threadsPerWorker} threads)`,
      );

      let closing = false;
      const shutdown = async () => {
        if (closing) return;
        closing = true;
        console.log("Shutting down worker node...");
        server.close();
        await coordinator.stopCluster();
        process.exit(0);
      };

      process.on("SIGINT", () => {
        shutdown().catch((err) => fail("Shutdown failed", err));
      });
      process.on("SIGTERM", () => {
        shutdown().catch((err) => fail("Shutdown failed", err));
      });
    } catch (error) {
      fail("Worker node failed to start", error);
    }
  });
