import process from "node:process";
import { errorMessage } from "../errors";
import { createLogger } from "../utils/logger";
import { currentRssMb } from "../utils/memory";
import type { ChildMessage, ParentMessage } from "./protocol";
import { convertChunk, runJob } from "./worker";

const log = createLogger("process-worker");

const running = new Map<number, AbortController>();

const send = (msg: ChildMessage) => {
  if (process.send) {
    process.send(msg);
  }
};

function isParentMessage(value: unknown): value is ParentMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    ("cancel" in value || "method" in value)
  );
}

async function handle(msg: ParentMessage) {
  if ("cancel" in msg) {
    running.get(msg.id)?.abort();
    return;
  }

  const { id } = msg;
  try {
    if (msg.method === "convertChunk") {
      const result = await convertChunk(msg.payload, (outcome) =>
        send({ id, method: "convertChunk", heartbeat: true, event: outcome, rssMb: currentRssMb() }),
      );
      send({ id, method: "convertChunk", result, rssMb: currentRssMb() });
      return;
    }

    const controller = new AbortController();
    running.set(id, controller);
    try {
      const result = await runJob(
        msg.payload,
        (stats) => send({ id, method: "runJob", heartbeat: true, event: stats, rssMb: currentRssMb() }),
        controller.signal,
      );
      send({ id, method: "runJob", result, rssMb: currentRssMb() });
    } finally {
      running.delete(id);
    }
  } catch (err) {
    send({ id, error: errorMessage(err), rssMb: currentRssMb() });
  }
}

process.on("message", (msg: unknown) => {
  if (!isParentMessage(msg)) {
    log.warn("ignoring malformed message from parent");
    return;
  }
  handle(msg).catch((err) => log.error("message handling failed", err));
});

// The parent owns shutdown; Ctrl-C reaches the whole process group.
process.on("SIGINT", () => {
  log.debug("SIGINT ignored; waiting for the parent");
});

process.on("uncaughtException", (err) => {
  log.error("uncaughtException", err);
  process.exitCode = 1;
  process.exit();
});

process.on("unhandledRejection", (reason) => {
  log.error("unhandledRejection", reason);
  process.exitCode = 1;
  process.exit();
});
