/**
 * Pool of forked conversion processes. A crashed child is replaced and its
 * task rejected; the parent keeps running.
 */
import * as childProcess from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { FORCE_KILL_GRACE_MS } from "../../config";
import type { BatchStats } from "../batch/types";
import type { ConversionOutcome } from "../convert/types";
import { DependencyError } from "../errors";
import { createLogger } from "../utils/logger";
import type {
  ChildMessage,
  ConvertChunkPayload,
  ParentMessage,
  RunJobPayload,
  RunJobResult,
  TaskMethod,
  TaskPayloads,
} from "./protocol";

const log = createLogger("worker-pool");

type ResultMessage = Extract<ChildMessage, { result: unknown }>;
type HeartbeatMessage = Extract<ChildMessage, { heartbeat: true }>;

type TaskRequest = {
  [M in TaskMethod]: { method: M; payload: TaskPayloads[M] };
}[TaskMethod];

/** The parts of a forked `ChildProcess` the pool relies on. */
export interface WorkerChild {
  readonly pid?: number;
  send(message: ParentMessage): boolean;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "message", listener: (message: unknown) => void): unknown;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "exit", listener: () => void): unknown;
  removeAllListeners(event: "message" | "exit"): unknown;
}

export type ForkFn = (
  modulePath: string,
  options: { execArgv: string[]; env: NodeJS.ProcessEnv },
) => WorkerChild;

export interface WorkerPoolOptions {
  size: number;
  /** Per-task inactivity limit; every heartbeat restarts the clock. */
  taskTimeoutMs: number;
  /** Workers reporting more resident memory than this are replaced. */
  maxWorkerMemoryMb?: number;
  execArgv?: string[];
  env?: NodeJS.ProcessEnv;
  modulePath?: string;
  fork?: ForkFn;
}

type PendingTask = {
  id: number;
  request: TaskRequest;
  timeoutMs: number;
  onResult: (msg: ResultMessage) => void;
  onEvent: (msg: HeartbeatMessage) => void;
  reject: (reason: unknown) => void;
  worker?: ProcessWorker;
  timeout?: NodeJS.Timeout;
};

class ProcessWorker {
  busy = false;
  pendingTaskId: number | null = null;
  rssMb = 0;

  constructor(readonly child: WorkerChild) {}
}

const defaultFork: ForkFn = (modulePath, options) =>
  childProcess.fork(modulePath, {
    execArgv: options.execArgv,
    env: options.env,
  });

function isChildMessage(value: unknown): value is ChildMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "rssMb" in value &&
    typeof value.rssMb === "number" &&
    ("result" in value || "heartbeat" in value || "error" in value)
  );
}

export function abortError(): Error {
  const err = new Error("Aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Locates the child entry point next to this file: compiled JavaScript when
 * running from dist/, the TypeScript source (loaded through tsx) otherwise.
 */
export function resolveProcessWorker(dir = __dirname): { filename: string; execArgv: string[] } {
  const jsWorker = path.join(dir, "process-child.js");
  const tsWorker = path.join(dir, "process-child.ts");

  if (fs.existsSync(jsWorker)) {
    return { filename: jsWorker, execArgv: [] };
  }

  if (fs.existsSync(tsWorker)) {
    return { filename: tsWorker, execArgv: ["--import", "tsx"] };
  }

  throw new DependencyError(`Process worker file not found in ${dir}`);
}

export class WorkerPool {
  private workers: ProcessWorker[] = [];
  private taskQueue: number[] = [];
  private tasks = new Map<number, PendingTask>();
  private nextId = 1;
  private destroyed = false;
  private destroyPromise: Promise<void> | null = null;
  private readonly modulePath: string;
  private readonly execArgv: string[];
  private readonly forkFn: ForkFn;

  constructor(private readonly options: WorkerPoolOptions) {
    if (options.modulePath) {
      this.modulePath = options.modulePath;
      this.execArgv = options.execArgv ?? [];
    } else {
      const resolved = resolveProcessWorker();
      this.modulePath = resolved.filename;
      this.execArgv = [...resolved.execArgv, ...(options.execArgv ?? [])];
    }
    this.forkFn = options.fork ?? defaultFork;

    const workerCount = Math.max(1, options.size);
    for (let i = 0; i < workerCount; i++) {
      this.spawnWorker();
    }
  }

  get size(): number {
    return this.workers.length;
  }

  /** Sum of the last resident-memory figure each live worker reported. */
  memoryMb(): number {
    return this.workers.reduce((sum, w) => sum + w.rssMb, 0);
  }

  private clearTaskTimeout(task: PendingTask) {
    if (task.timeout) {
      clearTimeout(task.timeout);
      task.timeout = undefined;
    }
  }

  private armTaskTimeout(task: PendingTask, worker: ProcessWorker) {
    this.clearTaskTimeout(task);
    task.timeout = setTimeout(() => this.handleTaskTimeout(task, worker), task.timeoutMs);
  }

  private removeFromQueue(taskId: number) {
    const idx = this.taskQueue.indexOf(taskId);
    if (idx !== -1) this.taskQueue.splice(idx, 1);
  }

  private completeTask(task: PendingTask, worker: ProcessWorker | null) {
    this.clearTaskTimeout(task);
    this.tasks.delete(task.id);
    this.removeFromQueue(task.id);

    if (worker) {
      worker.busy = false;
      worker.pendingTaskId = null;
    }
  }

  private handleWorkerExit(
    worker: ProcessWorker,
    code: number | null,
    signal: NodeJS.Signals | null,
  ) {
    worker.busy = false;
    const failedTasks = Array.from(this.tasks.values()).filter(
      (t) => t.worker === worker,
    );
    for (const task of failedTasks) {
      this.completeTask(task, null);
      task.reject(
        new Error(
          `Worker exited unexpectedly${code ? ` (code ${code})` : ""}${
            signal ? ` signal ${signal}` : ""
          }`,
        ),
      );
    }

    this.workers = this.workers.filter((w) => w !== worker);
    if (!this.destroyed) {
      log.warn(`worker ${worker.child.pid ?? "?"} exited; starting a replacement`);
      this.spawnWorker();
      this.dispatch();
    }
  }

  private spawnWorker() {
    const worker = new ProcessWorker(
      this.forkFn(this.modulePath, {
        execArgv: this.execArgv,
        env: { ...process.env, ...this.options.env },
      }),
    );

    const onMessage = (raw: unknown) => {
      if (!isChildMessage(raw)) {
        log.debug(`ignoring malformed message from worker ${worker.child.pid ?? "?"}`);
        return;
      }
      const msg = raw;
      worker.rssMb = msg.rssMb;
      const task = this.tasks.get(msg.id);
      if (!task) return;

      if ("heartbeat" in msg) {
        if (task.worker) this.armTaskTimeout(task, task.worker);
        task.onEvent(msg);
        return;
      }

      this.completeTask(task, worker);
      if ("error" in msg) {
        task.reject(new Error(msg.error));
      } else {
        task.onResult(msg);
      }

      const limitMb = this.options.maxWorkerMemoryMb;
      if (limitMb !== undefined && worker.rssMb > limitMb) {
        this.recycleWorker(worker, `memory limit exceeded (${worker.rssMb}MB > ${limitMb}MB)`);
      }
      this.dispatch();
    };

    const onExit = (code: number | null, signal: NodeJS.Signals | null) =>
      this.handleWorkerExit(worker, code, signal);

    worker.child.on("message", onMessage);
    worker.child.on("exit", onExit);
    this.workers.push(worker);
  }

  private killWorker(worker: ProcessWorker, signal: NodeJS.Signals) {
    worker.child.removeAllListeners("message");
    worker.child.removeAllListeners("exit");
    try {
      worker.child.kill(signal);
    } catch (err) {
      log.debug(`kill ${signal} failed for worker ${worker.child.pid ?? "?"}`, err);
    }
    this.workers = this.workers.filter((w) => w !== worker);
  }

  private recycleWorker(worker: ProcessWorker, reason: string) {
    log.warn(`recycling worker ${worker.child.pid ?? "?"}: ${reason}`);
    this.killWorker(worker, "SIGTERM");
    if (!this.destroyed) this.spawnWorker();
  }

  private enqueue<R>(
    request: TaskRequest,
    handlers: {
      timeoutMs?: number;
      signal?: AbortSignal;
      result: (msg: ResultMessage) => R | Error;
      event?: (msg: HeartbeatMessage) => void;
    },
  ): Promise<R> {
    if (this.destroyed) {
      return Promise.reject(new Error("Worker pool destroyed"));
    }
    const { signal } = handlers;
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    const id = this.nextId++;
    return new Promise<R>((resolve, reject) => {
      let settled = false;
      const safeResolve = (val: R) => {
        if (!settled) {
          settled = true;
          resolve(val);
        }
      };
      const safeReject = (reason?: unknown) => {
        if (!settled) {
          settled = true;
          reject(reason);
        }
      };

      const task: PendingTask = {
        id,
        request,
        timeoutMs: handlers.timeoutMs ?? this.options.taskTimeoutMs,
        onResult: (msg) => {
          const value = handlers.result(msg);
          if (value instanceof Error) safeReject(value);
          else safeResolve(value);
        },
        onEvent: (msg) => {
          if (!settled) handlers.event?.(msg);
        },
        reject: safeReject,
      };

      if (signal) {
        signal.addEventListener(
          "abort",
          () => {
            const idx = this.taskQueue.indexOf(id);
            if (idx !== -1 && !task.worker) {
              this.taskQueue.splice(idx, 1);
              this.tasks.delete(id);
              safeReject(abortError());
            } else if (this.tasks.has(id) && task.worker) {
              // Running: ask the worker to stop, release the caller now and
              // let the result clean up worker state when it arrives.
              this.sendTo(task.worker, { id, cancel: true });
              safeReject(abortError());
            }
          },
          { once: true },
        );
      }

      this.tasks.set(id, task);
      this.taskQueue.push(id);
      this.dispatch();
    });
  }

  private sendTo(worker: ProcessWorker, message: ParentMessage): boolean {
    try {
      return worker.child.send(message);
    } catch (err) {
      log.debug(`send to worker ${worker.child.pid ?? "?"} failed`, err);
      return false;
    }
  }

  private handleTaskTimeout(task: PendingTask, worker: ProcessWorker) {
    if (this.destroyed || !this.tasks.has(task.id)) return;

    log.warn(
      `${task.request.method} made no progress for ${task.timeoutMs}ms; restarting worker`,
    );
    this.completeTask(task, null);
    task.reject(
      new Error(`Worker task ${task.request.method} timed out after ${task.timeoutMs}ms`),
    );

    this.killWorker(worker, "SIGKILL");
    if (!this.destroyed) {
      this.spawnWorker();
    }
    this.dispatch();
  }

  private dispatch() {
    if (this.destroyed) return;
    const idle = this.workers.find((w) => !w.busy);
    const nextTaskId = this.taskQueue.find((id) => {
      const t = this.tasks.get(id);
      return t && !t.worker;
    });

    if (!idle || nextTaskId === undefined) return;
    const task = this.tasks.get(nextTaskId);
    if (!task) {
      this.removeFromQueue(nextTaskId);
      this.dispatch();
      return;
    }

    idle.busy = true;
    idle.pendingTaskId = task.id;
    task.worker = idle;
    this.armTaskTimeout(task, idle);

    const message: ParentMessage =
      task.request.method === "convertChunk"
        ? { id: task.id, method: "convertChunk", payload: task.request.payload }
        : { id: task.id, method: "runJob", payload: task.request.payload };

    try {
      idle.child.send(message);
    } catch (err) {
      this.completeTask(task, idle);
      task.reject(err);
      return;
    }

    this.dispatch();
  }

  convertChunk(
    payload: ConvertChunkPayload,
    onOutcome?: (outcome: ConversionOutcome, workerRssMb: number) => void,
  ): Promise<ConversionOutcome[]> {
    return this.enqueue({ method: "convertChunk", payload }, {
      result: (msg) =>
        msg.method === "convertChunk"
          ? msg.result
          : new Error(`Unexpected ${msg.method} result for convertChunk`),
      event: (msg) => {
        if (msg.method === "convertChunk") onOutcome?.(msg.event, msg.rssMb);
      },
    });
  }

  runJob(
    payload: RunJobPayload,
    options: {
      onProgress?: (stats: BatchStats) => void;
      signal?: AbortSignal;
      timeoutMs?: number;
    } = {},
  ): Promise<RunJobResult> {
    return this.enqueue({ method: "runJob", payload }, {
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      result: (msg) =>
        msg.method === "runJob"
          ? msg.result
          : new Error(`Unexpected ${msg.method} result for runJob`),
      event: (msg) => {
        if (msg.method === "runJob") options.onProgress?.(msg.event);
      },
    });
  }

  async destroy(): Promise<void> {
    if (this.destroyPromise) return this.destroyPromise;
    if (this.destroyed) return;

    this.destroyed = true;

    for (const task of this.tasks.values()) {
      this.clearTaskTimeout(task);
      task.reject(new Error("Worker pool destroyed"));
    }
    this.tasks.clear();
    this.taskQueue = [];

    const killPromises = this.workers.map(
      (w) =>
        new Promise<void>((resolve) => {
          w.child.removeAllListeners("message");
          w.child.removeAllListeners("exit");
          const force = setTimeout(() => {
            try {
              w.child.kill("SIGKILL");
            } catch (err) {
              log.debug(`SIGKILL failed for worker ${w.child.pid ?? "?"}`, err);
            }
          }, FORCE_KILL_GRACE_MS);
          const giveUp = setTimeout(resolve, FORCE_KILL_GRACE_MS * 10);
          w.child.once("exit", () => {
            clearTimeout(force);
            clearTimeout(giveUp);
            resolve();
          });
          w.child.kill("SIGTERM");
        }),
    );

    this.destroyPromise = Promise.allSettled(killPromises).then(() => {
      this.workers = [];
      this.destroyPromise = null;
    });

    await this.destroyPromise;
  }
}
