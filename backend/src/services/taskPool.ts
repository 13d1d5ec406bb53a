import { describeError, silentLogger, type Logger } from "../logging";

export type Task = (signal: AbortSignal) => Promise<unknown>;

export type TaskPoolDeps = Readonly<{
  concurrency: number;
  maxQueued: number;
  timeoutMs: number;
  logger?: Logger;
}>;

export type TaskPool = Readonly<{
  /** Returns false when the queue is full and the task was dropped. */
  submit(label: string, task: Task): boolean;
  /** Resolves once nothing is queued or running. */
  idle(): Promise<void>;
  pending(): number;
  running(): number;
}>;

type QueuedTask = Readonly<{ label: string; task: Task }>;

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`taskPool requires a positive ${name}.`);
  }
}

export function createTaskPool(deps: TaskPoolDeps): TaskPool {
  assertPositiveInt(deps.concurrency, "concurrency");
  assertPositiveInt(deps.maxQueued, "maxQueued");
  assertPositiveInt(deps.timeoutMs, "timeoutMs");
  const logger = deps.logger ?? silentLogger;

  const queue: QueuedTask[] = [];
  const idleWaiters: Array<() => void> = [];
  let active = 0;

  function settleIdle(): void {
    if (active > 0 || queue.length > 0) return;
    for (const resolve of idleWaiters.splice(0)) resolve();
  }

  function drain(): void {
    while (active < deps.concurrency) {
      const next = queue.shift();
      if (!next) break;
      start(next);
    }
    settleIdle();
  }

  function start(item: QueuedTask): void {
    active += 1;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deps.timeoutMs);
    timer.unref();

    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new Error(`timed out after ${deps.timeoutMs}ms`)),
        { once: true }
      );
    });
    const work = Promise.resolve().then(() => item.task(controller.signal));

    void Promise.race([work, timedOut])
      .then(
        () => undefined,
        (e: unknown) => {
          logger.warn(`Task ${item.label} failed: ${describeError(e)}`);
        }
      )
      .finally(() => {
        clearTimeout(timer);
        active -= 1;
        drain();
      });
  }

  return {
    submit(label: string, task: Task): boolean {
      if (active < deps.concurrency) {
        start({ label, task });
        return true;
      }
      if (queue.length >= deps.maxQueued) return false;
      queue.push({ label, task });
      return true;
    },

    idle(): Promise<void> {
      if (active === 0 && queue.length === 0) return Promise.resolve();
      return new Promise<void>((resolve) => idleWaiters.push(resolve));
    },

    pending(): number {
      return queue.length;
    },

    running(): number {
      return active;
    }
  };
}
