// ============================================================
// Chat Worker Pool — Task Queue Consumer
// ============================================================
// Runs `concurrency` independent consumer loops against a
// TaskQueue. Each loop:
//
//   1. claim()  the oldest available task (under a lease)
//   2. call the same ChatService.reply() the sync path uses
//   3. complete() with the reply, or fail() with the error
//   4. nothing to claim → sleep pollIntervalMs, then try again
//
// The queue decides retries: a failed attempt goes back to
// "pending" until TASK_MAX_ATTEMPTS is used up. The pool itself
// never retries inline.
//
// Used in-process (CHAT_DISPATCH=memory) and by the separate
// worker process in worker.ts (CHAT_DISPATCH=queue).
// ============================================================

import { v4 as uuidv4 } from "uuid";
import { ChatService } from "./chat.service";
import { TaskQueue } from "../../types";
import { errorMessage } from "../../utils/errors";

export interface ChatWorkerOptions {
  queue: TaskQueue;
  chat: ChatService;
  concurrency: number;
  pollIntervalMs: number;
  /** Prefix for per-loop worker ids; random when omitted. */
  name?: string;
}

export class ChatWorkerPool {
  private readonly name: string;
  private running = false;
  private loops: Promise<void>[] = [];
  private sleepers = new Set<() => void>();

  constructor(private readonly options: ChatWorkerOptions) {
    this.name = options.name ?? `worker-${uuidv4().slice(0, 8)}`;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    for (let i = 0; i < this.options.concurrency; i++) {
      this.loops.push(this.loop(`${this.name}-${i}`));
    }
    console.log(`[Worker] ${this.name} started with ${this.options.concurrency} consumer(s)`);
  }

  /** Stop claiming new work and wait for in-flight tasks to finish. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const wake of this.sleepers) wake();
    await Promise.all(this.loops);
    this.loops = [];
    console.log(`[Worker] ${this.name} stopped`);
  }

  /**
   * Claim and run one task as `workerId`.
   * Returns false when the queue had nothing to claim.
   */
  async processNext(workerId: string): Promise<boolean> {
    const { queue, chat } = this.options;

    const task = await queue.claim(workerId);
    if (!task) return false;

    try {
      const reply = await chat.reply({
        prompt: task.prompt,
        model: task.model,
        temperature: task.temperature,
      });
      await queue.complete(task.id, workerId, reply);
      console.log(`[Worker] Task ${task.id} succeeded (attempt ${task.attempts})`);
    } catch (error) {
      const message = errorMessage(error);
      await queue.fail(task.id, workerId, message);
      console.error(`[Worker] Task ${task.id} attempt ${task.attempts} failed: ${message}`);
    }
    return true;
  }

  private async loop(workerId: string): Promise<void> {
    while (this.running) {
      let worked = false;
      try {
        worked = await this.processNext(workerId);
      } catch (error) {
        // Queue store unreachable; back off and keep the loop alive
        console.error(`[Worker] ${workerId} queue error: ${errorMessage(error)}`);
      }
      if (!worked && this.running) await this.sleep(this.options.pollIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }
}
