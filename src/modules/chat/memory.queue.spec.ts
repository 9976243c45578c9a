import { createMemoryTaskQueue } from "./memory.queue";
import { FakeClock } from "../../test/fakes";

const task = (owner: string, prompt: string, requestId?: string) => ({
  owner,
  requestId,
  prompt,
  model: "gemini-2.0-flash",
  temperature: 0.4,
});

describe("memory task queue", () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  const build = (maxAttempts = 3) =>
    createMemoryTaskQueue({ leaseMs: 1000, maxAttempts, resultTtlMs: 5000, now: clock.now });

  it("hands out pending tasks oldest first, one worker each", async () => {
    const queue = build();
    const a = await queue.enqueue(task("user:1", "first"));
    const b = await queue.enqueue(task("user:1", "second"));

    const claimedA = await queue.claim("w-1");
    const claimedB = await queue.claim("w-2");

    expect(claimedA).toMatchObject({ id: a.id, status: "running", attempts: 1 });
    expect(claimedB).toMatchObject({ id: b.id, status: "running", attempts: 1 });
    await expect(queue.claim("w-3")).resolves.toBeNull();
  });

  it("generates a requestId when none is given", async () => {
    const created = await build().enqueue(task("user:1", "hi"));
    expect(created.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("deduplicates by requestId per owner", async () => {
    const queue = build();
    const first = await queue.enqueue(task("user:1", "hi", "req-1"));
    const again = await queue.enqueue(task("user:1", "something else", "req-1"));
    const otherOwner = await queue.enqueue(task("user:2", "hi", "req-1"));

    expect(again.id).toBe(first.id);
    expect(again.prompt).toBe("hi");
    expect(otherOwner.id).not.toBe(first.id);
  });

  it("records the reply on completion", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi"));
    await queue.claim("w-1");

    await queue.complete(created.id, "w-1", "hello back");

    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "succeeded",
      reply: "hello back",
      error: null,
    });
  });

  it("ignores results from a worker that does not hold the lease", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi"));
    await queue.claim("w-1");

    await queue.complete(created.id, "w-2", "stolen");

    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "running",
      reply: null,
    });
  });

  it("returns a failed attempt to pending until attempts run out", async () => {
    const queue = build(2);
    const created = await queue.enqueue(task("user:1", "hi"));

    await queue.claim("w-1");
    await queue.fail(created.id, "w-1", "quota exceeded");
    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "pending",
      error: "quota exceeded",
      attempts: 1,
    });

    await queue.claim("w-1");
    await queue.fail(created.id, "w-1", "quota exceeded again");
    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "failed",
      error: "quota exceeded again",
      attempts: 2,
    });
    await expect(queue.claim("w-1")).resolves.toBeNull();
  });

  it("lets another worker take over an expired lease", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi"));
    await queue.claim("w-1");

    clock.advance(999);
    await expect(queue.claim("w-2")).resolves.toBeNull();

    clock.advance(1);
    await expect(queue.claim("w-2")).resolves.toMatchObject({ id: created.id, attempts: 2 });

    await queue.complete(created.id, "w-1", "late");
    await queue.complete(created.id, "w-2", "on time");
    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "succeeded",
      reply: "on time",
    });
  });

  it("fails a task whose last lease expired", async () => {
    const queue = build(1);
    const created = await queue.enqueue(task("user:1", "hi"));
    await queue.claim("w-1");

    clock.advance(1000);
    await expect(queue.claim("w-2")).resolves.toBeNull();

    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({
      status: "failed",
      error: "Worker lease expired after 1 attempt(s)",
    });
  });

  it("only shows a task to its owner", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi"));

    await expect(queue.findForOwner(created.id, "user:2")).resolves.toBeNull();
    await expect(queue.findForOwner("missing", "user:1")).resolves.toBeNull();
  });

  it("returns snapshots, not live entries", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi"));
    created.status = "failed";

    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({ status: "pending" });
  });

  it("drops a finished task once its result has been kept long enough", async () => {
    const queue = build();
    const created = await queue.enqueue(task("user:1", "hi", "req-1"));
    await queue.claim("w-1");
    await queue.complete(created.id, "w-1", "hello back");

    clock.advance(4999);
    await expect(queue.findForOwner(created.id, "user:1")).resolves.toMatchObject({ status: "succeeded" });

    clock.advance(1);
    await expect(queue.findForOwner(created.id, "user:1")).resolves.toBeNull();
  });

  it("frees the request id of an evicted task", async () => {
    const queue = build(1);
    const created = await queue.enqueue(task("user:1", "hi", "req-1"));
    await queue.claim("w-1");
    await queue.fail(created.id, "w-1", "quota exceeded");

    clock.advance(5000);
    const again = await queue.enqueue(task("user:1", "hi", "req-1"));

    expect(again.id).not.toBe(created.id);
    expect(again.status).toBe("pending");
  });

  it("keeps pending and retrying tasks regardless of age", async () => {
    const queue = build(2);
    const waiting = await queue.enqueue(task("user:1", "waiting"));
    const retrying = await queue.enqueue(task("user:1", "retrying"));
    await queue.claim("w-1");
    await queue.fail(waiting.id, "w-1", "quota exceeded");

    clock.advance(60_000);

    await expect(queue.findForOwner(waiting.id, "user:1")).resolves.toMatchObject({ status: "pending" });
    await expect(queue.findForOwner(retrying.id, "user:1")).resolves.toMatchObject({ status: "pending" });
  });
});
