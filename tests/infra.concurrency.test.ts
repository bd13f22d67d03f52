import { describe, it } from "mocha";
import { expect } from "chai";

import { KeyedMutex } from "../src/infra/keyedMutex.js";
import { WorkerPool } from "../src/infra/workerPool.js";
import { deferred, flushAsync } from "./helpers/async.js";

describe("WorkerPool", () => {
  it("runs at most `concurrency` tasks and queues the rest", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      pool.run(async () => {
        started.push(index);
        await gate.promise;
        return index * 10;
      }),
    );
    await flushAsync();

    expect(started).to.deep.equal([0, 1]);
    expect(pool.statistics()).to.deep.equal({ concurrency: 2, active: 2, queued: 1, executed: 0, failed: 0 });

    gates[0].resolve();
    await flushAsync();
    expect(started).to.deep.equal([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).to.deep.equal([0, 10, 20]);
    await pool.onIdle();
    expect(pool.statistics().executed).to.equal(3);
  });

  it("reports failures without stalling the queue", async () => {
    const pool = new WorkerPool(1);
    const failing = pool.run(() => {
      throw new Error("boom");
    });
    const next = pool.run(() => "after");

    try {
      await failing;
      expect.fail("the task should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(Error);
      expect(error instanceof Error ? error.message : "").to.equal("boom");
    }
    expect(await next).to.equal("after");
    expect(pool.statistics().failed).to.equal(1);
  });

  it("waits for queued tasks as well as running ones before going idle", async () => {
    const pool = new WorkerPool(1);
    const gates = [deferred(), deferred()];
    const finished: number[] = [];
    for (const [index, gate] of gates.entries()) {
      void pool.run(async () => {
        await gate.promise;
        finished.push(index);
      });
    }
    let idle = false;
    const idling = pool.onIdle().then(() => {
      idle = true;
    });

    gates[0].resolve();
    await flushAsync();
    expect(finished).to.deep.equal([0]);
    expect(idle).to.equal(false);
    expect(pool.statistics()).to.include({ active: 1, queued: 0 });

    gates[1].resolve();
    await idling;
    expect(finished).to.deep.equal([0, 1]);
    expect(pool.statistics()).to.deep.equal({ concurrency: 1, active: 0, queued: 0, executed: 2, failed: 0 });
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new WorkerPool(0)).to.throw(TypeError, "concurrency must be a positive number");
  });
});

describe("KeyedMutex", () => {
  it("serialises sections sharing a key and lets other keys through", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("c-1", async () => {
      order.push("c-1:first:start");
      await gate.promise;
      order.push("c-1:first:end");
    });
    const second = mutex.runExclusive("c-1", () => {
      order.push("c-1:second");
    });
    const other = mutex.runExclusive("c-2", () => {
      order.push("c-2");
    });

    await other;
    expect(mutex.isLocked("c-1")).to.equal(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).to.deep.equal(["c-1:first:start", "c-2", "c-1:first:end", "c-1:second"]);
    expect(mutex.size()).to.equal(0);
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();
    try {
      await mutex.runExclusive("c-1", () => {
        throw new Error("section failed");
      });
      expect.fail("the section should reject");
    } catch (error) {
      expect(error instanceof Error ? error.message : "").to.equal("section failed");
    }
    expect(await mutex.runExclusive("c-1", () => "next")).to.equal("next");
  });
});
