import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { computeBackoffDelay, runtimeTimers, sleep } from "../src/runtime/timers.js";

describe("runtime timers", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("follows the clock installed by sinon", async () => {
    const clock = sinon.useFakeTimers();
    try {
      const fired: number[] = [];
      runtimeTimers.setTimeout(() => fired.push(clock.now), 40);
      const interval = runtimeTimers.setInterval(() => fired.push(clock.now), 25);

      await clock.tickAsync(60);
      runtimeTimers.clearInterval(interval);
      await clock.tickAsync(100);

      expect(fired).to.deep.equal([25, 40, 50]);
    } finally {
      clock.restore();
    }
  });

  it("cancels a pending timeout", async () => {
    const clock = sinon.useFakeTimers();
    try {
      const handler = sinon.stub();
      const handle = runtimeTimers.setTimeout(handler, 10);
      runtimeTimers.clearTimeout(handle);
      await clock.tickAsync(20);
      sinon.assert.notCalled(handler);
    } finally {
      clock.restore();
    }
  });

  it("sleeps for the requested delay and returns at once for zero", async () => {
    const clock = sinon.useFakeTimers();
    try {
      let woke = false;
      const pending = sleep(100).then(() => {
        woke = true;
      });
      await clock.tickAsync(99);
      expect(woke).to.equal(false);
      await clock.tickAsync(1);
      await pending;
      expect(woke).to.equal(true);

      await sleep(0);
    } finally {
      clock.restore();
    }
  });

  describe("computeBackoffDelay", () => {
    const policy = { initialDelayMs: 500, backoffFactor: 2, maxDelayMs: 10_000 };

    it("grows exponentially from the first retry", () => {
      expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(policy, attempt))).to.deep.equal([500, 1_000, 2_000, 4_000]);
    });

    it("caps the delay", () => {
      expect(computeBackoffDelay(policy, 6)).to.equal(10_000);
    });

    it("is zero when the policy disables waiting", () => {
      expect(computeBackoffDelay({ ...policy, initialDelayMs: 0 }, 3)).to.equal(0);
      expect(computeBackoffDelay({ ...policy, maxDelayMs: 0 }, 1)).to.equal(0);
    });

    it("treats attempts below one as the first retry", () => {
      expect(computeBackoffDelay(policy, 0)).to.equal(500);
    });
  });
});
