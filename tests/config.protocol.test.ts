import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readInt, readNumber, readOptionalString } from "../src/config/env.js";
import {
  DEFAULT_NAMESPACE,
  resolveCodecLimits,
  resolveInvokerSettings,
  resolveNamespace,
  resolveResponderSettings,
  resolveTransportSettings,
} from "../src/config/protocol.js";
import { withEnv } from "./helpers/env.js";

describe("config", () => {
  describe("env readers", () => {
    it("parses booleans leniently and falls back on unknown literals", async () => {
      await withEnv({ RELAY_TEST_FLAG: " YES " }, () => {
        expect(readBool("RELAY_TEST_FLAG", false)).to.equal(true);
      });
      await withEnv({ RELAY_TEST_FLAG: "off" }, () => {
        expect(readBool("RELAY_TEST_FLAG", true)).to.equal(false);
      });
      await withEnv({ RELAY_TEST_FLAG: "maybe" }, () => {
        expect(readBool("RELAY_TEST_FLAG", true)).to.equal(true);
      });
    });

    it("rejects malformed and out-of-bounds integers", async () => {
      await withEnv({ RELAY_TEST_INT: "12.5" }, () => {
        expect(readInt("RELAY_TEST_INT", 7)).to.equal(7);
      });
      await withEnv({ RELAY_TEST_INT: "250" }, () => {
        expect(readInt("RELAY_TEST_INT", 7, { min: 1, max: 100 })).to.equal(7);
        expect(readInt("RELAY_TEST_INT", 7, { min: 1, max: 1_000 })).to.equal(250);
      });
      await withEnv({ RELAY_TEST_INT: "1.5" }, () => {
        expect(readNumber("RELAY_TEST_INT", 2)).to.equal(1.5);
      });
    });

    it("treats blank strings as unset", async () => {
      await withEnv({ RELAY_TEST_STRING: "   " }, () => {
        expect(readOptionalString("RELAY_TEST_STRING")).to.equal(undefined);
      });
    });
  });

  describe("protocol settings", () => {
    it("uses the documented defaults when nothing is configured", () => {
      expect(resolveInvokerSettings()).to.deep.equal({
        timeoutMs: 60_000,
        retry: { maxRetries: 2, initialDelayMs: 500, backoffFactor: 2, maxDelayMs: 10_000 },
        reorderTimeoutMs: 2_000,
        sweepIntervalMs: 1_000,
        retentionMs: 300_000,
      });
      expect(resolveTransportSettings()).to.deep.equal({
        publish: { attempts: 5, initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 5_000 },
        concurrency: 8,
        credits: 64,
        maxDeliveryAttempts: 5,
      });
      expect(resolveResponderSettings()).to.deep.equal({ analysisConcurrency: 2, heartbeatIntervalMs: 10_000 });
      expect(resolveNamespace()).to.equal(DEFAULT_NAMESPACE);
    });

    it("prefers explicit options, then the environment, then the default", async () => {
      await withEnv({ RELAY_INVOCATION_TIMEOUT_MS: "1500", RELAY_MAX_RETRIES: "4" }, () => {
        const fromEnv = resolveInvokerSettings();
        expect(fromEnv.timeoutMs).to.equal(1_500);
        expect(fromEnv.retry.maxRetries).to.equal(4);

        const explicit = resolveInvokerSettings({ timeoutMs: 2_500, retry: { maxRetries: 0 } });
        expect(explicit.timeoutMs).to.equal(2_500);
        expect(explicit.retry.maxRetries).to.equal(0);
      });
    });

    it("ignores out-of-bounds explicit values", async () => {
      await withEnv({ RELAY_INVOCATION_TIMEOUT_MS: "abc" }, () => {
        expect(resolveInvokerSettings({ timeoutMs: 0 }).timeoutMs).to.equal(60_000);
      });
      expect(resolveTransportSettings({ credits: -3 }).credits).to.equal(64);
      expect(resolveInvokerSettings({ retry: { backoffFactor: 0.5 } }).retry.backoffFactor).to.equal(2);
    });

    it("keeps the stream payload limit within the envelope limit", () => {
      expect(resolveCodecLimits({ maxEnvelopeBytes: 2_048 })).to.deep.equal({
        maxEnvelopeBytes: 2_048,
        maxStreamPayloadBytes: 2_048,
      });
      expect(resolveCodecLimits({ maxEnvelopeBytes: 4_096, maxStreamPayloadBytes: 512 })).to.deep.equal({
        maxEnvelopeBytes: 4_096,
        maxStreamPayloadBytes: 512,
      });
    });

    it("trims the namespace and reads it from the environment", async () => {
      expect(resolveNamespace("  lab.services ")).to.equal("lab.services");
      await withEnv({ RELAY_NAMESPACE: "env.services" }, () => {
        expect(resolveNamespace()).to.equal("env.services");
        expect(resolveNamespace("  ")).to.equal("env.services");
      });
    });
  });
});
