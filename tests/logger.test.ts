import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithMessageContext } from "../src/infra/messageContext.js";
import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "relay-logger-"));
    const logFile = path.join(directory, "relay.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3 });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, filler: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("relay.log");
      expect(files).to.include("relay.log.1");
      expect(files).to.not.include("relay.log.3");

      const archived = await readFile(path.join(directory, "relay.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("redacts sensitive keys and configured substrings", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      logFile: null,
      redactionEnabled: true,
      redactSecrets: ["test-secret"],
      onEntry: (entry) => entries.push(entry),
    });

    logger.warn("bus_selected", { redis_url: "redis://localhost:6379", note: "auth test-secret used" });

    expect(entries).to.have.length(1);
    expect(entries[0].payload).to.deep.equal({ redis_url: "[REDACTED]", note: "auth [REDACTED] used" });
  });

  it("stamps entries with the message being handled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => entries.push(entry) });

    runWithMessageContext({ correlationId: "c-1", serviceId: "child-a", envelopeType: "question" }, () => {
      logger.info("question_received");
    });
    logger.info("outside");

    expect(entries.map((entry) => [entry.message, entry.correlation_id, entry.service_id, entry.envelope_type])).to.deep.equal([
      ["question_received", "c-1", "child-a", "question"],
      ["outside", undefined, undefined, undefined],
    ]);
  });

  it("omits file mirroring when callers pass a null logFile", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "relay-logger-"));
    try {
      const messages: string[] = [];
      const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => messages.push(entry.message) });

      logger.debug("nothing_on_disk", { detail: "capture" });
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
      expect(messages).to.deep.equal(["nothing_on_disk"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  describe("parseRedactionDirectives", () => {
    it("reads toggles and patterns", () => {
      expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
      expect(parseRedactionDirectives("off, secret")).to.deep.equal({ enabled: false, tokens: ["secret"] });
      expect(parseRedactionDirectives("secret,secret")).to.deep.equal({ enabled: true, tokens: ["secret"] });
      expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    });
  });
});
