import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { z } from "zod";

import { CancelledError, RemoteAnalysisError, TimeoutError, UnknownInvocationError, ValidationError } from "../src/errors.js";
import { ChildServiceProxy, type ChildDescriptor } from "../src/invoker/invoker.js";
import type { InvokerSettingsOverrides } from "../src/config/protocol.js";
import { createEnvelope } from "../src/protocol/envelope.js";
import type { Outcome } from "../src/registry/correlationRegistry.js";
import type { AnalysisFunction } from "../src/responder/analysis.js";
import { ParentServiceResponder } from "../src/responder/responder.js";
import { sleep } from "../src/runtime/timers.js";
import { TransportAdapter } from "../src/transport/adapter.js";
import { InMemoryBus } from "../src/transport/memoryBus.js";
import { eventually, flushAsync } from "./helpers/async.js";
import { logEnvelope } from "./helpers/envelopes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const CHILD: ChildDescriptor = { id: "child-a" };
const QUESTIONS = "test.child-a";
const ANSWERS = "test.child-a.answers";

function readN(values: unknown): number {
  if (typeof values === "object" && values !== null && "n" in values && typeof values.n === "number") {
    return values.n;
  }
  throw new Error("n is missing");
}

function sequentialIds(prefix = "c"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

function result(correlationId: string, orderingNumber: number, outputValues: unknown) {
  return createEnvelope(
    "result",
    { correlation_id: correlationId, ordering_number: orderingNumber, sender_role: "child" },
    { output_values: outputValues, output_manifest: null },
  );
}

function exception(correlationId: string, orderingNumber: number, kind: string, message: string) {
  return createEnvelope(
    "exception",
    { correlation_id: correlationId, ordering_number: orderingNumber, sender_role: "child" },
    { kind, message, detail: {} },
  );
}

describe("ChildServiceProxy", () => {
  let bus: InMemoryBus;
  let logger: RecordingLogger;
  let parentTransport: TransportAdapter;
  let childTransport: TransportAdapter;
  let proxy: ChildServiceProxy | null;
  let responder: ParentServiceResponder | null;
  let clock: sinon.SinonFakeTimers | null;

  function createProxy(settings: InvokerSettingsOverrides = {}): ChildServiceProxy {
    proxy = new ChildServiceProxy({
      transport: parentTransport,
      logger,
      serviceId: "parent",
      namespace: "test",
      settings,
      idFactory: sequentialIds(),
    });
    return proxy;
  }

  async function startResponder(analysis: AnalysisFunction, heartbeatIntervalMs = 0): Promise<ParentServiceResponder> {
    responder = new ParentServiceResponder({
      transport: childTransport,
      logger,
      serviceId: "child-a",
      namespace: "test",
      analysis,
      settings: { heartbeatIntervalMs },
    });
    await responder.start();
    return responder;
  }

  function questionCount(): number {
    return bus.published.filter((record) => record.destination === QUESTIONS).length;
  }

  function useFakeClock(): sinon.SinonFakeTimers {
    clock = sinon.useFakeTimers({
      now: 0,
      toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"],
    });
    return clock;
  }

  beforeEach(() => {
    bus = new InMemoryBus();
    logger = new RecordingLogger();
    parentTransport = new TransportAdapter({ bus, logger });
    childTransport = new TransportAdapter({ bus, logger });
    proxy = null;
    responder = null;
    clock = null;
  });

  afterEach(async () => {
    await responder?.stop();
    await proxy?.stop();
    await parentTransport.close();
    await childTransport.close();
    clock?.restore();
  });

  describe("round trip", () => {
    it("asks a child and returns its output with the streamed logs", async () => {
      await startResponder(async ({ inputValues, log }) => {
        await log("info", "squaring");
        const n = readN(inputValues);
        return { outputValues: { square: n * n } };
      });
      const invoker = createProxy();
      const logs: string[] = [];

      const answer = await invoker.ask(CHILD, { n: 5 }, null, {
        handlers: { onLog: (message) => logs.push(message.message) },
      });

      expect(answer).to.deep.equal({ correlationId: "c-1", outputValues: { square: 25 }, outputManifest: null });
      expect(logs).to.deep.equal(["squaring"]);
      const snapshot = invoker.poll("c-1");
      expect(snapshot.state).to.equal("COMPLETED");
      expect(snapshot.logicalCallId).to.equal("c-1");
      expect(snapshot.attempt).to.equal(1);
    });

    it("publishes the question as ordering 0 from the parent", async () => {
      const invoker = createProxy();

      await invoker.sendQuestion(CHILD, { n: 2 }, null, { childIdentitiesAllowed: ["child-b"] });

      const [question] = bus.published.filter((record) => record.destination === QUESTIONS);
      expect(question.attributes).to.deep.equal({
        type: "question",
        correlation_id: "c-1",
        ordering_number: "0",
        sender_role: "parent",
      });
      expect(parentTransport.codec.decode(question.data).payload).to.deep.equal({
        input_values: { n: 2 },
        input_manifest: null,
        child_identities_allowed: ["child-b"],
      });
      expect(invoker.poll("c-1").state).to.equal("PENDING");
    });

    it("raises the child's failure as a RemoteAnalysisError", async () => {
      await startResponder(() => {
        throw new RangeError("n must be positive");
      });
      const invoker = createProxy();

      try {
        await invoker.ask(CHILD, { n: -1 });
        expect.fail("ask should reject");
      } catch (error) {
        expect(error).to.be.instanceOf(RemoteAnalysisError);
        if (error instanceof RemoteAnalysisError) {
          expect(error.message).to.equal("RangeError: n must be positive");
          expect(error.remoteKind).to.equal("RangeError");
          expect(error.correlationId).to.equal("c-1");
        }
      }
      expect(invoker.poll("c-1").state).to.equal("FAILED");
    });

    it("validates inputs against the child's schema before sending", async () => {
      const invoker = createProxy();
      const child: ChildDescriptor = { id: "child-a", schema: { input_values: z.object({ n: z.number() }) } };

      try {
        await invoker.sendQuestion(child, { n: "five" });
        expect.fail("sendQuestion should reject");
      } catch (error) {
        expect(error).to.be.instanceOf(ValidationError);
      }
      expect(questionCount()).to.equal(0);
    });

    it("notifies outcome callbacks and rejects unknown correlation ids", async () => {
      await startResponder(() => ({ outputValues: "ok" }));
      const invoker = createProxy();
      const outcomes: Outcome[] = [];

      const id = await invoker.sendQuestion(CHILD, null);
      invoker.onOutcome(id, (outcome) => outcomes.push(outcome));
      await eventually(() => outcomes.length === 1);

      expect(outcomes[0]).to.deep.equal({ status: "COMPLETED", correlationId: "c-1", outputValues: "ok", outputManifest: null });
      expect(() => invoker.poll("missing")).to.throw(UnknownInvocationError);
    });
  });

  describe("answers on the bus", () => {
    it("keeps the first terminal envelope and ignores later ones", async () => {
      const invoker = createProxy();
      const id = await invoker.sendQuestion(CHILD, null);

      await childTransport.publish(ANSWERS, exception(id, 0, "ValueError", "bad"));
      await childTransport.publish(ANSWERS, result(id, 1, "late"));
      const outcome = await invoker.awaitCall(id);

      expect(outcome.status).to.equal("FAILED");
      if (outcome.status === "FAILED") {
        expect(outcome.error.message).to.equal("ValueError: bad");
        expect(outcome.failure).to.deep.equal({ kind: "ValueError", message: "bad", detail: {} });
      }
      await eventually(() => logger.count("answer_after_terminal") === 1);
      expect(invoker.poll(id).state).to.equal("FAILED");
    });

    it("delivers stream messages in ordering order", async () => {
      const invoker = createProxy();
      const lines: string[] = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: { onLog: (message) => lines.push(message.message) },
      });

      for (const orderingNumber of [4, 3, 2, 1, 0]) {
        await childTransport.publish(ANSWERS, logEnvelope(orderingNumber, `line ${orderingNumber}`, false, id));
      }
      await eventually(() => lines.length === 5);
      await childTransport.publish(ANSWERS, result(id, 5, null));

      expect((await invoker.awaitCall(id)).status).to.equal("COMPLETED");
      expect(lines).to.deep.equal(["line 0", "line 1", "line 2", "line 3", "line 4"]);
    });

    it("drops duplicate stream envelopes", async () => {
      const invoker = createProxy();
      const lines: string[] = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: { onLog: (message) => lines.push(message.message) },
      });

      await childTransport.publish(ANSWERS, logEnvelope(0, "once", false, id));
      await childTransport.publish(ANSWERS, logEnvelope(0, "once", false, id));
      await eventually(() => logger.count("envelope_duplicate") === 1);

      expect(lines).to.deep.equal(["once"]);
      expect(invoker.poll(id).state).to.equal("RUNNING");
    });

    it("reports a gap once the reorder timeout elapses", async () => {
      const fake = useFakeClock();
      const invoker = createProxy({ reorderTimeoutMs: 200 });
      const lines: string[] = [];
      const gaps: Array<[number, number]> = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: {
          onLog: (message) => lines.push(message.message),
          onGap: (from, to) => gaps.push([from, to]),
        },
      });

      await childTransport.publish(ANSWERS, logEnvelope(1, "line 1", false, id));
      await childTransport.publish(ANSWERS, logEnvelope(2, "line 2", false, id));
      await flushAsync();
      expect(lines).to.deep.equal([]);

      await fake.tickAsync(200);
      await flushAsync();

      expect(gaps).to.deep.equal([[0, 0]]);
      expect(lines).to.deep.equal(["line 1", "line 2"]);
      expect(logger.count("stream_gap")).to.equal(1);
    });

    it("still delivers a log that the result overtook on the bus", async () => {
      const invoker = createProxy({ reorderTimeoutMs: 2_000 });
      const lines: string[] = [];
      const gaps: Array<[number, number]> = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: {
          onLog: (message) => lines.push(message.message),
          onGap: (from, to) => gaps.push([from, to]),
        },
      });

      await childTransport.publish(ANSWERS, result(id, 1, "done"));
      expect(await invoker.awaitCall(id)).to.deep.equal({
        status: "COMPLETED",
        correlationId: "c-1",
        outputValues: "done",
        outputManifest: null,
      });
      await childTransport.publish(ANSWERS, logEnvelope(0, "last words", false, id));
      await eventually(() => lines.length === 1);

      expect(lines).to.deep.equal(["last words"]);
      expect(gaps).to.deep.equal([]);
      expect(logger.count("answer_after_terminal")).to.equal(0);
    });

    it("gives up on logs the result overtook once the reorder timeout elapses", async () => {
      const fake = useFakeClock();
      const invoker = createProxy({ reorderTimeoutMs: 200 });
      const lines: string[] = [];
      const gaps: Array<[number, number]> = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: {
          onLog: (message) => lines.push(message.message),
          onGap: (from, to) => gaps.push([from, to]),
        },
      });

      await childTransport.publish(ANSWERS, logEnvelope(0, "line 0", false, id));
      await childTransport.publish(ANSWERS, result(id, 2, null));
      expect((await invoker.awaitCall(id)).status).to.equal("COMPLETED");
      await flushAsync();
      expect(gaps).to.deep.equal([]);

      await fake.tickAsync(200);
      await flushAsync();
      expect(gaps).to.deep.equal([[1, 1]]);

      await childTransport.publish(ANSWERS, logEnvelope(1, "line 1", false, id));
      await eventually(() => logger.count("answer_after_terminal") === 1);
      expect(lines).to.deep.equal(["line 0"]);
    });

    it("ignores answers meant for another parent", async () => {
      const invoker = createProxy();
      await invoker.sendQuestion(CHILD, null);

      await childTransport.publish(ANSWERS, result("someone-else", 0, null));
      await eventually(() => logger.count("answer_unknown_correlation") === 1);

      expect(invoker.poll("c-1").state).to.equal("PENDING");
    });
  });

  describe("on a bus that reorders deliveries", () => {
    beforeEach(() => {
      bus = new InMemoryBus({ shuffleDeliveries: true });
      parentTransport = new TransportAdapter({ bus, logger });
      childTransport = new TransportAdapter({ bus, logger });
    });

    it("releases a burst of logs and the result in ordering order without gaps", async () => {
      const invoker = createProxy({ reorderTimeoutMs: 5_000 });
      const lines: string[] = [];
      const gaps: Array<[number, number]> = [];
      const id = await invoker.sendQuestion(CHILD, null, null, {
        handlers: {
          onLog: (message) => lines.push(message.message),
          onGap: (from, to) => gaps.push([from, to]),
        },
      });
      const expected = Array.from({ length: 8 }, (_, index) => `line ${index}`);
      const envelopes = [
        ...expected.map((line, index) => logEnvelope(index, line, false, id)),
        result(id, expected.length, "done"),
      ];

      await Promise.all(envelopes.map((envelope) => childTransport.publish(ANSWERS, envelope)));
      const outcome = await invoker.awaitCall(id);
      await eventually(() => lines.length === expected.length);

      expect(outcome.status).to.equal("COMPLETED");
      expect(lines).to.deep.equal(expected);
      expect(gaps).to.deep.equal([]);
    });

    it("streams an analysis' logs in the order it wrote them", async () => {
      const steps = Array.from({ length: 12 }, (_, index) => `step ${index}`);
      await startResponder(async ({ log }) => {
        for (const step of steps) {
          await log("info", step);
        }
        return { outputValues: "finished" };
      });
      const invoker = createProxy({ reorderTimeoutMs: 5_000 });
      const lines: string[] = [];
      const gaps: Array<[number, number]> = [];

      const answer = await invoker.ask(CHILD, null, null, {
        handlers: {
          onLog: (message) => lines.push(message.message),
          onGap: (from, to) => gaps.push([from, to]),
        },
      });
      await eventually(() => lines.length === steps.length);

      expect(answer.outputValues).to.equal("finished");
      expect(lines).to.deep.equal(steps);
      expect(gaps).to.deep.equal([]);
    });
  });

  describe("cancellation", () => {
    it("settles the call as cancelled and drops later answers", async () => {
      const invoker = createProxy();
      const id = await invoker.sendQuestion(CHILD, null);

      expect(await invoker.cancel(id)).to.equal(true);
      expect(await invoker.cancel(id)).to.equal(false);
      expect(await invoker.awaitCall(id)).to.deep.equal({
        status: "CANCELLED",
        correlationId: "c-1",
        reason: "cancelled by caller",
      });

      await childTransport.publish(ANSWERS, result(id, 0, null));
      await eventually(() => logger.count("answer_after_terminal") === 1);
      expect(invoker.poll(id).state).to.equal("CANCELLED");
    });

    it("turns a cancelled ask into a CancelledError", async () => {
      const invoker = createProxy();
      const pending = invoker.ask(CHILD, null).then(
        () => null,
        (error: unknown) => error,
      );
      await eventually(() => questionCount() === 1);

      await invoker.cancel("c-1");

      expect(await pending).to.be.instanceOf(CancelledError);
    });

    it("releases waiters when the proxy stops", async () => {
      const invoker = createProxy();
      const id = await invoker.sendQuestion(CHILD, null);

      await invoker.stop();

      expect(await invoker.awaitCall(id)).to.deep.equal({
        status: "CANCELLED",
        correlationId: "c-1",
        reason: "invoker stopped",
      });
    });
  });

  describe("deadlines and retries", () => {
    it("re-sends under fresh correlation ids and times out once retries run out", async () => {
      const fake = useFakeClock();
      const invoker = createProxy({
        timeoutMs: 1_000,
        sweepIntervalMs: 50,
        retry: { maxRetries: 2, initialDelayMs: 100, backoffFactor: 2 },
      });
      const id = await invoker.sendQuestion(CHILD, { n: 1 });
      const settled = invoker.awaitCall(id);

      await fake.tickAsync(1_000);
      await flushAsync();
      expect(invoker.poll("c-1").state).to.equal("TIMED_OUT");
      expect(logger.find("invocation_retry_scheduled")?.payload).to.deep.equal({
        logical_call_id: "c-1",
        child_id: "child-a",
        attempt: 2,
        delay_ms: 100,
      });

      await fake.tickAsync(100);
      await flushAsync();
      expect(questionCount()).to.equal(2);
      expect(invoker.poll("c-2").deadline).to.equal(2_100);

      await fake.tickAsync(2_200);
      await flushAsync();
      const outcome = await settled;

      expect(outcome.status).to.equal("TIMED_OUT");
      if (outcome.status === "TIMED_OUT") {
        expect(outcome.correlationId).to.equal("c-3");
        expect(outcome.error).to.be.instanceOf(TimeoutError);
        if (outcome.error instanceof TimeoutError) {
          expect(outcome.error.attempts).to.equal(3);
          expect(outcome.error.correlationIds).to.deep.equal(["c-1", "c-2", "c-3"]);
        }
      }
      expect(questionCount()).to.equal(3);
      expect(invoker.poll("c-3")).to.include({ logicalCallId: "c-1", attempt: 3, state: "TIMED_OUT" });

      await childTransport.publish(ANSWERS, result("c-1", 0, "too late"));
      await eventually(() => logger.count("answer_after_terminal") === 1);
    });

    it("completes the logical call when a re-sent attempt is answered", async () => {
      const fake = useFakeClock();
      const invoker = createProxy({
        timeoutMs: 1_000,
        sweepIntervalMs: 50,
        retry: { maxRetries: 1, initialDelayMs: 100 },
      });
      const id = await invoker.sendQuestion(CHILD, null);

      await fake.tickAsync(1_100);
      await flushAsync();
      expect(questionCount()).to.equal(2);

      await childTransport.publish(ANSWERS, result("c-2", 0, "second time"));
      const outcome = await invoker.awaitCall(id);

      expect(outcome).to.deep.equal({
        status: "COMPLETED",
        correlationId: "c-2",
        outputValues: "second time",
        outputManifest: null,
      });
    });

    it("keeps a slow call alive while heartbeats arrive", async () => {
      const fake = useFakeClock();
      await startResponder(async () => {
        await sleep(2_500);
        return { outputValues: "done" };
      }, 300);
      const invoker = createProxy({ timeoutMs: 1_000, sweepIntervalMs: 50, retry: { maxRetries: 0 } });
      const id = await invoker.sendQuestion(CHILD, null);
      const settled = invoker.awaitCall(id);

      await fake.tickAsync(2_500);
      await flushAsync();

      expect(await settled).to.deep.equal({
        status: "COMPLETED",
        correlationId: "c-1",
        outputValues: "done",
        outputManifest: null,
      });
      const answers = bus.published.filter((record) => record.destination === ANSWERS);
      expect(answers.map((record) => record.attributes.type)).to.deep.equal([
        ...Array.from({ length: 8 }, () => "heartbeat"),
        "result",
      ]);
      expect(answers[8].attributes.ordering_number).to.equal("8");
      expect(questionCount()).to.equal(1);
    });
  });
});
