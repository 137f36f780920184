import { describe, expect, it, vi } from "vitest";
import { StoreFailureError, type ClassificationResult, type Post } from "@incident-relay/shared";

import {
  createFakeClassifier,
  createSilentLogger,
  incidentResult,
} from "../test-helpers/fakes.js";
import {
  ClassificationPoller,
  isConfirmedIncident,
  type ClassificationPollerConfig,
  type PollerSleep,
} from "./classification-poller.js";
import { SAFE_DEFAULT_RESULT } from "./incident-classifier.js";
import { InMemoryPostStore } from "./post-store.js";

const baseConfig: ClassificationPollerConfig = {
  pollIntervalMs: 1_000,
  batchLimit: 10,
  confidenceThreshold: 70,
  includeSynthetic: true,
};

const seedPosts = async (store: InMemoryPostStore, texts: string[]) => {
  const posts: Post[] = [];
  for (const text of texts) {
    posts.push(await store.createPost({ text, isSynthetic: false }));
  }
  return posts;
};

const unprocessedIds = async (store: InMemoryPostStore) => {
  return (await store.listUnprocessedPosts(100, true)).map((post) => post.id);
};

describe("isConfirmedIncident", () => {
  it("needs a positive verdict at or above the threshold", () => {
    expect(isConfirmedIncident(incidentResult({ confidence: 70 }), 70)).toBe(true);
    expect(isConfirmedIncident(incidentResult({ confidence: 69 }), 70)).toBe(false);
    expect(isConfirmedIncident(incidentResult({ isIncident: false, confidence: 100 }), 70)).toBe(
      false
    );
  });
});

describe("ClassificationPoller.runOnce", () => {
  it("records incidents only at or above the threshold and marks every post processed", async () => {
    const store = new InMemoryPostStore();
    const [below, at] = await seedPosts(store, ["bang near the market", "car set on fire"]);
    const results = new Map<string, ClassificationResult>([
      ["bang near the market", incidentResult({ confidence: 69 })],
      ["car set on fire", incidentResult({ confidence: 70 })],
    ]);
    const { classifier } = createFakeClassifier(async (text) => results.get(text) ?? SAFE_DEFAULT_RESULT);
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      logger: createSilentLogger(),
    });

    const report = await poller.runOnce();

    expect(report).toEqual({
      fetched: 2,
      processed: 2,
      incidents: 1,
      classificationFailures: 0,
      storeFailures: 0,
      cancelled: false,
    });
    expect(await unprocessedIds(store)).toEqual([]);

    const incidents = await store.listRecentIncidents(10);
    expect(incidents).toHaveLength(1);
    expect(incidents[0]).toMatchObject({
      sourcePostId: at?.id,
      incidentType: "arson",
      confidence: 70,
      country: "South Korea",
      area: "Mapo-gu",
      summary: "A car was set on fire near the station.",
    });
    expect(incidents.some((incident) => incident.sourcePostId === below?.id)).toBe(false);
  });

  it("contains a classification failure to its own post", async () => {
    const store = new InMemoryPostStore();
    const posts = await seedPosts(store, ["p1", "p2", "p3", "p4", "p5"]);
    const { classifier, classify } = createFakeClassifier(async (text) => {
      if (text === "p3") {
        throw new Error("classifier unavailable");
      }
      return incidentResult();
    });
    const logger = createSilentLogger();
    const poller = new ClassificationPoller({ store, classifier, config: baseConfig, logger });
    const markSpy = vi.spyOn(store, "markPostProcessed");

    const report = await poller.runOnce();

    expect(report).toMatchObject({
      fetched: 5,
      processed: 5,
      incidents: 4,
      classificationFailures: 1,
    });
    expect(classify.mock.calls.map(([text]) => text)).toEqual(["p1", "p2", "p3", "p4", "p5"]);
    expect(markSpy.mock.calls.map(([id]) => id)).toEqual(posts.map((post) => post.id));
    expect(await unprocessedIds(store)).toEqual([]);

    const sources = (await store.listRecentIncidents(10)).map((incident) => incident.sourcePostId);
    expect(sources).not.toContain(posts[2]?.id);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("does nothing on a second pass over the same posts", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["p1", "p2"]);
    const { classifier, classify } = createFakeClassifier(async () => incidentResult());
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      logger: createSilentLogger(),
    });

    await poller.runOnce();
    const markSpy = vi.spyOn(store, "markPostProcessed");
    const incidentSpy = vi.spyOn(store, "createConfirmedIncident");
    const second = await poller.runOnce();

    expect(second).toMatchObject({ fetched: 0, processed: 0, incidents: 0 });
    expect(classify).toHaveBeenCalledTimes(2);
    expect(markSpy).not.toHaveBeenCalled();
    expect(incidentSpy).not.toHaveBeenCalled();
    expect(await store.listRecentIncidents(10)).toHaveLength(2);
  });

  it("respects the batch limit and the synthetic filter", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["r1", "r2", "r3"]);
    const synthetic = await store.createPost({ text: "s1", isSynthetic: true });
    const { classifier, classify } = createFakeClassifier(async () => SAFE_DEFAULT_RESULT);
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: { ...baseConfig, batchLimit: 2, includeSynthetic: false },
      logger: createSilentLogger(),
    });

    expect((await poller.runOnce()).processed).toBe(2);
    expect((await poller.runOnce()).processed).toBe(1);
    expect((await poller.runOnce()).fetched).toBe(0);

    expect(classify.mock.calls.map(([text]) => text)).toEqual(["r1", "r2", "r3"]);
    expect(await unprocessedIds(store)).toEqual([synthetic.id]);
  });

  it("yields an empty batch when listing fails", async () => {
    const store = new InMemoryPostStore();
    vi.spyOn(store, "listUnprocessedPosts").mockRejectedValueOnce(
      new StoreFailureError("listUnprocessedPosts", 503)
    );
    const { classifier, classify } = createFakeClassifier(async () => incidentResult());
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      logger: createSilentLogger(),
    });

    expect(await poller.runOnce()).toEqual({
      fetched: 0,
      processed: 0,
      incidents: 0,
      classificationFailures: 0,
      storeFailures: 1,
      cancelled: false,
    });
    expect(classify).not.toHaveBeenCalled();
  });

  it("still marks the post processed when the incident insert fails", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["car set on fire"]);
    vi.spyOn(store, "createConfirmedIncident").mockRejectedValueOnce(
      new StoreFailureError("createConfirmedIncident", 500)
    );
    const { classifier } = createFakeClassifier(async () => incidentResult());
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      logger: createSilentLogger(),
    });

    const report = await poller.runOnce();

    expect(report).toMatchObject({ processed: 1, incidents: 0, storeFailures: 1 });
    expect(await unprocessedIds(store)).toEqual([]);
  });

  it("returns at once for an aborted signal", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["p1"]);
    const listSpy = vi.spyOn(store, "listUnprocessedPosts");
    const { classifier } = createFakeClassifier(async () => incidentResult());
    const poller = new ClassificationPoller({ store, classifier, config: baseConfig });
    const controller = new AbortController();
    controller.abort();

    const report = await poller.runOnce(controller.signal);

    expect(report.cancelled).toBe(true);
    expect(listSpy).not.toHaveBeenCalled();
  });

  it("leaves a post unprocessed when cancelled during its classification", async () => {
    const store = new InMemoryPostStore();
    const posts = await seedPosts(store, ["p1", "p2"]);
    const controller = new AbortController();
    const { classifier, classify } = createFakeClassifier(async () => {
      controller.abort();
      return incidentResult();
    });
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      logger: createSilentLogger(),
    });

    const report = await poller.runOnce(controller.signal);

    expect(report).toMatchObject({ fetched: 2, processed: 0, incidents: 0, cancelled: true });
    expect(classify).toHaveBeenCalledTimes(1);
    expect(await unprocessedIds(store)).toEqual(posts.map((post) => post.id));
    expect(await store.listRecentIncidents(10)).toEqual([]);
  });
});

describe("ClassificationPoller loop", () => {
  it("polls on its interval until the signal aborts", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["p1"]);
    const listSpy = vi.spyOn(store, "listUnprocessedPosts");
    const { classifier } = createFakeClassifier(async () => SAFE_DEFAULT_RESULT);
    const controller = new AbortController();
    let sleeps = 0;
    const sleep = vi.fn<PollerSleep>(async () => {
      sleeps += 1;
      if (sleeps >= 2) {
        controller.abort();
      }
    });
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      sleep,
      logger: createSilentLogger(),
    });

    await poller.run(controller.signal);

    expect(listSpy).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1_000, controller.signal);
    expect(await unprocessedIds(store)).toEqual([]);
  });

  it("starts once and stops cleanly", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["p1"]);
    const { classifier, classify } = createFakeClassifier(async () => SAFE_DEFAULT_RESULT);
    const sleep: PollerSleep = (_ms, signal) => {
      return new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
    };
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      sleep,
      logger: createSilentLogger(),
    });

    poller.start();
    poller.start();
    expect(poller.isRunning).toBe(true);

    await vi.waitFor(async () => {
      expect(await unprocessedIds(store)).toEqual([]);
    });
    await poller.stop();

    expect(poller.isRunning).toBe(false);
    expect(classify).toHaveBeenCalledTimes(1);
  });

  it("does not overlap loops when restarted before stop resolves", async () => {
    const store = new InMemoryPostStore();
    await seedPosts(store, ["car set on fire"]);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let calls = 0;
    let active = 0;
    let maxActive = 0;
    const { classifier, classify } = createFakeClassifier(async () => {
      calls += 1;
      active += 1;
      maxActive = Math.max(maxActive, active);
      if (calls === 1) {
        await gate;
      }
      active -= 1;
      return incidentResult();
    });
    const sleep: PollerSleep = (_ms, signal) => {
      return new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
    };
    const poller = new ClassificationPoller({
      store,
      classifier,
      config: baseConfig,
      sleep,
      logger: createSilentLogger(),
    });

    poller.start();
    await vi.waitFor(() => {
      expect(classify).toHaveBeenCalledTimes(1);
    });

    const stopping = poller.stop();
    poller.start();
    expect(poller.isRunning).toBe(true);

    release();
    await stopping;
    await vi.waitFor(async () => {
      expect(await unprocessedIds(store)).toEqual([]);
    });
    await poller.stop();

    expect(maxActive).toBe(1);
    expect(classify).toHaveBeenCalledTimes(2);
    expect(await store.listRecentIncidents(10)).toHaveLength(1);
    expect(poller.isRunning).toBe(false);
  });
});
