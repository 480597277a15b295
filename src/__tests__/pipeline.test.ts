import { describe, expect, it } from "vitest";
import type { Receiver } from "../channel.js";
import { ReviewPipeline } from "../pipeline.js";
import type { ReviewDetail, ReviewPage, ReviewSource, ReviewSummary } from "../types.js";

const PAGE_SIZE = 10;

function summary(n: number): ReviewSummary {
  return {
    id: `PR_${n}`,
    owner: "acme",
    repo: "widgets",
    title: `Change ${n}`,
    createdAt: "2024-01-01T00:00:00Z",
    number: n
  };
}

function detail(item: ReviewSummary): ReviewDetail {
  return {
    id: item.id,
    owner: item.owner,
    repo: item.repo,
    number: item.number,
    title: item.title,
    body: "",
    author: "octo",
    publishedAt: item.createdAt,
    labels: [],
    comments: { comments: [], hasPrevious: false },
    statusChecks: []
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

class FakeSource implements ReviewSource {
  calls = 0;
  readonly cursors: Array<string | null> = [];

  constructor(
    private readonly pageAt: (index: number) => ReviewPage,
    private readonly detailFor: (item: ReviewSummary) => Promise<ReviewDetail | null> = async (item) =>
      detail(item)
  ) {}

  async listPage(_filter: unknown, cursor: string | null): Promise<ReviewPage> {
    this.cursors.push(cursor);
    const index = this.calls;
    this.calls += 1;
    return this.pageAt(index);
  }

  async getDetail(_owner: string, _repo: string, number: number): Promise<ReviewDetail | null> {
    return this.detailFor(summary(number));
  }
}

function fixedPages(pages: ReviewSummary[][]): (index: number) => ReviewPage {
  return (index) => ({
    items: pages[index] ?? [],
    nextCursor: `c${index + 1}`,
    hasMore: index < pages.length - 1
  });
}

function endlessPages(index: number): ReviewPage {
  return {
    items: Array.from({ length: PAGE_SIZE }, (_, k) => summary(index * PAGE_SIZE + k)),
    nextCursor: `c${index + 1}`,
    hasMore: true
  };
}

async function collect<T>(rx: Receiver<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of rx) {
    items.push(item);
  }
  return items;
}

describe("ReviewPipeline.start", () => {
  it("should deliver summaries in page order", async () => {
    const [a, b, c] = [summary(1), summary(2), summary(3)];
    const source = new FakeSource(fixedPages([[a, b], [c], []]));
    const rx = new ReviewPipeline(source).start({});

    expect(await collect(rx)).toEqual([a, b, c]);
    expect(await rx.closed).toEqual({ reason: "exhausted" });
    expect(source.cursors).toEqual([null, "c1", "c2"]);
  });

  it("should stop fetching once the source reports no more results", async () => {
    const source = new FakeSource(fixedPages([[summary(1)], [summary(2)]]));
    const rx = new ReviewPipeline(source).start({});

    expect((await collect(rx)).map((item) => item.number)).toEqual([1, 2]);
    await delay(10);
    expect(source.calls).toBe(2);
  });

  it("should hold fetching while a slow consumer leaves the channel full", async () => {
    const source = new FakeSource(endlessPages);
    const rx = new ReviewPipeline(source, {
      summaries: { channelCapacity: 5, lowWater: 3 }
    }).start({});

    await delay(20);
    expect(source.calls).toBe(1);
    expect(rx.buffered).toBe(5);
    expect(source.calls * PAGE_SIZE).toBeLessThanOrEqual(3 + PAGE_SIZE + 5);

    await delay(20);
    expect(source.calls).toBe(1);

    rx.close();
    expect(await rx.closed).toEqual({ reason: "cancelled" });
  });

  it("should end with the cap plus at most one page", async () => {
    const source = new FakeSource(endlessPages);
    const rx = new ReviewPipeline(source, { summaries: { hardCap: 25 } }).start({});

    const items = await collect(rx);

    expect(items).toHaveLength(30);
    expect(items.length).toBeGreaterThanOrEqual(25);
    expect(items.length).toBeLessThanOrEqual(25 + PAGE_SIZE);
    expect(items.map((item) => item.number)).toEqual(Array.from({ length: 30 }, (_, n) => n));
    expect(source.calls).toBe(3);
    expect(rx.outcome).toEqual({ reason: "capped" });
  });

  it("should stop promptly when the consumer goes away", async () => {
    const source = new FakeSource(endlessPages);
    const rx = new ReviewPipeline(source).start({});

    expect(await rx.receive()).toEqual(summary(0));
    expect(await rx.receive()).toEqual(summary(1));
    const fetchesAtDrop = source.calls;

    rx.close();

    expect(await rx.closed).toEqual({ reason: "cancelled" });
    await delay(20);
    expect(source.calls).toBeLessThanOrEqual(fetchesAtDrop + 1);
  });

  it("should fail the stream when a listing call rejects", async () => {
    const source = new FakeSource((index) => {
      if (index === 1) {
        throw new Error("rate limited");
      }
      return endlessPages(index);
    });
    const rx = new ReviewPipeline(source).start({});

    expect(await collect(rx)).toEqual([summary(0)]);
    expect(rx.outcome?.reason).toBe("failed");
    expect(rx.outcome?.error?.message).toBe("rate limited");
    expect(source.calls).toBe(2);
  });

  it("should treat a cursor that does not advance as the end of results", async () => {
    const source = new FakeSource((index) => ({
      items: [summary(index)],
      nextCursor: "same",
      hasMore: true
    }));
    const rx = new ReviewPipeline(source).start({});

    expect((await collect(rx)).map((item) => item.number)).toEqual([0, 1]);
    expect(rx.outcome).toEqual({ reason: "exhausted" });
    expect(source.calls).toBe(2);
  });
});

describe("ReviewPipeline.startDetails", () => {
  it("should deliver every available detail in completion order", async () => {
    const latency: Record<number, number> = { 1: 30, 2: 10, 3: 0, 4: 5 };
    const source = new FakeSource(
      fixedPages([[summary(1), summary(2), summary(3)], [summary(4)]]),
      async (item) => {
        await delay(latency[item.number]);
        return item.number === 3 ? null : detail(item);
      }
    );
    const rx = new ReviewPipeline(source).startDetails({});

    const numbers = (await collect(rx)).map((item) => item.number);

    expect([...numbers].sort()).toEqual([1, 2, 4]);
    expect(numbers).toEqual([2, 1, 4]);
    expect(rx.outcome).toEqual({ reason: "exhausted" });
  });

  it("should discard the whole page when one detail lookup fails", async () => {
    const source = new FakeSource(fixedPages([[summary(1), summary(2)]]), async (item) => {
      if (item.number === 2) {
        await delay(5);
        throw new Error("boom");
      }
      return detail(item);
    });
    const rx = new ReviewPipeline(source).startDetails({});

    expect(await collect(rx)).toEqual([]);
    expect(rx.outcome?.reason).toBe("failed");
    expect(rx.outcome?.error?.message).toBe("boom");
  });
});
