import { describe, expect, it } from "vitest";
import { PaginationCancelledError, PaginationError } from "../src/errors";
import { fetchRemainingPages, PAGE_WORKER_COUNT, remainingOffsets } from "../src/page-fetcher";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function pageItems(offset: number, pageSize: number, total: number): number[] {
  const items: number[] = [];
  for (let index = offset; index < Math.min(offset + pageSize, total); index += 1) {
    items.push(index);
  }

  return items;
}

describe("remainingOffsets", () => {
  it("lists offsets after the first page", () => {
    expect(remainingOffsets(130, 50)).toEqual([50, 100]);
    expect(remainingOffsets(150, 50)).toEqual([50, 100]);
    expect(remainingOffsets(151, 50)).toEqual([50, 100, 150]);
  });

  it("is empty when everything fits on the first page", () => {
    expect(remainingOffsets(0, 50)).toEqual([]);
    expect(remainingOffsets(50, 50)).toEqual([]);
  });

  it("rejects a non-positive page size", () => {
    expect(() => remainingOffsets(10, 0)).toThrow(RangeError);
  });
});

describe("fetchRemainingPages", () => {
  it("returns nothing and spawns no worker when there are no offsets", async () => {
    let workers = 0;
    let calls = 0;

    const result = await fetchRemainingPages(
      40,
      50,
      async () => {
        calls += 1;
        return [];
      },
      { onWorkerStart: () => (workers += 1) }
    );

    expect(result).toEqual([]);
    expect(workers).toBe(0);
    expect(calls).toBe(0);
  });

  it("spawns min(8, offsets) workers", async () => {
    const countWorkers = async (total: number): Promise<number> => {
      let workers = 0;
      await fetchRemainingPages(total, 10, async () => [], { onWorkerStart: () => (workers += 1) });
      return workers;
    };

    expect(PAGE_WORKER_COUNT).toBe(8);
    expect(await countWorkers(30)).toBe(2);
    expect(await countWorkers(90)).toBe(8);
    expect(await countWorkers(500)).toBe(8);
  });

  it("never runs more fetches at once than there are workers", async () => {
    let active = 0;
    let peak = 0;

    await fetchRemainingPages(250, 10, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(2);
      active -= 1;
      return [];
    });

    expect(peak).toBe(8);
  });

  it("orders pages by offset regardless of completion order", async () => {
    const result = await fetchRemainingPages(130, 50, async (offset) => {
      await sleep(offset === 50 ? 20 : 1);
      return pageItems(offset, 50, 130);
    });

    expect(result.map((slice) => slice.offset)).toEqual([50, 100]);
    expect(result.flatMap((slice) => slice.items)).toEqual(pageItems(50, 80, 130));
  });

  it("matches a strictly sequential fetch", async () => {
    const cases: Array<[number, number]> = [
      [101, 10],
      [1000, 50],
      [37, 7],
      [100, 100],
      [9, 1]
    ];

    for (const [total, pageSize] of cases) {
      const fetchPage = async (offset: number): Promise<number[]> => {
        await sleep((offset * 7) % 5);
        return pageItems(offset, pageSize, total);
      };

      const sequential: number[] = [];
      for (let offset = pageSize; offset < total; offset += pageSize) {
        sequential.push(...(await fetchPage(offset)));
      }

      const concurrent = (await fetchRemainingPages(total, pageSize, fetchPage)).flatMap((slice) => slice.items);

      expect(concurrent).toEqual(sequential);
    }
  });

  it("fails with the offending offset and returns no partial pages", async () => {
    const failure = new Error("boom");

    const attempt = fetchRemainingPages(300, 50, async (offset) => {
      if (offset === 150) {
        throw failure;
      }
      return pageItems(offset, 50, 300);
    });

    await expect(attempt).rejects.toBeInstanceOf(PaginationError);
    await expect(attempt).rejects.toMatchObject({
      offset: 150,
      cause: failure,
      message: "Failed fetching page at offset 150: boom"
    });
  });

  it("reports the first error to arrive, not the lowest offset", async () => {
    const attempt = fetchRemainingPages(150, 50, async (offset) => {
      if (offset === 50) {
        await sleep(30);
        throw new Error("slow failure");
      }
      throw new Error("fast failure");
    });

    await expect(attempt).rejects.toMatchObject({ offset: 100 });
  });

  it("lets every started fetch finish before failing", async () => {
    const completed: number[] = [];

    await expect(
      fetchRemainingPages(
        200,
        50,
        async (offset) => {
          if (offset === 50) {
            throw new Error("early failure");
          }
          await sleep(15);
          completed.push(offset);
          return [];
        },
        { workerCount: 3 }
      )
    ).rejects.toMatchObject({ offset: 50 });

    expect(completed.sort((a, b) => a - b)).toEqual([100, 150]);
  });

  it("skips remaining fetches once cancelled and reports the cancellation", async () => {
    const controller = new AbortController();
    const fetched: number[] = [];

    const attempt = fetchRemainingPages(
      500,
      50,
      async (offset) => {
        fetched.push(offset);
        if (offset === 50) {
          controller.abort(new Error("stop"));
        }
        return [];
      },
      { signal: controller.signal, workerCount: 1 }
    );

    await expect(attempt).rejects.toBeInstanceOf(PaginationCancelledError);
    expect(fetched).toEqual([50]);
  });

  it("rejects a worker count it cannot run with", async () => {
    let calls = 0;
    const fetchPage = async (): Promise<number[]> => {
      calls += 1;
      return [];
    };

    for (const workerCount of [0, -2, 1.5, Number.NaN]) {
      await expect(fetchRemainingPages(130, 50, fetchPage, { workerCount })).rejects.toBeInstanceOf(RangeError);
    }
    expect(calls).toBe(0);
  });

  it("reports a fetch interrupted mid-flight as a cancellation", async () => {
    const controller = new AbortController();
    const reason = new Error("stop");
    const started: number[] = [];

    const attempt = fetchRemainingPages(
      200,
      50,
      (offset, signal) =>
        new Promise<number[]>((_, reject) => {
          started.push(offset);
          signal?.addEventListener("abort", () => reject(new Error("socket closed")), { once: true });
          if (started.length === 3) {
            controller.abort(reason);
          }
        }),
      { signal: controller.signal }
    );

    const error = await attempt.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(PaginationCancelledError);
    expect(error instanceof PaginationCancelledError && error.cause).toBe(reason);
    expect(started.sort((a, b) => a - b)).toEqual([50, 100, 150]);
  });
});
