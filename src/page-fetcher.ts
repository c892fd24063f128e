import { PaginationCancelledError, PaginationError } from "./errors";
import { createLogger } from "./logger";

export const PAGE_WORKER_COUNT = 8;

const log = createLogger("pages");

export type PageFetcher<T> = (offset: number, signal?: AbortSignal) => Promise<T[]>;

export interface PageSlice<T> {
  offset: number;
  items: T[];
}

type PageResult<T> = { ok: true; offset: number; items: T[] } | { ok: false; offset: number; error: unknown };

export interface PageFetchOptions {
  signal?: AbortSignal;
  workerCount?: number;
  /** Called once per spawned worker, before it takes its first offset. */
  onWorkerStart?: (workerIndex: number) => void;
}

/** Offsets after the first page: pageSize, 2*pageSize, ... below total. */
export function remainingOffsets(total: number, pageSize: number): number[] {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const offsets: number[] = [];
  for (let offset = pageSize; offset < total; offset += pageSize) {
    offsets.push(offset);
  }

  return offsets;
}

/**
 * Fetches every page after the first with a bounded pool of workers sharing one
 * offset queue. All workers run to completion before the outcome is decided;
 * the first error to arrive wins and no partial pages are returned. Successful
 * pages come back in ascending offset order.
 */
export async function fetchRemainingPages<T>(
  total: number,
  pageSize: number,
  fetchPage: PageFetcher<T>,
  options: PageFetchOptions = {}
): Promise<PageSlice<T>[]> {
  const requestedWorkers = options.workerCount ?? PAGE_WORKER_COUNT;
  if (!Number.isInteger(requestedWorkers) || requestedWorkers <= 0) {
    throw new RangeError(`workerCount must be a positive integer, got ${requestedWorkers}`);
  }

  const offsets = remainingOffsets(total, pageSize);
  if (offsets.length === 0) {
    return [];
  }

  const { signal } = options;
  const workerCount = Math.min(requestedWorkers, offsets.length);
  const queue = [...offsets];
  const arrived: PageResult<T>[] = [];

  log.debug(`Fetching ${offsets.length} pages with ${workerCount} workers (total=${total} pageSize=${pageSize}).`);

  const worker = async (workerIndex: number): Promise<void> => {
    options.onWorkerStart?.(workerIndex);

    for (let offset = queue.shift(); offset !== undefined; offset = queue.shift()) {
      if (signal?.aborted) {
        arrived.push({ ok: false, offset, error: signal.reason });
        continue;
      }

      try {
        const items = await fetchPage(offset, signal);
        arrived.push({ ok: true, offset, items });
      } catch (error) {
        // a fetch cut off by the signal fails with whatever the transport threw
        arrived.push({ ok: false, offset, error: signal?.aborted ? signal.reason : error });
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, (_, index) => worker(index)));

  const failed = arrived.find((result) => !result.ok);
  if (failed && !failed.ok) {
    if (signal?.aborted && failed.error === signal.reason) {
      throw new PaginationCancelledError(signal.reason);
    }

    throw new PaginationError(failed.offset, failed.error);
  }

  if (signal?.aborted) {
    throw new PaginationCancelledError(signal.reason);
  }

  const slices: PageSlice<T>[] = [];
  for (const result of arrived) {
    if (result.ok) {
      slices.push({ offset: result.offset, items: result.items });
    }
  }

  return slices.sort((a, b) => a.offset - b.offset);
}
