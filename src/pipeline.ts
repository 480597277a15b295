import { createChannel, type Receiver, type Sender } from "./channel.js";
import { errorMessage, log } from "./logging.js";
import type {
  PipelineOptions,
  ReviewDetail,
  ReviewFilter,
  ReviewSource,
  ReviewSummary,
  StreamEndReason
} from "./types.js";

export const SUMMARY_PIPELINE_DEFAULTS: PipelineOptions = {
  channelCapacity: 20,
  lowWater: 15,
  hardCap: 100
};

export const DETAIL_PIPELINE_DEFAULTS: PipelineOptions = {
  channelCapacity: 15,
  lowWater: 10,
  hardCap: 100
};

/** Owned by a single pump task. */
interface PipelineState<T> {
  backlog: T[];
  cursor: string | null;
  hasMore: boolean;
  seen: number;
  lowWater: number;
  hardCap: number;
}

/**
 * Turns one page of summaries into backlog entries. Resolves with the entries
 * in the order they should be delivered.
 */
type PageExpander<T> = (items: ReviewSummary[]) => Promise<T[]>;

async function pump<T>(
  source: ReviewSource,
  filter: ReviewFilter,
  state: PipelineState<T>,
  expand: PageExpander<T>,
  tx: Sender<T>
): Promise<StreamEndReason> {
  let reason: StreamEndReason = "exhausted";

  for (;;) {
    if (tx.isReceiverClosed) {
      return "cancelled";
    }

    if (state.backlog.length <= state.lowWater && state.hasMore) {
      log.debug("fetching more", { backlog: state.backlog.length, seen: state.seen });
      const page = await source.listPage(filter, state.cursor);

      const stalled = page.hasMore && (page.nextCursor === null || page.nextCursor === state.cursor);
      if (stalled) {
        log.warn("listing claimed more results without advancing its cursor", { cursor: state.cursor });
      }

      state.hasMore = page.hasMore && !stalled;
      state.cursor = page.nextCursor;
      state.seen += page.items.length;
      log.debug("page received", { items: page.items.length, hasMore: state.hasMore });
      state.backlog.push(...(await expand(page.items)));

      if (!state.hasMore) {
        break;
      }
    }

    if (state.seen > state.hardCap) {
      log.info("hard cap reached", { seen: state.seen, cap: state.hardCap });
      reason = "capped";
      break;
    }

    const next = state.backlog.shift();
    if (next !== undefined && !(await tx.send(next))) {
      return "cancelled";
    }
  }

  while (state.backlog.length > 0) {
    const next = state.backlog.shift();
    if (next === undefined || !(await tx.send(next))) {
      return "cancelled";
    }
  }

  return reason;
}

export class ReviewPipeline {
  private readonly summaryOptions: PipelineOptions;
  private readonly detailOptions: PipelineOptions;

  constructor(
    private readonly source: ReviewSource,
    options: { summaries?: Partial<PipelineOptions>; details?: Partial<PipelineOptions> } = {}
  ) {
    this.summaryOptions = { ...SUMMARY_PIPELINE_DEFAULTS, ...options.summaries };
    this.detailOptions = { ...DETAIL_PIPELINE_DEFAULTS, ...options.details };
  }

  /** Streams review summaries in listing order. */
  start(filter: ReviewFilter): Receiver<ReviewSummary> {
    return this.spawn("summaries", filter, this.summaryOptions, async (items) => items);
  }

  /**
   * Streams full review records. Details of one page are fetched concurrently
   * and delivered in the order they complete; pull requests that can no longer
   * be read are skipped. One failed lookup fails the whole run.
   */
  startDetails(filter: ReviewFilter): Receiver<ReviewDetail> {
    return this.spawn("details", filter, this.detailOptions, async (items) => {
      const completed: ReviewDetail[] = [];
      await Promise.all(
        items.map(async (item) => {
          log.debug("fetching pull request", { owner: item.owner, repo: item.repo, number: item.number });
          const detail = await this.source.getDetail(item.owner, item.repo, item.number);
          if (detail) {
            completed.push(detail);
          } else {
            log.info("pull request no longer available", { owner: item.owner, repo: item.repo, number: item.number });
          }
        })
      );
      return completed;
    });
  }

  private spawn<T>(
    name: string,
    filter: ReviewFilter,
    options: PipelineOptions,
    expand: PageExpander<T>
  ): Receiver<T> {
    const [tx, rx] = createChannel<T>(options.channelCapacity);
    const state: PipelineState<T> = {
      backlog: [],
      cursor: null,
      hasMore: true,
      seen: 0,
      lowWater: options.lowWater,
      hardCap: options.hardCap
    };

    void pump(this.source, filter, state, expand, tx).then(
      (reason) => {
        log.info("pipeline finished", { pipeline: name, reason, seen: state.seen });
        tx.close({ reason });
      },
      (error: unknown) => {
        log.error("pipeline failed", { pipeline: name, error: errorMessage(error) });
        tx.close({
          reason: "failed",
          error: error instanceof Error ? error : new Error(String(error))
        });
      }
    );

    return rx;
  }
}
