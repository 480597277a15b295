import React, { useCallback, useEffect, useState } from "react";
import { Box, Text, useInput, useStdin, useStdout } from "ink";
import type { Receiver } from "./channel.js";
import { SelectableList, type SelectableListOptions, type WidgetListState } from "./list.js";
import {
  checkOutcome,
  commentHeight,
  fmtAge,
  STATUS_CHECK_HEIGHT,
  SUMMARY_ROW_HEIGHT,
  truncateText,
  wrapPlainLines
} from "./model.js";
import { useItemStream, type StreamStatus } from "./useItemStream.js";
import type { CheckOutcome, Comment, ReviewDetail, ReviewSummary, StatusCheck } from "./types.js";

type ReviewFocus = "comments" | "checks";

const FETCH_AHEAD = 5;
const DESCRIPTION_LINES = 4;

const OUTCOME_COLOR: Record<CheckOutcome, "green" | "yellow" | "red" | "blue"> = {
  success: "green",
  pending: "yellow",
  failure: "red",
  expired: "blue"
};

export interface WidgetListItem {
  key: string;
  height: number;
  /** `selected` is null while nothing in the list is selected. */
  render: (selected: boolean | null) => JSX.Element;
}

/**
 * Draws only the items that fit into `height` rows, keeping the selected item
 * on screen. The window is recomputed on every render since item heights may
 * change between frames.
 */
export function WidgetList({
  items,
  state,
  width,
  height,
  truncate
}: {
  items: WidgetListItem[];
  state: WidgetListState;
  width: number;
  height: number;
  truncate: boolean;
}): JSX.Element {
  const rows = state.computeViewport(
    items.map((item) => item.height),
    height,
    truncate
  );
  const first = state.offset;
  const selected = state.selected;

  return (
    <Box flexDirection="column" width={width} height={height} overflow="hidden">
      {rows.map((rowHeight, idx) => {
        const index = first + idx;
        const item = items[index];
        return (
          <Box key={item.key} width={width} height={rowHeight} flexShrink={0} overflow="hidden">
            {item.render(selected === null ? null : selected === index)}
          </Box>
        );
      })}
    </Box>
  );
}

function useSelectableList<T>(
  items: T[],
  options: SelectableListOptions
): { list: SelectableList<T>; update: (change: (list: SelectableList<T>) => void) => void } {
  const [list] = useState(() => new SelectableList<T>(items, options));
  const [, setVersion] = useState(0);
  list.items = items;
  list.circular = options.circular ?? list.circular;
  list.truncate = options.truncate ?? list.truncate;

  const update = useCallback(
    (change: (target: SelectableList<T>) => void): void => {
      change(list);
      setVersion((value) => value + 1);
    },
    [list]
  );

  return { list, update };
}

export function Spinner({ label }: { label: string }): JSX.Element {
  const { isRawModeSupported } = useStdin();
  const frames = ["|", "/", "-", "\\"];
  const [index, setIndex] = useState(0);

  useEffect(() => {
    if (!isRawModeSupported) {
      return () => undefined;
    }

    const timer = setInterval(() => {
      setIndex((value) => (value + 1) % frames.length);
    }, 120);
    return () => clearInterval(timer);
  }, [isRawModeSupported]);

  return <Text>{`${isRawModeSupported ? frames[index] : "-"} ${label}`}</Text>;
}

function StreamStatusLine({
  status,
  error,
  count,
  noun
}: {
  status: StreamStatus;
  error: string | null;
  count: number;
  noun: string;
}): JSX.Element {
  if (status === "processing") {
    return <Spinner label={`processing (${count} ${noun} loaded)`} />;
  }

  if (status === "failed") {
    return (
      <Text color="red" wrap="truncate">
        {`failed: ${error || "unknown error"} (${count} ${noun} loaded)`}
      </Text>
    );
  }

  return <Text dimColor>{status === "done" ? `done, ${count} ${noun}` : `${count} ${noun} loaded`}</Text>;
}

function summaryItem(summary: ReviewSummary, width: number, now: number): WidgetListItem {
  return {
    key: `review-${summary.id}`,
    height: SUMMARY_ROW_HEIGHT,
    render: (selected) => (
      <Box flexDirection="column">
        <Text color={selected ? "yellow" : "white"} bold={Boolean(selected)} wrap="truncate">
          {truncateText(
            `${selected ? ">" : " "} ${summary.owner}/${summary.repo} #${summary.number} ${summary.title}`,
            width
          )}
        </Text>
        <Text dimColor wrap="truncate">
          {`    created ${fmtAge(summary.createdAt, now)}`}
        </Text>
      </Box>
    )
  };
}

export function ReviewListScreen({
  open,
  filterLabel,
  listOptions,
  onBeginReview,
  onExitRequest
}: {
  open: () => Receiver<ReviewSummary>;
  filterLabel: string;
  listOptions: SelectableListOptions;
  onBeginReview: () => void;
  onExitRequest: () => void;
}): JSX.Element {
  const { isRawModeSupported } = useStdin();
  const { stdout } = useStdout();
  const stream = useItemStream(open, { batchSize: 4, prefetch: 30 });
  const { list, update } = useSelectableList(stream.items, listOptions);

  const terminalRows = stdout.rows || 24;
  const terminalCols = stdout.columns || 80;
  // Outer padding, border and inner padding take three columns per side.
  const listWidth = Math.max(20, terminalCols - 6);
  const listHeight = Math.max(SUMMARY_ROW_HEIGHT, terminalRows - 7);
  const selected = list.state.selected;

  useEffect(() => {
    if (selected === null && stream.items.length > 0) {
      update((target) => target.select(0));
    }
  }, [selected, stream.items.length, update]);

  const { pull, status, items: loaded } = stream;
  useEffect(() => {
    const position = selected ?? 0;
    if (status === "idle" && position >= loaded.length - FETCH_AHEAD) {
      pull();
    }
  }, [loaded.length, pull, selected, status]);

  useEffect(() => {
    if (!isRawModeSupported && stream.status !== "processing") {
      onExitRequest();
    }
  }, [isRawModeSupported, onExitRequest, stream.status]);

  useInput(
    (input, key) => {
      if (input === "q" || key.escape || (key.ctrl && input === "c")) {
        onExitRequest();
        return;
      }

      if (input === "r") {
        update((target) => target.select(null));
        stream.restart();
        return;
      }

      if (key.return) {
        onBeginReview();
        return;
      }

      if (input === "g") {
        update((target) => target.select(target.items.length > 0 ? 0 : null));
        return;
      }

      if (input === "G") {
        update((target) => target.select(target.items.length > 0 ? target.items.length - 1 : null));
        return;
      }

      if (key.downArrow || input === "j") {
        update((target) => target.next());
        return;
      }

      if (key.upArrow || input === "k") {
        update((target) => target.previous());
      }
    },
    { isActive: Boolean(isRawModeSupported) }
  );

  const now = Date.now();
  const items = stream.items.map((summary) => summaryItem(summary, listWidth, now));

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="green" wrap="truncate">
        {`rev  review requests  (${filterLabel})`}
      </Text>
      <StreamStatusLine status={stream.status} error={stream.error} count={stream.items.length} noun="pull requests" />

      <Box flexDirection="column" borderStyle="round" paddingX={1} height={listHeight + 2}>
        {items.length === 0 ? (
          <Text dimColor>
            {stream.status === "processing" ? "processing" : "No pull requests are waiting on you."}
          </Text>
        ) : (
          <WidgetList
            items={items}
            state={list.state}
            width={listWidth}
            height={listHeight}
            truncate={list.truncate}
          />
        )}
      </Box>

      <Text dimColor wrap="truncate">
        {isRawModeSupported
          ? "Keys: up/down or j/k move, g/G first/last, Enter start review, r reload, q quit"
          : "Non-interactive terminal detected: rendered once and exiting."}
      </Text>
    </Box>
  );
}

function commentItem(comment: Comment, index: number, width: number): WidgetListItem {
  const bodyLines = wrapPlainLines(comment.text.trim() || "(no text)", width - 4);
  return {
    key: `comment-${index}`,
    height: commentHeight(comment.text, width),
    render: (selected) => (
      <Box flexDirection="column" width={width} borderStyle="round" borderColor={selected ? "yellow" : "gray"} paddingX={1}>
        <Text bold color="cyan" wrap="truncate">
          {comment.author}
        </Text>
        {bodyLines.map((line, lineIdx) => (
          <Text key={`comment-${index}-${lineIdx}`} wrap="truncate">
            {line || " "}
          </Text>
        ))}
      </Box>
    )
  };
}

function statusCheckItem(check: StatusCheck, width: number): WidgetListItem {
  const outcome = checkOutcome(check);
  const title = check.kind === "check-run" ? check.name : check.context;
  const detail = check.kind === "check-run" ? check.status : check.description || "no description";
  const state = check.kind === "check-run" ? check.conclusion : check.state;

  return {
    key: `check-${check.id}`,
    height: STATUS_CHECK_HEIGHT,
    render: (selected) => (
      <Box flexDirection="column" width={width} borderStyle="single" borderColor={selected ? "yellow" : "gray"} paddingX={1}>
        <Text wrap="truncate">
          <Text bold>{title}</Text>
          <Text dimColor>{`  ${detail}`}</Text>
        </Text>
        <Text color={OUTCOME_COLOR[outcome]} wrap="truncate">
          {state}
        </Text>
      </Box>
    )
  };
}

function ReviewBody({
  review,
  focus,
  width,
  height,
  truncate,
  comments,
  checks
}: {
  review: ReviewDetail;
  focus: ReviewFocus;
  width: number;
  height: number;
  truncate: boolean;
  comments: SelectableList<Comment>;
  checks: SelectableList<StatusCheck>;
}): JSX.Element {
  const description = wrapPlainLines(review.body.trim() || "(no description)", width);
  const shownDescription = description.slice(0, DESCRIPTION_LINES);
  const labels = review.labels.length > 0 ? review.labels.join(", ") : "none";
  const commentsWidth = Math.max(20, Math.floor(width * 0.6));
  const checksWidth = Math.max(16, width - commentsWidth - 1);
  const panelHeight = Math.max(3, height - shownDescription.length - 6);

  return (
    <Box flexDirection="column">
      <Text bold wrap="truncate">
        {review.title}
      </Text>
      <Text dimColor wrap="truncate">
        {`${review.owner}/${review.repo} #${review.number} by ${review.author}, published ${fmtAge(review.publishedAt)}`}
      </Text>
      <Text wrap="truncate">{`labels: ${labels}`}</Text>
      {shownDescription.map((line, idx) => (
        <Text key={`description-${idx}`} wrap="truncate">
          {line || " "}
        </Text>
      ))}
      {description.length > shownDescription.length && <Text dimColor>...</Text>}

      <Box marginTop={1}>
        <Box flexDirection="column" width={commentsWidth}>
          <Text color={focus === "comments" ? "cyan" : "gray"}>
            {`Comments (${review.comments.comments.length}${review.comments.hasPrevious ? ", older not shown" : ""})`}
          </Text>
          {comments.items.length === 0 ? (
            <Text dimColor>No comments.</Text>
          ) : (
            <WidgetList
              items={comments.items.map((comment, idx) => commentItem(comment, idx, commentsWidth))}
              state={comments.state}
              width={commentsWidth}
              height={panelHeight}
              truncate={truncate}
            />
          )}
        </Box>
        <Box flexDirection="column" width={checksWidth} marginLeft={1}>
          <Text color={focus === "checks" ? "cyan" : "gray"}>{`Checks (${review.statusChecks.length})`}</Text>
          {checks.items.length === 0 ? (
            <Text dimColor>No status checks.</Text>
          ) : (
            <WidgetList
              items={checks.items.map((check) => statusCheckItem(check, checksWidth))}
              state={checks.state}
              width={checksWidth}
              height={panelHeight}
              truncate={truncate}
            />
          )}
        </Box>
      </Box>
    </Box>
  );
}

export function ReviewScreen({
  open,
  listOptions,
  onBack,
  onExitRequest
}: {
  open: () => Receiver<ReviewDetail>;
  listOptions: SelectableListOptions;
  onBack: () => void;
  onExitRequest: () => void;
}): JSX.Element {
  const { isRawModeSupported } = useStdin();
  const { stdout } = useStdout();
  const [position, setPosition] = useState(0);
  const [focus, setFocus] = useState<ReviewFocus>("comments");
  const stream = useItemStream(open, { batchSize: 1, prefetch: position + 2 });
  const review: ReviewDetail | undefined = stream.items[position];
  const finished = !review && (stream.status === "done" || stream.status === "failed");

  const comments = useSelectableList(review?.comments.comments || [], listOptions);
  const checks = useSelectableList(review?.statusChecks || [], listOptions);
  const resetComments = comments.update;
  const resetChecks = checks.update;

  useEffect(() => {
    resetComments((target) => target.select(null));
    resetChecks((target) => target.select(null));
  }, [position, resetChecks, resetComments]);

  useEffect(() => {
    if (!isRawModeSupported && (review || finished)) {
      onExitRequest();
    }
  }, [finished, isRawModeSupported, onExitRequest, review]);

  useInput(
    (input, key) => {
      if (input === "q" || (key.ctrl && input === "c")) {
        onExitRequest();
        return;
      }

      if (finished || key.escape || input === "b") {
        onBack();
        return;
      }

      if (input === "n" || input === "s") {
        if (review) {
          setPosition((value) => value + 1);
        }
        return;
      }

      if (key.tab) {
        setFocus((value) => (value === "comments" ? "checks" : "comments"));
        return;
      }

      const target = focus === "comments" ? comments.update : checks.update;
      if (key.downArrow || input === "j") {
        target((list) => list.next());
        return;
      }

      if (key.upArrow || input === "k") {
        target((list) => list.previous());
      }
    },
    { isActive: Boolean(isRawModeSupported) }
  );

  const terminalRows = stdout.rows || 24;
  const terminalCols = stdout.columns || 80;
  const width = Math.max(40, terminalCols - 2);
  const bodyHeight = Math.max(8, terminalRows - 4);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="green" wrap="truncate">
        {`rev  review ${position + 1}`}
      </Text>
      {finished ? (
        <Box flexDirection="column">
          {stream.status === "failed" ? (
            <Text color="red">{`failed: ${stream.error || "unknown error"}`}</Text>
          ) : (
            <Text>No more reviews.</Text>
          )}
          <Text dimColor>Press any key to go back to the list, or q to quit.</Text>
        </Box>
      ) : review ? (
        <ReviewBody
          review={review}
          focus={focus}
          width={width}
          height={bodyHeight}
          truncate={comments.list.truncate}
          comments={comments.list}
          checks={checks.list}
        />
      ) : (
        <Spinner label="processing" />
      )}
      <Text dimColor wrap="truncate">
        Keys: n/s next review, Tab switch panel, j/k move, b/Esc back to list, q quit
      </Text>
    </Box>
  );
}
