/**
 * Tests for the list component and the review list screen.
 */

import React from "react";
import { Text } from "ink";
import { render } from "ink-testing-library";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ReviewListScreen, WidgetList, type WidgetListItem } from "../App.js";
import { createChannel } from "../channel.js";
import { WidgetListState } from "../list.js";
import type { ReviewSummary } from "../types.js";

const ANSI = /\u001B\[[0-9;]*m/g;

function lines(frame: string | undefined): string[] {
  return (frame ?? "")
    .replace(ANSI, "")
    .split("\n")
    .map((line) => line.trimEnd());
}

function textItem(key: string): WidgetListItem {
  return {
    key,
    height: 1,
    render: (selected) => <Text>{`${key}:${String(selected)}`}</Text>
  };
}

describe("WidgetList", () => {
  let cleanup: (() => void) | undefined;

  afterEach(() => {
    cleanup?.();
    cleanup = undefined;
  });

  it("should pass null to render while nothing is selected", () => {
    const state = new WidgetListState();
    const { lastFrame, unmount } = render(
      <WidgetList items={["a", "b", "c"].map(textItem)} state={state} width={20} height={2} truncate={false} />
    );
    cleanup = unmount;

    expect(lines(lastFrame())).toEqual(["a:null", "b:null"]);
  });

  it("should mark only the selected item and scroll it into view", () => {
    const state = new WidgetListState();
    const items = ["a", "b", "c", "d"].map(textItem);
    const view = (): JSX.Element => <WidgetList items={items} state={state} width={20} height={3} truncate />;
    state.select(2);
    const { lastFrame, rerender, unmount } = render(view());
    cleanup = unmount;

    expect(lines(lastFrame())).toEqual(["a:false", "b:false", "c:true"]);

    state.select(3);
    rerender(view());

    expect(lines(lastFrame())).toEqual(["b:false", "c:false", "d:true"]);
    expect(state.offset).toBe(1);
  });

  it("should give each item its computed number of rows", () => {
    const tall: WidgetListItem = {
      key: "x",
      height: 2,
      render: () => <Text>{"x1\nx2\nx3"}</Text>
    };
    const { lastFrame, unmount } = render(
      <WidgetList items={[tall, textItem("y")]} state={new WidgetListState()} width={20} height={3} truncate={false} />
    );
    cleanup = unmount;

    expect(lines(lastFrame())).toEqual(["x1", "x2", "y:null"]);
  });
});

describe("ReviewListScreen", () => {
  const summary: ReviewSummary = {
    id: "PR_7",
    owner: "acme",
    repo: "widgets",
    title: "x".repeat(200),
    createdAt: "2024-05-01T10:00:00Z",
    number: 7
  };

  function renderScreen() {
    const [tx, rx] = createChannel<ReviewSummary>(2);
    void tx.send(summary);
    tx.close({ reason: "exhausted" });
    const open = () => rx;
    const onBeginReview = vi.fn();

    const result = render(
      <ReviewListScreen
        open={open}
        filterLabel="requested @me"
        listOptions={{ circular: false, truncate: true }}
        onBeginReview={onBeginReview}
        onExitRequest={() => undefined}
      />
    );
    return { onBeginReview, result };
  }

  it("should start a review on Enter only", async () => {
    const { onBeginReview, result } = renderScreen();

    await vi.waitFor(() => {
      expect(lines(result.lastFrame()).join("\n")).toContain("done, 1 pull requests");
    });

    result.stdin.write("b");
    expect(onBeginReview).not.toHaveBeenCalled();

    result.stdin.write("\r");
    await vi.waitFor(() => {
      expect(onBeginReview).toHaveBeenCalledTimes(1);
    });

    result.unmount();
  });

  it("should keep rows inside the terminal width", async () => {
    const { result } = renderScreen();

    // 100 columns minus padding and border leaves 94 for the row text.
    const row = `> acme/widgets #7 ${"x".repeat(73)}...`;
    await vi.waitFor(() => {
      expect(lines(result.lastFrame()).some((line) => line.includes(row))).toBe(true);
    });

    const frame = lines(result.lastFrame());
    expect(Math.max(...frame.map((line) => line.length))).toBeLessThanOrEqual(100);

    result.unmount();
  });
});
