import { describe, expect, it } from "vitest";
import {
  buildSearchQuery,
  checkOutcome,
  commentHeight,
  describeFilter,
  enumLabel,
  fmtAge,
  truncateText,
  wrapPlainLines
} from "../model.js";
import type { CheckRunCheck, StatusContextCheck } from "../types.js";

function context(state: string): StatusContextCheck {
  return { kind: "status-context", id: "SC_1", state, description: null, context: "ci/lint" };
}

function checkRun(status: string, conclusion: string): CheckRunCheck {
  return { kind: "check-run", id: "CR_1", name: "build", status, conclusion };
}

describe("buildSearchQuery", () => {
  it("should default to reviews requested from the current user", () => {
    expect(buildSearchQuery({})).toBe("is:pr review-requested:@me state:open");
  });

  it("should request from a named user", () => {
    expect(buildSearchQuery({ requested: "octo" })).toBe("is:pr review-requested:octo state:open");
  });

  it("should request from a team and add org and label filters", () => {
    expect(buildSearchQuery({ requested: "acme/core", org: "acme", labels: ["bug", " ui "] })).toBe(
      "is:pr team-review-requested:acme/core state:open org:acme label:bug,ui"
    );
  });

  it("should ignore blank labels", () => {
    expect(buildSearchQuery({ labels: ["", "  "] })).toBe("is:pr review-requested:@me state:open");
  });
});

describe("describeFilter", () => {
  it("should summarize the active filters", () => {
    expect(describeFilter({})).toBe("requested @me");
    expect(describeFilter({ org: "acme", labels: ["a", "b"] })).toBe("requested @me | org acme | labels a,b");
  });
});

describe("enumLabel", () => {
  it("should lower case and replace underscores", () => {
    expect(enumLabel("IN_PROGRESS")).toBe("in progress");
    expect(enumLabel("SUCCESS")).toBe("success");
  });
});

describe("checkOutcome", () => {
  it("should map status context states", () => {
    expect(checkOutcome(context("success"))).toBe("success");
    expect(checkOutcome(context("pending"))).toBe("pending");
    expect(checkOutcome(context("expected"))).toBe("pending");
    expect(checkOutcome(context("error"))).toBe("failure");
  });

  it("should map check runs by status and conclusion", () => {
    expect(checkOutcome(checkRun("in progress", "unknown"))).toBe("pending");
    expect(checkOutcome(checkRun("completed", "skipped"))).toBe("success");
    expect(checkOutcome(checkRun("completed", "neutral"))).toBe("success");
    expect(checkOutcome(checkRun("completed", "stale"))).toBe("expired");
    expect(checkOutcome(checkRun("completed", "timed out"))).toBe("failure");
  });
});

describe("fmtAge", () => {
  const now = Date.parse("2024-06-01T12:00:00Z");

  it("should handle missing and unparseable dates", () => {
    expect(fmtAge(null, now)).toBe("unknown time");
    expect(fmtAge("yesterday-ish", now)).toBe("yesterday-ish");
  });

  it("should pick the largest whole unit", () => {
    expect(fmtAge("2024-06-01T11:59:30Z", now)).toBe("just now");
    expect(fmtAge("2024-06-01T11:59:00Z", now)).toBe("1 minute ago");
    expect(fmtAge("2024-06-01T11:15:00Z", now)).toBe("45 minutes ago");
    expect(fmtAge("2024-06-01T09:00:00Z", now)).toBe("3 hours ago");
    expect(fmtAge("2024-05-31T12:00:00Z", now)).toBe("1 day ago");
    expect(fmtAge("2024-04-01T12:00:00Z", now)).toBe("2 months ago");
    expect(fmtAge("2022-06-01T12:00:00Z", now)).toBe("2 years ago");
  });

  it("should not report future dates as negative", () => {
    expect(fmtAge("2024-06-02T12:00:00Z", now)).toBe("just now");
  });
});

describe("truncateText", () => {
  it("should collapse whitespace and add an ellipsis", () => {
    expect(truncateText("hello   world", 8)).toBe("hello...");
    expect(truncateText("hello\nworld", 20)).toBe("hello world");
    expect(truncateText("abc", 2)).toBe("ab");
  });
});

describe("wrapPlainLines", () => {
  it("should hard wrap long lines", () => {
    expect(wrapPlainLines("abcdefgh", 3)).toEqual(["abc", "def", "gh"]);
  });

  it("should keep blank lines and normalize line endings", () => {
    expect(wrapPlainLines("a\r\n\nb", 5)).toEqual(["a", "", "b"]);
    expect(wrapPlainLines("", 4)).toEqual([""]);
  });
});

describe("commentHeight", () => {
  it("should count the author line, wrapped body and border", () => {
    expect(commentHeight("hello world", 10)).toBe(5);
    expect(commentHeight("   ", 20)).toBe(4);
  });
});
