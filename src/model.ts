import type { CheckOutcome, ReviewFilter, StatusCheck } from "./types.js";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export function buildSearchQuery(filter: ReviewFilter): string {
  const requested = filter.requested?.trim();
  let reviewRequested = "review-requested:@me";
  if (requested) {
    reviewRequested = requested.includes("/")
      ? `team-review-requested:${requested}`
      : `review-requested:${requested}`;
  }

  const tokens = ["is:pr", reviewRequested, "state:open"];
  if (filter.org?.trim()) {
    tokens.push(`org:${filter.org.trim()}`);
  }

  const labels = (filter.labels || []).map((label) => label.trim()).filter(Boolean);
  if (labels.length > 0) {
    tokens.push(`label:${labels.join(",")}`);
  }

  return tokens.join(" ");
}

export function describeFilter(filter: ReviewFilter): string {
  const parts = [`requested ${filter.requested?.trim() || "@me"}`];
  if (filter.org) {
    parts.push(`org ${filter.org}`);
  }
  if (filter.labels && filter.labels.length > 0) {
    parts.push(`labels ${filter.labels.join(",")}`);
  }
  return parts.join(" | ");
}

/** `IN_PROGRESS` -> `in progress` */
export function enumLabel(value: string): string {
  return value.toLowerCase().replace(/_/g, " ");
}

export function checkOutcome(check: StatusCheck): CheckOutcome {
  if (check.kind === "status-context") {
    switch (check.state) {
      case "success":
        return "success";
      case "pending":
      case "expected":
        return "pending";
      default:
        return "failure";
    }
  }

  if (check.status !== "completed") {
    return "pending";
  }

  switch (check.conclusion) {
    case "success":
    case "neutral":
    case "skipped":
      return "success";
    case "stale":
      return "expired";
    default:
      return "failure";
  }
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"} ago`;
}

export function fmtAge(iso: string | null | undefined, now = Date.now()): string {
  if (!iso) {
    return "unknown time";
  }

  const timestamp = new Date(iso).getTime();
  if (Number.isNaN(timestamp)) {
    return iso;
  }

  const delta = Math.max(0, now - timestamp);
  if (delta < MINUTE_MS) {
    return "just now";
  }
  if (delta < HOUR_MS) {
    return plural(Math.floor(delta / MINUTE_MS), "minute");
  }
  if (delta < DAY_MS) {
    return plural(Math.floor(delta / HOUR_MS), "hour");
  }
  if (delta < 30 * DAY_MS) {
    return plural(Math.floor(delta / DAY_MS), "day");
  }
  if (delta < 365 * DAY_MS) {
    return plural(Math.floor(delta / (30 * DAY_MS)), "month");
  }
  return plural(Math.floor(delta / (365 * DAY_MS)), "year");
}

export function truncateText(input: string, maxWidth: number): string {
  const clean = input.replace(/\s+/g, " ").trim();
  if (clean.length <= maxWidth) {
    return clean;
  }

  if (maxWidth <= 3) {
    return clean.slice(0, Math.max(0, maxWidth));
  }

  return `${clean.slice(0, maxWidth - 3)}...`;
}

export function wrapPlainLines(text: string, wrapWidth: number): string[] {
  const safeWidth = Math.max(1, wrapWidth);
  const source = (text || "").replace(/\r\n?/g, "\n").split("\n");
  const output: string[] = [];

  for (const raw of source) {
    if (raw.length === 0) {
      output.push("");
      continue;
    }

    let remaining = raw;
    while (remaining.length > safeWidth) {
      output.push(remaining.slice(0, safeWidth));
      remaining = remaining.slice(safeWidth);
    }
    output.push(remaining);
  }

  return output.length > 0 ? output : [""];
}

export function countWrappedPlainLines(text: string, wrapWidth: number): number {
  return wrapPlainLines(text, wrapWidth).length;
}

/** Rows taken by a boxed comment: author line, wrapped body, top and bottom border. */
export function commentHeight(text: string, width: number): number {
  return countWrappedPlainLines(text.trim() || "(no text)", width - 4) + 3;
}

export const SUMMARY_ROW_HEIGHT = 2;
export const STATUS_CHECK_HEIGHT = 4;
