export interface ReviewFilter {
  requested?: string;
  org?: string;
  labels?: string[];
}

export interface ReviewSummary {
  id: string;
  owner: string;
  repo: string;
  title: string;
  createdAt: string;
  number: number;
}

export interface ReviewPage {
  items: ReviewSummary[];
  nextCursor: string | null;
  hasMore: boolean;
}

export interface Comment {
  author: string;
  text: string;
}

export interface CommentThread {
  comments: Comment[];
  hasPrevious: boolean;
}

export interface StatusContextCheck {
  kind: "status-context";
  id: string;
  state: string;
  description: string | null;
  context: string;
}

export interface CheckRunCheck {
  kind: "check-run";
  id: string;
  name: string;
  status: string;
  conclusion: string;
}

export type StatusCheck = StatusContextCheck | CheckRunCheck;

export type CheckOutcome = "success" | "pending" | "failure" | "expired";

export interface ReviewDetail {
  id: string;
  owner: string;
  repo: string;
  number: number;
  title: string;
  body: string;
  author: string;
  publishedAt: string | null;
  labels: string[];
  comments: CommentThread;
  statusChecks: StatusCheck[];
}

export interface ReviewLister {
  listPage(filter: ReviewFilter, cursor: string | null): Promise<ReviewPage>;
}

export interface ReviewDetailFetcher {
  getDetail(owner: string, repo: string, number: number): Promise<ReviewDetail | null>;
}

export type ReviewSource = ReviewLister & ReviewDetailFetcher;

export type StreamEndReason = "exhausted" | "capped" | "cancelled" | "failed";

export interface StreamOutcome {
  reason: StreamEndReason;
  error?: Error;
}

export interface PipelineOptions {
  channelCapacity: number;
  lowWater: number;
  hardCap: number;
}

export type Command = "review" | "init";

export interface CliOptions {
  command: Command;
  requested?: string;
  org?: string;
  labels?: string[];
  hardCap?: number;
  details?: boolean;
}

export interface AppConfig {
  filter: ReviewFilter;
  pageSize: number;
  hardCap: number;
  circular: boolean;
  truncate: boolean;
  githubToken: string | null;
}
