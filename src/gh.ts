import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { errorMessage, log } from "./logging.js";
import { buildSearchQuery, enumLabel } from "./model.js";
import type {
  ReviewDetail,
  ReviewFilter,
  ReviewPage,
  ReviewSource,
  ReviewSummary,
  StatusCheck
} from "./types.js";

const execFileAsync = promisify(execFile);
const DEFAULT_PAGE_SIZE = 20;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (bin: string, args: string[], env: NodeJS.ProcessEnv) => Promise<CommandResult>;

export class GhCommandError extends Error {
  constructor(
    message: string,
    readonly stderr = ""
  ) {
    super(message);
    this.name = "GhCommandError";
  }
}

export class GithubResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GithubResponseError";
  }
}

function execFailure(error: unknown): { code: unknown; stdout: string; stderr: string } | null {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }

  const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  return { code: error.code, stdout, stderr };
}

export const execRunner: CommandRunner = async (bin, args, env) => {
  try {
    const { stdout, stderr } = await execFileAsync(bin, args, { env, maxBuffer: 1024 * 1024 * 64 });
    return { stdout, stderr, exitCode: 0 };
  } catch (error) {
    const failure = execFailure(error);
    if (!failure) {
      throw error;
    }

    if (failure.code === "ENOENT") {
      throw new GhCommandError(`${bin} was not found on PATH. Install the GitHub CLI and run "gh auth login".`);
    }

    return {
      stdout: failure.stdout,
      stderr: failure.stderr,
      exitCode: typeof failure.code === "number" ? failure.code : 1
    };
  }
};

const SEARCH_QUERY = [
  "query($searchQuery:String!,$first:Int!,$cursor:String){",
  "search(query:$searchQuery,type:ISSUE,first:$first,after:$cursor){",
  "pageInfo{ endCursor hasNextPage }",
  "nodes{ __typename ... on PullRequest { id number title createdAt repository { name owner { login } } } }",
  "}",
  "}"
].join(" ");

const PULL_REQUEST_QUERY = [
  "query($owner:String!,$name:String!,$number:Int!){",
  "repository(owner:$owner,name:$name){",
  "name owner { login }",
  "pullRequest(number:$number){",
  "id number title bodyText publishedAt",
  "author { login }",
  "labels(first:20){ nodes { name } }",
  "comments(last:20){ pageInfo { hasPreviousPage } nodes { author { login } bodyText } }",
  "commits(last:1){ nodes { commit { statusCheckRollup { contexts(first:50){ nodes {",
  "__typename",
  "... on CheckRun { id name status conclusion }",
  "... on StatusContext { id state description context }",
  "} } } } } }",
  "}",
  "}",
  "}"
].join(" ");

const graphqlErrorSchema = z.object({
  type: z.string().optional(),
  message: z.string()
});

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphqlErrorSchema).optional()
});

interface GraphqlResponse {
  data: unknown;
  errors: Array<z.infer<typeof graphqlErrorSchema>>;
}

const actorSchema = z.object({ login: z.string() }).nullable();

const searchNodeSchema = z.object({ __typename: z.string() }).passthrough().nullable();

const pullRequestSummarySchema = z.object({
  id: z.string(),
  number: z.number(),
  title: z.string(),
  createdAt: z.string(),
  repository: z.object({
    name: z.string(),
    owner: z.object({ login: z.string() })
  })
});

const searchSchema = z.object({
  search: z.object({
    pageInfo: z.object({
      endCursor: z.string().nullable(),
      hasNextPage: z.boolean()
    }),
    nodes: z.array(searchNodeSchema).nullable()
  })
});

const statusContextNodeSchema = z.discriminatedUnion("__typename", [
  z.object({
    __typename: z.literal("CheckRun"),
    id: z.string(),
    name: z.string(),
    status: z.string(),
    conclusion: z.string().nullable()
  }),
  z.object({
    __typename: z.literal("StatusContext"),
    id: z.string(),
    state: z.string(),
    description: z.string().nullable(),
    context: z.string()
  })
]);

const pullRequestSchema = z.object({
  id: z.string(),
  number: z.number(),
  title: z.string(),
  bodyText: z.string(),
  publishedAt: z.string().nullable(),
  author: actorSchema,
  labels: z.object({ nodes: z.array(z.object({ name: z.string() }).nullable()).nullable() }).nullable(),
  comments: z.object({
    pageInfo: z.object({ hasPreviousPage: z.boolean() }),
    nodes: z.array(z.object({ author: actorSchema, bodyText: z.string() }).nullable()).nullable()
  }),
  commits: z.object({
    nodes: z
      .array(
        z
          .object({
            commit: z.object({
              statusCheckRollup: z
                .object({
                  contexts: z.object({ nodes: z.array(statusContextNodeSchema.nullable()).nullable() })
                })
                .nullable()
            })
          })
          .nullable()
      )
      .nullable()
  })
});

const repositorySchema = z.object({
  repository: z
    .object({
      name: z.string(),
      owner: z.object({ login: z.string() }),
      pullRequest: pullRequestSchema.nullable()
    })
    .nullable()
});

type PullRequestNode = z.infer<typeof pullRequestSchema>;
type StatusContextNode = z.infer<typeof statusContextNodeSchema>;

function author(actor: { login: string } | null): string {
  return actor?.login || "ghost";
}

function toStatusCheck(node: StatusContextNode): StatusCheck {
  if (node.__typename === "CheckRun") {
    return {
      kind: "check-run",
      id: node.id,
      name: node.name,
      status: enumLabel(node.status),
      conclusion: node.conclusion ? enumLabel(node.conclusion) : "unknown"
    };
  }

  return {
    kind: "status-context",
    id: node.id,
    state: enumLabel(node.state),
    description: node.description,
    context: node.context
  };
}

export function toReviewDetail(owner: string, repo: string, pr: PullRequestNode): ReviewDetail {
  const checks = (pr.commits.nodes || [])
    .flatMap((node) => node?.commit.statusCheckRollup?.contexts.nodes || [])
    .filter((node): node is StatusContextNode => node !== null)
    .map(toStatusCheck);

  return {
    id: pr.id,
    owner,
    repo,
    number: pr.number,
    title: pr.title,
    body: pr.bodyText,
    author: author(pr.author),
    publishedAt: pr.publishedAt,
    labels: (pr.labels?.nodes || []).flatMap((label) => (label ? [label.name] : [])),
    comments: {
      hasPrevious: pr.comments.pageInfo.hasPreviousPage,
      comments: (pr.comments.nodes || []).flatMap((comment) =>
        comment ? [{ author: author(comment.author), text: comment.bodyText }] : []
      )
    },
    statusChecks: checks
  };
}

function parseJson(raw: string, context: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new GithubResponseError(`Could not parse JSON for ${context}: ${errorMessage(error)}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseData<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new GithubResponseError(`Unexpected response for ${label}: ${describeIssues(parsed.error)}`);
  }

  return parsed.data;
}

export interface GithubReviewSourceOptions {
  pageSize?: number;
  token?: string | null;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export class GithubReviewSource implements ReviewSource {
  private readonly pageSize: number;
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: GithubReviewSourceOptions = {}) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.runner = options.runner ?? execRunner;
    const env = options.env ?? process.env;
    this.env = options.token ? { ...env, GH_TOKEN: options.token } : env;
  }

  private async graphql(
    label: string,
    query: string,
    variables: Record<string, string | number | null>
  ): Promise<GraphqlResponse> {
    const args = ["api", "graphql", "-f", `query=${query}`];
    for (const [key, value] of Object.entries(variables)) {
      if (value === null) {
        continue;
      }
      args.push(typeof value === "number" ? "-F" : "-f", `${key}=${value}`);
    }

    log.trace("gh api graphql", { query: label });
    const result = await this.runner("gh", args, this.env);
    const commandFailed = (): GhCommandError => {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      return new GhCommandError(`gh api graphql (${label}) failed: ${detail}`, result.stderr);
    };

    const stdout = result.stdout.trim();
    if (!stdout) {
      throw commandFailed();
    }

    let body: unknown;
    try {
      body = parseJson(stdout, `gh api graphql (${label})`);
    } catch (error) {
      if (result.exitCode !== 0) {
        throw commandFailed();
      }
      throw error;
    }

    const parsed = envelopeSchema.safeParse(body);
    const errors = parsed.success ? parsed.data.errors || [] : [];
    // gh also exits non-zero on GraphQL errors; only those carry their own messages.
    if (result.exitCode !== 0 && errors.length === 0) {
      throw commandFailed();
    }

    if (!parsed.success) {
      throw new GithubResponseError(`Unexpected response for ${label}: ${describeIssues(parsed.error)}`);
    }

    return { data: parsed.data.data ?? null, errors };
  }

  async listPage(filter: ReviewFilter, cursor: string | null): Promise<ReviewPage> {
    const searchQuery = buildSearchQuery(filter);
    const response = await this.graphql("review search", SEARCH_QUERY, {
      searchQuery,
      first: this.pageSize,
      cursor
    });

    if (response.errors.length > 0 || response.data === null) {
      const messages = response.errors.map((error) => error.message).join("; ");
      throw new GithubResponseError(`Review search failed: ${messages || "no data returned"}`);
    }

    const search = parseData(searchSchema, response.data, "review search").search;
    const items: ReviewSummary[] = [];
    for (const node of search.nodes || []) {
      if (node?.__typename !== "PullRequest") {
        continue;
      }

      const parsed = pullRequestSummarySchema.safeParse(node);
      if (!parsed.success) {
        throw new GithubResponseError(`Unexpected pull request in search: ${describeIssues(parsed.error)}`);
      }

      const pr = parsed.data;
      items.push({
        id: pr.id,
        owner: pr.repository.owner.login,
        repo: pr.repository.name,
        title: pr.title,
        createdAt: pr.createdAt,
        number: pr.number
      });
    }

    return {
      items,
      nextCursor: search.pageInfo.endCursor,
      hasMore: search.pageInfo.hasNextPage
    };
  }

  async getDetail(owner: string, repo: string, number: number): Promise<ReviewDetail | null> {
    const label = `${owner}/${repo}#${number}`;
    const response = await this.graphql(label, PULL_REQUEST_QUERY, { owner, name: repo, number });

    const errors = response.errors;
    if (response.data === null && errors.length === 0) {
      throw new GithubResponseError(`Loading ${label} failed: no data returned`);
    }

    const repository =
      response.data === null ? null : parseData(repositorySchema, response.data, label).repository;
    if (errors.length > 0) {
      const onlyMissing = errors.every((error) => error.type === "NOT_FOUND");
      if (!onlyMissing || repository?.pullRequest) {
        throw new GithubResponseError(
          `Loading ${label} failed: ${errors.map((error) => error.message).join("; ")}`
        );
      }
    }

    if (!repository?.pullRequest) {
      return null;
    }

    return toReviewDetail(repository.owner.login, repository.name, repository.pullRequest);
  }
}
