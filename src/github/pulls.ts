import type { DiffSource, FetchedDiff } from "../review/orchestrator.js";
import { FetchError, errorMessage } from "../review/errors.js";
import { withRetry, httpStatusOf, isTransientHttpError } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { createChildLogger } from "../utils/logger.js";
import {
  createPullRequestApi,
  type PullRequestApiFactory,
  type PullRequestFile,
  type PullRequestRef,
} from "./client.js";

const log = createChildLogger({ module: "github-pulls" });

const PR_URL_PATTERN = /^https?:\/\/github\.com\/([\w.-]+)\/([\w.-]+)\/pull\/(\d+)\/?$/i;

const NO_TEXT_CHANGES =
  "No analyzable text changes found. The PR may contain only binary files (PDFs, images, docs) or large files.";

export function parsePullRequestUrl(url: string): PullRequestRef {
  const match = PR_URL_PATTERN.exec(url.trim());
  if (!match) {
    throw new FetchError(`Invalid GitHub PR URL format: ${url}`);
  }
  return { owner: match[1], repo: match[2], pullNumber: Number(match[3]) };
}

export interface GitHubDiffSourceOptions {
  /** Used when a request carries no token of its own */
  defaultToken?: string;
  createApi?: PullRequestApiFactory;
  timeoutMs?: number;
  retry?: { maxAttempts?: number; baseDelayMs?: number };
}

/** Fetches pull request metadata and patches and assembles a unified diff. */
export class GitHubDiffSource implements DiffSource {
  private readonly createApi: PullRequestApiFactory;
  private readonly timeoutMs: number;

  constructor(private readonly options: GitHubDiffSourceOptions = {}) {
    this.createApi = options.createApi ?? createPullRequestApi;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async fetch(reference: string, { token }: { token?: string } = {}): Promise<FetchedDiff> {
    const ref = parsePullRequestUrl(reference);
    const api = this.createApi(token ?? this.options.defaultToken);
    const retry = {
      maxAttempts: this.options.retry?.maxAttempts ?? 3,
      baseDelayMs: this.options.retry?.baseDelayMs ?? 1000,
      retryOn: isTransientHttpError,
    };

    log.info(
      {
        owner: ref.owner,
        repo: ref.repo,
        pr: ref.pullNumber,
        tokenSource: token ? "request" : this.options.defaultToken ? "environment" : "none",
      },
      "Fetching pull request"
    );

    try {
      const [pull, files] = await withTimeout(
        (signal) =>
          Promise.all([
            withRetry(() => api.getPull(ref, signal), { ...retry, signal }),
            withRetry(() => api.listFiles(ref, signal), { ...retry, signal }),
          ]),
        this.timeoutMs,
        () => new FetchError(`GitHub request timed out after ${this.timeoutMs}ms`)
      );

      const diffText = assembleDiff(files);
      if (files.length > 0 && !diffText) {
        throw new FetchError(NO_TEXT_CHANGES);
      }

      log.info(
        { pr: ref.pullNumber, files: files.length, withPatch: files.filter((f) => f.patch).length },
        "Fetched pull request"
      );

      return {
        metadata: {
          number: pull.number,
          title: pull.title,
          description: pull.body ?? "",
          author: pull.author,
          state: pull.state,
          baseBranch: pull.baseRef,
          headBranch: pull.headRef,
          filesChanged: pull.changedFiles,
          additions: pull.additions,
          deletions: pull.deletions,
        },
        diffText,
      };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(describeGitHubError(err, ref, Boolean(token)), { cause: err });
    }
  }
}

/** One `--- a/ +++ b/` block per file that carries patch text. */
export function assembleDiff(files: readonly PullRequestFile[]): string {
  return files
    .filter((f) => f.patch)
    .map((f) => `--- a/${f.filename}\n+++ b/${f.filename}\n${f.patch}\n`)
    .join("");
}

export function describeGitHubError(
  err: unknown,
  { owner, repo, pullNumber }: PullRequestRef,
  requestToken: boolean
): string {
  const hint = requestToken
    ? ""
    : " If this is a private repository, provide your github_token in the request body.";
  const slug = `'${owner}/${repo}'`;

  switch (httpStatusOf(err)) {
    case 401:
      return `GitHub authentication failed. Please check your token is valid and not expired.${hint}`;
    case 403:
      return (
        `Access denied to repository ${slug}. This may be a private repository. ` +
        `Ensure your GitHub token has access to this repository and the 'repo' scope (for classic tokens) ` +
        `or 'Pull requests: Read-only' permission (for fine-grained tokens).${hint}`
      );
    case 404:
      return (
        `Repository ${slug} or PR #${pullNumber} not found. ` +
        `If this is a private repository, ensure your GitHub token has access to it.${hint}`
      );
    default:
      return `GitHub API error: ${errorMessage(err)}`;
  }
}
