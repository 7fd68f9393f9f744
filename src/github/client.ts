import { Octokit } from "@octokit/rest";

export interface PullRequestRef {
  owner: string;
  repo: string;
  pullNumber: number;
}

export interface PullRequestData {
  number: number;
  title: string;
  body: string | null;
  author: string;
  state: string;
  baseRef: string;
  headRef: string;
  changedFiles: number;
  additions: number;
  deletions: number;
}

export interface PullRequestFile {
  filename: string;
  status: string;
  patch?: string;
}

/** The two GitHub calls a review needs, behind a seam tests can fake. */
export interface PullRequestApi {
  getPull(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestData>;
  listFiles(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestFile[]>;
}

export type PullRequestApiFactory = (token?: string) => PullRequestApi;

const PER_PAGE = 100;

export class OctokitPullRequestApi implements PullRequestApi {
  constructor(private readonly octokit: Octokit) {}

  async getPull(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestData> {
    const { data } = await this.octokit.pulls.get({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.pullNumber,
      request: { signal },
    });
    return {
      number: data.number,
      title: data.title,
      body: data.body,
      author: data.user.login,
      state: data.state,
      baseRef: data.base.ref,
      headRef: data.head.ref,
      changedFiles: data.changed_files,
      additions: data.additions,
      deletions: data.deletions,
    };
  }

  async listFiles(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestFile[]> {
    const files: PullRequestFile[] = [];
    let page = 1;

    while (true) {
      const { data } = await this.octokit.pulls.listFiles({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.pullNumber,
        per_page: PER_PAGE,
        page,
        request: { signal },
      });

      files.push(
        ...data.map((f) => ({ filename: f.filename, status: f.status, patch: f.patch }))
      );

      if (data.length < PER_PAGE) break;
      page++;
    }
    return files;
  }
}

/** Octokit-backed factory; anonymous when no token is given. */
export const createPullRequestApi: PullRequestApiFactory = (token) =>
  new OctokitPullRequestApi(
    new Octokit({ auth: token, userAgent: "diffsieve" })
  );
