import { type SimpleGit, simpleGit } from "simple-git";

import { historyError } from "../core/errors.js";
import type { CommitRecord } from "../core/types.js";
import { toErrorMessage, toPosixPath } from "../core/utils.js";
import {
  COMMIT_HEADER_FORMAT,
  buildFileDeltas,
  computeCommitStats,
  parseCommitHeader,
} from "./git-output.js";

const DIFF_TREE_BASE_ARGS = ["diff-tree", "-r", "-M", "--no-commit-id", "-z"] as const;

/**
 * Thin wrapper over simple-git exposing the read-only operations the
 * miner needs. Opening is lazy so a missing directory surfaces as
 * `REPOSITORY_UNAVAILABLE` rather than a constructor exception.
 */
export class GitRepository {
  private git: SimpleGit | null = null;

  public constructor(
    public readonly path: string,
    private readonly branch?: string,
  ) {}

  public async open(): Promise<SimpleGit> {
    if (this.git) {
      return this.git;
    }

    let git: SimpleGit;
    let isRepo: boolean;
    try {
      git = simpleGit({ baseDir: this.path });
      isRepo = await git.checkIsRepo();
    } catch (error) {
      throw historyError("REPOSITORY_UNAVAILABLE", `Cannot open repository at "${this.path}".`, {
        context: { path: this.path, message: toErrorMessage(error) },
        cause: error,
      });
    }

    if (!isRepo) {
      throw historyError("REPOSITORY_UNAVAILABLE", `"${this.path}" is not a git repository.`, {
        context: { path: this.path },
      });
    }

    this.git = git;
    return git;
  }

  /** Returns `null` for a repository without commits. */
  public async resolveHead(): Promise<string | null> {
    const git = await this.open();
    try {
      const ref = `${this.branch ?? "HEAD"}^{commit}`;
      const head = await git.raw(["rev-parse", "--verify", "--quiet", ref]);
      const trimmed = head.trim();
      return trimmed.length > 0 ? trimmed : null;
    } catch {
      return null;
    }
  }

  /**
   * `candidate` is an ancestor of `head` exactly when it is their merge base.
   * (`merge-base --is-ancestor` signals only through its exit code, which
   * simple-git does not surface when stderr is empty.)
   */
  public async isAncestor(candidate: string, head: string): Promise<boolean> {
    const git = await this.open();
    try {
      const base = await git.raw(["merge-base", candidate, head]);
      return base.trim() === candidate;
    } catch {
      return false;
    }
  }

  /** Commit hashes reachable from `head`, oldest first, excluding `since` and its ancestors. */
  public async listCommitHashes(head: string, since?: string): Promise<string[]> {
    const git = await this.open();
    const range = since ? `${since}..${head}` : head;

    let output: string;
    try {
      output = await git.raw(["rev-list", "--reverse", "--topo-order", range]);
    } catch (error) {
      throw historyError("REPOSITORY_UNAVAILABLE", `Cannot walk the log of "${this.path}".`, {
        context: { path: this.path, range, message: toErrorMessage(error) },
        cause: error,
      });
    }

    return output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Reads one commit with its file deltas. Merge commits are diffed against
   * their first parent only.
   */
  public async readCommit(hash: string): Promise<CommitRecord> {
    const git = await this.open();
    const header = parseCommitHeader(
      await git.raw(["show", "-s", `--format=${COMMIT_HEADER_FORMAT}`, hash]),
    );

    const firstParent = header.parents[0];
    const diffTarget = firstParent ? [firstParent, header.hash] : ["--root", header.hash];
    const [numstat, nameStatus] = await Promise.all([
      git.raw([...DIFF_TREE_BASE_ARGS, "--numstat", ...diffTarget]),
      git.raw([...DIFF_TREE_BASE_ARGS, "--name-status", ...diffTarget]),
    ]);

    const deltas = buildFileDeltas(numstat, nameStatus);
    return { ...header, deltas, stats: computeCommitStats(deltas) };
  }

  public async listTrackedFiles(revision: string): Promise<string[]> {
    const git = await this.open();
    const output = await git.raw(["ls-tree", "-r", "--name-only", "-z", revision]);
    return output
      .split("\0")
      .filter((path) => path.length > 0)
      .map(toPosixPath);
  }

  /** Raw bytes of `path` at `revision`; decoding is left to the caller. */
  public async readFileAt(revision: string, path: string): Promise<Buffer> {
    const git = await this.open();
    return await git.showBuffer([`${revision}:${path}`]);
  }

  public async readRemoteUrl(remote = "origin"): Promise<string | undefined> {
    const git = await this.open();
    const remotes = await git.getRemotes(true);
    const match = remotes.find((entry) => entry.name === remote) ?? remotes[0];
    return match?.refs.fetch || undefined;
  }
}
