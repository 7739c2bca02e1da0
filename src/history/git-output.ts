import type { AuthorIdentity, ChangeType, CommitStats, FileDelta } from "../core/types.js";
import { toPosixPath, toUtcIso } from "../core/utils.js";

/** `git show -s` format: fields separated by NUL, message last. */
export const COMMIT_HEADER_FORMAT = "%H%x00%P%x00%an%x00%ae%x00%aI%x00%B";

const HASH_PATTERN = /^[0-9a-f]{7,64}$/;

export interface CommitHeader {
  hash: string;
  parents: string[];
  author: AuthorIdentity;
  timestamp: string;
  message: string;
}

export class MalformedGitOutputError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "MalformedGitOutputError";
  }
}

export function parseCommitHeader(raw: string): CommitHeader {
  const fields = raw.split("\0");
  if (fields.length < 6) {
    throw new MalformedGitOutputError(`Expected 6 header fields, received ${fields.length}.`);
  }

  const [hash, parentList, name, email, authoredAt] = fields.map((field) => field.trim());
  if (!HASH_PATTERN.test(hash)) {
    throw new MalformedGitOutputError(`Invalid commit hash "${hash}".`);
  }

  const timestamp = toUtcIso(authoredAt);
  if (!timestamp) {
    throw new MalformedGitOutputError(`Invalid author date "${authoredAt}" on ${hash}.`);
  }

  return {
    hash,
    parents: parentList.split(" ").filter((parent) => parent.length > 0),
    author: { name, email },
    timestamp,
    message: fields.slice(5).join("\0").trim(),
  };
}

interface NumstatEntry {
  path: string;
  oldPath?: string;
  linesAdded: number;
  linesRemoved: number;
  binary: boolean;
}

/**
 * Parses `git diff-tree --numstat -z`. Renames are emitted as
 * `added\tremoved\t\0old\0new\0`; everything else as `added\tremoved\tpath\0`.
 * Binary files report `-` for both counts.
 */
export function parseNumstat(raw: string): NumstatEntry[] {
  const tokens = raw.split("\0");
  const entries: NumstatEntry[] = [];

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index].replace(/^\n+/, "");
    if (token.length === 0) continue;

    const match = token.match(/^(-|\d+)\t(-|\d+)\t(.*)$/s);
    if (!match) {
      throw new MalformedGitOutputError(`Unexpected numstat token "${token}".`);
    }

    const binary = match[1] === "-" || match[2] === "-";
    const linesAdded = binary ? 0 : Number.parseInt(match[1], 10);
    const linesRemoved = binary ? 0 : Number.parseInt(match[2], 10);

    if (match[3].length > 0) {
      entries.push({ path: toPosixPath(match[3]), linesAdded, linesRemoved, binary });
      continue;
    }

    const oldPath = tokens[index + 1];
    const newPath = tokens[index + 2];
    if (oldPath === undefined || newPath === undefined) {
      throw new MalformedGitOutputError("Truncated rename entry in numstat output.");
    }
    index += 2;
    entries.push({
      path: toPosixPath(newPath),
      oldPath: toPosixPath(oldPath),
      linesAdded,
      linesRemoved,
      binary,
    });
  }

  return entries;
}

interface NameStatusEntry {
  path: string;
  oldPath?: string;
  changeType: ChangeType;
}

/**
 * Parses `git diff-tree --name-status -z`: `M\0path\0`, `R087\0old\0new\0`.
 */
export function parseNameStatus(raw: string): NameStatusEntry[] {
  const tokens = raw.split("\0");
  const entries: NameStatusEntry[] = [];

  for (let index = 0; index < tokens.length; index += 1) {
    const status = tokens[index].replace(/^\n+/, "");
    if (status.length === 0) continue;

    const letter = status[0];
    if (letter === "R" || letter === "C") {
      const oldPath = tokens[index + 1];
      const newPath = tokens[index + 2];
      if (oldPath === undefined || newPath === undefined) {
        throw new MalformedGitOutputError(`Truncated ${letter} entry in name-status output.`);
      }
      index += 2;
      entries.push({
        path: toPosixPath(newPath),
        oldPath: toPosixPath(oldPath),
        changeType: letter === "R" ? "renamed" : "added",
      });
      continue;
    }

    const path = tokens[index + 1];
    if (path === undefined) {
      throw new MalformedGitOutputError(`Missing path after status "${status}".`);
    }
    index += 1;
    entries.push({ path: toPosixPath(path), changeType: mapStatusLetter(letter) });
  }

  return entries;
}

function mapStatusLetter(letter: string): ChangeType {
  switch (letter) {
    case "A":
      return "added";
    case "D":
      return "deleted";
    case "M":
    case "T":
      return "modified";
    default:
      throw new MalformedGitOutputError(`Unknown change status "${letter}".`);
  }
}

/** Joins numstat counts onto name-status change types by path. */
export function buildFileDeltas(numstatRaw: string, nameStatusRaw: string): FileDelta[] {
  const counts = new Map(parseNumstat(numstatRaw).map((entry) => [entry.path, entry]));

  return parseNameStatus(nameStatusRaw)
    .map((entry): FileDelta => {
      const count = counts.get(entry.path);
      const delta: FileDelta = {
        path: entry.path,
        linesAdded: count?.linesAdded ?? 0,
        linesRemoved: count?.linesRemoved ?? 0,
        changeType: entry.changeType,
        binary: count?.binary ?? false,
      };
      if (entry.oldPath !== undefined) {
        delta.oldPath = entry.oldPath;
      }
      return delta;
    })
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export function computeCommitStats(deltas: FileDelta[]): CommitStats {
  const linesAdded = deltas.reduce((sum, delta) => sum + delta.linesAdded, 0);
  const linesRemoved = deltas.reduce((sum, delta) => sum + delta.linesRemoved, 0);

  return {
    filesChanged: deltas.length,
    linesAdded,
    linesRemoved,
    netLines: linesAdded - linesRemoved,
  };
}
