import type { RepoCoordinates } from "./types.js";

const OWNER_REPO_PATTERN = /^(?<owner>[A-Za-z0-9_.-]+)\/(?<repo>[A-Za-z0-9_.-]+?)(?:\.git)?$/;
const GITHUB_SSH_PATTERN =
  /^(?:ssh:\/\/)?git@github\.com[:/](?<owner>[A-Za-z0-9_.-]+)\/(?<repo>[A-Za-z0-9_.-]+?)(?:\.git)?\/?$/i;

/**
 * Accepts `owner/repo`, `github.com/owner/repo`, https and ssh remote URLs.
 * Returns `undefined` for anything that is not a GitHub repository.
 */
export function parseGitHubRemoteUrl(remoteUrl: string): RepoCoordinates | undefined {
  const normalized = remoteUrl.trim();
  if (!normalized) {
    return undefined;
  }

  const shorthand = normalized.match(OWNER_REPO_PATTERN);
  if (shorthand?.groups?.owner && shorthand.groups.repo) {
    return { owner: shorthand.groups.owner, name: shorthand.groups.repo };
  }

  const sshMatch = normalized.match(GITHUB_SSH_PATTERN);
  if (sshMatch?.groups?.owner && sshMatch.groups.repo) {
    return { owner: sshMatch.groups.owner, name: stripGitSuffix(sshMatch.groups.repo) };
  }

  const urlInput = normalized.startsWith("github.com/") ? `https://${normalized}` : normalized;

  let url: URL;
  try {
    url = new URL(urlInput);
  } catch {
    return undefined;
  }

  if (!isGitHubHost(url.hostname)) {
    return undefined;
  }

  const [owner, rawName] = url.pathname.split("/").filter(Boolean);
  const name = rawName ? stripGitSuffix(rawName) : undefined;
  if (!owner || !name) {
    return undefined;
  }

  return { owner, name };
}

export function toRepoSlug(coordinates: RepoCoordinates): string {
  return `${coordinates.owner}/${coordinates.name}`;
}

function isGitHubHost(hostname: string): boolean {
  const normalized = hostname.toLowerCase();
  return normalized === "github.com" || normalized === "www.github.com";
}

function stripGitSuffix(value: string): string {
  return value.replace(/\.git$/i, "");
}
