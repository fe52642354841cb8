const REMOTE_PREFIXES = ["git@github.com:", "https://github.com/"] as const;

const stripSuffixes = (value: string): string => {
  let result = value.trim();
  while (result.endsWith("/")) {
    result = result.slice(0, -1);
  }

  return result.endsWith(".git") ? result.slice(0, -".git".length) : result;
};

// Returns "owner/repo" for GitHub SSH and HTTPS remotes, null for anything else.
export const parseRemoteIdentifier = (remoteUrl: string): string | null => {
  const trimmed = remoteUrl.trim();
  const prefix = REMOTE_PREFIXES.find((candidate) => trimmed.startsWith(candidate));
  if (prefix === undefined) {
    return null;
  }

  const identifier = stripSuffixes(trimmed.slice(prefix.length));
  const parts = identifier.split("/");
  if (parts.length !== 2 || parts.some((part) => part.length === 0)) {
    return null;
  }

  return identifier;
};
