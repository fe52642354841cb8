import type { RemoteSyncStatus } from "@repohealth/core";

const COMMITTER_DATE_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})\s*([+-])(\d{2}):?(\d{2})$/;

const OFFSET_MARKER_PATTERN = /(?:\s+[+-]\d{2}(?::?\d{2})?|\s*Z)$/;

const isValidDate = (value: string): boolean => !Number.isNaN(Date.parse(value));

const parseLocalTimestamp = (raw: string): string | null => {
  const truncated = raw.replace(OFFSET_MARKER_PATTERN, "").trim().replace(" ", "T");
  if (!/^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2})?)?$/.test(truncated)) {
    return null;
  }

  const parsed = new Date(truncated.includes("T") ? truncated : `${truncated}T00:00:00`);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
};

// Accepts `git log --format=%ci` output ("2024-01-15 10:30:00 +0100").
export const parseCommitTimestamp = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const match = trimmed.match(COMMITTER_DATE_PATTERN);
  if (match !== null) {
    const [, date, time, sign, hours, minutes] = match;
    const iso = `${date}T${time}${sign}${hours}:${minutes}`;
    if (isValidDate(iso)) {
      return iso;
    }
  }

  return parseLocalTimestamp(trimmed);
};

export const countStatusEntries = (porcelain: string): number =>
  porcelain.split("\n").filter((line) => line.trim().length > 0).length;

export const parseRemoteSyncStatus = (leftRightCount: string): RemoteSyncStatus => {
  const parts = leftRightCount.trim().split(/\s+/);
  if (parts.length !== 2) {
    return "unknown";
  }

  const counts = parts.map((part) => Number.parseInt(part, 10));
  if (counts.some((count) => Number.isNaN(count))) {
    return "unknown";
  }

  return counts.every((count) => count === 0) ? "clean" : "dirty";
};
