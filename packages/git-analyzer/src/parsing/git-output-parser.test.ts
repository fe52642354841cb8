import { describe, expect, it } from "vitest";
import {
  countStatusEntries,
  parseCommitTimestamp,
  parseRemoteSyncStatus,
} from "./git-output-parser.js";

describe("parseCommitTimestamp", () => {
  it("keeps the committer offset when parsing %ci output", () => {
    expect(parseCommitTimestamp("2024-01-15 10:30:00 +0100\n")).toBe("2024-01-15T10:30:00+01:00");
    expect(parseCommitTimestamp("2023-11-02 08:05:09 -0700")).toBe("2023-11-02T08:05:09-07:00");
  });

  it("truncates an unrecognised offset and parses the rest as local time", () => {
    expect(parseCommitTimestamp("2024-01-15 10:30:00 +01")).toBe(
      new Date("2024-01-15T10:30:00").toISOString(),
    );
  });

  it("returns null for empty or unparsable output", () => {
    expect(parseCommitTimestamp("")).toBeNull();
    expect(parseCommitTimestamp("not a date")).toBeNull();
  });
});

describe("countStatusEntries", () => {
  it("counts non-empty porcelain lines", () => {
    expect(countStatusEntries(" M src/a.ts\n?? notes.md\n\n")).toBe(2);
    expect(countStatusEntries("")).toBe(0);
  });
});

describe("parseRemoteSyncStatus", () => {
  it("maps ahead/behind counts to a sync status", () => {
    expect(parseRemoteSyncStatus("0\t0\n")).toBe("clean");
    expect(parseRemoteSyncStatus("2\t0\n")).toBe("dirty");
    expect(parseRemoteSyncStatus("")).toBe("unknown");
  });
});
