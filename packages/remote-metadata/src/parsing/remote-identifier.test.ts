import { describe, expect, it } from "vitest";
import { parseRemoteIdentifier } from "./remote-identifier.js";

describe("parseRemoteIdentifier", () => {
  it("accepts short-form and URL-form GitHub remotes", () => {
    expect(parseRemoteIdentifier("git@github.com:acme/widgets.git")).toBe("acme/widgets");
    expect(parseRemoteIdentifier("https://github.com/acme/widgets.git\n")).toBe("acme/widgets");
    expect(parseRemoteIdentifier("https://github.com/acme/widgets/")).toBe("acme/widgets");
  });

  it("keeps .git inside a repository name", () => {
    expect(parseRemoteIdentifier("git@github.com:acme/dotfiles.github")).toBe("acme/dotfiles.github");
  });

  it("rejects other hosts and malformed paths", () => {
    expect(parseRemoteIdentifier("git@gitlab.com:acme/widgets.git")).toBeNull();
    expect(parseRemoteIdentifier("https://github.com/acme")).toBeNull();
    expect(parseRemoteIdentifier("https://github.com/acme/widgets/tree/main")).toBeNull();
    expect(parseRemoteIdentifier("")).toBeNull();
  });
});
