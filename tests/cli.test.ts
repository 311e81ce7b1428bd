import { afterEach, describe, it, expect, vi } from "vitest";
import { runCli } from "../server/cli";
import type { MatchResponse } from "@shared/schema";

afterEach(() => {
  vi.restoreAllMocks();
});

function lastLine(calls: unknown[][]): string {
  const last = calls[calls.length - 1];
  return typeof last?.[0] === "string" ? last[0] : "";
}

describe("runCli", () => {
  it("prints the ranked response for a request file", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(runCli(["fixtures/sample-match-request.json"], {})).toBe(0);

    const response: MatchResponse = JSON.parse(lastLine(log.mock.calls));
    expect(response.job_id).toBe("job-1042");
    expect(response.matches_found).toBe(3);
    expect(response.matches[0]?.provider_id).toBe("p-17");
  });

  it("exits with 1 and a usage line without arguments", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(runCli([], {})).toBe(1);
    expect(error).toHaveBeenCalledWith("Usage: npm run match -- <request.json>");
  });

  it("exits with 1 for a missing file", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(runCli(["fixtures/does-not-exist.json"], {})).toBe(1);
  });

  it("exits with 1 and prints issues for an invalid environment", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(runCli(["fixtures/sample-match-request.json"], { MATCH_TOP_K: "zero" })).toBe(1);
    expect(lastLine(error.mock.calls)).toContain("env.MATCH_TOP_K");
  });
});
