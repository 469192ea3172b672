import { describe, it, expect } from "vitest";
import {
  createEnrichmentProgress,
  createReportProgress,
  formatEnrichmentLabel,
  withReportProgress,
  type ProgressStream,
} from "./progress.js";

function createStream(isTTY = true): ProgressStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
  };
}

describe("formatEnrichmentLabel", () => {
  it("should name the workspace, its user and what is left", () => {
    expect(
      formatEnrichmentLabel({ workspaceId: "ws-1", userName: "jdoe", completed: 3, remaining: 7, total: 10, failed: false }),
    ).toBe("Enriching ws-1 (jdoe), 7 remaining");
  });

  it("should omit an empty user name", () => {
    expect(
      formatEnrichmentLabel({ workspaceId: "ws-1", userName: "", completed: 1, remaining: 0, total: 1, failed: false }),
    ).toBe("Enriching ws-1, 0 remaining");
  });
});

describe("createReportProgress", () => {
  it("should write nothing when the stream is not a terminal", () => {
    const stream = createStream(false);
    const progress = createReportProgress({ label: "Listing", stream });

    progress.setLabel("Still listing");
    progress.done();

    expect(stream.chunks).toEqual([]);
  });

  it("should write nothing when disabled", () => {
    const stream = createStream();
    createReportProgress({ label: "Listing", enabled: false, stream }).done();

    expect(stream.chunks).toEqual([]);
  });

  it("should render percentages and clear the line when done", () => {
    const stream = createStream();
    const progress = createReportProgress({ label: "Work", stream });

    progress.setPercent(25);
    progress.done();

    expect(stream.chunks).toEqual(["\rWork 0%  ", "\rWork 25%  ", "\r" + " ".repeat(10) + "\r"]);
  });
});

describe("createEnrichmentProgress", () => {
  it("should follow enrichment events", () => {
    const stream = createStream();
    const progress = createEnrichmentProgress(2, { stream });

    progress.update({ workspaceId: "ws-1", userName: "jdoe", completed: 1, remaining: 1, total: 2, failed: false });

    expect(stream.chunks.slice(-2)).toEqual([
      "\rEnriching ws-1 (jdoe), 1 remaining 0%  ",
      "\rEnriching ws-1 (jdoe), 1 remaining 50%  ",
    ]);
  });
});

describe("withReportProgress", () => {
  it("should clear the line even when the operation fails", async () => {
    const stream = createStream();

    await expect(
      withReportProgress(
        "Listing",
        async () => {
          throw new Error("boom");
        },
        { stream },
      ),
    ).rejects.toThrow("boom");

    expect(stream.chunks.at(-1)).toBe("\r" + " ".repeat(12) + "\r");
  });
});
