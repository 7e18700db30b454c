/**
 * Unit Tests: Site list reader
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { detectFormat, parseSiteList, readSiteList } from "@/input";
import { createRecordingLogger } from "../helpers/silentLogger";

describe("parseSiteList (text)", () => {
  it("should read Company|URL lines and bare URLs", () => {
    const content = [
      "# career sites",
      "Bloomberg|https://bloomberg.avature.net/careers",
      "",
      "acme.avature.net/careers/",
      "  Koch Industries | https://koch.avature.net/en_US/careers  ",
    ].join("\n");

    const result = parseSiteList(content, "text", "sites.txt", createRecordingLogger());

    expect(result).toEqual({
      sites: [
        { company: "Bloomberg", careerUrl: "https://bloomberg.avature.net/careers" },
        { company: "acme", careerUrl: "https://acme.avature.net/careers" },
        { company: "Koch Industries", careerUrl: "https://koch.avature.net/en_US/careers" },
      ],
      invalid: 0,
      duplicates: 0,
    });
  });

  it("should count invalid lines and skip duplicates by identity", () => {
    const logger = createRecordingLogger();
    const content = [
      "Bloomberg|https://bloomberg.avature.net/careers",
      "Broken|ftp://bloomberg.avature.net",
      "Bloomberg LP|https://Bloomberg.avature.net/careers/",
      "Empty|",
    ].join("\r\n");

    const result = parseSiteList(content, "text", "sites.txt", logger);

    expect(result.sites).toEqual([
      { company: "Bloomberg", careerUrl: "https://bloomberg.avature.net/careers" },
    ]);
    expect(result.invalid).toBe(2);
    expect(result.duplicates).toBe(1);
    expect(logger.messages.filter((m) => m.level === "warn")).toHaveLength(2);
  });

  it("should infer the company when the name part is blank", () => {
    const result = parseSiteList("|https://acme.avature.net", "text", "sites.txt", createRecordingLogger());
    expect(result.sites).toEqual([{ company: "acme", careerUrl: "https://acme.avature.net" }]);
  });
});

describe("parseSiteList (JSON Lines)", () => {
  it("should read career_url or url with optional company", () => {
    const content = [
      JSON.stringify({ career_url: "https://bloomberg.avature.net/careers", company: "Bloomberg" }),
      JSON.stringify({ url: "https://acme.avature.net" }),
      JSON.stringify({
        career_url: "https://initech.avature.net/careers",
        company: "Initech",
        error_type: "timeout",
        error_message: "Request timeout",
        http_status: null,
        timestamp: "2026-01-01T00:00:00.000Z",
        attempt: 1,
        next_eligible_at: "2026-01-01T00:05:00.000Z",
      }),
      "{not json",
      JSON.stringify({ company: "No URL" }),
    ].join("\n");

    const result = parseSiteList(content, "jsonl", "retries.jsonl", createRecordingLogger());

    expect(result.sites).toEqual([
      { company: "Bloomberg", careerUrl: "https://bloomberg.avature.net/careers" },
      { company: "acme", careerUrl: "https://acme.avature.net" },
      { company: "Initech", careerUrl: "https://initech.avature.net/careers" },
    ]);
    expect(result.invalid).toBe(2);
  });

  it("should accept JSON object lines inside text files", () => {
    const content = [
      "Bloomberg|https://bloomberg.avature.net/careers",
      JSON.stringify({ career_url: "https://acme.avature.net", company: "Acme" }),
    ].join("\n");
    expect(parseSiteList(content, "text", "mixed.txt", createRecordingLogger()).sites).toHaveLength(2);
  });
});

describe("detectFormat", () => {
  it("should pick the format from the extension", () => {
    expect(detectFormat("sites.jsonl")).toBe("jsonl");
    expect(detectFormat("retries/retries_20260101_000000.JSONL")).toBe("jsonl");
    expect(detectFormat("sites.json")).toBe("jsonl");
    expect(detectFormat("sites.txt")).toBe("text");
    expect(detectFormat("pending_20260101_000000.txt")).toBe("text");
  });
});

describe("readSiteList", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("should read a file from disk", () => {
    dir = mkdtempSync(join(tmpdir(), "site-list-"));
    const file = join(dir, "pending.txt");
    writeFileSync(file, "Acme|https://acme.avature.net/careers\n");

    expect(readSiteList(file, createRecordingLogger()).sites).toEqual([
      { company: "Acme", careerUrl: "https://acme.avature.net/careers" },
    ]);
  });
});
