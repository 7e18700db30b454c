/**
 * Site list reader: input files to Sites
 *
 * Formats:
 * - text: one site per line, `Company|URL` or a bare URL; blank lines and
 *   `#` comments skipped
 * - JSON Lines (.jsonl / .json): objects with `career_url` or `url` and an
 *   optional `company` (retry and failure records qualify)
 *
 * Sites are de-duplicated by normalized URL, first occurrence wins.
 */

import { readFileSync } from "fs";
import { extname } from "path";
import { z } from "zod";
import type { Logger, Site, SiteListReadResult, SiteSource } from "@/types";
import { inferCompanyFromUrl, normalizeCareerUrl } from "@/discovery";
import { rootLogger } from "@/logger";

export type SiteListFormat = "text" | "jsonl";

const jsonSiteSchema = z
  .object({
    career_url: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
    company: z.string().optional(),
  })
  .refine((value) => value.career_url !== undefined || value.url !== undefined, {
    message: "career_url or url is required",
  });

/**
 * Build a Site from raw values
 *
 * @returns Site, or null when the URL is unusable
 */
export function toSite(rawUrl: string, rawCompany?: string): Site | null {
  const careerUrl = normalizeCareerUrl(rawUrl);
  if (!careerUrl) {
    return null;
  }
  const company = rawCompany?.trim() || inferCompanyFromUrl(careerUrl);
  return { company, careerUrl };
}

function parseTextLine(line: string): Site | null {
  const separator = line.indexOf("|");
  if (separator === -1) {
    return toSite(line);
  }
  return toSite(line.slice(separator + 1), line.slice(0, separator));
}

function parseJsonLine(line: string): Site | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = jsonSiteSchema.safeParse(value);
  if (!result.success) {
    return null;
  }
  const { career_url, url, company } = result.data;
  return toSite(career_url ?? url ?? "", company);
}

/**
 * Format of a file, from its extension
 */
export function detectFormat(filePath: string): SiteListFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === ".jsonl" || ext === ".json" ? "jsonl" : "text";
}

/**
 * Parse site list content
 *
 * @param content - File content
 * @param format - Line format; text files also accept JSON object lines
 * @param file - File name used in log messages
 */
export function parseSiteList(
  content: string,
  format: SiteListFormat,
  file = "<input>",
  logger: Logger = rootLogger,
): SiteListReadResult {
  const sites: Site[] = [];
  const seen = new Set<string>();
  let invalid = 0;
  let duplicates = 0;

  const lines = content.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) {
      return;
    }

    const source: SiteSource = { file, line: index + 1 };
    const site =
      format === "jsonl" || line.startsWith("{") ? parseJsonLine(line) : parseTextLine(line);

    if (!site) {
      invalid++;
      logger.warn("Skipping invalid site line", { ...source, content: line.slice(0, 200) });
      return;
    }
    if (seen.has(site.careerUrl)) {
      duplicates++;
      logger.debug("Skipping duplicate site", { ...source, careerUrl: site.careerUrl });
      return;
    }

    seen.add(site.careerUrl);
    sites.push(site);
  });

  return { sites, invalid, duplicates };
}

/**
 * Read and parse a site list file
 *
 * @throws When the file cannot be read
 */
export function readSiteList(filePath: string, logger: Logger = rootLogger): SiteListReadResult {
  const content = readFileSync(filePath, "utf-8");
  const result = parseSiteList(content, detectFormat(filePath), filePath, logger);
  logger.info("Site list loaded", {
    file: filePath,
    sites: result.sites.length,
    invalid: result.invalid,
    duplicates: result.duplicates,
  });
  return result;
}
