/**
 * Site type definitions
 */

/**
 * A company career site to discover job postings on.
 *
 * `careerUrl` is the normalized root URL and doubles as the site identity.
 */
export type Site = {
  readonly company: string;
  readonly careerUrl: string;
};

/**
 * Where a Site came from in the input file (for logging only)
 */
export type SiteSource = {
  file: string;
  line: number;
};

export type SiteListReadResult = {
  sites: Site[];
  /** Lines that could not be turned into a Site */
  invalid: number;
  /** Lines naming a Site already read earlier in the file */
  duplicates: number;
};
