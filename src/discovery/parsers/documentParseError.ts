/**
 * DocumentParseError: a fetched document is not the XML/HTML the parser expects
 */

export class DocumentParseError extends Error {
  /** URL of the document that could not be parsed */
  public readonly url: string;

  constructor(message: string, url: string) {
    super(`${message} (${url})`);
    this.name = "DocumentParseError";
    this.url = url;
  }
}
