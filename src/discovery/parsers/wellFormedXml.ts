/**
 * Strict XML well-formedness check
 *
 * cheerio's XML mode recovers from truncated or broken markup, so documents
 * are validated before they are read.
 */

import { XMLValidator } from "fast-xml-parser";
import { DocumentParseError } from "./documentParseError";

/**
 * @param documentName - Name used in the error message ("Sitemap", "Feed")
 * @throws {DocumentParseError} When the document is not well-formed XML
 */
export function assertWellFormedXml(xml: string, url: string, documentName: string): void {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return;
  }
  const { msg, line, col } = result.err;
  throw new DocumentParseError(`${documentName} is not well-formed XML: ${msg} (line ${line}, column ${col})`, url);
}
