// ============================================================================
// BASE XML PARSER
// Uses @xmldom/xmldom for XML parsing
// ============================================================================

import { DOMParser } from "@xmldom/xmldom";
import { XmlParseError } from "../errors/index.js";
import { logger } from "../utils/logger.js";

export class BaseXmlParser {
  /**
   * Parse XML string to Document. Fails on malformed markup or a missing root element.
   */
  protected parseXml(xml: string): Document {
    const problems: string[] = [];
    const parser = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (msg: unknown) => problems.push(String(msg)),
        fatalError: (msg: unknown) => problems.push(String(msg)),
      },
    });

    let doc: Document | undefined;
    try {
      doc = parser.parseFromString(xml, "text/xml");
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error({ error: cause.message }, "Failed to parse XML");
      throw new XmlParseError(cause.message, cause);
    }

    if (problems.length > 0) {
      logger.warn({ problems }, "Malformed XML received");
      throw new XmlParseError(problems[0] ?? "malformed document");
    }

    if (!doc || !doc.documentElement) {
      throw new XmlParseError("document has no root element");
    }

    return doc;
  }

  /**
   * All descendant elements with the given local name, in any namespace
   */
  protected getElements(parent: Element | Document, localName: string): Element[] {
    return Array.from(parent.getElementsByTagNameNS("*", localName));
  }

  protected getElement(parent: Element | Document, localName: string): Element | null {
    return this.getElements(parent, localName)[0] ?? null;
  }

  /**
   * Trimmed text of the first matching descendant, or `fallback` when absent or empty
   */
  protected getText(parent: Element | Document, localName: string, fallback = ""): string {
    const text = this.getElement(parent, localName)?.textContent?.trim();
    return text ? text : fallback;
  }

  protected getInt(parent: Element | Document, localName: string, fallback: number): number {
    const value = Number.parseInt(this.getText(parent, localName), 10);
    return Number.isNaN(value) ? fallback : value;
  }

  protected getFloat(parent: Element | Document, localName: string, fallback: number): number {
    const value = Number.parseFloat(this.getText(parent, localName));
    return Number.isNaN(value) ? fallback : value;
  }

  protected getAttribute(element: Element, name: string): string | null {
    return element.hasAttribute(name) ? element.getAttribute(name) : null;
  }
}
