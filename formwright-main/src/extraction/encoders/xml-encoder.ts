import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "../../shared/errors.js";
import { isRecord } from "../types.js";
import type { Encoder, ExtractedData } from "../types.js";

const WRAPPER = "formwright-root";
const TEXT_KEY = "#text";

/**
 * Element-markup encoder: `<do>eat</do>` decodes to `{ do: "eat" }`.
 * Several top-level elements are allowed; stray text between them is dropped.
 */
export class XmlEncoder implements Encoder {
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    trimValues: true,
    parseTagValue: false,
    textNodeName: TEXT_KEY,
  });

  private readonly builder = new XMLBuilder({
    ignoreAttributes: true,
  });

  encode(data: ExtractedData): string {
    return String(this.builder.build(data));
  }

  decode(text: string): ExtractedData {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return {};
    }

    const wrapped = `<${WRAPPER}>${trimmed}</${WRAPPER}>`;
    const check = XMLValidator.validate(wrapped);
    if (check !== true) {
      throw new ParseError(`Failed to decode XML: ${check.err.msg}`);
    }

    const parsed: unknown = this.parser.parse(wrapped);
    if (!isRecord(parsed)) {
      return {};
    }

    const root = parsed[WRAPPER];
    if (!isRecord(root)) {
      return {};
    }

    const out: ExtractedData = {};
    for (const [key, value] of Object.entries(root)) {
      if (key === TEXT_KEY) continue;
      out[key] = value;
    }
    return out;
  }
}
