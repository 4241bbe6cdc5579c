import { ParseError } from "../../shared/errors.js";
import { isRecord } from "../types.js";
import type { Encoder, ExtractedData } from "../types.js";

const TAG_PATTERN = /<json>([\s\S]*?)<\/json>/;
const FENCE_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

export interface JsonEncoderOptions {
  /** Expect the payload inside <json>…</json>. Defaults to true. */
  useTags?: boolean;
}

export class JsonEncoder implements Encoder {
  private readonly useTags: boolean;

  constructor(options: JsonEncoderOptions = {}) {
    this.useTags = options.useTags ?? true;
  }

  encode(data: ExtractedData): string {
    const body = JSON.stringify(data);
    return this.useTags ? `<json>${body}</json>` : body;
  }

  decode(text: string): ExtractedData {
    const payload = this.extractPayload(text);
    if (payload === null || payload.trim().length === 0) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError(`Failed to decode JSON: ${message}`);
    }

    if (!isRecord(parsed)) {
      throw new ParseError("Expected a JSON object at the top level.");
    }
    return parsed;
  }

  private extractPayload(text: string): string | null {
    if (this.useTags) {
      const match = text.match(TAG_PATTERN);
      return match ? (match[1] ?? "") : null;
    }

    const raw = text.trim();
    const fenceMatch = raw.match(FENCE_PATTERN);
    return fenceMatch?.[1] !== undefined ? fenceMatch[1].trim() : raw;
  }
}
