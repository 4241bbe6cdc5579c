import { readFile } from "node:fs/promises";
import { z } from "zod";
import { SchemaError } from "../shared/errors.js";
import { form, option, selection } from "./nodes.js";
import type { OptionNode, SchemaNode } from "./nodes.js";

type OptionDocument = {
  kind: "option";
  id: string;
  description?: string;
  examples?: string[];
};

type NodeDocument =
  | OptionDocument
  | {
      kind: "selection";
      id: string;
      description?: string;
      examples?: string[];
      options: OptionDocument[];
    }
  | {
      kind: "form";
      id: string;
      description?: string;
      examples?: string[];
      elements: NodeDocument[];
    };

const OptionDocumentSchema = z.object({
  kind: z.literal("option"),
  id: z.string().min(1),
  description: z.string().optional(),
  examples: z.array(z.string()).optional(),
});

const NodeDocumentSchema: z.ZodType<NodeDocument> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    OptionDocumentSchema,
    z.object({
      kind: z.literal("selection"),
      id: z.string().min(1),
      description: z.string().optional(),
      examples: z.array(z.string()).optional(),
      options: z.array(OptionDocumentSchema).min(1),
    }),
    z.object({
      kind: z.literal("form"),
      id: z.string().min(1),
      description: z.string().optional(),
      examples: z.array(z.string()).optional(),
      elements: z.array(NodeDocumentSchema).min(1),
    }),
  ]),
);

function toOption(doc: OptionDocument): OptionNode {
  return option({ id: doc.id, description: doc.description ?? "", examples: doc.examples });
}

function toSchemaNode(doc: NodeDocument): SchemaNode {
  switch (doc.kind) {
    case "option":
      return toOption(doc);
    case "selection":
      return selection({
        id: doc.id,
        description: doc.description ?? "",
        examples: doc.examples,
        options: doc.options.map(toOption),
      });
    case "form":
      return form({
        id: doc.id,
        description: doc.description ?? "",
        examples: doc.examples,
        elements: doc.elements.map(toSchemaNode),
      });
  }
}

export function parseSchemaDocument(value: unknown): SchemaNode {
  const result = NodeDocumentSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`)
      .join("; ");
    throw new SchemaError(`Invalid schema document: ${detail}`, "INVALID_DOCUMENT");
  }
  return toSchemaNode(result.data);
}

export async function loadSchemaFile(filePath: string): Promise<SchemaNode> {
  const raw = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`Schema file ${filePath} is not valid JSON: ${message}`, "INVALID_DOCUMENT");
  }
  return parseSchemaDocument(parsed);
}
