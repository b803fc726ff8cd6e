import { readFile } from "node:fs/promises";

import { z } from "zod";

import type { OperationCatalog } from "../catalog/registry.js";
import { EngineError, formatValidationIssues } from "../errors.js";
import { ERROR_CODES } from "../types.js";
import { parsePrimitiveLiteral } from "../values/literal.js";
import { formatType, parseType, type TypeDescriptor } from "../values/types.js";
import type { Value } from "../values/value.js";
import { NodeGraph, type NodeInit } from "./document.js";
import {
  literal,
  networkRef,
  nodeRef,
  parameter,
  primitive,
  type ExposedInput,
  type NodeImplementation,
  type NodeInput,
} from "./types.js";

/** Raised when a JSON graph descriptor does not describe a valid document. */
export class GraphDescriptorError extends EngineError<{ issues: string[] }> {
  constructor(issues: string[]) {
    super(
      ERROR_CODES.GRAPH_INVALID_INPUT,
      `invalid graph descriptor: ${issues.join("; ")}`,
      "compare the descriptor with the documented JSON layout",
      { issues },
    );
    this.name = "GraphDescriptorError";
  }
}

const TypeSchema = z.string().transform((text, ctx): TypeDescriptor => {
  const parsed = parseType(text);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown type spelling '${text}'` });
    return z.NEVER;
  }
  return parsed;
});

/** Literal written as a primitive string, a number or a boolean. */
const LiteralTextSchema = z.union([z.string(), z.number(), z.boolean()]).transform((raw) => String(raw));

function parseLiteral(text: string, type: TypeDescriptor, ctx: z.RefinementCtx): Value {
  const value = parsePrimitiveLiteral(text, type);
  if (!value) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${text}' is not a ${formatType(type)} literal` });
    return z.NEVER;
  }
  return value;
}

const InputSchema = z.union([
  z.object({ node: z.string().min(1) }).strict(),
  z
    .object({ literal: LiteralTextSchema, type: TypeSchema })
    .strict()
    .transform((input, ctx) => parseLiteral(input.literal, input.type, ctx)),
]);

const ExposedInputSchema = z
  .object({ name: z.string().min(1), type: TypeSchema, default: LiteralTextSchema.optional() })
  .strict()
  .transform((input, ctx): ExposedInput => {
    if (input.default === undefined) {
      return { name: input.name, type: input.type };
    }
    return { name: input.name, type: input.type, default: parseLiteral(input.default, input.type, ctx) };
  });

const NodeSchema = z
  .object({
    id: z.string().min(1),
    operation: z.string().min(1).optional(),
    network: z.string().min(1).optional(),
    parameter: z.number().int().min(0).optional(),
    inputs: z.array(InputSchema).default([]),
  })
  .strict()
  .superRefine((node, ctx) => {
    const kinds = [node.operation, node.network, node.parameter].filter((entry) => entry !== undefined);
    if (kinds.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `node '${node.id}' must set exactly one of operation, network or parameter`,
      });
    }
  });

const NetworkSchema = z
  .object({
    id: z.string().min(1),
    inputs: z.array(ExposedInputSchema).default([]),
    output: z.string().min(1).optional(),
    nodes: z.array(NodeSchema).default([]),
  })
  .strict();

/** JSON layout of a graph document: the root network plus its library. */
export const GraphDescriptorSchema = z
  .object({
    inputs: z.array(ExposedInputSchema).default([]),
    output: z.string().min(1).optional(),
    nodes: z.array(NodeSchema).default([]),
    networks: z.array(NetworkSchema).default([]),
  })
  .strict();

export type GraphDescriptor = z.input<typeof GraphDescriptorSchema>;

type ParsedNode = z.output<typeof NodeSchema>;

function implementationOf(node: ParsedNode): NodeImplementation {
  if (node.operation !== undefined) {
    return primitive(node.operation);
  }
  if (node.network !== undefined) {
    return networkRef(node.network);
  }
  return parameter(node.parameter ?? 0);
}

function toNodeInit(node: ParsedNode): NodeInit {
  const inputs: NodeInput[] = node.inputs.map((input) => ("node" in input ? nodeRef(input.node) : literal(input)));
  return { id: node.id, implementation: implementationOf(node), inputs };
}

/**
 * Builds an editable graph from a JSON descriptor. Library networks are
 * defined in declaration order before the root nodes are added, so a network
 * should be declared after the networks it embeds.
 */
export function parseGraphDocument(payload: unknown, catalog: OperationCatalog): NodeGraph {
  const result = GraphDescriptorSchema.safeParse(payload);
  if (!result.success) {
    throw new GraphDescriptorError(formatValidationIssues(result.error.issues));
  }
  const descriptor = result.data;
  const graph = new NodeGraph(catalog, { inputs: descriptor.inputs });
  for (const network of descriptor.networks) {
    graph.defineNetwork({
      id: network.id,
      inputs: network.inputs,
      ...(network.output !== undefined ? { output: network.output } : {}),
      nodes: network.nodes.map(toNodeInit),
    });
  }
  for (const node of descriptor.nodes) {
    graph.addNode(toNodeInit(node));
  }
  if (descriptor.output !== undefined) {
    graph.setOutput(descriptor.output);
  }
  return graph;
}

/** Reads and parses a JSON descriptor from disk. */
export async function loadGraphDocument(path: string, catalog: OperationCatalog): Promise<NodeGraph> {
  const raw = await readFile(path, "utf8");
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GraphDescriptorError([`${path}: ${message}`]);
  }
  return parseGraphDocument(payload, catalog);
}
