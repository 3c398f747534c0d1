/**
 * JSON definition of a DAG as authored by users and fed to the composer.
 *
 * ```json
 * {
 *   "vertices": [{ "name": "a", "kind": { "variant": "off_chain", "tool_fqn": "xyz.tool@1" }, "entry_ports": ["in"] }],
 *   "edges": [{ "from": { "vertex": "a", "output_variant": "ok", "output_port": "out" }, "to": { "vertex": "b", "input_port": "in" } }],
 *   "default_values": [{ "vertex": "b", "input_port": "extra", "value": { "storage": "inline", "data": 1 } }],
 *   "entry_groups": [{ "name": "group", "vertices": ["a"] }],
 *   "outputs": [{ "vertex": "b", "output_variant": "ok", "output_port": "result" }]
 * }
 * ```
 *
 * @module
 */

import { z } from "zod";
import { jsonValueSchema, type JsonValue } from "./nexus-data.js";
import { toolFqnSchema, type ToolFqn } from "./tool.js";

/** Entry group every entry port joins when no group lists its vertex. */
export const DEFAULT_ENTRY_GROUP = "_default_group";

export type EdgeKind = "normal" | "for_each" | "collect" | "do_while" | "break";

export type VertexKind = { variant: "off_chain"; toolFqn: ToolFqn } | { variant: "on_chain"; toolFqn: ToolFqn };

export interface DagVertex {
  name: string;
  kind: VertexKind;
  /** Input ports fed by the caller when execution begins */
  entryPorts: string[];
}

export interface DagEdge {
  from: { vertex: string; outputVariant: string; outputPort: string; encrypted: boolean };
  to: { vertex: string; inputPort: string };
  kind: EdgeKind;
}

export interface DagDefaultValue {
  vertex: string;
  inputPort: string;
  value: { storage: "inline"; data: JsonValue };
}

export interface DagEntryGroup {
  name: string;
  vertices: string[];
}

export interface DagOutput {
  vertex: string;
  outputVariant: string;
  outputPort: string;
  encrypted: boolean;
}

export interface DagDefinition {
  vertices: DagVertex[];
  edges: DagEdge[];
  defaultValues: DagDefaultValue[];
  entryGroups: DagEntryGroup[];
  outputs: DagOutput[];
}

/** One `(group, vertex, port)` entry-port marker, in composition order. */
export interface EntryPortMarker {
  group: string;
  vertex: string;
  inputPort: string;
}

// ============================================================================
// Schema
// ============================================================================

const name = z.string().min(1);

const vertexKindSchema = z.discriminatedUnion("variant", [
  z.object({ variant: z.literal("off_chain"), tool_fqn: toolFqnSchema }),
  z.object({ variant: z.literal("on_chain"), tool_fqn: toolFqnSchema }),
]);

const vertexSchema = z.object({
  name,
  kind: vertexKindSchema,
  entry_ports: z.array(name).default([]),
});

/** Older definitions list entry vertices separately; they are folded into `vertices`. */
const entryVertexSchema = z.object({
  name,
  kind: vertexKindSchema,
  input_ports: z.array(name),
});

const edgeSchema = z.object({
  from: z.object({
    vertex: name,
    output_variant: name,
    output_port: name,
    encrypted: z.boolean().default(false),
  }),
  to: z.object({ vertex: name, input_port: name }),
  kind: z.enum(["normal", "for_each", "collect", "do_while", "break"]).default("normal"),
});

const defaultValueSchema = z.object({
  vertex: name,
  input_port: name,
  value: z.object({ storage: z.literal("inline"), data: jsonValueSchema }),
});

const outputSchema = z.object({
  vertex: name,
  output_variant: name,
  output_port: name,
  encrypted: z.boolean().default(false),
});

export const dagDefinitionSchema = z
  .object({
    vertices: z.array(vertexSchema),
    edges: z.array(edgeSchema).default([]),
    entry_vertices: z.array(entryVertexSchema).default([]),
    default_values: z.array(defaultValueSchema).nullish(),
    entry_groups: z
      .array(z.object({ name, vertices: z.array(name) }))
      .nullish(),
    outputs: z.array(outputSchema).nullish(),
  })
  .transform(
    (v): DagDefinition => ({
      vertices: [
        ...v.vertices.map((vertex) => ({
          name: vertex.name,
          kind: { variant: vertex.kind.variant, toolFqn: vertex.kind.tool_fqn },
          entryPorts: vertex.entry_ports,
        })),
        ...v.entry_vertices.map((vertex) => ({
          name: vertex.name,
          kind: { variant: vertex.kind.variant, toolFqn: vertex.kind.tool_fqn },
          entryPorts: vertex.input_ports,
        })),
      ],
      edges: v.edges.map((edge) => ({
        from: {
          vertex: edge.from.vertex,
          outputVariant: edge.from.output_variant,
          outputPort: edge.from.output_port,
          encrypted: edge.from.encrypted,
        },
        to: { vertex: edge.to.vertex, inputPort: edge.to.input_port },
        kind: edge.kind,
      })),
      defaultValues: (v.default_values ?? []).map((value) => ({
        vertex: value.vertex,
        inputPort: value.input_port,
        value: value.value,
      })),
      entryGroups: v.entry_groups ?? [],
      outputs: (v.outputs ?? []).map((output) => ({
        vertex: output.vertex,
        outputVariant: output.output_variant,
        outputPort: output.output_port,
        encrypted: output.encrypted,
      })),
    }),
  )
  .superRefine((dag, ctx) => {
    const names = new Set<string>();
    for (const vertex of dag.vertices) {
      if (names.has(vertex.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate vertex "${vertex.name}"` });
      }
      names.add(vertex.name);
    }
    const check = (vertex: string, where: string): void => {
      if (!names.has(vertex)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown vertex "${vertex}" in ${where}` });
      }
    };
    for (const edge of dag.edges) {
      check(edge.from.vertex, "edge source");
      check(edge.to.vertex, "edge target");
    }
    for (const value of dag.defaultValues) check(value.vertex, "default value");
    for (const group of dag.entryGroups) {
      for (const vertex of group.vertices) check(vertex, `entry group "${group.name}"`);
    }
    for (const output of dag.outputs) check(output.vertex, "output");
  });

export function parseDagDefinition(json: unknown): DagDefinition {
  return dagDefinitionSchema.parse(json);
}

/**
 * Entry-port markers in the order the composer emits them. A vertex listed in
 * one or more entry groups contributes its entry ports to each of those
 * groups; any other vertex contributes them to {@link DEFAULT_ENTRY_GROUP}.
 */
export function entryPortMarkers(dag: DagDefinition): EntryPortMarker[] {
  const markers: EntryPortMarker[] = [];
  for (const vertex of dag.vertices) {
    if (vertex.entryPorts.length === 0) continue;
    const groups = dag.entryGroups.filter((group) => group.vertices.includes(vertex.name)).map((group) => group.name);
    for (const group of groups.length > 0 ? groups : [DEFAULT_ENTRY_GROUP]) {
      for (const inputPort of vertex.entryPorts) {
        markers.push({ group, vertex: vertex.name, inputPort });
      }
    }
  }
  return markers;
}
