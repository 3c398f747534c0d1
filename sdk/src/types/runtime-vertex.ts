import { z } from "zod";
import { normalizeMoveEnum, typeNameSchema, u64Schema, emitU64, type TypeName } from "./codecs.js";

/**
 * A vertex as the workflow engine addresses it at run time: either the plain
 * vertex, or one iteration of a for-each expansion.
 */
export type RuntimeVertex =
  | { variant: "Plain"; vertex: TypeName }
  | { variant: "WithIterator"; vertex: TypeName; iteration: bigint; outOf: bigint };

export const runtimeVertexSchema: z.ZodType<RuntimeVertex, z.ZodTypeDef, unknown> = z.preprocess(
  normalizeMoveEnum,
  z.union([
    z.object({ "@variant": z.literal("Plain"), vertex: typeNameSchema }).transform(
      (v): RuntimeVertex => ({ variant: "Plain", vertex: v.vertex }),
    ),
    z
      .object({
        "@variant": z.literal("WithIterator"),
        vertex: typeNameSchema,
        iteration: u64Schema,
        out_of: u64Schema,
      })
      .transform(
        (v): RuntimeVertex => ({ variant: "WithIterator", vertex: v.vertex, iteration: v.iteration, outOf: v.out_of }),
      ),
  ]),
);

export function plainVertex(name: string): RuntimeVertex {
  return { variant: "Plain", vertex: { name } };
}

export function iteratorVertex(name: string, iteration: bigint, outOf: bigint): RuntimeVertex {
  return { variant: "WithIterator", vertex: { name }, iteration, outOf };
}

/** Ledger JSON form. */
export function emitRuntimeVertex(vertex: RuntimeVertex): Record<string, unknown> {
  if (vertex.variant === "Plain") {
    return { "@variant": "Plain", vertex: { name: vertex.vertex.name } };
  }
  return {
    "@variant": "WithIterator",
    vertex: { name: vertex.vertex.name },
    iteration: emitU64(vertex.iteration),
    out_of: emitU64(vertex.outOf),
  };
}

export function formatRuntimeVertex(vertex: RuntimeVertex): string {
  return vertex.variant === "Plain"
    ? `Plain(${vertex.vertex.name})`
    : `WithIterator(${vertex.vertex.name}:${vertex.iteration}:${vertex.outOf})`;
}
