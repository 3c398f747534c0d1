/**
 * Move type tags: parsing from and formatting to type strings such as
 * `0x2::coin::Coin<0x2::sui::SUI>`.
 * @module
 */

import { normalizeAddress, type Address } from "./address.js";

export type PrimitiveTypeName =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "u256"
  | "address"
  | "signer";

export interface StructTag {
  address: Address;
  module: string;
  name: string;
  typeParams: TypeTag[];
}

export type TypeTag =
  | { kind: PrimitiveTypeName }
  | { kind: "vector"; element: TypeTag }
  | { kind: "struct"; struct: StructTag };

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveTypeName>([
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "u256",
  "address",
  "signer",
]);

function isPrimitive(name: string): name is PrimitiveTypeName {
  return PRIMITIVES.has(name);
}

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================================
// Tokenizer / parser
// ============================================================================

type Token = { kind: "ident"; value: string } | { kind: "punct"; value: "<" | ">" | "," | "::" };

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === " " || ch === "\t" || ch === "\n") {
      i++;
    } else if (ch === "<" || ch === ">" || ch === ",") {
      tokens.push({ kind: "punct", value: ch });
      i++;
    } else if (ch === ":" && input[i + 1] === ":") {
      tokens.push({ kind: "punct", value: "::" });
      i += 2;
    } else {
      let j = i;
      while (j < input.length && /[A-Za-z0-9_]/.test(input[j])) j++;
      if (j === i) {
        throw new Error(`Unexpected character "${ch}" in type "${input}"`);
      }
      tokens.push({ kind: "ident", value: input.slice(i, j) });
      i = j;
    }
  }
  return tokens;
}

class TypeParser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  parseAll(): TypeTag {
    const tag = this.parseType();
    if (this.pos !== this.tokens.length) {
      this.fail("trailing input");
    }
    return tag;
  }

  private fail(reason: string): never {
    throw new Error(`Invalid type "${this.source}": ${reason}`);
  }

  private peekPunct(value: string): boolean {
    const token = this.tokens[this.pos];
    return token !== undefined && token.kind === "punct" && token.value === value;
  }

  private expectPunct(value: string): void {
    if (!this.peekPunct(value)) this.fail(`expected "${value}"`);
    this.pos++;
  }

  private expectIdent(): string {
    const token = this.tokens[this.pos];
    if (token === undefined || token.kind !== "ident") this.fail("expected identifier");
    this.pos++;
    return token.value;
  }

  private parseTypeList(): TypeTag[] {
    const params: TypeTag[] = [];
    this.expectPunct("<");
    for (;;) {
      params.push(this.parseType());
      if (this.peekPunct(",")) {
        this.pos++;
        continue;
      }
      this.expectPunct(">");
      return params;
    }
  }

  parseType(): TypeTag {
    const head = this.expectIdent();
    if (head === "vector") {
      const params = this.parseTypeList();
      if (params.length !== 1) this.fail("vector takes exactly one type parameter");
      return { kind: "vector", element: params[0] };
    }
    if (isPrimitive(head) && !this.peekPunct("::")) {
      return { kind: head };
    }
    return { kind: "struct", struct: this.parseStructRest(head) };
  }

  private parseStructRest(addressText: string): StructTag {
    let address: Address;
    try {
      address = normalizeAddress(addressText);
    } catch {
      this.fail(`invalid address "${addressText}"`);
    }
    this.expectPunct("::");
    const module = this.expectIdent();
    this.expectPunct("::");
    const name = this.expectIdent();
    if (!IDENT_RE.test(module) || !IDENT_RE.test(name)) {
      this.fail("invalid identifier");
    }
    const typeParams = this.peekPunct("<") ? this.parseTypeList() : [];
    return { address, module, name, typeParams };
  }
}

export function parseTypeTag(input: string): TypeTag {
  return new TypeParser(tokenize(input), input).parseAll();
}

export function parseStructTag(input: string): StructTag {
  const tag = parseTypeTag(input);
  if (tag.kind !== "struct") {
    throw new Error(`Invalid struct type "${input}": not a struct`);
  }
  return tag.struct;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatStructTag(tag: StructTag): string {
  const params = tag.typeParams.length > 0 ? `<${tag.typeParams.map(formatTypeTag).join(", ")}>` : "";
  return `${tag.address}::${tag.module}::${tag.name}${params}`;
}

export function formatTypeTag(tag: TypeTag): string {
  switch (tag.kind) {
    case "vector":
      return `vector<${formatTypeTag(tag.element)}>`;
    case "struct":
      return formatStructTag(tag.struct);
    default:
      return tag.kind;
  }
}

export function structTag(address: string, module: string, name: string, typeParams: TypeTag[] = []): StructTag {
  return { address: normalizeAddress(address), module, name, typeParams };
}

export function structType(address: string, module: string, name: string, typeParams: TypeTag[] = []): TypeTag {
  return { kind: "struct", struct: structTag(address, module, name, typeParams) };
}

export function typeTagEquals(a: TypeTag, b: TypeTag): boolean {
  return formatTypeTag(a) === formatTypeTag(b);
}
