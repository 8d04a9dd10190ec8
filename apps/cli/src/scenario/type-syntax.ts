import {
  type TypeRef,
  functionType,
  optionalType,
  structuralType,
  tupleType,
} from "@expandc/compiler/semantics/type-ref.js";

export class TypeSyntaxError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.offset = offset;
  }
}

type Token =
  | { kind: "ident"; text: string; offset: number }
  | { kind: "punct"; text: string; offset: number }
  | { kind: "eof"; text: ""; offset: number };

const PUNCTUATION = ["->", "(", ")", "{", "}", "<", ">", ",", ":", "?"];

const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let offset = 0;
  while (offset < source.length) {
    const rest = source.slice(offset);
    const space = /^\s+/.exec(rest);
    if (space) {
      offset += space[0].length;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(rest);
    if (ident) {
      tokens.push({ kind: "ident", text: ident[0], offset });
      offset += ident[0].length;
      continue;
    }
    const punct = PUNCTUATION.find((candidate) => rest.startsWith(candidate));
    if (!punct) {
      throw new TypeSyntaxError(`unexpected character "${rest[0]}"`, offset);
    }
    tokens.push({ kind: "punct", text: punct, offset });
    offset += punct.length;
  }
  tokens.push({ kind: "eof", text: "", offset });
  return tokens;
};

/** Turns a written type name into a reference, given its type arguments. */
export type NameResolver = (name: string, typeArgs: TypeRef[]) => TypeRef;

class TypeParser {
  #tokens: Token[];
  #position = 0;
  #resolveName: NameResolver;

  constructor(source: string, resolveName: NameResolver) {
    this.#tokens = tokenize(source);
    this.#resolveName = resolveName;
  }

  parse(): TypeRef {
    const type = this.#type();
    const next = this.#peek();
    if (next.kind !== "eof") {
      throw new TypeSyntaxError(`unexpected "${next.text}"`, next.offset);
    }
    return type;
  }

  #peek(): Token {
    const token = this.#tokens[this.#position];
    if (token) return token;
    throw new TypeSyntaxError("unexpected end of type", 0);
  }

  #next(): Token {
    const token = this.#peek();
    if (token.kind !== "eof") this.#position += 1;
    return token;
  }

  #eat(text: string): boolean {
    const token = this.#peek();
    if (token.kind === "punct" && token.text === text) {
      this.#position += 1;
      return true;
    }
    return false;
  }

  #expect(text: string): void {
    const token = this.#peek();
    if (!this.#eat(text)) {
      const found = token.kind === "eof" ? "end of type" : `"${token.text}"`;
      throw new TypeSyntaxError(`expected "${text}" but found ${found}`, token.offset);
    }
  }

  #ident(): string {
    const token = this.#next();
    if (token.kind !== "ident") {
      throw new TypeSyntaxError("expected a type name", token.offset);
    }
    return token.text;
  }

  #list<T>(close: string, item: () => T): T[] {
    const items: T[] = [];
    if (this.#eat(close)) return items;
    do {
      items.push(item());
    } while (this.#eat(","));
    this.#expect(close);
    return items;
  }

  #type(): TypeRef {
    let type = this.#primary();
    while (this.#eat("?")) {
      type = optionalType(type);
    }
    return type;
  }

  #primary(): TypeRef {
    if (this.#eat("(")) {
      const elements = this.#list(")", () => this.#type());
      if (this.#eat("->")) {
        return functionType(elements, this.#type());
      }
      const [only] = elements;
      return only && elements.length === 1 ? only : tupleType(elements);
    }

    if (this.#eat("{")) {
      return structuralType(
        this.#list("}", () => {
          const name = this.#ident();
          this.#expect(":");
          return { name, type: this.#type() };
        })
      );
    }

    const name = this.#ident();
    const typeArgs = this.#eat("<") ? this.#list(">", () => this.#type()) : [];
    return this.#resolveName(name, typeArgs);
  }
}

/**
 * Parses written types such as `Point?`, `Box<Int>`, `(Int, Bool) -> Int`
 * or `{ x: Int }`.
 */
export const parseTypeSyntax = (source: string, resolveName: NameResolver): TypeRef =>
  new TypeParser(source, resolveName).parse();
