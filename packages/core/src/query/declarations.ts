import type { FactValue } from "../model/value.js";

export type Binding = Readonly<Record<string, FactValue>>;

export type CelType = "bool" | "int" | "double" | "string" | "dyn";

export interface Declaration {
  name: string;
  type: CelType;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RESERVED_WORDS = new Set([
  "true", "false", "null", "in", "as", "break", "const", "continue", "else",
  "for", "function", "if", "import", "let", "loop", "package", "namespace",
  "return", "var", "void", "while",
]);

/** Whether a binding name can be referenced from an expression. */
export function isBindableName(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_WORDS.has(name);
}

export function inferCelType(value: FactValue): CelType {
  switch (typeof value) {
    case "boolean":
      return "bool";
    case "number":
      return Number.isSafeInteger(value) ? "int" : "double";
    case "string":
      return "string";
    default:
      return "dyn";
  }
}

/** One declaration per bindable name, sorted by name. */
export function inferDeclarations(binding: Binding): Declaration[] {
  return Object.keys(binding)
    .filter(isBindableName)
    .sort()
    .map((name) => ({ name, type: inferCelType(binding[name]) }));
}

export function declarationSignature(declarations: Declaration[]): string {
  return declarations.map((d) => `${d.name}:${d.type}`).join(",");
}
