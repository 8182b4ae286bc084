import globToRegexp from "glob-to-regexp";

/**
 * How a light, group or scene is selected on the command line or in a
 * YAML state file.
 */
export type Identifier =
  | { kind: "all" }
  | { kind: "id"; id: number }
  | { kind: "name"; name: string }
  | { kind: "pattern"; pattern: RegExp };

export type IdentifierInput = string | number | null | undefined;

const INTEGER = /^[+-]?\d+$/;

export function parseIdentifier(input: IdentifierInput): Identifier {
  if (input === null || input === undefined) {
    return { kind: "all" };
  }

  if (typeof input === "number") {
    return { kind: "id", id: input };
  }

  const text = input.trim();

  if (INTEGER.test(text)) {
    return { kind: "id", id: Number(text) };
  }

  if (text.length > 1 && text.startsWith("/") && text.endsWith("/")) {
    return { kind: "pattern", pattern: new RegExp(`^(?:${text.slice(1, -1)})`, "i") };
  }

  if (/[*?]/.test(text)) {
    return { kind: "pattern", pattern: globToRegexp(text, { extended: true, flags: "i" }) };
  }

  return { kind: "name", name: text.toLowerCase() };
}

export function matchesIdentifier(
  identifier: Identifier,
  id: string,
  name: string
): boolean {
  switch (identifier.kind) {
    case "all":
      return true;
    case "id":
      return Number(id) === identifier.id;
    case "name":
      return name.toLowerCase() === identifier.name;
    case "pattern":
      return identifier.pattern.test(name);
  }
}

/**
 * Keeps the entries of a gateway catalog (id -> resource) that match.
 */
export function selectEntries<T extends { name: string }>(
  catalog: Record<string, T>,
  identifier: Identifier
): Record<string, T> {
  return Object.fromEntries(
    Object.entries(catalog).filter(([id, value]) =>
      matchesIdentifier(identifier, id, value.name)
    )
  );
}

export function describeIdentifier(identifier: Identifier): string {
  switch (identifier.kind) {
    case "all":
      return "everything";
    case "id":
      return `#${identifier.id}`;
    case "name":
      return `"${identifier.name}"`;
    case "pattern":
      return identifier.pattern.toString();
  }
}
