/**
 * Canonical Renderer
 *
 * Serializes a type-expression AST back to text with every namespace
 * qualifier dropped: `pkg.models.User` renders as `User`.
 */

import type { TypeNode } from "../parser/ast";

export function renderTypeNode(node: TypeNode): string {
  switch (node.kind) {
    case "name":
      return node.identifier;

    case "qualified":
      return node.segments[node.segments.length - 1] ?? "";

    case "subscript":
      return `${renderTypeNode(node.base)}[${node.args.map(renderTypeNode).join(", ")}]`;

    case "literal":
      return node.text;

    case "union":
      // Both sides go through the same rule, so chains come out flat
      return `${renderTypeNode(node.left)} | ${renderTypeNode(node.right)}`;
  }
}
