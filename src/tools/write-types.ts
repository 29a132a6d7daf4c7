import { isNodeList } from "../syntax-objects/syntax.js";
import type { Node } from "../syntax-objects/node.js";
import { typeHolder } from "./typed-node.js";

/**
 * Renders the tree one node per line with the type of every typed node,
 * e.g. `binary: int {`.
 */
export const writeTypes = (root: Node): string => {
  const lines: string[] = [];

  const write = (node: Node, depth: number) => {
    const pad = "  ".repeat(depth);
    const holder = typeHolder(node);
    const type = holder ? `: ${holder.type?.name ?? "<unresolved>"}` : "";
    lines.push(`${pad}${node.syntaxType}${type} {`);

    node.childEntries().forEach(([, value]) => {
      if (value === undefined) return;
      if (typeof value === "string") {
        lines.push(`${pad}  ${value}`);
        return;
      }
      if (isNodeList(value)) {
        value.forEach((child) => write(child, depth + 1));
        return;
      }
      write(value, depth + 1);
    });

    lines.push(`${pad}}`);
  };

  write(root, 0);
  return lines.map((line) => `${line}\n`).join("");
};
