import { isNodeList } from "../syntax-objects/syntax.js";
import type { Node } from "../syntax-objects/node.js";
import { typeHolder } from "./typed-node.js";

const escape = (text: string) =>
  text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

const nodeLabel = (node: Node) => {
  const type = typeHolder(node)?.type;
  return type ? `${node.syntaxType} (${type.name})` : node.syntaxType;
};

/** Renders the tree as a Graphviz digraph. Edges are labelled with field names. */
export const graphGen = (root: Node): string => {
  const lines = ["digraph {"];
  const edge = (parent: string, target: string, label: string, name: string) =>
    lines.push(`  ${parent} -> {${target} [label="${label}"]} [label="${name}"]`);

  const visitNode = (node: Node, parent: string) => {
    node.childEntries().forEach(([name, value], index) => {
      if (value === undefined) return;

      if (typeof value === "string") {
        edge(parent, `${parent}T${index}`, escape(value), name);
        return;
      }

      if (isNodeList(value)) {
        const listId = `${parent}L${index}`;
        edge(parent, listId, "[list]", name);
        value.forEach((child, i) => {
          edge(listId, `N${child.syntaxId}`, nodeLabel(child), `${i}`);
          visitNode(child, `N${child.syntaxId}`);
        });
        return;
      }

      edge(parent, `N${value.syntaxId}`, nodeLabel(value), name);
      visitNode(value, `N${value.syntaxId}`);
    });
  };

  visitNode(root, root.syntaxType);
  lines.push("}");
  return lines.map((line) => `${line}\n`).join("");
};
