import type { Syntax } from "./syntax.js";

/**
 * Owns every node of one compilation and hands out sequential ids in
 * insertion order.
 */
export class SyntaxArena {
  #nodes: Syntax[] = [];

  register(node: Syntax): number {
    this.#nodes.push(node);
    return this.#nodes.length - 1;
  }

  get(id: number): Syntax | undefined {
    return this.#nodes[id];
  }

  get size(): number {
    return this.#nodes.length;
  }
}
