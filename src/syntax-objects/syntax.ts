import type { Position } from "../diagnostics/index.js";
import type { SyntaxArena } from "./arena.js";
import type { Node } from "./node.js";

export type SyntaxMetadata = {
  arena: SyntaxArena;
  position: Position;
};

/** A structural field of a node: a sub-node, a list of them, or a terminal */
export type ChildValue = Node | readonly Node[] | string | undefined;

export type ChildEntry = readonly [name: string, value: ChildValue];

/**
 * Thrown when an analysis attribute is read before the phase that
 * populates it has visited the node. Always a compiler bug.
 */
export class UnresolvedAttributeError extends Error {
  constructor(node: Syntax, attribute: string) {
    super(
      `${node.syntaxType}#${node.syntaxId} at line ${node.position}: ${attribute} read before it was resolved`
    );
  }
}

export abstract class Syntax {
  /** For tagged unions */
  abstract readonly syntaxType: string;
  readonly syntaxId: number;
  readonly position: Position;

  constructor(metadata: SyntaxMetadata) {
    this.position = metadata.position;
    this.syntaxId = metadata.arena.register(this);
  }

  /** Structural fields in declaration order. Attributes are never included. */
  abstract childEntries(): ChildEntry[];

  /** Sub-nodes in traversal order, with lists flattened */
  get children(): Node[] {
    return this.childEntries().flatMap(([, value]) => {
      if (value === undefined || typeof value === "string") return [];
      if (isNodeList(value)) return [...value];
      return [value];
    });
  }

  /** Returns the attribute, throwing if its owning phase has not run yet */
  protected resolved<T>(value: T | undefined, attribute: string): T {
    if (value === undefined) throw new UnresolvedAttributeError(this, attribute);
    return value;
  }
}

export const isNodeList = (value: ChildValue): value is readonly Node[] =>
  Array.isArray(value);
