import type { Expression } from "./expressions.js";
import { Syntax, type ChildEntry, type SyntaxMetadata } from "./syntax.js";

export class Block extends Syntax {
  readonly syntaxType = "block";
  statements: Statement[];

  constructor(opts: SyntaxMetadata & { statements: Statement[] }) {
    super(opts);
    this.statements = opts.statements;
  }

  childEntries(): ChildEntry[] {
    return [["statements", this.statements]];
  }
}

export class IfStmt extends Syntax {
  readonly syntaxType = "if";
  test: Expression;
  thenBlock: Block;
  /** Empty when the source has no else branch */
  elseBlock: Block;

  constructor(
    opts: SyntaxMetadata & {
      test: Expression;
      thenBlock: Block;
      elseBlock: Block;
    }
  ) {
    super(opts);
    this.test = opts.test;
    this.thenBlock = opts.thenBlock;
    this.elseBlock = opts.elseBlock;
  }

  childEntries(): ChildEntry[] {
    return [
      ["test", this.test],
      ["thenBlock", this.thenBlock],
      ["elseBlock", this.elseBlock],
    ];
  }
}

export class WhileStmt extends Syntax {
  readonly syntaxType = "while";
  test: Expression;
  body: Block;

  constructor(opts: SyntaxMetadata & { test: Expression; body: Block }) {
    super(opts);
    this.test = opts.test;
    this.body = opts.body;
  }

  childEntries(): ChildEntry[] {
    return [
      ["test", this.test],
      ["body", this.body],
    ];
  }
}

/** Each of init, test and update may be omitted */
export class ForStmt extends Syntax {
  readonly syntaxType = "for";
  init?: Expression;
  test?: Expression;
  update?: Expression;
  body: Block;

  constructor(
    opts: SyntaxMetadata & {
      init?: Expression;
      test?: Expression;
      update?: Expression;
      body: Block;
    }
  ) {
    super(opts);
    this.init = opts.init;
    this.test = opts.test;
    this.update = opts.update;
    this.body = opts.body;
  }

  childEntries(): ChildEntry[] {
    return [
      ["init", this.init],
      ["test", this.test],
      ["update", this.update],
      ["body", this.body],
    ];
  }
}

export class BreakStmt extends Syntax {
  readonly syntaxType = "break";

  childEntries(): ChildEntry[] {
    return [];
  }
}

export class ContinueStmt extends Syntax {
  readonly syntaxType = "continue";

  childEntries(): ChildEntry[] {
    return [];
  }
}

export class ReturnStmt extends Syntax {
  readonly syntaxType = "return";
  expr?: Expression;

  constructor(opts: SyntaxMetadata & { expr?: Expression }) {
    super(opts);
    this.expr = opts.expr;
  }

  childEntries(): ChildEntry[] {
    return [["expr", this.expr]];
  }
}

export class ExpressionStmt extends Syntax {
  readonly syntaxType = "expression-statement";
  expr: Expression;

  constructor(opts: SyntaxMetadata & { expr: Expression }) {
    super(opts);
    this.expr = opts.expr;
  }

  childEntries(): ChildEntry[] {
    return [["expr", this.expr]];
  }
}

export type Statement =
  | IfStmt
  | WhileStmt
  | ForStmt
  | BreakStmt
  | ContinueStmt
  | ReturnStmt
  | ExpressionStmt;
