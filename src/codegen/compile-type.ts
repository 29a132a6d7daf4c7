import type { StructDecl } from "../syntax-objects/declarations.js";
import type { PhaseContext } from "../semantics/phase-context.js";

const typedef = (decl: StructDecl) => `UC_TYPEDEF(${decl.name.raw})`;

const variable = (name: string) => `UC_VAR(${name})`;

export const genTypeDecl = (decl: StructDecl, ctx: PhaseContext): void => {
  ctx.printIndented(`struct ${typedef(decl)};\n`);
};

/**
 * A record with one member per field, a default constructor, a
 * constructor taking every field in order, and field-wise equality.
 */
export const genTypeDef = (decl: StructDecl, ctx: PhaseContext): void => {
  const name = typedef(decl);
  const members = ctx.indented();
  const body = members.indented();

  ctx.printIndented(`struct ${name} {\n`);
  decl.fields.forEach((field) =>
    members.printIndented(
      `${field.typeExpr.resolvedType.mangle()} ${variable(field.name.raw)};\n`
    )
  );

  members.printIndented(`${name}() = default;\n`);
  if (decl.fields.length) {
    const params = decl.fields
      .map((field, i) => `const ${field.typeExpr.resolvedType.mangle()} &var${i}`)
      .join(", ");
    members.printIndented(`${name}(${params}) {\n`);
    decl.fields.forEach((field, i) =>
      body.printIndented(`${variable(field.name.raw)} = var${i};\n`)
    );
    members.printIndented("}\n");
  }

  const equality = decl.fields.length
    ? decl.fields
        .map(({ name }) => `${variable(name.raw)} == rhs.${variable(name.raw)}`)
        .join(" && ")
    : "true";
  members.printIndented(
    `UC_PRIMITIVE(boolean) operator==(const ${name} &rhs) const {\n`
  );
  body.printIndented(`return ${equality};\n`);
  members.printIndented("}\n");

  members.printIndented(
    `UC_PRIMITIVE(boolean) operator!=(const ${name} &rhs) const {\n`
  );
  body.printIndented("return !((*this)==rhs);\n");
  members.printIndented("}\n");

  ctx.printIndented("};\n", "\n");
};
