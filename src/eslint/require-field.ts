/**
 * ESLint rule: fieldpath/require-field
 *
 * A Struct subclass must declare at least one @field property; with none it
 * has no path accessor and `accessorFor` throws on first use. Public instance
 * properties without @field are unreachable by path, so they are reported too.
 *
 * Known limitation: only detects direct `extends Struct`, not transitive inheritance.
 */

import type { TSESTree } from "@typescript-eslint/utils";
import { ESLintUtils } from "@typescript-eslint/utils";

const PACKAGE_NAME = "fieldpath";

const createRule = ESLintUtils.RuleCreator(
  (name) => `https://www.npmjs.com/package/${PACKAGE_NAME}#${name}`,
);

/**
 * Check whether an import specifier for "Struct" comes from "fieldpath".
 */
function findStructImport(
  program: TSESTree.Program,
): TSESTree.ImportSpecifier | undefined {
  for (const stmt of program.body) {
    if (
      stmt.type !== "ImportDeclaration" ||
      stmt.source.value !== PACKAGE_NAME
    ) {
      continue;
    }
    for (const spec of stmt.specifiers) {
      if (
        spec.type === "ImportSpecifier" &&
        ((spec.imported.type === "Identifier" &&
          spec.imported.name === "Struct") ||
          (spec.imported.type === "Literal" &&
            spec.imported.value === "Struct"))
      ) {
        return spec;
      }
    }
  }
  return undefined;
}

function getSuperClassName(node: TSESTree.ClassDeclaration): string | null {
  if (!node.superClass) return null;
  if (node.superClass.type === "Identifier") return node.superClass.name;
  return null;
}

function hasFieldDecorator(node: TSESTree.PropertyDefinition): boolean {
  return node.decorators.some((d) => {
    const expr = d.expression;
    // @field(...)
    return (
      expr.type === "CallExpression" &&
      expr.callee.type === "Identifier" &&
      expr.callee.name === "field"
    );
  });
}

function propertyName(node: TSESTree.PropertyDefinition): string {
  if (node.key.type === "Identifier") return node.key.name;
  if (node.key.type === "Literal") return String(node.key.value);
  return "(computed)";
}

export const requireField = createRule({
  name: "require-field",
  meta: {
    type: "problem",
    docs: {
      description:
        "Require Struct subclasses to expose their public properties with @field",
    },
    messages: {
      emptyStruct:
        'Struct subclass "{{className}}" declares no @field properties and cannot be accessed by path.',
      missingDecorator:
        'Public property "{{name}}" on Struct subclass "{{className}}" is not decorated with @field and is unreachable by path.',
    },
    schema: [],
  },
  defaultOptions: [],
  create(context) {
    let structImportLocal: string | null = null;

    return {
      Program(program) {
        const spec = findStructImport(program);
        if (spec) {
          structImportLocal = spec.local.name;
        }
      },

      ClassDeclaration(node) {
        if (!structImportLocal) return;
        if (getSuperClassName(node) !== structImportLocal) return;

        const className = node.id?.name ?? "(anonymous)";
        let decorated = 0;

        for (const member of node.body.body) {
          if (member.type !== "PropertyDefinition") continue;

          if (hasFieldDecorator(member)) {
            decorated++;
            continue;
          }

          if (member.static) continue;
          if (
            member.accessibility === "private" ||
            member.accessibility === "protected"
          ) {
            continue;
          }
          if (member.key.type === "PrivateIdentifier") continue;
          // `declare` properties have no runtime presence
          if (member.declare) continue;

          context.report({
            node: member,
            messageId: "missingDecorator",
            data: { name: propertyName(member), className },
          });
        }

        if (decorated === 0) {
          context.report({
            node,
            messageId: "emptyStruct",
            data: { className },
          });
        }
      },
    };
  },
});
