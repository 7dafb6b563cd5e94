/**
 * String-hint evaluator
 *
 * Parses a hint expression as a TypeScript type and converts the type node
 * into a hint. Every name is resolved through the forward scope with the
 * evaluator trust token, so names not yet defined become forward reference
 * proxies instead of failures.
 */

import * as ts from "typescript";
import {
  ANY_HINT,
  ARRAY_TEMPLATE,
  type Hint,
  type HintDiagnostic,
  type LiteralHint,
  type Result,
  classHint,
  collectResults,
  error,
  flatMap,
  hintError,
  hintRepr,
  isHintClass,
  literal,
  map,
  ok,
  subscript,
  tuple,
  union,
} from "@hintwarden/hints";
import type { ForwardRefRegistry } from "./forward-ref-registry.js";
import type { ForwardScope } from "./forward-scope.js";
import { EVALUATOR_TRUST } from "./trust.js";

const ALIAS_PREFIX = "type __hint = ";

type EvaluationContext = {
  readonly expression: string;
  readonly sourceFile: ts.SourceFile;
  readonly scope: ForwardScope;
  readonly refs: ForwardRefRegistry;
};

const containsMissingIdentifier = (node: ts.Node): boolean =>
  (ts.isIdentifier(node) && node.text === "") ||
  (ts.forEachChild(node, (child) =>
    containsMissingIdentifier(child) ? true : undefined
  ) ??
    false);

const hasSyntaxErrors = (sourceFile: ts.SourceFile): boolean => {
  const options: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    noEmit: true,
    noLib: true,
    noResolve: true,
  };
  const host = ts.createCompilerHost(options);
  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    name: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ) => {
    if (name === sourceFile.fileName) {
      return sourceFile;
    }
    return originalGetSourceFile.call(
      host,
      name,
      languageVersionOrOptions,
      onError,
      shouldCreateNewSourceFile
    );
  };

  const program = ts.createProgram([sourceFile.fileName], options, host);
  return program.getSyntacticDiagnostics(sourceFile).length > 0;
};

const hasEmptyTypeArguments = (node: ts.Node): boolean =>
  (ts.isTypeReferenceNode(node) && node.typeArguments?.length === 0) ||
  (ts.forEachChild(node, (child) =>
    hasEmptyTypeArguments(child) ? true : undefined
  ) ??
    false);

/**
 * Parse `expression` as exactly one type node, or nothing.
 */
const parseTypeExpression = (
  expression: string
): { readonly node: ts.TypeNode; readonly sourceFile: ts.SourceFile } | null => {
  const sourceFile = ts.createSourceFile(
    "hint.ts",
    `${ALIAS_PREFIX}${expression};`,
    ts.ScriptTarget.ES2022,
    false,
    ts.ScriptKind.TS
  );

  const [statement, ...rest] = sourceFile.statements;
  if (!statement || rest.length > 0) return null;
  if (!ts.isTypeAliasDeclaration(statement)) return null;
  if (statement.type.end !== ALIAS_PREFIX.length + expression.length) {
    return null;
  }
  if (containsMissingIdentifier(statement.type)) return null;
  if (hasEmptyTypeArguments(statement.type)) return null;
  if (hasSyntaxErrors(sourceFile)) return null;

  return { node: statement.type, sourceFile };
};

const unsupported = (
  node: ts.Node,
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> =>
  error(
    hintError(
      "HWD1004",
      `hint expression ${JSON.stringify(ctx.expression)} syntax ${JSON.stringify(node.getText(ctx.sourceFile))} unsupported.`
    )
  );

/**
 * Scope name a keyword type resolves through, so a seeded scope can shadow it.
 */
const keywordScopeName = (kind: ts.SyntaxKind): string | null => {
  switch (kind) {
    case ts.SyntaxKind.StringKeyword:
      return "string";
    case ts.SyntaxKind.NumberKeyword:
      return "number";
    case ts.SyntaxKind.BooleanKeyword:
      return "boolean";
    case ts.SyntaxKind.BigIntKeyword:
      return "bigint";
    case ts.SyntaxKind.SymbolKeyword:
      return "symbol";
    case ts.SyntaxKind.ObjectKeyword:
      return "object";
    default:
      return null;
  }
};

const convertKeyword = (kind: ts.SyntaxKind): Hint | null => {
  switch (kind) {
    case ts.SyntaxKind.AnyKeyword:
    case ts.SyntaxKind.UnknownKeyword:
      return ANY_HINT;
    case ts.SyntaxKind.UndefinedKeyword:
    case ts.SyntaxKind.VoidKeyword:
      return literal(undefined);
    default:
      return null;
  }
};

const convertLiteral = (node: ts.LiteralTypeNode): LiteralHint | null => {
  const value = node.literal;

  if (value.kind === ts.SyntaxKind.NullKeyword) return literal(null);
  if (value.kind === ts.SyntaxKind.TrueKeyword) return literal(true);
  if (value.kind === ts.SyntaxKind.FalseKeyword) return literal(false);
  if (ts.isStringLiteral(value)) return literal(value.text);
  if (ts.isNumericLiteral(value)) return literal(Number(value.text));
  if (ts.isBigIntLiteral(value)) return literal(BigInt(value.text.slice(0, -1)));
  if (
    ts.isPrefixUnaryExpression(value) &&
    value.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(value.operand)
  ) {
    return literal(-Number(value.operand.text));
  }

  return null;
};

/**
 * `Outer.Inner`: a member of a proxy is a proxy; a member of a class is one
 * of its static class-valued properties.
 */
const resolveMember = (
  owner: Hint,
  memberName: string,
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> => {
  if (owner.kind === "forwardRef") return ctx.refs.member(owner, memberName);

  if (owner.kind === "class") {
    const value: unknown = Object.hasOwn(owner.ctor, memberName)
      ? Reflect.get(owner.ctor, memberName)
      : undefined;
    if (isHintClass(value)) return ok(classHint(value));
  }

  return error(
    hintError(
      "HWD1004",
      `hint expression ${JSON.stringify(ctx.expression)} type ${hintRepr(owner)} has no class member ${JSON.stringify(memberName)}.`
    )
  );
};

const resolveEntityName = (
  name: ts.EntityName,
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> => {
  if (ts.isIdentifier(name)) {
    return ctx.scope.lookup(name.text, EVALUATOR_TRUST);
  }
  return flatMap(resolveEntityName(name.left, ctx), (owner) =>
    resolveMember(owner, name.right.text, ctx)
  );
};

const applyTypeArguments = (
  origin: Hint,
  args: readonly Hint[],
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> => {
  switch (origin.kind) {
    case "generic":
    case "alias":
      return ok(subscript(origin, args));
    case "forwardRef":
      return ctx.refs.subscript(origin, args);
    default:
      return error(
        hintError(
          "HWD1005",
          `hint expression ${JSON.stringify(ctx.expression)} type ${hintRepr(origin)} not subscriptable.`
        )
      );
  }
};

const convertAll = (
  nodes: readonly ts.TypeNode[],
  ctx: EvaluationContext
): Result<readonly Hint[], HintDiagnostic> =>
  collectResults(nodes.map((node) => convertTypeNode(node, ctx)));

const convertTupleElement = (
  element: ts.TypeNode | ts.NamedTupleMember,
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> => {
  if (ts.isNamedTupleMember(element)) {
    if (element.dotDotDotToken || element.questionToken) {
      return unsupported(element, ctx);
    }
    return convertTypeNode(element.type, ctx);
  }
  if (ts.isRestTypeNode(element) || ts.isOptionalTypeNode(element)) {
    return unsupported(element, ctx);
  }
  return convertTypeNode(element, ctx);
};

const convertTypeNode = (
  node: ts.TypeNode,
  ctx: EvaluationContext
): Result<Hint, HintDiagnostic> => {
  const scopeName = keywordScopeName(node.kind);
  if (scopeName) return ctx.scope.lookup(scopeName, EVALUATOR_TRUST);

  const keyword = convertKeyword(node.kind);
  if (keyword) return ok(keyword);

  if (ts.isParenthesizedTypeNode(node)) return convertTypeNode(node.type, ctx);

  if (ts.isTypeReferenceNode(node)) {
    const origin = resolveEntityName(node.typeName, ctx);
    if (!node.typeArguments) return origin;
    const typeArguments = node.typeArguments;
    return flatMap(origin, (resolved) =>
      flatMap(convertAll(typeArguments, ctx), (args) =>
        applyTypeArguments(resolved, args, ctx)
      )
    );
  }

  if (ts.isUnionTypeNode(node)) return map(convertAll(node.types, ctx), union);

  if (ts.isArrayTypeNode(node)) {
    return map(convertTypeNode(node.elementType, ctx), (element) =>
      subscript(ARRAY_TEMPLATE, [element])
    );
  }

  if (ts.isTupleTypeNode(node)) {
    return map(
      collectResults(
        node.elements.map((element) => convertTupleElement(element, ctx))
      ),
      tuple
    );
  }

  if (ts.isLiteralTypeNode(node)) {
    const converted = convertLiteral(node);
    return converted ? ok(converted) : unsupported(node, ctx);
  }

  return unsupported(node, ctx);
};

/**
 * Evaluate a hint expression against a forward scope.
 */
export const evaluateHintExpression = (
  expression: string,
  scope: ForwardScope,
  refs: ForwardRefRegistry
): Result<Hint, HintDiagnostic> => {
  const trimmed = expression.trim();
  const parsed = parseTypeExpression(trimmed);
  if (!parsed) {
    return error(
      hintError(
        "HWD1004",
        `hint expression ${JSON.stringify(expression)} not a valid type expression.`
      )
    );
  }

  return convertTypeNode(parsed.node, {
    expression: trimmed,
    sourceFile: parsed.sourceFile,
    scope,
    refs,
  });
};
