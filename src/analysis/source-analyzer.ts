import ts from "typescript";

import type {
  Definition,
  DefinitionKind,
  FileAnalysis,
  FileMetrics,
  ImportReference,
  ParseFailedFile,
} from "../core/types.js";
import { toErrorMessage, toPosixPath, uniqueSorted } from "../core/utils.js";
import { classComplexity, functionComplexity, isDefinitionNode } from "./complexity.js";
import { type LineKind, classifyLines, summarizeLines } from "./line-counter.js";
import { commentRatio, maintainabilityIndex, roundTo2 } from "./maintainability.js";

const SCRIPT_KIND_BY_EXTENSION: Record<string, ts.ScriptKind> = {
  ".ts": ts.ScriptKind.TS,
  ".mts": ts.ScriptKind.TS,
  ".cts": ts.ScriptKind.TS,
  ".tsx": ts.ScriptKind.TSX,
  ".js": ts.ScriptKind.JS,
  ".mjs": ts.ScriptKind.JS,
  ".cjs": ts.ScriptKind.JS,
  ".jsx": ts.ScriptKind.JSX,
};

/**
 * Parses one source file and extracts its definitions, imports and
 * metrics. Never throws: undecodable bytes and syntax errors come back as
 * a `parse-failed` result without definitions.
 */
export function analyzeFile(path: string, source: string | Uint8Array): FileAnalysis {
  const normalizedPath = toPosixPath(path);

  let text: string;
  try {
    text = typeof source === "string" ? source : new TextDecoder("utf-8", { fatal: true }).decode(source);
  } catch (error) {
    return parseFailed(normalizedPath, "encoding", `Not valid UTF-8: ${toErrorMessage(error)}`);
  }

  const syntaxError = findSyntaxError(normalizedPath, text);
  if (syntaxError) {
    return parseFailed(normalizedPath, "syntax", syntaxError);
  }

  const sourceFile = ts.createSourceFile(
    normalizedPath,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(normalizedPath),
  );
  const lineKinds = classifyLines(sourceFile);
  const definitions = collectDefinitions(sourceFile, modulePathOf(normalizedPath), lineKinds);

  return {
    status: "ok",
    path: normalizedPath,
    definitions,
    imports: collectImports(sourceFile),
    metrics: computeFileMetrics(definitions, lineKinds),
  };
}

/** `src/server.ts` → `src/server`. */
export function modulePathOf(path: string): string {
  const normalized = toPosixPath(path);
  const lastSlash = normalized.lastIndexOf("/");
  const lastDot = normalized.lastIndexOf(".");
  return lastDot > lastSlash + 1 ? normalized.slice(0, lastDot) : normalized;
}

function scriptKindFor(path: string): ts.ScriptKind {
  const lastDot = path.lastIndexOf(".");
  const extension = lastDot >= 0 ? path.slice(lastDot).toLowerCase() : "";
  return SCRIPT_KIND_BY_EXTENSION[extension] ?? ts.ScriptKind.TS;
}

function parseFailed(path: string, reason: ParseFailedFile["reason"], message: string): ParseFailedFile {
  return { status: "parse-failed", path, reason, message, definitions: [], imports: [] };
}

/** First syntactic error, formatted as `line N: message`, or `undefined`. */
function findSyntaxError(path: string, text: string): string | undefined {
  const { diagnostics = [] } = ts.transpileModule(text, {
    fileName: path,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });

  const error = diagnostics.find(
    (diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error && diagnostic.file !== undefined,
  );
  if (!error?.file) {
    return undefined;
  }

  const message = ts.flattenDiagnosticMessageText(error.messageText, "\n");
  if (error.start === undefined) {
    return message;
  }
  const { line } = error.file.getLineAndCharacterOfPosition(error.start);
  return `line ${line + 1}: ${message}`;
}

// ── Definitions ──────────────────────────────────────────────

interface DefinitionTarget {
  node: ts.Node;
  name: string;
  kind: DefinitionKind;
}

function collectDefinitions(sourceFile: ts.SourceFile, modulePath: string, lineKinds: LineKind[]): Definition[] {
  const definitions: Definition[] = [];

  const visit = (node: ts.Node, scope: string[]): void => {
    const target = isDefinitionNode(node) ? describeDefinition(node) : undefined;
    if (!target) {
      ts.forEachChild(node, (child) => visit(child, scope));
      return;
    }

    const nestedScope = [...scope, target.name];
    definitions.push(buildDefinition(sourceFile, target, `${modulePath}:${nestedScope.join(".")}`, lineKinds));
    ts.forEachChild(node, (child) => visit(child, nestedScope));
  };

  visit(sourceFile, []);
  return definitions;
}

function describeDefinition(node: ts.Node): DefinitionTarget | undefined {
  if (ts.isClassLike(node)) {
    return { node, name: node.name?.text ?? contextualName(node), kind: "class" };
  }

  if (ts.isFunctionDeclaration(node)) {
    return { node, name: node.name?.text ?? contextualName(node), kind: "function" };
  }

  if (ts.isConstructorDeclaration(node)) {
    return { node, name: "constructor", kind: "method" };
  }

  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return { node, name: propertyNameText(node.name), kind: "method" };
  }

  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
    const parent = node.parent;
    if (ts.isPropertyDeclaration(parent)) {
      return { node, name: propertyNameText(parent.name), kind: "method" };
    }
    if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) {
      return { node, name: parent.name.text, kind: "function" };
    }
  }

  return undefined;
}

/** Name for an anonymous class or function taken from where it appears. */
function contextualName(node: ts.Node): string {
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  if (modifiers?.some((modifier) => modifier.kind === ts.SyntaxKind.DefaultKeyword)) {
    return "default";
  }
  return "<anonymous>";
}

function propertyNameText(name: ts.PropertyName): string {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return name.getText();
}

function buildDefinition(
  sourceFile: ts.SourceFile,
  target: DefinitionTarget,
  qualifiedName: string,
  lineKinds: LineKind[],
): Definition {
  const { node, name, kind } = target;
  const startLine = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
  const endLine = sourceFile.getLineAndCharacterOfPosition(node.end).line + 1;
  const lines = summarizeLines(lineKinds, startLine, endLine);

  const complexity = ts.isClassLike(node)
    ? classComplexity(node)
    : ts.isFunctionLike(node)
      ? functionComplexity(node)
      : 1;

  return {
    qualifiedName,
    name,
    kind,
    startLine,
    endLine,
    parameterCount: countParameters(node),
    decorators: decoratorNames(node, sourceFile),
    complexity,
    maintainability: maintainabilityIndex(complexity, lines.code, commentRatio(lines.code, lines.comment)),
    linesOfCode: lines.code,
  };
}

function countParameters(node: ts.Node): number {
  if (ts.isClassLike(node)) {
    const constructor = node.members.find(ts.isConstructorDeclaration);
    return constructor ? countParameters(constructor) : 0;
  }
  if (!ts.isFunctionLike(node)) {
    return 0;
  }
  return node.parameters.filter(
    (parameter) => !(ts.isIdentifier(parameter.name) && parameter.name.text === "this"),
  ).length;
}

/**
 * `@Injectable()` and `@Injectable` both yield `Injectable`. Decorators on
 * a property carry over to the arrow function it holds.
 */
function decoratorNames(node: ts.Node, sourceFile: ts.SourceFile): string[] {
  const holder = (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) && ts.isPropertyDeclaration(node.parent)
    ? node.parent
    : node;
  if (!ts.canHaveDecorators(holder)) {
    return [];
  }

  const names = (ts.getDecorators(holder) ?? []).map((decorator) => {
    const expression = ts.isCallExpression(decorator.expression)
      ? decorator.expression.expression
      : decorator.expression;
    return expression.getText(sourceFile);
  });
  return uniqueSorted(names);
}

// ── Imports ──────────────────────────────────────────────────

function collectImports(sourceFile: ts.SourceFile): ImportReference[] {
  const imports: ImportReference[] = [];
  const lineOf = (node: ts.Node): number =>
    sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node) && ts.isStringLiteral(node.moduleSpecifier)) {
      imports.push({
        specifier: node.moduleSpecifier.text,
        kind: "static",
        typeOnly: node.importClause?.isTypeOnly ?? false,
        line: lineOf(node),
      });
    } else if (ts.isExportDeclaration(node) && node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier)) {
      imports.push({
        specifier: node.moduleSpecifier.text,
        kind: "re-export",
        typeOnly: node.isTypeOnly,
        line: lineOf(node),
      });
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      imports.push({
        specifier: node.moduleReference.expression.text,
        kind: "import-equals",
        typeOnly: node.isTypeOnly,
        line: lineOf(node),
      });
    } else if (ts.isCallExpression(node)) {
      const [argument] = node.arguments;
      const specifier = argument && ts.isStringLiteralLike(argument) ? argument.text : undefined;
      if (specifier !== undefined && node.arguments.length === 1) {
        if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
          imports.push({ specifier, kind: "dynamic", typeOnly: false, line: lineOf(node) });
        } else if (ts.isIdentifier(node.expression) && node.expression.text === "require") {
          imports.push({ specifier, kind: "require", typeOnly: false, line: lineOf(node) });
        }
      }
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return imports;
}

// ── Metrics ──────────────────────────────────────────────────

function computeFileMetrics(definitions: Definition[], lineKinds: LineKind[]): FileMetrics {
  const callables = definitions.filter((definition) => definition.kind !== "class");
  const totalComplexity = callables.reduce((sum, definition) => sum + definition.complexity, 0);
  const maxComplexity = callables.reduce((max, definition) => Math.max(max, definition.complexity), 0);
  const averageMaintainability =
    callables.length === 0
      ? null
      : roundTo2(callables.reduce((sum, definition) => sum + definition.maintainability, 0) / callables.length);

  return {
    lines: summarizeLines(lineKinds),
    totalComplexity,
    maxComplexity,
    averageMaintainability,
  };
}
