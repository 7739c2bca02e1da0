import ts from "typescript";

const BRANCHING_OPERATORS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.AmpersandAmpersandToken,
  ts.SyntaxKind.BarBarToken,
  ts.SyntaxKind.QuestionQuestionToken,
  ts.SyntaxKind.AmpersandAmpersandEqualsToken,
  ts.SyntaxKind.BarBarEqualsToken,
  ts.SyntaxKind.QuestionQuestionEqualsToken,
]);

export function isDecisionPoint(node: ts.Node): boolean {
  switch (node.kind) {
    case ts.SyntaxKind.IfStatement:
    case ts.SyntaxKind.ConditionalExpression:
    case ts.SyntaxKind.ForStatement:
    case ts.SyntaxKind.ForInStatement:
    case ts.SyntaxKind.ForOfStatement:
    case ts.SyntaxKind.WhileStatement:
    case ts.SyntaxKind.DoStatement:
    case ts.SyntaxKind.CaseClause:
    case ts.SyntaxKind.CatchClause:
      return true;
    default:
      return ts.isBinaryExpression(node) && BRANCHING_OPERATORS.has(node.operatorToken.kind);
  }
}

/**
 * Function-like and class-like nodes that are reported as definitions of
 * their own. Their bodies never count toward an enclosing definition.
 * Anonymous callbacks and object-literal methods are not definitions and
 * stay with whatever encloses them.
 */
export function isDefinitionNode(node: ts.Node): boolean {
  if (ts.isFunctionDeclaration(node) || ts.isClassLike(node)) {
    return true;
  }

  if (
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    return ts.isClassLike(node.parent);
  }

  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
    const parent = node.parent;
    return (
      (ts.isVariableDeclaration(parent) && parent.initializer === node && ts.isIdentifier(parent.name)) ||
      (ts.isPropertyDeclaration(parent) && parent.initializer === node)
    );
  }

  return false;
}

/** Decision points below `root`, not entering nested definitions. */
export function countDecisionPoints(root: ts.Node): number {
  let count = 0;
  const stack: ts.Node[] = [];
  ts.forEachChild(root, (child) => {
    stack.push(child);
  });

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || isDefinitionNode(node)) continue;
    if (isDecisionPoint(node)) count += 1;
    ts.forEachChild(node, (child) => {
      stack.push(child);
    });
  }

  return count;
}

export function functionComplexity(node: ts.SignatureDeclaration): number {
  return 1 + countDecisionPoints(node);
}

/** One plus the decision points of every member, methods included. */
export function classComplexity(node: ts.ClassLikeDeclaration): number {
  let total = 1;
  for (const member of node.members) {
    if (ts.isPropertyDeclaration(member) && member.initializer && isDefinitionNode(member.initializer)) {
      total += countDecisionPoints(member.initializer);
    } else {
      total += countDecisionPoints(member);
    }
  }
  return total;
}
