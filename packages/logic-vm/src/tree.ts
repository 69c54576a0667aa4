import type { JsonObject, JsonPrimitive, JsonValue } from '@rulelogic/types';
import { UnrecognizedOperatorError } from './errors.js';
import type { OperatorRegistry } from './registry.js';
import { isLogic, splitLogic } from './rule.js';

export type TreeNode = OperationNode | JsonPrimitive | JsonObject | TreeNode[];

/** A rule with its unary sugar removed: one operator, explicit arguments. */
export class OperationNode {
  constructor(
    readonly operator: string,
    readonly args: TreeNode[] = [],
  ) {}

  toString(): string {
    return formatTree(this);
  }
}

/**
 * Convert a rule into an operation tree. Every operator must be registered.
 */
export function toOperationTree(rule: JsonValue, registry: OperatorRegistry, path = 'root'): TreeNode {
  if (typeof rule !== 'object' || rule === null) return rule;
  if (Array.isArray(rule)) {
    return rule.map((item, i) => toOperationTree(item, registry, `${path}[${i}]`));
  }
  // Multi-key and empty objects are data
  if (!isLogic(rule)) return rule;
  const [operator, operands] = splitLogic(rule);
  if (!registry.has(operator)) throw new UnrecognizedOperatorError(operator, path);
  return new OperationNode(
    operator,
    operands.map((operand, i) => toOperationTree(operand, registry, `${path}.${operator}[${i}]`)),
  );
}

function hasOperation(node: TreeNode): boolean {
  if (node instanceof OperationNode) return true;
  return Array.isArray(node) && node.some(hasOperation);
}

function renderChildren(header: string, children: TreeNode[]): string[] {
  const lines = [header];
  children.forEach((child, index) => {
    const last = index === children.length - 1;
    const [first, ...rest] = render(child);
    lines.push(`${last ? '  └─' : '  ├─'} ${first}`);
    for (const line of rest) lines.push(`${last ? '    ' : '  │ '} ${line}`);
  });
  return lines;
}

function renderConditional(args: TreeNode[]): string[] {
  const lines = ['Conditional'];
  for (let i = 0; i + 1 < args.length; i += 2) {
    const [condition, ...conditionRest] = render(args[i]);
    const [outcome, ...outcomeRest] = render(args[i + 1]);
    lines.push(
      i === 0 ? '  If' : '  Elif',
      `  ├─ ${condition}`,
      ...conditionRest.map((line) => `  │  ${line}`),
      '  └─ Then',
      `       └─ ${outcome}`,
      ...outcomeRest.map((line) => `          ${line}`),
    );
  }
  if (args.length % 2 === 1) {
    const [otherwise, ...rest] = render(args[args.length - 1]);
    lines.push('  Else', `  └─ ${otherwise}`, ...rest.map((line) => `     ${line}`));
  }
  return lines;
}

function render(node: TreeNode): string[] {
  if (Array.isArray(node)) {
    return hasOperation(node) ? renderChildren('Array', node) : [JSON.stringify(node)];
  }
  if (!(node instanceof OperationNode)) return [JSON.stringify(node)];

  const [reference] = node.args;
  if (node.operator === 'var' && (typeof reference === 'string' || typeof reference === 'number')) {
    return [`$${reference}`];
  }
  if (node.operator === 'if' && node.args.length > 2) return renderConditional(node.args);
  return renderChildren(`Operation(${node.operator})`, node.args);
}

/**
 * Box-drawing rendering of an operation tree, one node per line. Literal
 * `var` references print as `$path`.
 */
export function formatTree(node: TreeNode): string {
  return render(node).join('\n');
}
