import type { SqlParameter } from '../types.js';

export type Combinator = 'and' | 'or';

export type ConditionNode =
  | { kind: 'none' }
  | { kind: 'expression'; sql: string; params: readonly SqlParameter[] }
  | { kind: 'and'; left: ConditionNode; right: ConditionNode }
  | { kind: 'or'; left: ConditionNode; right: ConditionNode };

export function isComposite(node: ConditionNode): boolean {
  return node.kind === 'and' || node.kind === 'or';
}
