/**
 * Closed set of operations a semantic value can delegate to a backend.
 * Every piece of operator sugar on a value maps onto exactly one of these.
 */
export enum OperationKind {
  Equals = 'equals',
  Contains = 'contains',
  IsInstanceOf = 'isinstanceof',
  Compare = 'compare',
  GetItem = 'getitem',
  SetItem = 'setitem',
  DeleteItem = 'delitem',
  Negate = 'negate',
  Invert = 'invert',
  Include = 'include',
  Combine = 'combine',
  Replace = 'replace',
  Logic = 'logic',
  Query = 'query',
  List = 'list',
  Embed = 'embed',
  Index = 'index',
}

export type CompareOperator = '>' | '<' | '>=' | '<=';

export type LogicOperator = 'and' | 'or' | 'xor';

/** Backend-specific keyword overrides passed alongside a dispatch. */
export type Overrides = Record<string, unknown>;
