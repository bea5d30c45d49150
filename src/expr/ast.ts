/**
 * Expression AST
 */

export type UnaryOperator = '!' | '-' | '+' | 'typeof';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '===' | '!==' | '==' | '!='
  | '<' | '>' | '<=' | '>='
  | '&&' | '||' | '??'
  | 'in';

export interface LiteralNode { type: 'literal'; value: unknown }
export interface IdentifierNode { type: 'identifier'; name: string }
/** `a.b` stores `b` as a literal property; `a[b]` stores the expression */
export interface MemberNode { type: 'member'; object: ExprNode; property: ExprNode }
export interface CallNode { type: 'call'; callee: ExprNode; arguments: ExprNode[] }
export interface UnaryNode { type: 'unary'; op: UnaryOperator; arg: ExprNode }
export interface BinaryNode { type: 'binary'; op: BinaryOperator; left: ExprNode; right: ExprNode }
export interface TernaryNode { type: 'ternary'; condition: ExprNode; consequent: ExprNode; alternate: ExprNode }
export interface ArrayNode { type: 'array'; elements: ExprNode[] }
export interface ObjectProperty { key: ExprNode; value: ExprNode }
export interface ObjectNode { type: 'object'; properties: ObjectProperty[] }
export interface AssignNode { type: 'assign'; target: IdentifierNode | MemberNode; value: ExprNode }
/** Statements separated by `;`, value of the last one */
export interface SequenceNode { type: 'sequence'; body: ExprNode[] }

export type ExprNode =
  | LiteralNode
  | IdentifierNode
  | MemberNode
  | CallNode
  | UnaryNode
  | BinaryNode
  | TernaryNode
  | ArrayNode
  | ObjectNode
  | AssignNode
  | SequenceNode;
