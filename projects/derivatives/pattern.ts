/**
 * One element of the input alphabet. Patterns built from text use single
 * code points, but any string (a token kind, a word) works as a symbol.
 */
export type Sym = string;

export enum PatternKind {
  NO_MATCH = 'NO_MATCH',
  EMPTY = 'EMPTY',
  LITERAL = 'LITERAL',
  CONCAT = 'CONCAT',
  UNION = 'UNION',
  REPEAT = 'REPEAT',
}

let nextId = 0;

export enum Precedence {
  UNION = 0,
  CONCAT = 1,
  REPEAT = 2,
}

export const NO_MATCH_CHAR = '∅';
export const EMPTY_CHAR = 'ε';
/** Characters that must be escaped to be read as literals. */
export const OPERATOR_CHARS = `\\|*+?()${NO_MATCH_CHAR}${EMPTY_CHAR}`;
const operators = new Set(OPERATOR_CHARS);

function parens(s: string, wrap: boolean) {
  return wrap ? `(${s})` : s;
}

export abstract class PNode<Props = unknown> {
  abstract readonly kind: PatternKind;
  readonly props: Readonly<Props>;
  /**
   * Unique across every table in the process, so it can stand in for the
   * node when keying composite nodes.
   */
  readonly id: number;
  /**
   * Whether the node matches the empty sequence, worked out from the
   * children when the node is built.
   */
  readonly nullable: boolean;

  constructor(props: Props, nullable: boolean) {
    this.props = Object.freeze(props);
    this.id = nextId++;
    this.nullable = nullable;
  }

  toString(): string {
    return this.print(Precedence.UNION);
  }

  abstract toJSON(): PatternJSON;

  /**
   * Render in the textual syntax, parenthesizing when this node binds
   * looser than the context it is printed in. Sequences and unions nest to
   * the right, so the left operand of a binary node is printed one level
   * tighter and the output parses back to the same tree.
   */
  abstract print(context: Precedence): string;
}

export class NoMatchNode extends PNode<{}> {
  readonly kind = PatternKind.NO_MATCH;
  constructor() {
    super({}, false);
  }
  print(): string {
    return NO_MATCH_CHAR;
  }
  toJSON(): PatternJSON {
    return { kind: this.kind };
  }
}

export class EmptyNode extends PNode<{}> {
  readonly kind = PatternKind.EMPTY;
  constructor() {
    super({}, true);
  }
  print(): string {
    return EMPTY_CHAR;
  }
  toJSON(): PatternJSON {
    return { kind: this.kind };
  }
}

export class LiteralNode extends PNode<{ sym: Sym }> {
  readonly kind = PatternKind.LITERAL;
  constructor(props: { sym: Sym }) {
    super(props, false);
  }
  /**
   * Symbols of one code point print as themselves (escaped if they are
   * operators). Longer symbols print as their text, which reads back as a
   * sequence of one-character literals.
   */
  print(): string {
    const { sym } = this.props;
    return operators.has(sym) ? `\\${sym}` : sym;
  }
  toJSON(): PatternJSON {
    return { kind: this.kind, sym: this.props.sym };
  }
}

export class ConcatNode extends PNode<{ left: Pattern; right: Pattern }> {
  readonly kind = PatternKind.CONCAT;
  constructor(props: { left: Pattern; right: Pattern }) {
    super(props, props.left.nullable && props.right.nullable);
  }
  print(context: Precedence): string {
    const { left, right } = this.props;
    return parens(
      left.print(Precedence.REPEAT) + right.print(Precedence.CONCAT),
      context > Precedence.CONCAT
    );
  }
  toJSON(): PatternJSON {
    return {
      kind: this.kind,
      left: this.props.left.toJSON(),
      right: this.props.right.toJSON(),
    };
  }
}

export class UnionNode extends PNode<{ left: Pattern; right: Pattern }> {
  readonly kind = PatternKind.UNION;
  constructor(props: { left: Pattern; right: Pattern }) {
    super(props, props.left.nullable || props.right.nullable);
  }
  print(context: Precedence): string {
    const { left, right } = this.props;
    return parens(
      `${left.print(Precedence.CONCAT)}|${right.print(Precedence.UNION)}`,
      context > Precedence.UNION
    );
  }
  toJSON(): PatternJSON {
    return {
      kind: this.kind,
      left: this.props.left.toJSON(),
      right: this.props.right.toJSON(),
    };
  }
}

export class RepeatNode extends PNode<{ inner: Pattern }> {
  readonly kind = PatternKind.REPEAT;
  constructor(props: { inner: Pattern }) {
    super(props, true);
  }
  print(): string {
    return `${this.props.inner.print(Precedence.REPEAT)}*`;
  }
  toJSON(): PatternJSON {
    return { kind: this.kind, inner: this.props.inner.toJSON() };
  }
}

export type Pattern =
  | NoMatchNode
  | EmptyNode
  | LiteralNode
  | ConcatNode
  | UnionNode
  | RepeatNode;

export type PatternJSON =
  | { kind: PatternKind.NO_MATCH | PatternKind.EMPTY }
  | { kind: PatternKind.LITERAL; sym: Sym }
  | {
      kind: PatternKind.CONCAT | PatternKind.UNION;
      left: PatternJSON;
      right: PatternJSON;
    }
  | { kind: PatternKind.REPEAT; inner: PatternJSON };

// leaves without fields are the same node in every table
const noMatchNode = new NoMatchNode();
const emptyNode = new EmptyNode();

/**
 * Hash-conses pattern nodes: asking a table twice for the same structure
 * returns the same object, so equal subtrees are shared and derivatives
 * that come back around are recognized by identity.
 *
 * A table keeps every node it has handed out. Matchers intern their
 * derivatives in a table of their own, which goes away with the matcher.
 */
export class PatternTable {
  private nodes: Map<string, Pattern> = new Map();

  get size() {
    // the two constants are always present
    return this.nodes.size + 2;
  }

  clear() {
    this.nodes.clear();
  }

  noMatch(): NoMatchNode {
    return noMatchNode;
  }

  empty(): EmptyNode {
    return emptyNode;
  }

  literal(sym: Sym): LiteralNode {
    const key = `'${JSON.stringify(sym)}`;
    const cached = this.nodes.get(key);
    if (cached instanceof LiteralNode) {
      return cached;
    }
    const node = new LiteralNode({ sym });
    this.nodes.set(key, node);
    return node;
  }

  concat(left: Pattern, right: Pattern): ConcatNode {
    const key = `.${left.id},${right.id}`;
    const cached = this.nodes.get(key);
    if (cached instanceof ConcatNode) {
      return cached;
    }
    const node = new ConcatNode({ left, right });
    this.nodes.set(key, node);
    return node;
  }

  union(left: Pattern, right: Pattern): UnionNode {
    const key = `|${left.id},${right.id}`;
    const cached = this.nodes.get(key);
    if (cached instanceof UnionNode) {
      return cached;
    }
    const node = new UnionNode({ left, right });
    this.nodes.set(key, node);
    return node;
  }

  repeat(inner: Pattern): RepeatNode {
    const key = `*${inner.id}`;
    const cached = this.nodes.get(key);
    if (cached instanceof RepeatNode) {
      return cached;
    }
    const node = new RepeatNode({ inner });
    this.nodes.set(key, node);
    return node;
  }
}

export const defaultTable = new PatternTable();

export function noMatch() {
  return defaultTable.noMatch();
}
export function empty() {
  return defaultTable.empty();
}
export function literal(sym: Sym) {
  return defaultTable.literal(sym);
}
export function concat(left: Pattern, right: Pattern) {
  return defaultTable.concat(left, right);
}
export function union(left: Pattern, right: Pattern) {
  return defaultTable.union(left, right);
}
export function repeat(inner: Pattern) {
  return defaultTable.repeat(inner);
}

/**
 * Structural equality. Interned nodes from the same table short-circuit on
 * identity; nodes from different tables are compared field by field.
 */
export function equals(a: Pattern, b: Pattern): boolean {
  if (a === b) {
    return true;
  }
  switch (a.kind) {
    case PatternKind.NO_MATCH:
    case PatternKind.EMPTY:
      return a.kind === b.kind;
    case PatternKind.LITERAL:
      return b.kind === PatternKind.LITERAL && a.props.sym === b.props.sym;
    case PatternKind.CONCAT:
      return (
        b.kind === PatternKind.CONCAT &&
        equals(a.props.left, b.props.left) &&
        equals(a.props.right, b.props.right)
      );
    case PatternKind.UNION:
      return (
        b.kind === PatternKind.UNION &&
        equals(a.props.left, b.props.left) &&
        equals(a.props.right, b.props.right)
      );
    case PatternKind.REPEAT:
      return (
        b.kind === PatternKind.REPEAT && equals(a.props.inner, b.props.inner)
      );
  }
}

export function patternSize(pattern: Pattern): number {
  switch (pattern.kind) {
    case PatternKind.NO_MATCH:
    case PatternKind.EMPTY:
    case PatternKind.LITERAL:
      return 1;
    case PatternKind.CONCAT:
    case PatternKind.UNION:
      return (
        1 + patternSize(pattern.props.left) + patternSize(pattern.props.right)
      );
    case PatternKind.REPEAT:
      return 1 + patternSize(pattern.props.inner);
  }
}
