import { DiagnosticCode } from './errors';

export interface Span {
  start: number;
  end: number;
}

export interface Identifier {
  type: 'Identifier';
  name: string;
}

export interface TextElement {
  type: 'TextElement';
  value: string;
}

export interface Placeable {
  type: 'Placeable';
  expression: Expression;
  span?: Span;
}

export type PatternElement = TextElement | Placeable;

export interface Pattern {
  type: 'Pattern';
  elements: PatternElement[];
}

export interface StringLiteral {
  type: 'StringLiteral';
  /** Raw value, escape sequences kept as written. */
  value: string;
}

export interface NumberLiteral {
  type: 'NumberLiteral';
  value: string;
}

export type Literal = StringLiteral | NumberLiteral;

export interface MessageReference {
  type: 'MessageReference';
  id: Identifier;
  attribute: Identifier | null;
}

export interface TermReference {
  type: 'TermReference';
  id: Identifier;
  attribute: Identifier | null;
  arguments: CallArguments | null;
}

export interface VariableReference {
  type: 'VariableReference';
  id: Identifier;
}

export interface FunctionReference {
  type: 'FunctionReference';
  id: Identifier;
  arguments: CallArguments;
}

export interface NamedArgument {
  type: 'NamedArgument';
  name: Identifier;
  value: Literal;
}

export interface CallArguments {
  type: 'CallArguments';
  positional: InlineExpression[];
  named: NamedArgument[];
}

export interface Variant {
  type: 'Variant';
  key: Identifier | NumberLiteral;
  value: Pattern;
  default: boolean;
}

export interface SelectExpression {
  type: 'SelectExpression';
  selector: InlineExpression;
  variants: Variant[];
}

export type InlineExpression =
  | Literal
  | MessageReference
  | TermReference
  | VariableReference
  | FunctionReference
  | Placeable;

export type Expression = InlineExpression | SelectExpression;

export interface Attribute {
  type: 'Attribute';
  id: Identifier;
  value: Pattern;
}

interface CommentBase {
  content: string;
  span?: Span;
}

/** A `#` comment: attached to the following message or term, or detached. */
export interface Comment extends CommentBase {
  type: 'Comment';
}

export interface GroupComment extends CommentBase {
  type: 'GroupComment';
}

export interface ResourceComment extends CommentBase {
  type: 'ResourceComment';
}

export type AnyComment = Comment | GroupComment | ResourceComment;

export interface Message {
  type: 'Message';
  id: Identifier;
  value: Pattern | null;
  attributes: Attribute[];
  comment: Comment | null;
  span?: Span;
}

export interface Term {
  type: 'Term';
  id: Identifier;
  value: Pattern;
  attributes: Attribute[];
  comment: Comment | null;
  span?: Span;
}

export type TranslatableEntry = Message | Term;

export interface Annotation {
  code: DiagnosticCode;
  args: string[];
  message: string;
  position: number;
}

export interface Junk {
  type: 'Junk';
  content: string;
  annotations: Annotation[];
  span: Span;
}

export type Entry = Message | Term | AnyComment | Junk;

export interface Resource {
  type: 'Resource';
  body: Entry[];
}

export function isTranslatableEntry(entry: Entry): entry is TranslatableEntry {
  return entry.type === 'Message' || entry.type === 'Term';
}
