/**
 * Declaration model consumed by the principle checkers.
 * These types describe source structure without coupling to ts-morph,
 * so checkers can be driven by hand-built declarations in tests.
 */

/**
 * Source location in a file.
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

export type DeclarationKind = 'class' | 'interface';

export type MemberKind = 'method' | 'property' | 'field' | 'event';

export type Visibility = 'public' | 'protected' | 'private';

/**
 * Declaration and member modifiers.
 * - sealed / virtual come from the TSDoc modifier tags of the same name
 * - override is the keyword or the TSDoc @override tag
 */
export type Modifier =
  | 'abstract'
  | 'sealed'
  | 'virtual'
  | 'override'
  | 'static'
  | 'readonly'
  | 'async'
  | 'export'
  | 'default'
  | 'declare'
  | 'optional';

/**
 * Syntactic shape of a type reference.
 * - primitive: keyword types (string, number, void, ...)
 * - named: a bare identifier without type arguments
 * - generic: a reference with type arguments
 * - qualified: a dotted name (ns.Foo)
 * - array: T[] or a tuple
 * - other: unions, function types, literals, object types
 */
export type TypeForm = 'primitive' | 'named' | 'generic' | 'qualified' | 'array' | 'other';

export interface TypeRef {
  /** Type text as written (or inferred, when there is no annotation) */
  readonly text: string;
  readonly form: TypeForm;
  /** Resolved symbol id; absent when resolution failed */
  readonly symbol?: string;
}

export interface Parameter {
  readonly name: string;
  readonly type: TypeRef;
  /** Explicit `this` parameter (extension-receiver style) */
  readonly isReceiver: boolean;
}

export interface Member {
  readonly kind: MemberKind;
  readonly name: string;
  readonly visibility: Visibility;
  readonly modifiers: ReadonlySet<Modifier>;
  readonly parameters: readonly Parameter[];
  /** Methods only */
  readonly returnType?: TypeRef;
  /** Declared type of a field, property or event */
  readonly type?: TypeRef;
  /** Properties only: visibility of the set accessor, absent when there is none */
  readonly setter?: Visibility;
  /** Callee text of every call made in the member body */
  readonly bodyMarkers: ReadonlySet<string>;
  readonly location: SourceLocation;
}

export interface Declaration {
  readonly name: string;
  readonly kind: DeclarationKind;
  readonly modifiers: ReadonlySet<Modifier>;
  /** extends clause first, then implements, in source order */
  readonly baseTypes: readonly TypeRef[];
  readonly members: readonly Member[];
  readonly location: SourceLocation;
  /** Full declaration source text, without leading comments */
  readonly text: string;
}

/**
 * Symbol id -> ids of its direct supertypes.
 */
export type SymbolTable = ReadonlyMap<string, readonly string[]>;

/**
 * Everything the checkers know about one scanned file.
 */
export interface SourceUnit {
  readonly filePath: string;
  /** Declarations in source order, nested ones included */
  readonly declarations: readonly Declaration[];
  readonly symbols: SymbolTable;
}

/**
 * Produces SourceUnits from files. parseFile rejects when the file
 * cannot be turned into declarations.
 */
export interface SourceModel {
  parseFile(filePath: string, content?: string): Promise<SourceUnit>;
  dispose(): void;
}

export function methodsOf(declaration: Declaration): Member[] {
  return declaration.members.filter((m) => m.kind === 'method');
}

export function propertiesOf(declaration: Declaration): Member[] {
  return declaration.members.filter((m) => m.kind === 'property');
}

export function fieldsOf(declaration: Declaration): Member[] {
  return declaration.members.filter((m) => m.kind === 'field');
}

export function eventsOf(declaration: Declaration): Member[] {
  return declaration.members.filter((m) => m.kind === 'event');
}
