/**
 * TypeScript source model using ts-morph for AST analysis and type resolution.
 * Produces SourceUnits for the principle checkers.
 */
import {
  Project,
  Node,
  SyntaxKind,
  type SourceFile,
  type ClassDeclaration,
  type InterfaceDeclaration,
  type MethodDeclaration,
  type MethodSignature,
  type PropertyDeclaration,
  type PropertySignature,
  type ParameterDeclaration,
  type GetAccessorDeclaration,
  type SetAccessorDeclaration,
  type ExpressionWithTypeArguments,
  type TypeNode,
  type Type,
  type JSDoc,
  type Symbol as TsSymbol,
} from 'ts-morph';
import type {
  Declaration,
  Member,
  Modifier,
  Parameter,
  SourceLocation,
  SourceModel,
  SourceUnit,
  TypeForm,
  TypeRef,
  Visibility,
} from './types.js';
import { readFile } from '../utils/file-system.js';
import { SystemError, ErrorCodes, errorMessage } from '../utils/errors.js';

const PRIMITIVE_TYPES = new Set([
  'string', 'number', 'boolean', 'bigint', 'symbol', 'object',
  'any', 'unknown', 'void', 'never', 'undefined', 'null',
]);

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)+$/;
const EVENT_HANDLER_NAME = /^on[A-Z]/;

type MutableSymbolTable = Map<string, string[]>;

interface Positioned {
  getStartLineNumber(): number;
  getStart(): number;
  getStartLinePos(): number;
}

interface Modifiable {
  hasModifier(kind: SyntaxKind): boolean;
}

export interface TypeScriptSourceModelOptions {
  /** Pre-configured project (e.g. an in-memory one) */
  project?: Project;
}

/**
 * Source model over a single ts-morph Project.
 * Each file is removed from the project once its declarations are extracted.
 */
export class TypeScriptSourceModel implements SourceModel {
  private project: Project;

  constructor(options: TypeScriptSourceModelOptions = {}) {
    this.project = options.project ?? new Project({
      compilerOptions: {
        allowJs: false,
        strict: false,
        skipLibCheck: true,
      },
      skipAddingFilesFromTsConfig: true,
    });
  }

  /**
   * Parse a file into a SourceUnit.
   * @param filePath Path to the file
   * @param content Optional pre-loaded content to avoid re-reading from disk
   */
  async parseFile(filePath: string, content?: string): Promise<SourceUnit> {
    let sourceFile: SourceFile;
    try {
      const fileContent = content ?? await readFile(filePath);
      sourceFile = this.project.createSourceFile(filePath, fileContent, { overwrite: true });
    } catch (error) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to read ${filePath}: ${errorMessage(error)}`,
        { filePath }
      );
    }

    try {
      return this.extractUnit(sourceFile, filePath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to extract declarations from ${filePath}: ${errorMessage(error)}`,
        { filePath }
      );
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private extractUnit(sourceFile: SourceFile, filePath: string): SourceUnit {
    const symbols: MutableSymbolTable = new Map();
    const declarations: Declaration[] = [];

    // Pre-order traversal yields declarations in source order, nested ones included
    sourceFile.forEachDescendant((node) => {
      if (Node.isClassDeclaration(node)) {
        declarations.push(this.extractClass(node, symbols));
      } else if (Node.isInterfaceDeclaration(node)) {
        declarations.push(this.extractInterface(node, symbols));
      }
    });

    return { filePath, declarations, symbols };
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  private extractClass(classDecl: ClassDeclaration, symbols: MutableSymbolTable): Declaration {
    const modifiers = new Set<Modifier>();
    if (classDecl.isAbstract()) modifiers.add('abstract');
    if (classDecl.isExported()) modifiers.add('export');
    if (classDecl.isDefaultExport()) modifiers.add('default');
    if (classDecl.hasDeclareKeyword()) modifiers.add('declare');
    if (jsDocTags(classDecl.getJsDocs()).has('sealed')) modifiers.add('sealed');

    const heritage: ExpressionWithTypeArguments[] = [];
    const extendsClause = classDecl.getExtends();
    if (extendsClause) heritage.push(extendsClause);
    heritage.push(...classDecl.getImplements());

    const classSymbol = classDecl.getSymbol();
    if (classSymbol) this.registerSymbol(classSymbol, symbols);

    return {
      name: classDecl.getName() || 'Anonymous',
      kind: 'class',
      modifiers,
      baseTypes: heritage.map((h) => this.heritageRef(h, symbols)),
      members: this.extractClassMembers(classDecl, symbols),
      location: getLocation(classDecl),
      text: classDecl.getText(),
    };
  }

  private extractInterface(iface: InterfaceDeclaration, symbols: MutableSymbolTable): Declaration {
    const modifiers = new Set<Modifier>();
    if (iface.isExported()) modifiers.add('export');
    if (iface.isDefaultExport()) modifiers.add('default');

    const ifaceSymbol = iface.getSymbol();
    if (ifaceSymbol) this.registerSymbol(ifaceSymbol, symbols);

    const members: Array<{ pos: number; member: Member }> = [
      ...iface.getMethods().map((m) => ({ pos: m.getStart(), member: this.methodSignatureMember(m, symbols) })),
      ...iface.getProperties().map((p) => ({ pos: p.getStart(), member: this.propertySignatureMember(p, symbols) })),
    ];

    return {
      name: iface.getName(),
      kind: 'interface',
      modifiers,
      baseTypes: iface.getExtends().map((h) => this.heritageRef(h, symbols)),
      members: inSourceOrder(members),
      location: getLocation(iface),
      text: iface.getText(),
    };
  }

  // ---------------------------------------------------------------------------
  // Class members
  // ---------------------------------------------------------------------------

  private extractClassMembers(classDecl: ClassDeclaration, symbols: MutableSymbolTable): Member[] {
    const members: Array<{ pos: number; member: Member }> = [];

    for (const ctor of classDecl.getConstructors()) {
      for (const param of ctor.getParameters()) {
        if (param.isParameterProperty()) {
          members.push({ pos: param.getStart(), member: this.parameterPropertyMember(param, symbols) });
        }
      }
    }

    for (const prop of classDecl.getProperties()) {
      members.push({ pos: prop.getStart(), member: this.fieldMember(prop, symbols) });
    }

    for (const method of classDecl.getMethods()) {
      members.push({ pos: method.getStart(), member: this.methodMember(method, symbols) });
    }

    // get/set pairs collapse into one property
    const accessors = new Map<string, { getter?: GetAccessorDeclaration; setter?: SetAccessorDeclaration }>();
    for (const getter of classDecl.getGetAccessors()) {
      accessors.set(getter.getName(), { ...accessors.get(getter.getName()), getter });
    }
    for (const setter of classDecl.getSetAccessors()) {
      accessors.set(setter.getName(), { ...accessors.get(setter.getName()), setter });
    }
    for (const [name, pair] of accessors) {
      const primary = pair.getter ?? pair.setter;
      if (!primary) continue;
      const pos = Math.min(primary.getStart(), pair.setter?.getStart() ?? Infinity);
      members.push({ pos, member: this.accessorMember(name, primary, pair, symbols) });
    }

    return inSourceOrder(members);
  }

  private fieldMember(prop: PropertyDeclaration, symbols: MutableSymbolTable): Member {
    const modifiers = this.commonModifiers(prop);
    if (prop.hasQuestionToken()) modifiers.add('optional');

    return {
      kind: 'field',
      name: prop.getName(),
      visibility: getVisibility(prop, prop.getName()),
      modifiers,
      parameters: [],
      type: this.declaredTypeRef(prop.getTypeNode(), prop.getType(), prop, symbols),
      bodyMarkers: new Set(),
      location: getLocation(prop),
    };
  }

  private parameterPropertyMember(param: ParameterDeclaration, symbols: MutableSymbolTable): Member {
    const modifiers = this.commonModifiers(param);
    if (param.hasQuestionToken()) modifiers.add('optional');

    return {
      kind: 'field',
      name: param.getName(),
      visibility: getVisibility(param, param.getName()),
      modifiers,
      parameters: [],
      type: this.declaredTypeRef(param.getTypeNode(), param.getType(), param, symbols),
      bodyMarkers: new Set(),
      location: getLocation(param),
    };
  }

  private methodMember(method: MethodDeclaration, symbols: MutableSymbolTable): Member {
    const modifiers = this.commonModifiers(method);
    if (method.isAsync()) modifiers.add('async');
    const tags = jsDocTags(method.getJsDocs());
    if (tags.has('virtual')) modifiers.add('virtual');
    if (tags.has('override')) modifiers.add('override');

    return {
      kind: 'method',
      name: method.getName(),
      visibility: getVisibility(method, method.getName()),
      modifiers,
      parameters: method.getParameters().map((p) => this.parameter(p, symbols)),
      returnType: this.declaredTypeRef(method.getReturnTypeNode(), method.getReturnType(), method, symbols),
      bodyMarkers: callMarkers(method.getBody()),
      location: getLocation(method),
    };
  }

  private accessorMember(
    name: string,
    primary: GetAccessorDeclaration | SetAccessorDeclaration,
    pair: { getter?: GetAccessorDeclaration; setter?: SetAccessorDeclaration },
    symbols: MutableSymbolTable
  ): Member {
    const { getter, setter } = pair;
    const modifiers = new Set<Modifier>([
      ...(getter ? this.commonModifiers(getter) : []),
      ...(setter ? this.commonModifiers(setter) : []),
    ]);
    if (getter && !setter) modifiers.add('readonly');

    const setterParam = setter?.getParameters()[0];
    let type: TypeRef | undefined;
    if (getter) {
      type = this.declaredTypeRef(getter.getReturnTypeNode(), getter.getReturnType(), getter, symbols);
    } else if (setterParam) {
      type = this.declaredTypeRef(setterParam.getTypeNode(), setterParam.getType(), setterParam, symbols);
    }

    return {
      kind: 'property',
      name,
      visibility: getVisibility(primary, name),
      modifiers,
      parameters: [],
      type,
      setter: setter ? getVisibility(setter, name) : undefined,
      bodyMarkers: new Set([...callMarkers(getter?.getBody()), ...callMarkers(setter?.getBody())]),
      location: getLocation(primary),
    };
  }

  // ---------------------------------------------------------------------------
  // Interface members
  // ---------------------------------------------------------------------------

  private methodSignatureMember(method: MethodSignature, symbols: MutableSymbolTable): Member {
    return {
      kind: 'method',
      name: method.getName(),
      visibility: 'public',
      modifiers: method.hasQuestionToken() ? new Set<Modifier>(['optional']) : new Set<Modifier>(),
      parameters: method.getParameters().map((p) => this.parameter(p, symbols)),
      returnType: this.declaredTypeRef(method.getReturnTypeNode(), method.getReturnType(), method, symbols),
      bodyMarkers: new Set(),
      location: getLocation(method),
    };
  }

  private propertySignatureMember(prop: PropertySignature, symbols: MutableSymbolTable): Member {
    const modifiers = new Set<Modifier>();
    if (prop.isReadonly()) modifiers.add('readonly');
    if (prop.hasQuestionToken()) modifiers.add('optional');

    const typeNode = prop.getTypeNode();
    const isEvent = EVENT_HANDLER_NAME.test(prop.getName()) && typeNode !== undefined && Node.isFunctionTypeNode(typeNode);

    return {
      kind: isEvent ? 'event' : 'property',
      name: prop.getName(),
      visibility: 'public',
      modifiers,
      parameters: [],
      type: this.declaredTypeRef(typeNode, prop.getType(), prop, symbols),
      bodyMarkers: new Set(),
      location: getLocation(prop),
    };
  }

  // ---------------------------------------------------------------------------
  // Types and symbols
  // ---------------------------------------------------------------------------

  private parameter(param: ParameterDeclaration, symbols: MutableSymbolTable): Parameter {
    const name = param.getName();
    return {
      name,
      type: this.declaredTypeRef(param.getTypeNode(), param.getType(), param, symbols),
      isReceiver: name === 'this',
    };
  }

  private commonModifiers(node: Modifiable): Set<Modifier> {
    const modifiers = new Set<Modifier>();
    if (node.hasModifier(SyntaxKind.StaticKeyword)) modifiers.add('static');
    if (node.hasModifier(SyntaxKind.ReadonlyKeyword)) modifiers.add('readonly');
    if (node.hasModifier(SyntaxKind.AbstractKeyword)) modifiers.add('abstract');
    if (node.hasModifier(SyntaxKind.OverrideKeyword)) modifiers.add('override');
    if (node.hasModifier(SyntaxKind.DeclareKeyword)) modifiers.add('declare');
    return modifiers;
  }

  /**
   * TypeRef for an annotation, falling back to the inferred type when there is none.
   */
  private declaredTypeRef(
    typeNode: TypeNode | undefined,
    inferred: Type,
    enclosing: Node,
    symbols: MutableSymbolTable
  ): TypeRef {
    if (typeNode) return this.typeNodeRef(typeNode, symbols);

    // Unannotated parameters and fields are implicitly any unless an initializer says otherwise
    const text = inferred.getText(enclosing);
    const symbol = inferred.getSymbol() ?? inferred.getAliasSymbol();
    return {
      text,
      form: formFromText(text),
      symbol: symbol ? this.symbolId(symbol, symbols) : text,
    };
  }

  private typeNodeRef(typeNode: TypeNode, symbols: MutableSymbolTable): TypeRef {
    const text = typeNode.getText();

    if (PRIMITIVE_TYPES.has(text)) {
      return { text, form: 'primitive', symbol: text };
    }

    if (Node.isTypeReference(typeNode)) {
      const typeName = typeNode.getTypeName();
      const form: TypeForm = typeNode.getTypeArguments().length > 0
        ? 'generic'
        : Node.isQualifiedName(typeName) ? 'qualified' : 'named';
      const symbol = typeName.getSymbol();
      return { text, form, symbol: symbol ? this.symbolId(symbol, symbols) : undefined };
    }

    const form: TypeForm = Node.isArrayTypeNode(typeNode) || Node.isTupleTypeNode(typeNode)
      ? 'array'
      : 'other';
    return { text, form, symbol: typeNode.getType().getText(typeNode) };
  }

  private heritageRef(clause: ExpressionWithTypeArguments, symbols: MutableSymbolTable): TypeRef {
    const expression = clause.getExpression();
    let form: TypeForm = 'other';
    if (clause.getTypeArguments().length > 0) {
      form = 'generic';
    } else if (Node.isIdentifier(expression)) {
      form = 'named';
    } else if (Node.isPropertyAccessExpression(expression)) {
      form = 'qualified';
    }

    const symbol = expression.getSymbol();
    return {
      text: clause.getText(),
      form,
      symbol: symbol ? this.symbolId(symbol, symbols) : undefined,
    };
  }

  /**
   * Id of a declared symbol, registered with its supertype chain.
   * Undeclared names and failed imports have no declarations and stay unresolved.
   */
  private symbolId(symbol: TsSymbol, symbols: MutableSymbolTable): string | undefined {
    const target = symbol.isAlias() ? (symbol.getAliasedSymbol() ?? symbol) : symbol;
    if (target.getDeclarations().length === 0) return undefined;
    return this.registerSymbol(target, symbols);
  }

  /**
   * Records a symbol and its supertype chain (class extends, interface extends).
   * Returns the symbol id.
   */
  private registerSymbol(target: TsSymbol, symbols: MutableSymbolTable): string {
    const id = target.getFullyQualifiedName();
    if (symbols.has(id)) return id;

    // Placeholder first so inheritance cycles terminate
    symbols.set(id, []);

    const supertypes: string[] = [];
    for (const decl of target.getDeclarations()) {
      const clauses = Node.isClassDeclaration(decl)
        ? [decl.getExtends()]
        : Node.isInterfaceDeclaration(decl) ? decl.getExtends() : [];
      for (const clause of clauses) {
        const superSymbol = clause?.getExpression().getSymbol();
        const superId = superSymbol ? this.symbolId(superSymbol, symbols) : undefined;
        if (superId !== undefined) supertypes.push(superId);
      }
    }

    symbols.set(id, supertypes);
    return id;
  }

  /**
   * Release resources.
   */
  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function getLocation(node: Positioned): SourceLocation {
  return {
    line: node.getStartLineNumber(),
    column: node.getStart() - node.getStartLinePos() + 1,
  };
}

function getVisibility(node: Modifiable, name: string): Visibility {
  if (name.startsWith('#') || node.hasModifier(SyntaxKind.PrivateKeyword)) return 'private';
  if (node.hasModifier(SyntaxKind.ProtectedKeyword)) return 'protected';
  return 'public';
}

function jsDocTags(docs: JSDoc[]): Set<string> {
  return new Set(docs.flatMap((doc) => doc.getTags().map((tag) => tag.getTagName())));
}

/**
 * Callee text of every call inside a body, with optional chaining and whitespace normalized.
 */
function callMarkers(body: Node | undefined): Set<string> {
  const markers = new Set<string>();
  if (!body) return markers;

  for (const call of body.getDescendantsOfKind(SyntaxKind.CallExpression)) {
    markers.add(normalizeCallee(call.getExpression().getText()));
  }
  return markers;
}

export function normalizeCallee(text: string): string {
  return text.replace(/\s+/g, '').replace(/\?\./g, '.');
}

/**
 * Classifies type text when no syntax node is available (inferred types).
 */
export function formFromText(text: string): TypeForm {
  if (PRIMITIVE_TYPES.has(text)) return 'primitive';
  if (IDENTIFIER.test(text)) return 'named';
  if (QUALIFIED_NAME.test(text)) return 'qualified';
  if (text.endsWith('[]')) return 'array';
  if (/^[A-Za-z_$][\w$.]*<.*>$/.test(text)) return 'generic';
  return 'other';
}

function inSourceOrder(members: Array<{ pos: number; member: Member }>): Member[] {
  return [...members].sort((a, b) => a.pos - b.pos).map((m) => m.member);
}
