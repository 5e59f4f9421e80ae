/**
 * Syntax Tree - Value model over parsed TypeScript sources
 *
 * A source file is parsed with ts-morph and every value expression that can
 * describe a resource is converted into a closed tagged union (`ValueNode`).
 * Rules pattern-match on `kind` instead of poking at compiler nodes, and the
 * visitor below reaches every sub-value, including the ones inside function
 * bodies and call arguments.
 *
 * Each value keeps a handle on its ts-morph node (`syntax`). Only fixers use it.
 */

import {
  IndentationText,
  Node,
  Project,
  QuoteKind,
  SyntaxKind,
  type DiagnosticMessageChain,
  type ObjectLiteralExpression,
  type SourceFile,
  type TypeNode,
  type VariableDeclaration,
} from 'ts-morph';
import { ParseError, FixError } from './errors.js';
import { fieldType } from './schema.js';

// ─────────────────────────────────────────────────────────────
// Node Types
// ─────────────────────────────────────────────────────────────

export interface Position {
  line: number;
  column: number;
}

interface BaseNode {
  readonly position: Position;
  readonly syntax: Node;
}

export interface FieldNode {
  readonly name: string;
  readonly value: ValueNode;
  readonly position: Position;
  readonly syntax: Node;
}

export interface RecordNode extends BaseNode {
  readonly kind: 'record';
  /** Declared or contextual type name; undefined for an untyped map literal */
  readonly typeName: string | undefined;
  readonly fields: readonly FieldNode[];
  /** Spread elements (`...base`); not resolved, kept for traversal */
  readonly spreads: readonly ValueNode[];
  readonly literal: ObjectLiteralExpression;
}

export interface ListNode extends BaseNode {
  readonly kind: 'list';
  readonly items: readonly ValueNode[];
}

export interface StringNode extends BaseNode {
  readonly kind: 'string';
  readonly value: string;
}

export interface NumberNode extends BaseNode {
  readonly kind: 'number';
  readonly value: number;
}

export interface BooleanNode extends BaseNode {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** Identifier or property-access chain: `podB.metadata.name` */
export interface ReferenceNode extends BaseNode {
  readonly kind: 'reference';
  readonly path: readonly string[];
}

export interface CallNode extends BaseNode {
  readonly kind: 'call';
  readonly callee: string;
  /** `new T(...)` without a field literal */
  readonly isNew: boolean;
  readonly args: readonly ValueNode[];
}

/** Any other expression. Its value children are still walked. */
export interface OpaqueNode extends BaseNode {
  readonly kind: 'opaque';
  readonly children: readonly ValueNode[];
}

export type ValueNode =
  | RecordNode
  | ListNode
  | StringNode
  | NumberNode
  | BooleanNode
  | ReferenceNode
  | CallNode
  | OpaqueNode;

export interface Declaration {
  readonly name: string;
  readonly value: ValueNode | undefined;
  readonly position: Position;
  /** Index of the owning statement in the source file */
  readonly statementIndex: number;
}

export interface StringOccurrence {
  readonly value: string;
  readonly position: Position;
}

export interface ModuleTree {
  readonly path: string;
  /** Top-level variable declarations, in source order */
  readonly declarations: readonly Declaration[];
  /** Every value tree in the file */
  readonly roots: readonly ValueNode[];
  /** Every string literal in the file except module specifiers */
  readonly strings: readonly StringOccurrence[];
}

export interface FixContext {
  readonly path: string;
  readonly sourceFile: SourceFile;
  readonly tree: ModuleTree;
}

// ─────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────

export function positionOf(node: Node): Position {
  return {
    line: node.getStartLineNumber(),
    column: node.getStart() - node.getStartLinePos() + 1,
  };
}

/**
 * Last identifier of a type reference: `apps.Deployment` -> `Deployment`.
 * `as const` and non-reference types yield undefined.
 */
export function typeNameFromTypeNode(typeNode: TypeNode | undefined): string | undefined {
  if (!typeNode || !Node.isTypeReference(typeNode)) return undefined;
  const typeName = typeNode.getTypeName();
  const name = Node.isQualifiedName(typeName) ? typeName.getRight().getText() : typeName.getText();
  return name === 'const' ? undefined : name;
}

function constructorName(expression: Node): string | undefined {
  if (Node.isIdentifier(expression)) return expression.getText();
  if (Node.isPropertyAccessExpression(expression)) return expression.getName();
  return undefined;
}

function propertyName(nameNode: Node): string | undefined {
  if (Node.isIdentifier(nameNode) || Node.isNumericLiteral(nameNode)) return nameNode.getText();
  if (Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)) {
    return nameNode.getLiteralValue();
  }
  return undefined;
}

function referencePath(node: Node): string[] | undefined {
  if (Node.isIdentifier(node)) return [node.getText()];
  if (Node.isPropertyAccessExpression(node)) {
    const base = referencePath(node.getExpression());
    return base ? [...base, node.getName()] : undefined;
  }
  return undefined;
}

/**
 * Converts expressions into value nodes.
 *
 * While converting, a bare reference found where a type is expected
 * (`containers: [sidecar]`) leaves a hint, so the top-level declaration it
 * names can be typed on the next pass.
 */
class ValueConverter {
  readonly hints: Map<string, string>;

  constructor(hints: ReadonlyMap<string, string> = new Map()) {
    this.hints = new Map(hints);
  }

  /**
   * `expected` is the contextual type coming from the parent record or a
   * variable annotation; `outer` is the outermost expression before wrappers
   * were unwrapped.
   */
  toValue(node: Node, expected: string | undefined, outer: Node = node): ValueNode {
    // Reference-taking layer: unwrapped transparently
    if (Node.isParenthesizedExpression(node) || Node.isNonNullExpression(node)) {
      return this.toValue(node.getExpression(), expected, outer);
    }
    if (Node.isAsExpression(node) || Node.isSatisfiesExpression(node) || Node.isTypeAssertion(node)) {
      const declared = typeNameFromTypeNode(node.getTypeNode());
      return this.toValue(node.getExpression(), declared ?? expected, outer);
    }

    if (Node.isObjectLiteralExpression(node)) {
      return this.toRecord(node, expected, outer);
    }

    if (Node.isNewExpression(node)) {
      const args = node.getArguments();
      for (let i = args.length - 1; i >= 0; i--) {
        const arg = args[i];
        if (Node.isObjectLiteralExpression(arg)) {
          return this.toRecord(arg, constructorName(node.getExpression()) ?? expected, outer);
        }
      }
      return {
        kind: 'call',
        callee: node.getExpression().getText(),
        isNew: true,
        args: args.map((arg) => this.toValue(arg, undefined)),
        position: positionOf(outer),
        syntax: outer,
      };
    }

    const position = positionOf(outer);

    if (Node.isArrayLiteralExpression(node)) {
      const items: ValueNode[] = [];
      for (const element of node.getElements()) {
        if (Node.isOmittedExpression(element)) continue;
        const item = Node.isSpreadElement(element) ? element.getExpression() : element;
        items.push(this.toValue(item, expected));
      }
      return { kind: 'list', items, position, syntax: outer };
    }

    if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      return { kind: 'string', value: node.getLiteralValue(), position, syntax: outer };
    }

    if (Node.isNumericLiteral(node)) {
      return { kind: 'number', value: node.getLiteralValue(), position, syntax: outer };
    }

    if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.MinusToken) {
      const operand = node.getOperand();
      if (Node.isNumericLiteral(operand)) {
        return { kind: 'number', value: -operand.getLiteralValue(), position, syntax: outer };
      }
    }

    if (node.getKind() === SyntaxKind.TrueKeyword || node.getKind() === SyntaxKind.FalseKeyword) {
      return { kind: 'boolean', value: node.getKind() === SyntaxKind.TrueKeyword, position, syntax: outer };
    }

    const path = referencePath(node);
    if (path) {
      this.hint(path, expected);
      return { kind: 'reference', path, position, syntax: outer };
    }

    if (Node.isCallExpression(node)) {
      return {
        kind: 'call',
        callee: node.getExpression().getText(),
        isNew: false,
        args: node.getArguments().map((arg) => this.toValue(arg, undefined)),
        position,
        syntax: outer,
      };
    }

    return { kind: 'opaque', children: this.childValues(node), position, syntax: outer };
  }

  /**
   * Value expressions below an arbitrary node (statement, block, template span).
   * Type positions are skipped; local variable annotations type their initializers.
   */
  childValues(node: Node): ValueNode[] {
    const values: ValueNode[] = [];

    node.forEachChild((child) => {
      if (Node.isTypeNode(child)) return;
      // Member names are not references
      if (Node.isPropertyAccessExpression(node) && child === node.getNameNode()) return;
      if (Node.isQualifiedName(node) && child === node.getRight()) return;

      if (
        Node.isVariableDeclaration(child) ||
        Node.isParameterDeclaration(child) ||
        Node.isPropertyDeclaration(child)
      ) {
        const initializer = child.getInitializer();
        if (initializer) {
          values.push(this.toValue(initializer, typeNameFromTypeNode(child.getTypeNode())));
        }
        return;
      }

      if (Node.isExpression(child)) {
        values.push(this.toValue(child, undefined));
        return;
      }

      values.push(...this.childValues(child));
    });

    return values;
  }

  private toRecord(literal: ObjectLiteralExpression, typeName: string | undefined, outer: Node): RecordNode {
    const fields: FieldNode[] = [];
    const spreads: ValueNode[] = [];

    for (const property of literal.getProperties()) {
      if (Node.isPropertyAssignment(property)) {
        const name = propertyName(property.getNameNode());
        const initializer = property.getInitializer();
        if (name === undefined || !initializer) continue;
        fields.push({
          name,
          value: this.toValue(initializer, fieldType(typeName, name)),
          position: positionOf(property),
          syntax: property,
        });
      } else if (Node.isShorthandPropertyAssignment(property)) {
        const name = property.getName();
        const nameNode = property.getNameNode();
        this.hint([name], fieldType(typeName, name));
        fields.push({
          name,
          value: { kind: 'reference', path: [name], position: positionOf(nameNode), syntax: nameNode },
          position: positionOf(property),
          syntax: property,
        });
      } else if (Node.isSpreadAssignment(property)) {
        spreads.push(this.toValue(property.getExpression(), undefined));
      }
    }

    return { kind: 'record', typeName, fields, spreads, literal, position: positionOf(outer), syntax: outer };
  }

  private hint(path: readonly string[], expected: string | undefined): void {
    if (expected === undefined || path.length !== 1 || this.hints.has(path[0])) return;
    this.hints.set(path[0], expected);
  }
}

// ─────────────────────────────────────────────────────────────
// Module Tree
// ─────────────────────────────────────────────────────────────

function isModuleSpecifier(node: Node): boolean {
  const parent = node.getParent();
  return (
    parent !== undefined &&
    (Node.isImportDeclaration(parent) || Node.isExportDeclaration(parent) || Node.isExternalModuleReference(parent))
  );
}

function collectStrings(sourceFile: SourceFile): StringOccurrence[] {
  const strings: StringOccurrence[] = [];

  sourceFile.forEachDescendant((node) => {
    if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      if (!isModuleSpecifier(node)) {
        strings.push({ value: node.getLiteralValue(), position: positionOf(node) });
      }
    } else if (Node.isTemplateHead(node) || Node.isTemplateMiddle(node) || Node.isTemplateTail(node)) {
      strings.push({ value: node.compilerNode.text, position: positionOf(node) });
    }
  });

  return strings;
}

function declarationOf(
  converter: ValueConverter,
  declaration: VariableDeclaration,
  statementIndex: number,
  hinted: ReadonlyMap<string, string>
): Declaration | undefined {
  const nameNode = declaration.getNameNode();
  if (!Node.isIdentifier(nameNode)) return undefined;

  const name = nameNode.getText();
  const initializer = declaration.getInitializer();
  const expected = typeNameFromTypeNode(declaration.getTypeNode()) ?? hinted.get(name);

  return {
    name,
    value: initializer ? converter.toValue(initializer, expected) : undefined,
    position: positionOf(nameNode),
    statementIndex,
  };
}

function convertModule(
  sourceFile: SourceFile,
  hinted: ReadonlyMap<string, string>
): { declarations: Declaration[]; roots: ValueNode[]; hints: Map<string, string> } {
  const converter = new ValueConverter(hinted);
  const declarations: Declaration[] = [];
  const roots: ValueNode[] = [];

  sourceFile.getStatements().forEach((statement, index) => {
    if (Node.isImportDeclaration(statement)) return;

    if (Node.isVariableStatement(statement)) {
      for (const declaration of statement.getDeclarations()) {
        const parsed = declarationOf(converter, declaration, index, hinted);
        if (parsed) {
          declarations.push(parsed);
          if (parsed.value) roots.push(parsed.value);
        } else {
          // Destructuring: still walk the initializer
          const initializer = declaration.getInitializer();
          if (initializer) roots.push(converter.toValue(initializer, undefined));
        }
      }
      return;
    }

    roots.push(...converter.childValues(statement));
  });

  return { declarations, roots, hints: converter.hints };
}

/**
 * Converts the file until reference hints stop producing new types. Each pass
 * can only add hints, so this settles within one pass per declaration.
 */
export function buildModuleTree(path: string, sourceFile: SourceFile): ModuleTree {
  let hinted: ReadonlyMap<string, string> = new Map();
  let converted = convertModule(sourceFile, hinted);

  while (converted.hints.size > hinted.size) {
    hinted = converted.hints;
    converted = convertModule(sourceFile, hinted);
  }

  return {
    path,
    declarations: converted.declarations,
    roots: converted.roots,
    strings: collectStrings(sourceFile),
  };
}

/**
 * Every name bound at the top level of a file: imports, variables (including
 * destructured ones), functions, classes and enums.
 */
export function topLevelNames(sourceFile: SourceFile): Set<string> {
  const names = new Set<string>();
  const add = (name: string | undefined): void => {
    if (name) names.add(name);
  };

  for (const declaration of sourceFile.getImportDeclarations()) {
    add(declaration.getDefaultImport()?.getText());
    add(declaration.getNamespaceImport()?.getText());
    for (const specifier of declaration.getNamedImports()) {
      add((specifier.getAliasNode() ?? specifier.getNameNode()).getText());
    }
  }

  for (const statement of sourceFile.getVariableStatements()) {
    for (const declaration of statement.getDeclarations()) {
      const nameNode = declaration.getNameNode();
      if (Node.isIdentifier(nameNode)) {
        add(nameNode.getText());
      } else {
        for (const identifier of nameNode.getDescendantsOfKind(SyntaxKind.Identifier)) add(identifier.getText());
      }
    }
  }

  for (const fn of sourceFile.getFunctions()) add(fn.getName());
  for (const cls of sourceFile.getClasses()) add(cls.getName());
  for (const enumDeclaration of sourceFile.getEnums()) add(enumDeclaration.getName());

  return names;
}

// ─────────────────────────────────────────────────────────────
// Visitor
// ─────────────────────────────────────────────────────────────

export interface ValueVisitor {
  enter?(node: ValueNode): void;
  record?(node: RecordNode): void;
  list?(node: ListNode): void;
  string?(node: StringNode): void;
  number?(node: NumberNode): void;
  boolean?(node: BooleanNode): void;
  reference?(node: ReferenceNode): void;
  call?(node: CallNode): void;
  opaque?(node: OpaqueNode): void;
}

export function childrenOf(node: ValueNode): readonly ValueNode[] {
  switch (node.kind) {
    case 'record':
      return [...node.spreads, ...node.fields.map((field) => field.value)];
    case 'list':
      return node.items;
    case 'call':
      return node.args;
    case 'opaque':
      return node.children;
    case 'string':
    case 'number':
    case 'boolean':
    case 'reference':
      return [];
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

function dispatch(node: ValueNode, visitor: ValueVisitor): void {
  switch (node.kind) {
    case 'record':
      visitor.record?.(node);
      break;
    case 'list':
      visitor.list?.(node);
      break;
    case 'string':
      visitor.string?.(node);
      break;
    case 'number':
      visitor.number?.(node);
      break;
    case 'boolean':
      visitor.boolean?.(node);
      break;
    case 'reference':
      visitor.reference?.(node);
      break;
    case 'call':
      visitor.call?.(node);
      break;
    case 'opaque':
      visitor.opaque?.(node);
      break;
  }
}

/**
 * Depth-first, parents before children.
 */
export function walk(node: ValueNode, visitor: ValueVisitor): void {
  visitor.enter?.(node);
  dispatch(node, visitor);
  for (const child of childrenOf(node)) {
    walk(child, visitor);
  }
}

export function walkTree(tree: ModuleTree, visitor: ValueVisitor): void {
  for (const root of tree.roots) {
    walk(root, visitor);
  }
}

// ─────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────

function flattenMessage(message: string | DiagnosticMessageChain): string {
  return typeof message === 'string' ? message : message.getMessageText();
}

function createProject(): Project {
  return new Project({
    useInMemoryFileSystem: true,
    skipFileDependencyResolution: true,
    compilerOptions: { noLib: true, noResolve: true },
    manipulationSettings: {
      indentationText: IndentationText.TwoSpaces,
      quoteKind: QuoteKind.Double,
    },
  });
}

/**
 * A parsed source file. It owns its syntax tree: a fix pass takes the tree
 * over, after which the file can no longer be analyzed or fixed again.
 */
export class ParsedFile {
  private cachedTree: ModuleTree | undefined;
  private consumed = false;

  constructor(
    readonly path: string,
    readonly originalText: string,
    private readonly sourceFile: SourceFile
  ) {}

  get tree(): ModuleTree {
    this.assertOwned();
    if (!this.cachedTree) {
      this.cachedTree = buildModuleTree(this.path, this.sourceFile);
    }
    return this.cachedTree;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  /**
   * Hand the mutable syntax tree to a fix pass.
   */
  take(): SourceFile {
    this.assertOwned();
    this.consumed = true;
    this.cachedTree = undefined;
    return this.sourceFile;
  }

  private assertOwned(): void {
    if (this.consumed) {
      throw new FixError(`Syntax tree of ${this.path} was already handed to a fix pass`, this.path);
    }
  }
}

export function parseSource(path: string, text: string): ParsedFile {
  const project = createProject();
  const sourceFile = project.createSourceFile(path, text, { overwrite: true });

  const diagnostics = project.getProgram().getSyntacticDiagnostics(sourceFile);
  if (diagnostics.length > 0) {
    throw new ParseError(
      path,
      diagnostics.map((diagnostic) => {
        const line = diagnostic.getLineNumber();
        const message = flattenMessage(diagnostic.getMessageText());
        return line === undefined ? message : `line ${line}: ${message}`;
      })
    );
  }

  return new ParsedFile(path, text, sourceFile);
}
