/**
 * TypeScript/JavaScript extractor using ts-morph for AST analysis.
 */
import {
  Node,
  Project,
  SyntaxKind,
  VariableDeclarationKind,
  type ClassDeclaration,
  type SourceFile,
  type VariableStatement,
} from 'ts-morph';
import * as path from 'node:path';
import { C_STYLE_SYNTAX } from '../annotations/comment-syntax.js';
import type {
  CallSite,
  ExportRow,
  ImportStatement,
  StructuralExtractor,
  StructureResult,
  SymbolBoundary,
  SymbolKind,
} from './types.js';
import { countLines, fileBoundary } from './text.js';

export const TYPESCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

const MAX_SIGNATURE_LENGTH = 200;

export class TypeScriptExtractor implements StructuralExtractor {
  readonly id = 'typescript';
  readonly extensions = TYPESCRIPT_EXTENSIONS;
  readonly commentSyntax = C_STYLE_SYNTAX;

  private project: Project;
  private counter = 0;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        strict: false,
        skipLibCheck: true,
      },
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
  }

  extractStructure(text: string, filePath: string): StructureResult {
    // The extension decides how the file is parsed (TSX, JS).
    const sourceFile = this.project.createSourceFile(
      `/__extract_${this.counter++}${path.extname(filePath) || '.ts'}`,
      text,
      { overwrite: true }
    );

    try {
      const symbols: SymbolBoundary[] = [];
      const imports: ImportStatement[] = [];
      const exports: ExportRow[] = [];

      for (const statement of sourceFile.getStatements()) {
        this.visitStatement(statement, symbols, imports, exports);
      }

      return {
        file: fileBoundary(countLines(text)),
        symbols,
        imports,
        exports,
        calls: this.extractCalls(sourceFile, imports),
      };
    } finally {
      // Remove immediately so the in-memory project does not grow
      this.project.removeSourceFile(sourceFile);
    }
  }

  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private visitStatement(
    statement: Node,
    symbols: SymbolBoundary[],
    imports: ImportStatement[],
    exports: ExportRow[]
  ): void {
    if (Node.isImportDeclaration(statement)) {
      const names = statement.getNamedImports().map((specifier) => ({
        name: specifier.getName(),
        local: specifier.getAliasNode()?.getText() ?? specifier.getName(),
      }));
      const defaultImport = statement.getDefaultImport();
      if (defaultImport) {
        names.unshift({ name: 'default', local: defaultImport.getText() });
      }
      const namespaceImport = statement.getNamespaceImport();
      imports.push({
        specifier: statement.getModuleSpecifierValue(),
        line: statement.getStartLineNumber(),
        names,
        ...(namespaceImport ? { namespaceAlias: namespaceImport.getText() } : {}),
      });
      return;
    }

    if (Node.isExportDeclaration(statement)) {
      const specifier = statement.getModuleSpecifierValue();
      const named = statement.getNamedExports().map((exported) => ({
        sourceName: exported.getName(),
        name: exported.getAliasNode()?.getText() ?? exported.getName(),
      }));

      if (specifier === undefined) {
        for (const entry of named) {
          exports.push({ name: entry.name, local: entry.sourceName });
        }
        return;
      }

      const namespaceExport = statement.getNamespaceExport();
      if (namespaceExport) {
        exports.push({ name: namespaceExport.getName(), from: specifier, sourceName: '*' });
      } else if (named.length === 0) {
        exports.push({ name: '*', from: specifier, sourceName: '*' });
      }
      for (const entry of named) {
        exports.push({
          name: entry.name,
          from: specifier,
          ...(entry.sourceName !== entry.name ? { sourceName: entry.sourceName } : {}),
        });
      }
      imports.push({
        specifier,
        line: statement.getStartLineNumber(),
        names: named.map((entry) => ({ name: entry.sourceName, local: entry.name })),
      });
      return;
    }

    if (Node.isExportAssignment(statement)) {
      const expression = statement.getExpression();
      if (Node.isIdentifier(expression)) {
        exports.push({ name: 'default', local: expression.getText() });
      }
      return;
    }

    if (Node.isFunctionDeclaration(statement)) {
      if (statement.isOverload()) return;
      const name = statement.getName() ?? 'default';
      const body = statement.getBody();
      symbols.push({
        name,
        kind: 'function',
        lineSpan: spanOf(statement),
        exported: statement.isExported(),
        signature: signatureOf(statement, body?.getStart()),
      });
      this.pushDeclarationExport(exports, name, statement.isExported(), statement.isDefaultExport());
      return;
    }

    if (Node.isClassDeclaration(statement)) {
      this.visitClass(statement, symbols, exports);
      return;
    }

    if (
      Node.isInterfaceDeclaration(statement) ||
      Node.isTypeAliasDeclaration(statement) ||
      Node.isEnumDeclaration(statement)
    ) {
      const kind: SymbolKind = Node.isInterfaceDeclaration(statement)
        ? 'interface'
        : Node.isTypeAliasDeclaration(statement)
          ? 'type'
          : 'enum';
      const name = statement.getName();
      symbols.push({
        name,
        kind,
        lineSpan: spanOf(statement),
        exported: statement.isExported(),
        signature: signatureOf(statement),
      });
      this.pushDeclarationExport(exports, name, statement.isExported(), statement.isDefaultExport());
      return;
    }

    if (Node.isModuleDeclaration(statement)) {
      const name = statement.getName();
      // `declare module 'pkg'` augments another module
      if (/^['"]/.test(name)) return;
      symbols.push({
        name,
        kind: 'module',
        lineSpan: spanOf(statement),
        exported: statement.isExported(),
        signature: signatureOf(statement),
      });
      this.pushDeclarationExport(exports, name, statement.isExported(), false);
      return;
    }

    if (Node.isVariableStatement(statement)) {
      this.visitVariableStatement(statement, symbols, imports, exports);
    }
  }

  private visitClass(classDecl: ClassDeclaration, symbols: SymbolBoundary[], exports: ExportRow[]): void {
    const name = classDecl.getName() ?? 'default';
    const exported = classDecl.isExported();
    symbols.push({
      name,
      kind: 'class',
      lineSpan: spanOf(classDecl),
      exported,
      signature: signatureOf(classDecl, classBodyStart(classDecl)),
    });
    this.pushDeclarationExport(exports, name, exported, classDecl.isDefaultExport());

    for (const method of classDecl.getMethods()) {
      if (method.isOverload()) continue;
      const methodName = method.getName();
      symbols.push({
        name: methodName,
        kind: 'method',
        lineSpan: spanOf(method),
        exported: exported && !isPrivateMember(method),
        container: name,
        signature: signatureOf(method, method.getBody()?.getStart()),
      });
    }

    // Arrow-function properties behave like methods
    for (const property of classDecl.getProperties()) {
      const initializer = property.getInitializer();
      if (!initializer || !(Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
        continue;
      }
      symbols.push({
        name: property.getName(),
        kind: 'method',
        lineSpan: spanOf(property),
        exported: exported && !isPrivateMember(property),
        container: name,
        signature: signatureOf(property, initializer.getBody().getStart()),
      });
    }
  }

  private visitVariableStatement(
    statement: VariableStatement,
    symbols: SymbolBoundary[],
    imports: ImportStatement[],
    exports: ExportRow[]
  ): void {
    const declarations = statement.getDeclarations();
    const exported = statement.isExported();
    const isConst = statement.getDeclarationKind() === VariableDeclarationKind.Const;

    for (const declaration of declarations) {
      const nameNode = declaration.getNameNode();
      const initializer = declaration.getInitializer();

      const required = initializer ? requireSpecifier(initializer) : null;
      if (required !== null) {
        if (Node.isIdentifier(nameNode)) {
          imports.push({ specifier: required, line: declaration.getStartLineNumber(), names: [], namespaceAlias: nameNode.getText() });
        } else if (Node.isObjectBindingPattern(nameNode)) {
          imports.push({
            specifier: required,
            line: declaration.getStartLineNumber(),
            names: nameNode.getElements().map((element) => ({
              name: element.getPropertyNameNode()?.getText() ?? element.getName(),
              local: element.getName(),
            })),
          });
        }
        continue;
      }

      if (!Node.isIdentifier(nameNode)) continue;
      const name = nameNode.getText();
      const isFunction =
        initializer !== undefined && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer));
      const span = declarations.length === 1 ? spanOf(statement) : spanOf(declaration);

      symbols.push({
        name,
        kind: isFunction ? 'function' : isConst ? 'const' : 'variable',
        lineSpan: span,
        exported,
        signature: `${statement.getDeclarationKind()} ${signatureOf(
          declaration,
          initializer && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))
            ? initializer.getBody().getStart()
            : undefined
        )}`,
      });
      this.pushDeclarationExport(exports, name, exported, false);
    }
  }

  private pushDeclarationExport(exports: ExportRow[], name: string, exported: boolean, isDefault: boolean): void {
    if (isDefault) {
      exports.push({ name: 'default', local: name });
    } else if (exported) {
      exports.push({ name, local: name });
    }
  }

  /**
   * Single traversal for call and `new` expressions plus dynamic imports.
   */
  private extractCalls(sourceFile: SourceFile, imports: ImportStatement[]): CallSite[] {
    const calls: CallSite[] = [];

    sourceFile.forEachDescendant((node) => {
      if (Node.isCallExpression(node)) {
        const expression = node.getExpression();
        if (expression.getKind() === SyntaxKind.ImportKeyword) {
          const specifier = stringArgument(node.getArguments()[0]);
          if (specifier !== null) {
            imports.push({ specifier, line: node.getStartLineNumber(), names: [] });
          }
          return;
        }
        if (Node.isIdentifier(expression) && expression.getText() === 'require') {
          return;
        }
        const callee = calleeText(expression);
        if (callee) calls.push({ callee, line: node.getStartLineNumber() });
        return;
      }

      if (Node.isNewExpression(node)) {
        const callee = calleeText(node.getExpression());
        if (callee) calls.push({ callee, line: node.getStartLineNumber() });
      }
    });

    return calls;
  }
}

function spanOf(node: Node): { start: number; end: number } {
  return { start: node.getStartLineNumber(), end: node.getEndLineNumber() };
}

/**
 * Declaration text up to its body, whitespace collapsed.
 */
function signatureOf(node: Node, bodyStart?: number): string {
  const text = bodyStart !== undefined
    ? node.getText().slice(0, Math.max(0, bodyStart - node.getStart()))
    : node.getText().split('\n')[0] ?? '';
  const collapsed = text
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\s*(=>|\{|=|;)\s*$/, '')
    .trim();
  return collapsed.length > MAX_SIGNATURE_LENGTH ? `${collapsed.slice(0, MAX_SIGNATURE_LENGTH - 3)}...` : collapsed;
}

function classBodyStart(classDecl: ClassDeclaration): number | undefined {
  const brace = classDecl.getFirstChildByKind(SyntaxKind.OpenBraceToken);
  return brace?.getStart();
}

function isPrivateMember(member: Node): boolean {
  if (Node.isModifierable(member) && member.hasModifier(SyntaxKind.PrivateKeyword)) {
    return true;
  }
  return Node.isPropertyNamed(member) && member.getName().startsWith('#');
}

function requireSpecifier(initializer: Node): string | null {
  if (!Node.isCallExpression(initializer)) return null;
  const expression = initializer.getExpression();
  if (!Node.isIdentifier(expression) || expression.getText() !== 'require') return null;
  return stringArgument(initializer.getArguments()[0]);
}

function stringArgument(arg: Node | undefined): string | null {
  if (arg && (Node.isStringLiteral(arg) || Node.isNoSubstitutionTemplateLiteral(arg))) {
    return arg.getLiteralValue();
  }
  return null;
}

/**
 * `foo`, `ns.foo` or `this.foo`; deeper member chains are not resolvable.
 */
function calleeText(expression: Node): string | null {
  if (Node.isIdentifier(expression)) {
    return expression.getText();
  }
  if (Node.isPropertyAccessExpression(expression)) {
    const target = expression.getExpression();
    if (Node.isIdentifier(target)) {
      return `${target.getText()}.${expression.getName()}`;
    }
    if (Node.isThisExpression(target)) {
      return `this.${expression.getName()}`;
    }
  }
  return null;
}
