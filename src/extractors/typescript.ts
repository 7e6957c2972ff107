/**
 * TypeScript / JavaScript adapter
 * Uses ts-morph over an in-memory file system: one throwaway project per document
 */

import * as path from 'path';
import {
  ClassDeclaration,
  Node,
  ParameterDeclaration,
  Project,
  SourceFile,
  SyntaxKind,
  VariableDeclaration,
} from 'ts-morph';
import type {
  EdgeKind,
  HttpMethod,
  ModuleHint,
  NodeKind,
  SignatureEntry,
  SourceDocument,
  SourceSpan,
} from '../types.js';
import { ContributionBuilder, TS_EXTENSIONS, extensionOf, tsModuleHint } from './shared.js';
import type { AdapterResult, LanguageAdapter } from './index.js';

// =============================================================================
// SIGNATURES
// =============================================================================

const ROUTE_METHODS = new Map<string, HttpMethod>([
  ['get', 'GET'],
  ['post', 'POST'],
  ['put', 'PUT'],
  ['patch', 'PATCH'],
  ['delete', 'DELETE'],
  ['head', 'HEAD'],
  ['options', 'OPTIONS'],
  ['all', 'ANY'],
]);

const NEXT_HANDLER_NAMES = new Set<string>(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']);

const ROUTER_NAME = /^(app|server|router|.*Router)$/;
const HTTP_CLIENT_NAME = /^(axios|api|apiClient|client|http|httpClient|\$http|ky|instance)$/;
const REACT_COMPONENT_BASE = /^(React\.)?(Component|PureComponent)$/;
const PASCAL_CASE = /^[A-Z][A-Za-z0-9]*$/;

interface ImportBinding {
  module: ModuleHint;
  imported: string;           // '' = namespace, 'default', or the exported name
}

function span(node: Node): SourceSpan {
  return { lineStart: node.getStartLineNumber(), lineEnd: node.getEndLineNumber() };
}

function parameterSignature(params: ParameterDeclaration[]): SignatureEntry[] {
  return params.map((p) => {
    const type = p.getTypeNode()?.getText();
    return type ? { name: p.getName(), type } : { name: p.getName() };
  });
}

function containsJsx(node: Node): boolean {
  return (
    node.getFirstDescendantByKind(SyntaxKind.JsxElement) !== undefined ||
    node.getFirstDescendantByKind(SyntaxKind.JsxSelfClosingElement) !== undefined ||
    node.getFirstDescendantByKind(SyntaxKind.JsxFragment) !== undefined
  );
}

/**
 * Literal text of a URL argument. Template holes become "*".
 */
function urlLiteral(node: Node | undefined): string | null {
  if (!node) return null;
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue();
  }
  if (Node.isTemplateExpression(node)) {
    let text = node.getHead().getLiteralText();
    for (const templateSpan of node.getTemplateSpans()) {
      text += '*' + templateSpan.getLiteral().getLiteralText();
    }
    return text;
  }
  return null;
}

/**
 * Route path of a Next.js route module, or null.
 * "src/app/api/users/[id]/route.ts" → "/api/users/:id"
 */
export function nextRoutePath(filePath: string): { path: string; router: 'app' | 'pages' } | null {
  const appMatch = filePath.match(/(?:^|\/)app\/((?:.+\/)?)route\.[cm]?[jt]sx?$/);
  const pagesMatch = filePath.match(/(?:^|\/)pages\/(api(?:\/.*)?)\.[cm]?[jt]sx?$/);
  const raw = appMatch ? appMatch[1] : pagesMatch ? pagesMatch[1] : null;
  if (raw === null) return null;

  const segments = raw
    .split('/')
    .filter((s) => s && !/^\(.*\)$/.test(s))
    .map((s) => {
      if (/^\[\[?\.\.\./.test(s)) return '*';
      const param = s.match(/^\[(.+)\]$/);
      return param ? `:${param[1]}` : s;
    });
  if (pagesMatch && segments[segments.length - 1] === 'index') segments.pop();

  return { path: '/' + segments.join('/'), router: appMatch ? 'app' : 'pages' };
}

// =============================================================================
// EXTRACTION
// =============================================================================

class TypeScriptExtraction {
  private readonly out: ContributionBuilder;
  private readonly bindings = new Map<string, ImportBinding>();
  private readonly locals = new Map<string, NodeKind>();
  private readonly enclosing = new Map<Node, string>();
  private readonly classOf = new Map<Node, string>();
  private readonly routers = new Set<string>();
  private readonly routeCalls = new Set<Node>();
  private readonly jsxFile: boolean;

  constructor(private readonly sourceFile: SourceFile, document: SourceDocument) {
    this.out = new ContributionBuilder(document, sourceFile.getEndLineNumber());
    const ext = extensionOf(document.path);
    this.jsxFile = ext === '.tsx' || ext === '.jsx';
  }

  run(): ContributionBuilder {
    this.collectImports();
    this.collectDeclarations();
    this.collectExports();
    this.collectRoutes();
    this.collectNextRoutes();
    this.collectReferences();
    return this.out;
  }

  // ---------------------------------------------------------------------------
  // Imports and exports
  // ---------------------------------------------------------------------------

  private addImport(module: ModuleHint, target: string, node: Node): void {
    this.reference('Imports', '', target, span(node), module);
  }

  private collectImports(): void {
    for (const decl of this.sourceFile.getImportDeclarations()) {
      const module = tsModuleHint(this.out.path, decl.getModuleSpecifierValue());
      this.addImport(module, '', decl);

      const defaultImport = decl.getDefaultImport();
      if (defaultImport) {
        this.bindings.set(defaultImport.getText(), { module, imported: 'default' });
        this.addImport(module, 'default', decl);
      }

      const namespaceImport = decl.getNamespaceImport();
      if (namespaceImport) {
        this.bindings.set(namespaceImport.getText(), { module, imported: '' });
      }

      for (const named of decl.getNamedImports()) {
        const imported = named.getName();
        const local = named.getAliasNode()?.getText() ?? imported;
        this.bindings.set(local, { module, imported });
        this.addImport(module, imported, named);
      }
    }

    // CommonJS: const x = require('./x'), const { a } = require('./x')
    for (const decl of this.sourceFile.getVariableDeclarations()) {
      const init = decl.getInitializer();
      if (!init || !Node.isCallExpression(init)) continue;
      if (init.getExpression().getText() !== 'require') continue;
      const specifier = urlLiteral(init.getArguments()[0]);
      if (specifier === null) continue;

      const module = tsModuleHint(this.out.path, specifier);
      this.addImport(module, '', decl);

      const nameNode = decl.getNameNode();
      if (Node.isIdentifier(nameNode)) {
        this.bindings.set(nameNode.getText(), { module, imported: '' });
      } else if (Node.isObjectBindingPattern(nameNode)) {
        for (const element of nameNode.getElements()) {
          const imported = element.getPropertyNameNode()?.getText() ?? element.getName();
          this.bindings.set(element.getName(), { module, imported });
          this.addImport(module, imported, element);
        }
      }
    }
  }

  private collectExports(): void {
    for (const decl of this.sourceFile.getExportDeclarations()) {
      const specifier = decl.getModuleSpecifierValue();
      const named = decl.getNamedExports();

      if (specifier === undefined) {
        for (const spec of named) {
          this.out.markExported(spec.getName(), spec.getAliasNode()?.getText() === 'default');
        }
        continue;
      }

      // Re-exports depend on the module they forward
      const module = tsModuleHint(this.out.path, specifier);
      this.addImport(module, '', decl);
      for (const spec of named) {
        this.addImport(module, spec.getName(), spec);
      }
    }

    for (const assignment of this.sourceFile.getExportAssignments()) {
      const expr = assignment.getExpression();
      if (Node.isIdentifier(expr)) {
        this.out.markExported(expr.getText(), !assignment.isExportEquals());
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  private declare(
    kind: NodeKind,
    qualifiedName: string,
    node: Node,
    extra: { signature?: SignatureEntry[]; exported?: boolean; defaultExport?: boolean } = {}
  ): void {
    this.out.addNode(kind, qualifiedName, span(node), extra);
    this.enclosing.set(node, qualifiedName);
    if (!qualifiedName.includes('.')) this.locals.set(qualifiedName, kind);
  }

  private functionKind(name: string, body: Node): NodeKind {
    return PASCAL_CASE.test(name) && (this.jsxFile || containsJsx(body)) ? 'Component' : 'Function';
  }

  private collectDeclarations(): void {
    for (const fn of this.sourceFile.getFunctions()) {
      if (fn.isOverload()) continue;
      const name = fn.getName() ?? (fn.isDefaultExport() ? 'default' : undefined);
      if (!name) continue;
      this.declare(this.functionKind(name, fn), name, fn, {
        signature: parameterSignature(fn.getParameters()),
        exported: fn.isExported(),
        defaultExport: fn.isDefaultExport(),
      });
    }

    for (const statement of this.sourceFile.getVariableStatements()) {
      for (const decl of statement.getDeclarations()) {
        this.collectVariable(decl, statement.isExported());
      }
    }

    for (const cls of this.sourceFile.getClasses()) {
      this.collectClass(cls);
    }

    for (const iface of this.sourceFile.getInterfaces()) {
      this.declare('Schema', iface.getName(), iface, {
        signature: iface.getProperties().map((p) => {
          const type = p.getTypeNode()?.getText();
          return type ? { name: p.getName(), type } : { name: p.getName() };
        }),
        exported: iface.isExported(),
        defaultExport: iface.isDefaultExport(),
      });
    }

    for (const alias of this.sourceFile.getTypeAliases()) {
      const typeNode = alias.getTypeNode();
      if (!typeNode || !Node.isTypeLiteral(typeNode)) continue;
      this.declare('Schema', alias.getName(), alias, {
        signature: typeNode.getProperties().map((p) => {
          const type = p.getTypeNode()?.getText();
          return type ? { name: p.getName(), type } : { name: p.getName() };
        }),
        exported: alias.isExported(),
      });
    }

    for (const en of this.sourceFile.getEnums()) {
      this.declare('Schema', en.getName(), en, {
        signature: en.getMembers().map((m) => ({ name: m.getName() })),
        exported: en.isExported(),
      });
    }

    for (const mod of this.sourceFile.getModules()) {
      if (/^['"]/.test(mod.getName())) continue;
      this.declare('Module', mod.getName(), mod, { exported: mod.isExported() });
    }
  }

  private collectVariable(decl: VariableDeclaration, exported: boolean): void {
    const nameNode = decl.getNameNode();
    const init = decl.getInitializer();
    if (!Node.isIdentifier(nameNode) || !init) return;
    const name = nameNode.getText();

    if (Node.isArrowFunction(init) || Node.isFunctionExpression(init)) {
      this.declare(this.functionKind(name, init), name, decl, {
        signature: parameterSignature(init.getParameters()),
        exported,
      });
      return;
    }

    if (!Node.isCallExpression(init)) return;
    const callee = init.getExpression().getText();

    // z.object({ ... }) schemas
    if (/(^|\.)object$/.test(callee) && /^(z|zod|yup|Joi)\b/.test(callee)) {
      const shape = init.getArguments()[0];
      const signature: SignatureEntry[] = [];
      if (shape && Node.isObjectLiteralExpression(shape)) {
        for (const prop of shape.getProperties()) {
          if (Node.isPropertyAssignment(prop) || Node.isShorthandPropertyAssignment(prop)) {
            signature.push({ name: prop.getName() });
          }
        }
      }
      this.declare('Schema', name, decl, { signature, exported });
      return;
    }

    // express(), Router(), express.Router()
    if (/^(express|Router|express\.Router|fastify|Hono|new Hono)$/.test(callee)) {
      this.routers.add(name);
      return;
    }

    // memo(() => ...), forwardRef(...)
    const wrapped = init.getArguments()[0];
    if (
      PASCAL_CASE.test(name) &&
      /(^|\.)(memo|forwardRef)$/.test(callee) &&
      wrapped &&
      (Node.isArrowFunction(wrapped) || Node.isFunctionExpression(wrapped))
    ) {
      this.declare('Component', name, decl, {
        signature: parameterSignature(wrapped.getParameters()),
        exported,
      });
    }
  }

  private collectClass(cls: ClassDeclaration): void {
    const name = cls.getName() ?? (cls.isDefaultExport() ? 'default' : undefined);
    if (!name) return;

    const base = cls.getExtends()?.getExpression().getText();
    const kind: NodeKind = base && REACT_COMPONENT_BASE.test(base) ? 'Component' : 'Class';
    const ctor = cls.getConstructors().find((c) => !c.isOverload());

    this.declare(kind, name, cls, {
      signature: ctor ? parameterSignature(ctor.getParameters()) : undefined,
      exported: cls.isExported(),
      defaultExport: cls.isDefaultExport(),
    });
    this.classOf.set(cls, name);

    for (const method of cls.getMethods()) {
      if (method.isOverload()) continue;
      this.declare('Function', `${name}.${method.getName()}`, method, {
        signature: parameterSignature(method.getParameters()),
        exported: cls.isExported(),
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  private collectRoutes(): void {
    for (const statement of this.sourceFile.getStatements()) {
      if (!Node.isExpressionStatement(statement)) continue;
      const call = statement.getExpression();
      if (!Node.isCallExpression(call)) continue;

      const callee = call.getExpression();
      if (!Node.isPropertyAccessExpression(callee)) continue;
      const method = ROUTE_METHODS.get(callee.getName());
      const owner = callee.getExpression().getText();
      if (!method || !(this.routers.has(owner) || ROUTER_NAME.test(owner))) continue;

      const args = call.getArguments();
      const routePath = urlLiteral(args[0]);
      if (args.length < 2 || routePath === null || !routePath.startsWith('/')) continue;

      const qualifiedName = `${method} ${routePath}`;
      this.out.addNode('Endpoint', qualifiedName, span(call), {
        name: qualifiedName,
        route: { method, path: routePath },
      });
      this.enclosing.set(call, qualifiedName);
      this.routeCalls.add(call);

      const handler = args[args.length - 1];
      const target = this.valueTarget(handler);
      if (target) {
        this.reference('BindsEndpoint', qualifiedName, target.target, span(handler), target.module);
      }
    }
  }

  private collectNextRoutes(): void {
    const route = nextRoutePath(this.out.path);
    if (!route) return;

    for (const node of [...this.out.contribution.nodes]) {
      const isHandler = route.router === 'app'
        ? node.exported === true && NEXT_HANDLER_NAMES.has(node.qualifiedName)
        : node.defaultExport === true;
      if (!isHandler) continue;

      const method = route.router === 'app' ? ROUTE_METHODS.get(node.qualifiedName.toLowerCase()) : 'ANY';
      if (!method) continue;
      const qualifiedName = `${method} ${route.path}`;
      this.out.addNode('Endpoint', qualifiedName, node.span, {
        name: qualifiedName,
        route: { method, path: route.path },
      });
      this.reference('BindsEndpoint', qualifiedName, node.qualifiedName, node.span);
    }
  }

  // ---------------------------------------------------------------------------
  // References
  // ---------------------------------------------------------------------------

  private reference(kind: EdgeKind, from: string, target: string, at: SourceSpan, module?: ModuleHint): void {
    this.out.contribution.references.push(module ? { kind, from, target, module, span: at } : { kind, from, target, span: at });
  }

  /**
   * Qualified name a value expression refers to, if it names something we can resolve
   */
  private valueTarget(expr: Node): { target: string; module?: ModuleHint } | null {
    if (Node.isIdentifier(expr)) {
      const name = expr.getText();
      const binding = this.bindings.get(name);
      if (binding) {
        return { target: binding.imported === '' ? '' : binding.imported, module: binding.module };
      }
      return this.locals.has(name) ? { target: name } : null;
    }

    if (Node.isPropertyAccessExpression(expr)) {
      const owner = expr.getExpression();
      const member = expr.getName();

      if (Node.isThisExpression(owner)) {
        const cls = this.enclosingClass(expr);
        return cls && this.out.has(`${cls}.${member}`) ? { target: `${cls}.${member}` } : null;
      }
      if (!Node.isIdentifier(owner)) return null;

      const ownerName = owner.getText();
      const binding = this.bindings.get(ownerName);
      if (binding) {
        // ns.fn → fn in the module; Cls.fn → Cls.fn in the module
        const target = binding.imported === '' ? member : `${binding.imported === 'default' ? ownerName : binding.imported}.${member}`;
        return { target, module: binding.module };
      }
      if (this.out.has(`${ownerName}.${member}`)) return { target: `${ownerName}.${member}` };
    }

    return null;
  }

  private enclosingClass(node: Node): string | undefined {
    for (const ancestor of node.getAncestors()) {
      const cls = this.classOf.get(ancestor);
      if (cls) return cls;
    }
    return undefined;
  }

  private enclosingSymbol(node: Node): string {
    for (const ancestor of node.getAncestors()) {
      const qualifiedName = this.enclosing.get(ancestor);
      if (qualifiedName !== undefined) return qualifiedName;
    }
    return '';
  }

  private collectReferences(): void {
    this.sourceFile.forEachDescendant((node) => {
      if (Node.isCallExpression(node) || Node.isNewExpression(node)) {
        const callee = node.getExpression();
        if (this.routeCalls.has(node)) return;
        if (Node.isCallExpression(node) && this.collectHttpCall(node.getExpression(), node.getArguments(), node)) return;
        const target = this.valueTarget(callee);
        if (target) {
          this.reference('Calls', this.enclosingSymbol(node), target.target, span(node), target.module);
        }
        return;
      }

      if (Node.isJsxOpeningElement(node) || Node.isJsxSelfClosingElement(node)) {
        const tag = node.getTagNameNode();
        if (!PASCAL_CASE.test(tag.getText().split('.')[0])) return;
        const target = this.valueTarget(tag);
        if (target) {
          this.reference('Calls', this.enclosingSymbol(node), target.target, span(node), target.module);
        }
        return;
      }

      if (Node.isTypeReference(node)) {
        const typeName = node.getTypeName();
        const target = this.typeTarget(typeName.getText());
        if (target) {
          this.reference('ReferencesSchema', this.enclosingSymbol(node), target.target, span(node), target.module);
        }
        return;
      }

      if (Node.isHeritageClause(node)) {
        const owner = this.enclosingSymbol(node);
        for (const typeNode of node.getTypeNodes()) {
          const target = this.valueTarget(typeNode.getExpression());
          if (target && owner) {
            this.reference('Implements', owner, target.target, span(typeNode), target.module);
          }
        }
      }
    });
  }

  private typeTarget(typeName: string): { target: string; module?: ModuleHint } | null {
    const [head, ...rest] = typeName.split('.');
    const binding = this.bindings.get(head);
    if (binding) {
      if (binding.imported === '') {
        return rest.length > 0 ? { target: rest.join('.'), module: binding.module } : null;
      }
      return { target: binding.imported, module: binding.module };
    }
    const kind = this.locals.get(typeName);
    return kind === 'Schema' || kind === 'Class' ? { target: typeName } : null;
  }

  private collectHttpCall(callee: Node, args: Node[], call: Node): boolean {
    let method: HttpMethod | undefined;

    if (Node.isIdentifier(callee) && callee.getText() === 'fetch') {
      method = 'GET';
      const init = args[1];
      if (init && Node.isObjectLiteralExpression(init)) {
        const prop = init.getProperty('method');
        if (prop && Node.isPropertyAssignment(prop)) {
          const value = urlLiteral(prop.getInitializer());
          if (value) method = ROUTE_METHODS.get(value.toLowerCase()) ?? 'GET';
        }
      }
    } else if (Node.isPropertyAccessExpression(callee)) {
      const owner = callee.getExpression().getText();
      const verb = ROUTE_METHODS.get(callee.getName());
      const fromAxios = this.bindings.get(owner)?.module.specifier === 'axios';
      if (verb && verb !== 'ANY' && (HTTP_CLIENT_NAME.test(owner) || fromAxios) && !this.routers.has(owner)) {
        method = verb;
      }
    }

    if (!method) return false;
    const url = urlLiteral(args[0]);
    if (url === null || !url.includes('/')) return false;

    this.out.contribution.httpCalls.push({
      from: this.enclosingSymbol(call),
      method,
      url,
      span: span(call),
    });
    return true;
  }
}

// =============================================================================
// ADAPTER
// =============================================================================

export const typescriptAdapter: LanguageAdapter = {
  name: 'typescript',
  languages: ['typescript', 'javascript'],
  extensions: TS_EXTENSIONS,

  extract(document: SourceDocument): AdapterResult {
    const project = new Project({
      useInMemoryFileSystem: true,
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
      compilerOptions: { allowJs: true, noLib: true, noResolve: true },
    });
    const sourceFile = project.createSourceFile(path.posix.join('/', document.path), document.content);

    const syntaxErrors = project.getProgram().getSyntacticDiagnostics(sourceFile);
    if (syntaxErrors.length > 0) {
      const first = syntaxErrors[0];
      const text = first.getMessageText();
      const message = typeof text === 'string' ? text : text.getMessageText();
      const line = first.getLineNumber();
      return { ok: false, reason: 'syntax-error', message: line ? `line ${line}: ${message}` : message };
    }

    return { ok: true, contribution: new TypeScriptExtraction(sourceFile, document).run().contribution };
  },
};
