/**
 * Python adapter
 * Line and indentation based: logical lines are assembled with bracket and
 * string tracking, then matched against declaration, import and route patterns.
 */

import * as path from 'path';
import type {
  EdgeKind,
  GraphNode,
  HttpMethod,
  ModuleHint,
  SignatureEntry,
  SourceDocument,
  SourceSpan,
} from '../types.js';
import { ContributionBuilder, PY_EXTENSIONS, pyModuleHint } from './shared.js';
import type { AdapterResult, LanguageAdapter } from './index.js';

// =============================================================================
// LOGICAL LINES
// =============================================================================

export interface LogicalLine {
  text: string;               // source with comments removed
  code: string;               // same offsets, string contents blanked
  indent: number;
  lineStart: number;
  lineEnd: number;
}

export class PythonSyntaxError extends Error {
  constructor(readonly line: number, message: string) {
    super(`line ${line}: ${message}`);
  }
}

const OPENERS = '([{';
const CLOSERS = ')]}';

/**
 * Split source into logical lines, joining bracketed and backslash continuations
 */
export function splitLogicalLines(content: string): LogicalLine[] {
  const src = content.replace(/\r\n?/g, '\n');
  const lines: LogicalLine[] = [];
  const brackets: Array<{ ch: string; line: number }> = [];

  let text = '';
  let code = '';
  let line = 1;
  let lineStart = 1;
  let quote: string | null = null;
  let quoteLine = 0;

  const flush = () => {
    const trimmed = text.replace(/\s+$/, '');
    const body = trimmed.trimStart();
    if (body.length > 0) {
      const lead = trimmed.length - body.length;
      const indent = trimmed.slice(0, lead).replace(/\t/g, '    ').length;
      lines.push({
        text: body,
        code: code.slice(lead, trimmed.length),
        indent,
        lineStart,
        lineEnd: line,
      });
    }
    text = '';
    code = '';
  };

  for (let i = 0; i < src.length; i++) {
    const ch = src[i];

    if (quote !== null) {
      if (ch === '\\' && i + 1 < src.length) {
        const next = src[i + 1];
        if (next === '\n') line++;
        text += ch + (next === '\n' ? ' ' : next);
        code += '  ';
        i++;
        continue;
      }
      if (src.startsWith(quote, i)) {
        text += quote;
        code += quote;
        i += quote.length - 1;
        quote = null;
        continue;
      }
      if (ch === '\n') {
        if (quote.length === 1) throw new PythonSyntaxError(quoteLine, 'unterminated string literal');
        line++;
      }
      text += ch === '\n' ? ' ' : ch;
      code += ' ';
      continue;
    }

    if (ch === '#') {
      while (i + 1 < src.length && src[i + 1] !== '\n') i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = src.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
      quoteLine = line;
      text += quote;
      code += quote;
      i += quote.length - 1;
      continue;
    }

    if (OPENERS.includes(ch)) {
      brackets.push({ ch, line });
    } else if (CLOSERS.includes(ch)) {
      const open = brackets.pop();
      if (!open || OPENERS.indexOf(open.ch) !== CLOSERS.indexOf(ch)) {
        throw new PythonSyntaxError(line, `unmatched '${ch}'`);
      }
    }

    if (ch === '\\' && src[i + 1] === '\n') {
      text += ' ';
      code += ' ';
      i++;
      line++;
      continue;
    }

    if (ch === '\n') {
      if (brackets.length > 0) {
        text += ' ';
        code += ' ';
        line++;
        continue;
      }
      flush();
      line++;
      lineStart = line;
      continue;
    }

    text += ch;
    code += ch;
  }

  if (quote !== null) throw new PythonSyntaxError(quoteLine, 'unterminated string literal');
  const unclosed = brackets.pop();
  if (unclosed) throw new PythonSyntaxError(unclosed.line, `'${unclosed.ch}' was never closed`);
  flush();
  return lines;
}

/**
 * Index of the bracket closing the one at `open`, in blanked code
 */
function matchingBracket(code: string, open: number): number {
  let depth = 0;
  for (let i = open; i < code.length; i++) {
    if (OPENERS.includes(code[i])) depth++;
    else if (CLOSERS.includes(code[i])) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return code.length;
}

/**
 * Split on top-level commas (blanked code keeps offsets aligned with text)
 */
function splitArgs(text: string, code: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  const last = text.slice(start).trim();
  if (last) parts.push(last);
  return parts;
}

const STRING_LITERAL = /^([rRbBuUfF]{0,2})('''|"""|'|")([\s\S]*)\2$/;

/**
 * Render a URL-ish argument: literal parts kept, anything dynamic becomes "*"
 */
export function pyUrlLiteral(arg: string | undefined): string | null {
  if (!arg) return null;
  let url = '';
  let sawString = false;
  for (const piece of arg.split('+').map((p) => p.trim())) {
    const m = piece.match(STRING_LITERAL);
    if (!m) {
      if (!url.endsWith('*')) url += '*';
      continue;
    }
    sawString = true;
    url += /f/i.test(m[1]) ? m[3].replace(/\{[^}]*\}/g, '*') : m[3];
  }
  return sawString ? url : null;
}

function keywordArg(args: string[], name: string): string | undefined {
  for (const arg of args) {
    const m = arg.match(new RegExp(`^${name}\\s*=\\s*([\\s\\S]+)$`));
    if (m) return m[1].trim();
  }
  return undefined;
}

// =============================================================================
// PATTERNS
// =============================================================================

// Unicode identifiers; an optional type parameter list before the parentheses
const DEF_HEADER = /^(async\s+)?def\s+([\p{L}_][\p{L}\p{N}_]*)\s*(?:\[[^\]]*\]\s*)?\(/u;
const CLASS_HEADER = /^class\s+([\p{L}_][\p{L}\p{N}_]*)\s*(?:\[[^\]]*\]\s*)?(\(|:)/u;
const IMPORT_LINE = /^import\s+(.+)$/;
const FROM_IMPORT_LINE = /^from\s+(\S+)\s+import\s+(.+)$/;
const DECORATOR = /^@([\w.]+)\s*(\(|$)/;
const ROUTE_DECORATOR = /^(\w+)\.(get|post|put|patch|delete|head|options|route|api_route)$/;
const ROUTER_ASSIGN = /^(\w+)\s*=\s*(APIRouter|FastAPI|Flask|Blueprint|Router)\s*\(/;
const DJANGO_PATH = /\b(?:re_)?path\(/g;
const CALL_SITE = /([A-Za-z_][\w.]*)\s*\(/g;
const IDENTIFIER = /[A-Za-z_][\w.]*/g;

const SCHEMA_BASES = /^(BaseModel|Schema|ModelSchema|TypedDict|SQLModel|Base|DeclarativeBase|(models\.)?Model|Document|(serializers\.)?(Model)?Serializer)$/;
const HTTP_MODULES = new Set<string>(['requests', 'httpx', 'aiohttp']);
const TYPING_MODULES = new Set<string>(['typing', 'typing_extensions', 'collections.abc']);
const HTTP_VERBS = new Map<string, HttpMethod>([
  ['get', 'GET'],
  ['post', 'POST'],
  ['put', 'PUT'],
  ['patch', 'PATCH'],
  ['delete', 'DELETE'],
  ['head', 'HEAD'],
  ['options', 'OPTIONS'],
]);

const KEYWORDS = new Set<string>([
  'if', 'elif', 'while', 'for', 'return', 'and', 'or', 'not', 'in', 'is', 'with', 'assert',
  'lambda', 'yield', 'await', 'del', 'except', 'raise', 'print', 'super', 'self', 'cls',
]);

interface ImportBinding {
  module: ModuleHint;
  imported: string;           // '' = the module itself
}

interface Scope {
  indent: number;
  qualifiedName: string;      // innermost declared symbol
  className?: string;
  node?: GraphNode;
  schema?: boolean;
}

interface PendingReference {
  kind: EdgeKind;
  from: string;
  expr: string;
  span: SourceSpan;
  classContext?: string;
}

// =============================================================================
// EXTRACTION
// =============================================================================

class PythonExtraction {
  private readonly out: ContributionBuilder;
  private readonly bindings = new Map<string, ImportBinding>();
  private readonly routerPrefixes = new Map<string, string>();
  private readonly pending: PendingReference[] = [];
  private readonly scopes: Scope[] = [];
  private decorators: Array<{ text: string; code: string; line: number }> = [];
  private hasStarImport = false;

  constructor(document: SourceDocument, private readonly lines: LogicalLine[]) {
    const lastLine = lines.length > 0 ? lines[lines.length - 1].lineEnd : 1;
    this.out = new ContributionBuilder(document, lastLine);

    if (path.posix.basename(document.path) === '__init__.py') {
      const pkg = path.posix.basename(path.posix.dirname(document.path));
      if (pkg && pkg !== '.') {
        this.out.addNode('Module', pkg, { lineStart: 1, lineEnd: lastLine });
      }
    }
  }

  run(): ContributionBuilder {
    for (const line of this.lines) {
      while (this.scopes.length > 0 && line.indent <= this.scopes[this.scopes.length - 1].indent) {
        this.scopes.pop();
      }
      this.visit(line);
    }
    this.resolvePending();
    return this.out;
  }

  private get scope(): Scope | undefined {
    return this.scopes[this.scopes.length - 1];
  }

  private currentSymbol(): string {
    return this.scope?.qualifiedName ?? '';
  }

  private visit(line: LogicalLine): void {
    const at: SourceSpan = { lineStart: line.lineStart, lineEnd: line.lineEnd };

    const decorator = line.code.match(DECORATOR);
    if (decorator) {
      this.decorators.push({ text: line.text.slice(1), code: line.code.slice(1), line: line.lineStart });
      return;
    }

    if (/^(async\s+)?def\s/.test(line.code)) {
      if (!DEF_HEADER.test(line.code)) throw new PythonSyntaxError(line.lineStart, 'invalid function definition');
      this.visitDef(line);
      return;
    }

    if (/^class\s/.test(line.code)) {
      if (!CLASS_HEADER.test(line.code)) throw new PythonSyntaxError(line.lineStart, 'invalid class definition');
      this.visitClass(line);
      return;
    }
    this.decorators = [];

    if (this.scopes.length === 0) {
      const importMatch = line.text.match(IMPORT_LINE);
      if (importMatch) return this.visitImport(importMatch[1], at);
      const fromMatch = line.text.match(FROM_IMPORT_LINE);
      if (fromMatch) return this.visitFromImport(fromMatch[1], fromMatch[2], at);

      const router = line.code.match(ROUTER_ASSIGN);
      if (router) {
        const open = line.code.indexOf('(');
        const args = this.argsAt(line, open);
        const prefix = pyUrlLiteral(keywordArg(args, 'prefix') ?? keywordArg(args, 'url_prefix'));
        this.routerPrefixes.set(router[1], prefix ?? '');
      }
    }

    const scope = this.scope;
    if (scope?.schema && scope.node && line.indent > scope.indent) {
      this.visitField(line, scope, at);
    }

    this.visitDjangoPaths(line, at);
    this.visitCalls(line, line.code, at);
  }

  // ---------------------------------------------------------------------------
  // Imports
  // ---------------------------------------------------------------------------

  private visitImport(clause: string, at: SourceSpan): void {
    for (const part of clause.split(',')) {
      const m = part.trim().match(/^([\w.]+)(?:\s+as\s+(\w+))?$/);
      if (!m) continue;
      const module = pyModuleHint(this.out.path, m[1]);
      this.bindings.set(m[2] ?? m[1], { module, imported: '' });
      this.reference('Imports', '', '', at, module);
    }
  }

  private visitFromImport(specifier: string, clause: string, at: SourceSpan): void {
    const names = clause.replace(/[()]/g, '').split(',').map((n) => n.trim()).filter(Boolean);
    const module = pyModuleHint(this.out.path, specifier);
    const relativePackage = /^\.+$/.test(specifier);

    if (!relativePackage) this.reference('Imports', '', '', at, module);

    for (const name of names) {
      if (name === '*') {
        this.hasStarImport = true;
        continue;
      }
      const m = name.match(/^(\w+)(?:\s+as\s+(\w+))?$/);
      if (!m) continue;
      const local = m[2] ?? m[1];

      if (relativePackage) {
        // from . import views → the sibling module
        const submodule = pyModuleHint(this.out.path, specifier + m[1]);
        this.bindings.set(local, { module: submodule, imported: '' });
        this.reference('Imports', '', '', at, submodule);
        continue;
      }
      this.bindings.set(local, { module, imported: m[1] });
      this.reference('Imports', '', m[1], at, module);
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  private argsAt(line: LogicalLine, open: number): string[] {
    if (open < 0) return [];
    const close = matchingBracket(line.code, open);
    return splitArgs(line.text.slice(open + 1, close), line.code.slice(open + 1, close));
  }

  private visitDef(line: LogicalLine): void {
    const header = line.code.match(DEF_HEADER);
    if (!header) return;
    const name = header[2];
    const open = line.code.indexOf('(', header[0].length - 1);
    const close = matchingBracket(line.code, open);
    const params = this.argsAt(line, open);

    const parent = this.scope;
    let qualifiedName = name;
    let className: string | undefined;
    let declared = true;
    if (parent) {
      className = parent.className;
      if (className !== undefined && parent.qualifiedName === className) {
        qualifiedName = `${className}.${name}`;
      } else {
        // nested function: its body belongs to the enclosing symbol
        qualifiedName = parent.qualifiedName;
        declared = false;
      }
    }

    const signature: SignatureEntry[] = [];
    for (const param of params) {
      const m = param.match(/^\*{0,2}([\p{L}_][\p{L}\p{N}_]*)\s*(?::\s*([^=]+?))?\s*(?:=.*)?$/u);
      if (!m || m[1] === 'self' || m[1] === 'cls') continue;
      signature.push(m[2] ? { name: m[1], type: m[2].trim() } : { name: m[1] });
    }

    const endLine = this.blockEnd(line);
    if (declared) {
      this.out.addNode('Function', qualifiedName, { lineStart: line.lineStart, lineEnd: endLine }, {
        signature,
        exported: !name.startsWith('_'),
      });
    }

    this.scopes.push({ indent: line.indent, qualifiedName, className });

    // Annotations in parameters and the return type
    const at: SourceSpan = { lineStart: line.lineStart, lineEnd: line.lineEnd };
    for (const entry of signature) {
      if (entry.type) this.annotationRefs(entry.type, qualifiedName, at);
    }
    const ret = line.text.slice(close + 1).match(/^\s*->\s*(.+?)\s*:/);
    if (ret) this.annotationRefs(ret[1], qualifiedName, at);

    // Defaults run calls too; Depends(get_db) wires a dependency
    const paramCode = ' '.repeat(open + 1) + line.code.slice(open + 1, close);
    this.visitCalls(line, paramCode, at);
    for (const m of line.text.slice(open + 1, close).matchAll(/\bDepends\(\s*([\w.]+)/g)) {
      this.pending.push({ kind: 'Calls', from: qualifiedName, expr: m[1], span: at, classContext: className });
    }

    if (declared) this.visitRouteDecorators(qualifiedName, line.lineStart, endLine);
    this.decorators = [];
  }

  private visitClass(line: LogicalLine): void {
    const header = line.code.match(CLASS_HEADER);
    if (!header) return;
    const name = header[1];
    const parent = this.scope;

    const bases = header[2] === '(' ? this.argsAt(line, header[0].length - 1) : [];
    const baseNames = bases.filter((b) => !b.includes('='));
    const isDataclass = this.decorators.some((d) => /^(dataclasses\.)?dataclass\b/.test(d.text));
    const isSchema = isDataclass || baseNames.some((b) => SCHEMA_BASES.test(b));

    if (parent) {
      this.scopes.push({ indent: line.indent, qualifiedName: parent.qualifiedName });
      this.decorators = [];
      return;
    }

    const node = this.out.addNode(isSchema ? 'Schema' : 'Class', name, {
      lineStart: line.lineStart,
      lineEnd: this.blockEnd(line),
    }, { signature: isSchema ? [] : undefined, exported: !name.startsWith('_') });

    this.scopes.push({ indent: line.indent, qualifiedName: name, className: name, node, schema: isSchema });
    const at: SourceSpan = { lineStart: line.lineStart, lineEnd: line.lineEnd };
    for (const base of baseNames) {
      this.pending.push({ kind: 'Implements', from: name, expr: base, span: at });
    }
    this.decorators = [];
  }

  private visitField(line: LogicalLine, scope: Scope, at: SourceSpan): void {
    const node = scope.node;
    if (!node?.signature) return;

    const annotated = line.text.match(/^(\w+)\s*:\s*([^=]+?)\s*(?:=.*)?$/);
    if (annotated) {
      node.signature.push({ name: annotated[1], type: annotated[2] });
      this.annotationRefs(annotated[2], scope.qualifiedName, at);
      return;
    }

    // Django / SQLAlchemy / marshmallow: name = models.CharField(...)
    const assigned = line.code.match(/^(\w+)\s*=\s*([\w.]+)\s*\(/);
    if (assigned && assigned[1] !== 'Meta') {
      const type = assigned[2].split('.').pop() ?? assigned[2];
      node.signature.push({ name: assigned[1], type });
      const args = this.argsAt(line, line.code.indexOf('('));
      const related = args[0]?.match(/^['"]?([A-Z]\w*)['"]?$/);
      if (related && /ForeignKey|OneToOne|ManyToMany|relationship|Nested/.test(type)) {
        this.pending.push({ kind: 'ReferencesSchema', from: scope.qualifiedName, expr: related[1], span: at });
      }
    }
  }

  /**
   * Last physical line of the block opened by a def/class header
   */
  private blockEnd(header: LogicalLine): number {
    const index = this.lines.indexOf(header);
    let end = header.lineEnd;
    for (let i = index + 1; i < this.lines.length; i++) {
      if (this.lines[i].indent <= header.indent) break;
      end = this.lines[i].lineEnd;
    }
    return end;
  }

  private annotationRefs(annotation: string, from: string, at: SourceSpan): void {
    for (const m of annotation.matchAll(IDENTIFIER)) {
      this.pending.push({ kind: 'ReferencesSchema', from, expr: m[0], span: at });
    }
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  private visitRouteDecorators(handler: string, lineStart: number, lineEnd: number): void {
    for (const decorator of this.decorators) {
      const head = decorator.text.match(/^([\w.]+)\s*\(/);
      const route = head?.[1].match(ROUTE_DECORATOR);
      if (!head || !route) continue;

      const open = head[0].length - 1;
      const close = matchingBracket(decorator.code, open);
      const args = splitArgs(decorator.text.slice(open + 1, close), decorator.code.slice(open + 1, close));
      const routePath = pyUrlLiteral(args[0]);
      if (routePath === null) continue;

      const prefix = this.routerPrefixes.get(route[1]) ?? '';
      const fullPath = joinRoute(prefix, routePath);

      let methods: HttpMethod[] = [];
      const verb = HTTP_VERBS.get(route[2]);
      if (verb) {
        methods = [verb];
      } else {
        const listed = keywordArg(args, 'methods');
        methods = listed
          ? [...listed.matchAll(/['"](\w+)['"]/g)].flatMap((m) => {
              const method = HTTP_VERBS.get(m[1].toLowerCase());
              return method ? [method] : [];
            })
          : ['GET'];
      }

      const responseModel = keywordArg(args, 'response_model');
      for (const method of methods) {
        const qualifiedName = `${method} ${fullPath}`;
        this.out.addNode('Endpoint', qualifiedName, { lineStart: decorator.line, lineEnd }, {
          name: qualifiedName,
          route: { method, path: fullPath },
        });
        const at: SourceSpan = { lineStart: decorator.line, lineEnd: decorator.line };
        this.reference('BindsEndpoint', qualifiedName, handler, { lineStart, lineEnd: lineStart });
        if (responseModel) this.annotationRefs(responseModel, qualifiedName, at);
      }
    }
  }

  private visitDjangoPaths(line: LogicalLine, at: SourceSpan): void {
    if (this.scopes.length > 0) return;
    for (const m of line.code.matchAll(DJANGO_PATH)) {
      const start = m.index ?? 0;
      if (start > 0 && line.code[start - 1] === '.') continue;
      const open = start + m[0].length - 1;
      const args = this.argsAt(line, open);
      const routePath = pyUrlLiteral(args[0]);
      const view = args[1]?.replace(/\.as_view\(.*\)$/, '');
      if (routePath === null || !view || !/^[\w.]+$/.test(view)) continue;

      const fullPath = joinRoute('', routePath);
      const qualifiedName = `ANY ${fullPath}`;
      this.out.addNode('Endpoint', qualifiedName, at, {
        name: qualifiedName,
        route: { method: 'ANY', path: fullPath },
      });
      this.pending.push({ kind: 'BindsEndpoint', from: qualifiedName, expr: view, span: at });
    }
  }

  // ---------------------------------------------------------------------------
  // Calls
  // ---------------------------------------------------------------------------

  private visitCalls(line: LogicalLine, code: string, at: SourceSpan): void {
    const from = this.currentSymbol();
    const classContext = this.scope?.className;

    for (const m of code.matchAll(CALL_SITE)) {
      const expr = m[1];
      const start = m.index ?? 0;
      if (start > 0 && /[\w.]/.test(code[start - 1])) continue;
      if (KEYWORDS.has(expr) || /^(def|class|path|re_path)$/.test(expr)) continue;

      if (this.visitHttpCall(line, expr, start + m[0].length - 1, from, at)) continue;
      this.pending.push({ kind: 'Calls', from, expr, span: at, classContext });
    }
  }

  private visitHttpCall(line: LogicalLine, expr: string, open: number, from: string, at: SourceSpan): boolean {
    const dot = expr.lastIndexOf('.');
    if (dot === -1) return false;
    const owner = expr.slice(0, dot);
    const method = HTTP_VERBS.get(expr.slice(dot + 1));
    if (!method) return false;

    const binding = this.bindings.get(owner);
    const isClient = binding
      ? HTTP_MODULES.has(binding.module.specifier.split('.')[0])
      : /^(session|client|http_client|async_client)$/.test(owner);
    if (!isClient) return false;

    const url = pyUrlLiteral(this.argsAt(line, open)[0]);
    if (url === null || !url.includes('/')) return false;
    this.out.contribution.httpCalls.push({ from, method, url, span: at });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Resolution of names recorded during the pass
  // ---------------------------------------------------------------------------

  private reference(kind: EdgeKind, from: string, target: string, at: SourceSpan, module?: ModuleHint): void {
    this.out.contribution.references.push(module ? { kind, from, target, module, span: at } : { kind, from, target, span: at });
  }

  private resolvePending(): void {
    for (const item of this.pending) {
      const target = this.resolveName(item.expr, item.classContext);
      if (!target) continue;
      if (item.kind === 'ReferencesSchema') {
        if (target.module ? TYPING_MODULES.has(target.module.specifier) : !this.isTypeLike(target.target)) continue;
      }
      this.reference(item.kind, item.from, target.target, item.span, target.module);
    }
  }

  private isTypeLike(qualifiedName: string): boolean {
    return this.out.contribution.nodes.some(
      (n) => n.qualifiedName === qualifiedName && (n.kind === 'Schema' || n.kind === 'Class')
    );
  }

  private resolveName(expr: string, classContext?: string): { target: string; module?: ModuleHint } | null {
    const parts = expr.split('.');

    if ((parts[0] === 'self' || parts[0] === 'cls') && classContext && parts.length === 2) {
      const qualifiedName = `${classContext}.${parts[1]}`;
      return this.out.has(qualifiedName) ? { target: qualifiedName } : null;
    }

    // Longest bound prefix: "app.services.user.create" → binding "app.services.user"
    for (let n = parts.length; n > 0; n--) {
      const binding = this.bindings.get(parts.slice(0, n).join('.'));
      if (!binding) continue;
      const rest = parts.slice(n);
      if (binding.imported === '') {
        return rest.length > 0 ? { target: rest.join('.'), module: binding.module } : { target: '', module: binding.module };
      }
      return { target: [binding.imported, ...rest].join('.'), module: binding.module };
    }

    if (this.out.has(expr) && expr !== '') return { target: expr };
    if (parts.length === 2 && this.out.has(parts[0])) return null;

    // Names pulled in by "from x import *" resolve globally
    if (this.hasStarImport && parts.length === 1 && /^[A-Za-z_]\w*$/.test(expr) && !/^[a-z]+$/.test(expr)) {
      return { target: expr };
    }
    return null;
  }
}

/**
 * Join a router prefix and a route, with exactly one leading slash
 */
function joinRoute(prefix: string, route: string): string {
  const joined = `${prefix.replace(/\/+$/, '')}/${route.replace(/^\/+/, '')}`;
  return joined.startsWith('/') ? joined : `/${joined}`;
}

// =============================================================================
// ADAPTER
// =============================================================================

export const pythonAdapter: LanguageAdapter = {
  name: 'python',
  languages: ['python'],
  extensions: PY_EXTENSIONS,

  extract(document: SourceDocument): AdapterResult {
    let lines: LogicalLine[];
    try {
      lines = splitLogicalLines(document.content);
      return { ok: true, contribution: new PythonExtraction(document, lines).run().contribution };
    } catch (error) {
      if (error instanceof PythonSyntaxError) {
        return { ok: false, reason: 'syntax-error', message: error.message };
      }
      throw error;
    }
  },
};
