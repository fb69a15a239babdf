import { CircularReferenceError, MissingVariableError, SubstitutionError } from '../utils/errors.js';

/**
 * Variable substitution.
 *
 * Templates reference variables as `$name`, `${name}`, `$tool.name` or
 * `${tool.name}`; `$$` is a literal `$`. A braced reference may also call one
 * of the list functions: `${prefix(-I, $includes)}`.
 *
 * Expansion comes in two flavours. `expand` produces a single string, joining
 * list values with one space. `expandToSequence` produces one token per
 * argument and keeps list elements apart, so a generator can quote each one.
 */

/**
 * A path that must survive expansion untouched so that a generator can
 * rewrite it relative to wherever the build file ends up.
 */
export class PathToken {
  constructor(readonly path: string, readonly prefix: string = '', readonly suffix: string = '') {}

  withAffixes(prefix: string, suffix: string): PathToken {
    return new PathToken(this.path, prefix + this.prefix, this.suffix + suffix);
  }

  toString(): string {
    return `${this.prefix}${this.path}${this.suffix}`;
  }
}

export type CommandToken = string | PathToken;
export type Scalar = string | number | boolean;
export type VarItem = Scalar | PathToken;
export type VarValue = VarItem | readonly VarItem[];

export interface Namespace {
  /** Value of `name` or `tool.name`, undefined when not defined */
  lookup(name: string): VarValue | undefined;
}

export function isSequence(value: VarValue): value is readonly VarItem[] {
  return Array.isArray(value);
}

export function isVarValue(value: VarValue | Readonly<Record<string, VarValue>>): value is VarValue {
  return typeof value !== 'object' || value instanceof PathToken || Array.isArray(value);
}

export function tokenText(token: CommandToken): string {
  return typeof token === 'string' ? token : token.toString();
}

/**
 * Cross-tool variables plus one nested map per tool.
 */
export class MapNamespace implements Namespace {
  private readonly vars: ReadonlyMap<string, VarValue>;
  private readonly tools: ReadonlyMap<string, ReadonlyMap<string, VarValue>>;

  constructor(
    vars: ReadonlyMap<string, VarValue> = new Map(),
    tools: ReadonlyMap<string, ReadonlyMap<string, VarValue>> = new Map()
  ) {
    this.vars = vars;
    this.tools = tools;
  }

  lookup(name: string): VarValue | undefined {
    const dot = name.indexOf('.');
    if (dot < 0) {
      return this.vars.get(name);
    }
    return this.tools.get(name.slice(0, dot))?.get(name.slice(dot + 1));
  }
}

/**
 * Layers searched front to back; the first layer defining a name wins.
 */
export class LayeredNamespace implements Namespace {
  constructor(private readonly layers: readonly Namespace[]) {}

  lookup(name: string): VarValue | undefined {
    for (const layer of this.layers) {
      const value = layer.lookup(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}

export type NamespaceInit = Readonly<Record<string, VarValue | Readonly<Record<string, VarValue>>>>;

/**
 * Build a namespace from a plain object; nested objects are tool namespaces.
 *
 * @example
 * namespaceFrom({ out: 'a.o', cc: { flags: ['-O2'] } })
 */
export function namespaceFrom(init: NamespaceInit): Namespace {
  const vars = new Map<string, VarValue>();
  const tools = new Map<string, Map<string, VarValue>>();
  for (const [name, value] of Object.entries(init)) {
    if (isVarValue(value)) {
      vars.set(name, value);
    } else {
      tools.set(name, new Map(Object.entries(value)));
    }
  }
  return new MapNamespace(vars, tools);
}

export const EMPTY_NAMESPACE: Namespace = new MapNamespace();

// Stands in for an escaped `$` until expansion is finished, so it is never
// mistaken for the start of a reference.
const DOLLAR = '\u0000';

const IDENT = '[A-Za-z_][A-Za-z0-9_]*';
const REFERENCE_SOURCE = `\\$(\\$)|\\$\\{([^{}]*)\\}|\\$(${IDENT}(?:\\.${IDENT})*)`;
const WHOLE_REFERENCE = new RegExp(`^(?:\\$\\{([^{}]*)\\}|\\$(${IDENT}(?:\\.${IDENT})*))$`);
const NAME_PATTERN = new RegExp(`^${IDENT}(?:\\.${IDENT})*$`);
const CALL_PATTERN = new RegExp(`^(${IDENT})\\((.*)\\)$`, 's');

interface ListFunction {
  arity: number;
  apply(args: CommandToken[][]): CommandToken[];
}

function argText(arg: CommandToken[]): string {
  return arg.map(tokenText).join(' ');
}

function affix(token: CommandToken, prefix: string, suffix: string): CommandToken {
  return token instanceof PathToken ? token.withAffixes(prefix, suffix) : `${prefix}${token}${suffix}`;
}

const FUNCTIONS: Readonly<Record<string, ListFunction>> = {
  prefix: {
    arity: 2,
    apply: ([prefix, list]) => list.map(token => affix(token, argText(prefix), ''))
  },
  suffix: {
    arity: 2,
    apply: ([list, suffix]) => list.map(token => affix(token, '', argText(suffix)))
  },
  wrap: {
    arity: 3,
    apply: ([prefix, list, suffix]) => list.map(token => affix(token, argText(prefix), argText(suffix)))
  },
  join: {
    arity: 2,
    apply: ([separator, list]) => [list.map(tokenText).join(argText(separator))]
  },
  pairwise: {
    arity: 2,
    apply: ([prefix, list]) => list.flatMap(token => [argText(prefix), token])
  }
};

function enter(name: string, namespace: Namespace, chain: readonly string[]): { value: VarValue; chain: string[] } {
  const index = chain.indexOf(name);
  if (index >= 0) {
    throw new CircularReferenceError([...chain.slice(index), name]);
  }
  const value = namespace.lookup(name);
  if (value === undefined) {
    throw new MissingVariableError(name);
  }
  return { value, chain: [...chain, name] };
}

/**
 * Value of a variable as tokens. A list keeps one token per element; a
 * scalar string is itself expanded as a sequence template.
 */
function resolveSequence(name: string, namespace: Namespace, chain: readonly string[]): CommandToken[] {
  const entered = enter(name, namespace, chain);
  const value = entered.value;
  if (!isSequence(value)) {
    if (typeof value === 'string') return expandSequenceInternal(value, namespace, entered.chain);
    return value instanceof PathToken ? [value] : [String(value)];
  }
  return value.flatMap(item => {
    if (typeof item === 'string') return expandTokenInternal(item, namespace, entered.chain);
    return item instanceof PathToken ? [item] : [String(item)];
  });
}

function resolveScalar(name: string, namespace: Namespace, chain: readonly string[]): string {
  const entered = enter(name, namespace, chain);
  const items = isSequence(entered.value) ? entered.value : [entered.value];
  return items
    .map(item => (typeof item === 'string' ? expandScalarInternal(item, namespace, entered.chain) : String(item)))
    .join(' ');
}

function splitArguments(text: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: string | undefined;
  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ',') {
      args.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  args.push(current.trim());
  return args;
}

function resolveArgument(raw: string, namespace: Namespace, chain: readonly string[]): CommandToken[] {
  const quoted = /^(["'])(.*)\1$/s.exec(raw);
  if (quoted) {
    return [quoted[2]];
  }
  if (raw.startsWith('$')) {
    return expandTokenInternal(raw, namespace, chain);
  }
  if (NAME_PATTERN.test(raw) && namespace.lookup(raw) !== undefined) {
    return resolveSequence(raw, namespace, chain);
  }
  return [raw];
}

function callFunction(body: string, namespace: Namespace, chain: readonly string[]): CommandToken[] | undefined {
  const call = CALL_PATTERN.exec(body);
  if (!call) {
    return undefined;
  }
  const name = call[1];
  const fn = FUNCTIONS[name];
  if (!Object.prototype.hasOwnProperty.call(FUNCTIONS, name) || !fn) {
    throw new SubstitutionError(`unknown function '${name}' in \${${body}}`);
  }
  const rawArgs = call[2].trim() === '' ? [] : splitArguments(call[2]);
  if (rawArgs.length !== fn.arity) {
    throw new SubstitutionError(`${name}() takes ${fn.arity} arguments, got ${rawArgs.length}`);
  }
  return fn.apply(rawArgs.map(arg => resolveArgument(arg, namespace, chain)));
}

/**
 * Tokens for one braced or bare reference body.
 */
function resolveReference(body: string, namespace: Namespace, chain: readonly string[]): CommandToken[] {
  const called = callFunction(body, namespace, chain);
  if (called) {
    return called;
  }
  const name = body.trim();
  if (!NAME_PATTERN.test(name)) {
    throw new SubstitutionError(`invalid reference: \${${body}}`);
  }
  return resolveSequence(name, namespace, chain);
}

function expandScalarInternal(template: string, namespace: Namespace, chain: readonly string[]): string {
  return template.replace(
    new RegExp(REFERENCE_SOURCE, 'g'),
    (_match: string, escaped: string | undefined, braced: string | undefined, bare: string | undefined) => {
      if (escaped) return DOLLAR;
      if (bare !== undefined) return resolveScalar(bare, namespace, chain);
      const body = braced ?? '';
      if (CALL_PATTERN.test(body) || !NAME_PATTERN.test(body.trim())) {
        return resolveReference(body, namespace, chain).map(tokenText).join(' ');
      }
      return resolveScalar(body.trim(), namespace, chain);
    }
  );
}

/**
 * Split on whitespace, except inside `${...}`.
 */
function splitWords(template: string): string[] {
  const words: string[] = [];
  let current = '';
  let depth = 0;

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch === '$' && (template[i + 1] === '$' || template[i + 1] === '{')) {
      current += ch + template[i + 1];
      if (template[i + 1] === '{') depth++;
      i++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      current += ch;
    } else if (depth === 0 && /\s/.test(ch)) {
      if (current) words.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) words.push(current);

  return words;
}

/**
 * Merge literal text around a single path token into the token's affixes;
 * anything else becomes plain text.
 */
function joinPieces(pieces: readonly CommandToken[]): CommandToken {
  const pathIndexes = pieces.flatMap((piece, index) => (piece instanceof PathToken ? [index] : []));
  if (pathIndexes.length === 1) {
    const index = pathIndexes[0];
    const token = pieces[index];
    if (token instanceof PathToken) {
      const before = pieces.slice(0, index).map(tokenText).join('');
      const after = pieces.slice(index + 1).map(tokenText).join('');
      return token.withAffixes(before, after);
    }
  }
  return pieces.map(tokenText).join('');
}

function expandTokenInternal(word: string, namespace: Namespace, chain: readonly string[]): CommandToken[] {
  const whole = WHOLE_REFERENCE.exec(word);
  if (whole) {
    const [, braced, bare] = whole;
    return bare !== undefined ? resolveSequence(bare, namespace, chain) : resolveReference(braced, namespace, chain);
  }

  const pieces: CommandToken[] = [];
  const pattern = new RegExp(REFERENCE_SOURCE, 'g');
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(word)) !== null) {
    pieces.push(word.slice(last, match.index));
    const [text, escaped, braced, bare] = match;
    if (escaped) {
      pieces.push(DOLLAR);
    } else {
      const tokens =
        bare !== undefined ? resolveSequence(bare, namespace, chain) : resolveReference(braced ?? '', namespace, chain);
      const only = tokens.length === 1 ? tokens[0] : undefined;
      pieces.push(only instanceof PathToken ? only : tokens.map(tokenText).join(' '));
    }
    last = match.index + text.length;
  }
  pieces.push(word.slice(last));

  return [joinPieces(pieces)];
}

function expandSequenceInternal(template: string, namespace: Namespace, chain: readonly string[]): CommandToken[] {
  return splitWords(template).flatMap(word => expandTokenInternal(word, namespace, chain));
}

function restoreDollar(text: string): string {
  return text.split(DOLLAR).join('$');
}

function restoreToken(token: CommandToken): CommandToken {
  if (typeof token === 'string') {
    return restoreDollar(token);
  }
  return new PathToken(token.path, restoreDollar(token.prefix), restoreDollar(token.suffix));
}

/**
 * Expand a template to a single string. List values are joined with one
 * space. A template without references comes back unchanged.
 */
export function expand(template: string, namespace: Namespace): string {
  return restoreDollar(expandScalarInternal(template, namespace, []));
}

/**
 * Expand a template to command tokens. A string template is split on
 * whitespace first; a word that is exactly one reference to a list yields one
 * token per element, and path tokens pass through intact.
 */
export function expandToSequence(template: string | readonly CommandToken[], namespace: Namespace): CommandToken[] {
  const tokens =
    typeof template === 'string'
      ? expandSequenceInternal(template, namespace, [])
      : template.flatMap(token =>
          token instanceof PathToken ? [token] : expandTokenInternal(token, namespace, [])
        );
  return tokens.map(restoreToken);
}

export type ShellKind = 'posix' | 'cmd';

const POSIX_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;
const CMD_SPECIAL = /[\s"&|<>^()%!]/;

/**
 * Quote one argument so the shell passes it through as a single word.
 */
export function quoteForShell(token: string, shell: ShellKind = 'posix'): string {
  if (shell === 'cmd') {
    if (token === '') return '""';
    if (!CMD_SPECIAL.test(token)) return token;
    return `"${token.replace(/(\\*)"/g, '$1$1\\"').replace(/(\\+)$/, '$1$1')}"`;
  }
  if (token === '') return "''";
  if (POSIX_SAFE.test(token)) return token;
  return `'${token.replace(/'/g, `'\\''`)}'`;
}

export function toShellCommand(tokens: readonly CommandToken[], shell: ShellKind = 'posix'): string {
  return tokens.map(token => quoteForShell(tokenText(token), shell)).join(' ');
}
