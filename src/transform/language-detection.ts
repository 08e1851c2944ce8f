const LANGUAGE_TOKEN_PATTERN = /^[a-z0-9_+#.-]{1,30}$/i;
const CLASS_PREFIXES = ['language-', 'lang-', 'highlight-', 'brush:'] as const;

/**
 * Lower-cased, trimmed text of a code sample, computed once per detection.
 */
class CodeSample {
  readonly lower: string;
  readonly lines: readonly string[];
  readonly trimmedStart: string;

  constructor(readonly code: string) {
    this.lower = code.toLowerCase();
    this.lines = code.split(/\r?\n/);
    this.trimmedStart = code.trimStart();
  }
}

const BASH_COMMANDS = new Set([
  'sudo',
  'chmod',
  'mkdir',
  'cd',
  'ls',
  'cat',
  'echo',
  'export',
  'curl',
  'git',
]);
const BASH_PACKAGE_MANAGERS = new Set([
  'npm',
  'yarn',
  'pnpm',
  'npx',
  'brew',
  'apt',
  'apt-get',
  'pip',
  'cargo',
  'go',
]);
const BASH_VERBS = new Set(['install', 'add', 'run', 'build', 'start', 'get']);
const TYPESCRIPT_HINT_PATTERN =
  /:\s?(?:string|number|boolean|void|unknown|never)\b|\b(?:interface|type)\s+[A-Z]\w*/;
const RUST_PATTERN = /\b(?:fn|impl|struct|enum)\b|let mut /;
const GO_PATTERN = /\bpackage\s+\w+|\bfunc\s|import "/;
const JS_PATTERN =
  /\b(?:const|let|var|function|class|async|await|export|import)\b/;
const JS_SIGNAL_PATTERN =
  /\b(?:const |let |var |function |require\(|console\.)|=>|===|!==/;
const PYTHON_UNIQUE_PATTERN =
  /\b(?:def |elif |except\b|finally:|yield |lambda |raise |pass$)|print\(|__name__|self\./m;
const SQL_PATTERN =
  /^\s*(?:select|insert|update|delete|create|alter|drop|with)\b/im;
const CSS_AT_RULE_PATTERN = /@media|@import|@keyframes/;
const CSS_PROPERTY_PATTERN = /^\s*[a-z][\w-]*\s*:[^:]+;\s*$/;
const HTML_TAG_PATTERN =
  /<(?:!doctype|html|head|body|div|span|p|a|script|style)\b/i;
const JSX_PATTERN = /className=|from ['"]react['"]|<[A-Z]\w*[\s/>]/;

function isBashLine(line: string): boolean {
  const trimmed = line.trimStart();
  if (!trimmed) return false;
  if (trimmed.startsWith('#!') || trimmed.startsWith('$ ')) return true;

  const [first = '', second = ''] = trimmed.split(/\s+/);
  if (BASH_COMMANDS.has(first)) return true;
  return BASH_PACKAGE_MANAGERS.has(first) && BASH_VERBS.has(second);
}

function isCssSelectorLine(line: string): boolean {
  return /^\s*[.#]?[\w-]+[^{(]*\{\s*$/.test(line);
}

function looksLikeJson(sample: CodeSample): boolean {
  const start = sample.trimmedStart;
  if (!start.startsWith('{') && !start.startsWith('[')) return false;
  try {
    JSON.parse(sample.code);
    return true;
  } catch {
    return false;
  }
}

function looksLikeYaml(sample: CodeSample): boolean {
  const meaningful = sample.lines.filter((line) => line.trim().length > 0);
  return (
    meaningful.length > 0 &&
    meaningful.every((line) =>
      /^\s*(?:-\s+)?[\w"'.-]+:(?:\s|$)|^\s*-\s|^\s*#/.test(line)
    )
  );
}

interface LanguageRule {
  readonly lang: string;
  readonly weight: number;
  readonly match: (sample: CodeSample) => boolean;
}

const LANGUAGE_RULES: readonly LanguageRule[] = [
  { lang: 'json', weight: 30, match: looksLikeJson },
  { lang: 'rust', weight: 25, match: (s) => RUST_PATTERN.test(s.code) },
  { lang: 'go', weight: 22, match: (s) => GO_PATTERN.test(s.code) },
  { lang: 'jsx', weight: 22, match: (s) => JSX_PATTERN.test(s.code) },
  {
    lang: 'typescript',
    weight: 20,
    match: (s) => TYPESCRIPT_HINT_PATTERN.test(s.code),
  },
  { lang: 'sql', weight: 20, match: (s) => SQL_PATTERN.test(s.code) },
  {
    lang: 'python',
    weight: 18,
    match: (s) =>
      PYTHON_UNIQUE_PATTERN.test(s.code) ||
      (/^\s*(?:import|from)\s+\w+/m.test(s.code) &&
        !JS_SIGNAL_PATTERN.test(s.code) &&
        !s.code.includes('{')),
  },
  {
    lang: 'css',
    weight: 18,
    match: (s) =>
      CSS_AT_RULE_PATTERN.test(s.lower) ||
      (s.lines.some(isCssSelectorLine) &&
        s.lines.some((line) => CSS_PROPERTY_PATTERN.test(line))),
  },
  { lang: 'bash', weight: 15, match: (s) => s.lines.some(isBashLine) },
  { lang: 'javascript', weight: 15, match: (s) => JS_PATTERN.test(s.code) },
  { lang: 'html', weight: 12, match: (s) => HTML_TAG_PATTERN.test(s.code) },
  { lang: 'yaml', weight: 10, match: looksLikeYaml },
];

function normalizeLanguageToken(token: string): string | undefined {
  const trimmed = token.trim().toLowerCase();
  return LANGUAGE_TOKEN_PATTERN.test(trimmed) ? trimmed : undefined;
}

/**
 * `language-js`, `lang-js`, `highlight-js`, `brush: js` or a bare language
 * next to `hljs`.
 */
export function extractLanguageFromClassName(
  className: string
): string | undefined {
  const tokens = className.match(/\S+/g);
  if (!tokens) return undefined;

  for (const [index, token] of tokens.entries()) {
    const lower = token.toLowerCase();
    for (const prefix of CLASS_PREFIXES) {
      if (!lower.startsWith(prefix)) continue;
      const value = lower.slice(prefix.length) || (tokens[index + 1] ?? '');
      return normalizeLanguageToken(value.replace(/;$/, ''));
    }
  }

  if (!tokens.includes('hljs')) return undefined;
  const langClass = tokens.find((token) => {
    const lower = token.toLowerCase();
    return lower !== 'hljs' && !lower.startsWith('hljs-');
  });
  return langClass ? normalizeLanguageToken(langClass) : undefined;
}

export function resolveLanguageFromAttributes(
  className: string,
  dataLang: string
): string | undefined {
  return (
    extractLanguageFromClassName(className) ??
    normalizeLanguageToken(dataLang)
  );
}

/**
 * Best-weighted language whose content heuristic matches, if any.
 */
export function detectLanguageFromCode(code: string): string | undefined {
  if (!code.trim()) return undefined;

  const sample = new CodeSample(code);
  let best: LanguageRule | undefined;
  for (const rule of LANGUAGE_RULES) {
    if (best && rule.weight <= best.weight) continue;
    if (rule.match(sample)) best = rule;
  }
  return best?.lang;
}
