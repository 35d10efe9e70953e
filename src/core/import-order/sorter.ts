/**
 * @arch fmtkit.core.domain
 *
 * Canonical grouping of Java import statements.
 */
import type { UnmatchedImports } from '../config/schema.js';

export interface ImportSortOptions {
  /** Group prefixes in emission order */
  order: readonly string[];
  /** Placement of imports that match no configured prefix */
  unmatched: UnmatchedImports;
}

export interface JavaImport {
  /** Fully qualified name, e.g. `java.util.List` or `java.util.*` */
  name: string;
  isStatic: boolean;
}

const COMMENT_LINE_RE = /^[ \t]*(?:\/\/|\/\*|\*)/;
const BOM = '\uFEFF';

const IMPORT_LINE_RE = /^[ \t]*import\s+(static\s+)?([\w$]+(?:\s*\.\s*[\w$]+)*(?:\s*\.\s*\*)?)\s*;\s*$/;

/**
 * Parse one line as an import statement, or null.
 */
export function parseImportLine(line: string): JavaImport | null {
  const match = IMPORT_LINE_RE.exec(line);
  if (!match) return null;
  return { name: match[2].replace(/\s+/g, ''), isStatic: match[1] !== undefined };
}

function matchesPrefix(name: string, prefix: string): boolean {
  return name === prefix || name.startsWith(`${prefix}.`);
}

/**
 * Index of the group an import belongs to, or -1 when unmatched.
 * The first non-empty prefix matching the name wins; failing that, the
 * first empty prefix (the configured catch-all) takes it.
 */
export function findGroup(name: string, order: readonly string[]): number {
  const direct = order.findIndex((prefix) => prefix !== '' && matchesPrefix(name, prefix));
  return direct !== -1 ? direct : order.indexOf('');
}

/**
 * Split imports into ordered groups.
 * Relative order inside a group is the input order; empty groups are dropped.
 */
export function groupImports<T extends { name: string }>(imports: readonly T[], options: ImportSortOptions): T[][] {
  const buckets: T[][] = options.order.map(() => []);
  const unmatched: T[] = [];

  for (const entry of imports) {
    const group = findGroup(entry.name, options.order);
    if (group === -1) {
      unmatched.push(entry);
    } else {
      buckets[group].push(entry);
    }
  }

  const ordered = options.unmatched === 'first' ? [unmatched, ...buckets] : [...buckets, unmatched];
  return ordered.filter((group) => group.length > 0);
}

function renderImport(entry: JavaImport): string {
  return `import ${entry.isStatic ? 'static ' : ''}${entry.name};`;
}

/**
 * Rewrite the import block of a Java compilation unit.
 *
 * The block starts at the first import line and runs over the imports,
 * blank lines and comments that follow it; the first other line ends it.
 * Static imports come first, then regular imports; groups are separated by
 * one blank line. A block with comments between its imports is returned
 * unchanged. A leading byte order mark is kept.
 */
export function sortImports(code: string, options: ImportSortOptions): string {
  const bom = code.startsWith(BOM) ? BOM : '';
  const lines = code.slice(bom.length).split('\n');
  const parsed = lines.map((line) => parseImportLine(line.replace(/\r$/, '')));

  const first = parsed.findIndex((entry) => entry !== null);
  if (first === -1) return code;
  let last = first;
  for (let i = first + 1; i < lines.length; i++) {
    if (parsed[i] !== null) {
      last = i;
    } else if (lines[i].trim() !== '' && !COMMENT_LINE_RE.test(lines[i])) {
      break;
    }
  }

  const imports: JavaImport[] = [];
  for (let i = first; i <= last; i++) {
    const entry = parsed[i];
    if (entry) {
      imports.push(entry);
    } else if (lines[i].trim() !== '') {
      return code;
    }
  }

  const sections = [
    groupImports(imports.filter((entry) => entry.isStatic), options),
    groupImports(imports.filter((entry) => !entry.isStatic), options),
  ];
  const block: string[] = [];
  for (const group of sections.flat()) {
    if (block.length > 0) block.push('');
    block.push(...group.map(renderImport));
  }

  return bom + [...lines.slice(0, first), ...block, ...lines.slice(last + 1)].join('\n');
}
