/**
 * Line-level scanning shared by the extractors
 */

export interface Line {
  /** Line text without its terminator */
  text: string;
  start: number;
  end: number;
  /** Offset of the following line */
  next: number;
}

export interface Region {
  start: number;
  end: number;
}

export interface FrontmatterBlock extends Region {
  /** YAML text between the delimiters */
  source: string;
  /** Offset of `source` in the document */
  sourceStart: number;
}

export interface CodeFence extends Region {
  language: string | null;
  code: string;
  closed: boolean;
}

export interface ScannedDocument {
  lines: Line[];
  frontmatter: FrontmatterBlock | null;
  fences: CodeFence[];
  /** Lines outside front matter and fenced code */
  bodyLines: Line[];
}

const FENCE_OPEN = /^[ \t]*```[ \t]*([^\s`]+)?/;
const FENCE_CLOSE = /^[ \t]*```[ \t]*$/;

export function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  let start = 0;

  while (start <= content.length) {
    const newline = content.indexOf('\n', start);
    const next = newline === -1 ? content.length : newline + 1;
    let end = newline === -1 ? content.length : newline;
    if (end > start && content[end - 1] === '\r') {
      end -= 1;
    }
    lines.push({ text: content.slice(start, end), start, end, next });
    if (newline === -1) {
      break;
    }
    start = next;
  }

  return lines;
}

/**
 * A `---` delimited block on the very first line
 */
export function findFrontmatter(content: string, lines: Line[] = splitLines(content)): FrontmatterBlock | null {
  if (lines.length < 2 || lines[0].text.trimEnd() !== '---') {
    return null;
  }

  for (let i = 1; i < lines.length; i++) {
    const text = lines[i].text.trimEnd();
    if (text === '---' || text === '...') {
      const sourceStart = lines[0].next;
      return {
        start: 0,
        end: lines[i].end,
        source: content.slice(sourceStart, lines[i].start),
        sourceStart,
      };
    }
  }

  return null;
}

/**
 * Triple-backtick fences. An unterminated fence runs to the end.
 */
export function findCodeFences(content: string, lines: Line[], from: number = 0): CodeFence[] {
  const fences: CodeFence[] = [];
  let open: { line: Line; language: string | null } | null = null;

  for (const line of lines) {
    if (line.start < from) {
      continue;
    }

    if (open === null) {
      const match = FENCE_OPEN.exec(line.text);
      if (match) {
        open = { line, language: match[1] ?? null };
      }
      continue;
    }

    if (FENCE_CLOSE.test(line.text)) {
      const code = line.start > open.line.next
        ? content.slice(open.line.next, line.start).replace(/\r?\n$/, '')
        : '';
      fences.push({ start: open.line.start, end: line.end, language: open.language, code, closed: true });
      open = null;
    }
  }

  if (open !== null) {
    fences.push({
      start: open.line.start,
      end: content.length,
      language: open.language,
      code: content.slice(Math.min(open.line.next, content.length)).replace(/\r?\n$/, ''),
      closed: false,
    });
  }

  return fences;
}

export function inRegions(regions: readonly Region[], offset: number): boolean {
  return regions.some((region) => offset >= region.start && offset < region.end);
}

export function scanDocument(content: string): ScannedDocument {
  const lines = splitLines(content);
  const frontmatter = findFrontmatter(content, lines);
  const fences = findCodeFences(content, lines, frontmatter ? frontmatter.end : 0);
  const blocked: Region[] = frontmatter ? [frontmatter, ...fences] : fences;

  return {
    lines,
    frontmatter,
    fences,
    bodyLines: lines.filter((line) => !inRegions(blocked, line.start)),
  };
}

/**
 * Replace every character but newlines with a space, keeping offsets stable
 */
export function blankOut(text: string): string {
  return text.replace(/[^\n]/g, ' ');
}

export function blankRegions(content: string, regions: readonly Region[]): string {
  let result = content;
  for (const region of regions) {
    result = result.slice(0, region.start) + blankOut(result.slice(region.start, region.end)) + result.slice(region.end);
  }
  return result;
}

export function blankMatches(content: string, pattern: RegExp): string {
  return content.replace(pattern, (match) => blankOut(match));
}
