import type { FileResult, RenderOptions } from './types';

export interface RenderedBlock {
  /** 1-based, inclusive */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
  lines: string[];
}

/**
 * Resolves each interval of a result to the lines it covers. Bounds past the
 * end of the file are clamped to the last line.
 */
export function toBlocks(result: FileResult): RenderedBlock[] {
  const lastIndex = result.lines.length - 1;
  const blocks: RenderedBlock[] = [];
  for (const interval of result.intervals) {
    const end = Math.min(interval.end, lastIndex);
    if (interval.start > end) continue;
    blocks.push({
      startLine: interval.start + 1,
      endLine: end + 1,
      lines: result.lines.slice(interval.start, end + 1),
    });
  }
  return blocks;
}

export function formatLine(
  path: string,
  lineNumber: number,
  text: string,
  options: RenderOptions = {},
): string {
  let prefix = '';
  if (options.withFilename) prefix += `${path}:`;
  if (options.lineNumbers) prefix += `${lineNumber}: `;
  return prefix + text;
}

/**
 * Every covered line of a file, ascending, each at most once.
 */
export function renderFileResult(result: FileResult, options: RenderOptions = {}): string[] {
  const out: string[] = [];
  for (const block of toBlocks(result)) {
    block.lines.forEach((text, offset) => {
      out.push(formatLine(result.path, block.startLine + offset, text, options));
    });
  }
  return out;
}
