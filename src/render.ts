import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

/**
 * Render a Markdown answer for the terminal. Falls back to the raw text if
 * the renderer hands back anything but a string.
 */
export function renderMarkdown(content: string, width: number = process.stdout.columns || 80): string {
  const marked = new Marked(
    markedTerminal({ width: Math.max(width - 2, 20), reflowText: true, showSectionPrefix: false })
  );
  const rendered = marked.parse(content, { async: false });
  return typeof rendered === 'string' ? rendered.trimEnd() : content;
}
