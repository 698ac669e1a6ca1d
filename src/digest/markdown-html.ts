import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';

const processor = unified().use(remarkParse).use(remarkRehype).use(rehypeStringify);

/**
 * Escape text for use inside a markdown link label
 */
export function escapeLinkText(text: string): string {
  return text.replace(/[\\[\]]/g, (char) => `\\${char}`);
}

/**
 * Render digest markdown as an HTML fragment for email bodies.
 * Raw HTML in the source is dropped rather than passed through.
 */
export function markdownToHtml(markdown: string): string {
  return String(processor.processSync(markdown)).trim();
}
