export { DigestRenderer, formatDigestDate, saveDigest } from './renderer.js';
export { markdownToHtml, escapeLinkText } from './markdown-html.js';
export type { DigestInput } from './types.js';
