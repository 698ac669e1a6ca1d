import { describe, it, expect } from 'vitest';
import { escapeLinkText, markdownToHtml } from './markdown-html.js';

describe('escapeLinkText', () => {
  it('should escape brackets and backslashes', () => {
    expect(escapeLinkText('Rates [Docket 2] a\\b')).toBe('Rates \\[Docket 2\\] a\\\\b');
  });
});

describe('markdownToHtml', () => {
  it('should convert headings and nested lists', () => {
    const html = markdownToHtml(['# Title', '', '- **a**', '  - b', '- c'].join('\n'));

    expect(html).toContain('<h1>Title</h1>');
    expect(html).toContain('<li><strong>a</strong>');
    expect(html).toContain('<li>b</li>');
    expect(html).toContain('<li>c</li>');
  });

  it('should render rules and emphasised paragraphs', () => {
    const html = markdownToHtml('## Bills\n\n---\n\n_Generated today._');

    expect(html).toContain('<h2>Bills</h2>');
    expect(html).toContain('<hr>');
    expect(html).toContain('<p><em>Generated today.</em></p>');
  });

  it('should link titles that contain a bracketed docket number', () => {
    const title = escapeLinkText('Flood Rates [Docket FEMA-2025-0002]');

    const html = markdownToHtml(`- **[${title}](https://example.gov/d/1)** (Rule)`);

    expect(html).toContain(
      '<li><strong><a href="https://example.gov/d/1">Flood Rates [Docket FEMA-2025-0002]</a></strong> (Rule)</li>'
    );
  });

  it('should drop raw html', () => {
    expect(markdownToHtml('- <script>')).not.toContain('<script');
  });
});
