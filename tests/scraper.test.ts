import { afterEach, describe, expect, it, vi } from 'vitest';
import { ScraperTool, extractMainContent, extractMetadata } from '../lib/tools/scraper';

const ARTICLE_HTML = `<html><head><title>Fallback title</title>
<meta property="og:title" content="Rover Finds Water">
<meta name="author" content="Jane Doe">
<meta property="article:published_time" content="2024-05-01T09:00:00Z">
</head><body><nav>Home | World</nav><article><h1>Rover Finds Water</h1><p>The rover found &amp; confirmed ice.</p><script>track()</script></article><footer>Copyright</footer></body></html>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('extractMetadata', () => {
  it('prefers Open Graph and article tags', () => {
    expect(extractMetadata(ARTICLE_HTML)).toEqual({
      title: 'Rover Finds Water',
      authors: ['Jane Doe'],
      published_date: '2024-05-01T09:00:00Z',
    });
  });

  it('falls back to the title tag and <time>', () => {
    const html = '<title>Plain &amp; simple</title><time datetime="2024-02-03">Feb 3</time>';
    expect(extractMetadata(html)).toEqual({
      title: 'Plain & simple',
      authors: [],
      published_date: '2024-02-03',
    });
  });
});

describe('extractMainContent', () => {
  it('keeps the article body without chrome or scripts', () => {
    expect(extractMainContent(ARTICLE_HTML)).toBe('Rover Finds Water The rover found & confirmed ice.');
  });

  it('uses the body when no article markup exists', () => {
    const html = '<body><header>Site</header><p>Only paragraph.</p></body>';
    expect(extractMainContent(html)).toBe('Only paragraph.');
  });

  it('caps the text length', () => {
    expect(extractMainContent('<main>abcdefghij</main>', 4)).toBe('abcd');
  });
});

describe('ScraperTool', () => {
  it('scrapes each URL independently and keeps order', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) => {
        if (url.endsWith('/ok')) {
          return new Response(ARTICLE_HTML, {
            status: 200,
            headers: { 'content-type': 'text/html; charset=utf-8' },
          });
        }
        if (url.endsWith('/pdf')) {
          return new Response('%PDF', { status: 200, headers: { 'content-type': 'application/pdf' } });
        }
        return new Response('nope', { status: 404, statusText: 'Not Found' });
      })
    );

    const results = await new ScraperTool().scrapeUrls([
      'https://example.com/ok',
      'https://example.com/missing',
      'https://example.com/pdf',
    ]);

    expect(results[0]).toEqual({
      original_url: 'https://example.com/ok',
      final_url: 'https://example.com/ok',
      title: 'Rover Finds Water',
      authors: ['Jane Doe'],
      published_date: '2024-05-01T09:00:00Z',
      full_text: 'Rover Finds Water The rover found & confirmed ice.',
      success: true,
    });
    expect(results[1]).toEqual(
      expect.objectContaining({
        original_url: 'https://example.com/missing',
        error: 'HTTP 404: Not Found',
        success: false,
      })
    );
    expect(results[2]).toEqual(
      expect.objectContaining({ error: 'Unsupported content type: application/pdf', success: false })
    );
  });

  it('uses the extractor for long pages and keeps heuristic text when it fails', async () => {
    const body = `<article><p>${'Sentence about the rover. '.repeat(20)}</p></article>`;
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(body, { status: 200, headers: { 'content-type': 'text/html' } }))
    );

    const cleaned = await new ScraperTool({ extract: async () => '  Clean article text  ' }).scrapeUrl(
      'https://example.com/a'
    );
    expect(cleaned.success && cleaned.full_text).toBe('Clean article text');

    const fallback = await new ScraperTool({
      extract: async () => {
        throw new Error('model down');
      },
    }).scrapeUrl('https://example.com/b');
    expect(fallback.success && fallback.full_text).toBe('Sentence about the rover. '.repeat(20).trim());
  });
});
