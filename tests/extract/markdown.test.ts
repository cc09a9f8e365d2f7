/**
 * Tests for article HTML to Markdown conversion.
 */

import { describe, it, expect } from 'vitest';
import { htmlToMarkdown, bestSrcsetCandidate } from '../../src/extract/markdown';

const BASE = 'https://news.example/world/storm';

describe('bestSrcsetCandidate', () => {
  it('should pick the widest candidate', () => {
    expect(bestSrcsetCandidate('/s.jpg 320w, /l.jpg 1024w, /m.jpg 640w')).toBe('/l.jpg');
  });

  it('should read density descriptors', () => {
    expect(bestSrcsetCandidate('a.jpg 1x, b.jpg 2x')).toBe('b.jpg');
  });

  it('should prefer the later candidate on ties', () => {
    expect(bestSrcsetCandidate('a.jpg 100w, b.jpg 100w')).toBe('b.jpg');
    expect(bestSrcsetCandidate('only.jpg')).toBe('only.jpg');
  });

  it('should return undefined for an empty srcset', () => {
    expect(bestSrcsetCandidate('')).toBeUndefined();
  });
});

describe('htmlToMarkdown', () => {
  it('should render the article element and drop page chrome', () => {
    const html = `<html><head><title>Storm hits coast | Example News</title></head><body>
      <nav><a href="/">Home</a></nav>
      <article>
        <h1>Storm hits coast</h1>
        <p>Heavy <b>rain</b> is <a href="/weather">expected</a> tonight.</p>
        <ul>
          <li>Roads closed</li>
          <li>Schools shut</li>
        </ul>
        <script>track()</script>
      </article>
      <footer>Copyright</footer>
    </body></html>`;

    const result = htmlToMarkdown(html, BASE);

    expect(result.title).toBe('Storm hits coast');
    expect(result.markdown).toBe(
      '# Storm hits coast\n\n' +
        'Heavy **rain** is [expected](https://news.example/weather) tonight.\n\n' +
        '- Roads closed\n- Schools shut'
    );
    expect(result.images).toEqual([]);
  });

  it('should fall back to the page title and add it as a heading', () => {
    const html = '<html><head><title>Quiet day</title></head><body><p>Nothing happened.</p></body></html>';

    const result = htmlToMarkdown(html, BASE);

    expect(result.title).toBe('Quiet day');
    expect(result.markdown).toBe('# Quiet day\n\nNothing happened.');
  });

  it('should collect figures with captions and lazy-loaded images', () => {
    const html = `<article>
      <h1>Photos</h1>
      <figure>
        <img srcset="/s.jpg 320w, /l.jpg 1024w, /m.jpg 640w" alt="Flooded street">
        <figcaption> Water  rising </figcaption>
      </figure>
      <p><img data-src="/lazy.jpg" src="/placeholder.gif"></p>
    </article>`;

    const result = htmlToMarkdown(html, BASE);

    expect(result.markdown).toBe(
      '# Photos\n\n' +
        '![Flooded street](https://news.example/l.jpg)\n\n' +
        '*Water rising*\n\n' +
        '![](https://news.example/lazy.jpg)'
    );
    expect(result.images).toEqual([
      { url: 'https://news.example/l.jpg', alt: 'Flooded street', caption: 'Water rising' },
      { url: 'https://news.example/lazy.jpg', alt: null, caption: null },
    ]);
  });

  it('should place a social image after the heading when the body has none', () => {
    const html = `<html><head>
      <meta property="og:image" content="/cover.jpg">
    </head><body><article><h1>Budget passes</h1><p>The council voted.</p></article></body></html>`;

    const result = htmlToMarkdown(html, BASE);

    expect(result.markdown).toBe(
      '# Budget passes\n\n![Budget passes](https://news.example/cover.jpg)\n\nThe council voted.'
    );
    expect(result.images).toEqual([
      { url: 'https://news.example/cover.jpg', alt: 'Budget passes', caption: null },
    ]);
  });

  it('should read a fallback image from JSON-LD', () => {
    const jsonLd = JSON.stringify({
      '@context': 'https://schema.org',
      '@type': 'NewsArticle',
      headline: 'Rates held',
      image: { '@type': 'ImageObject', url: 'https://cdn.example/a.jpg' },
    });
    const html = `<html><head><script type="application/ld+json">${jsonLd}</script></head>
      <body><article><h1>Rates held</h1><p>Unchanged.</p></article></body></html>`;

    const result = htmlToMarkdown(html, BASE);

    expect(result.images[0].url).toBe('https://cdn.example/a.jpg');
    expect(result.markdown).toBe('# Rates held\n\n![Rates held](https://cdn.example/a.jpg)\n\nUnchanged.');
  });

  it('should skip player controls and short metadata blocks', () => {
    const html = `<article>
      <h1>Interview</h1>
      <div class="audio-player"><span>Play</span></div>
      <button>Listen</button>
      <div aria-label="Play video">0:00</div>
      <div class="share-bar"><a href="/x">Share</a></div>
      <p>She said yes.</p>
    </article>`;

    expect(htmlToMarkdown(html, BASE).markdown).toBe('# Interview\n\nShe said yes.');
  });

  it('should render quotes and ordered lists', () => {
    const html = `<article>
      <h1>Q</h1>
      <blockquote><p>One</p><p>Two</p></blockquote>
      <ol><li>First</li><li></li><li>Second</li></ol>
    </article>`;

    expect(htmlToMarkdown(html, BASE).markdown).toBe('# Q\n\n> One\n> \n> Two\n\n1. First\n2. Second');
  });

  it('should prefer a long content div over the whole body', () => {
    const story = Array.from({ length: 50 }, () => 'Word').join(' ');
    const html = `<body><div class="sidebar">Short links</div><div class="story-content"><p>${story}</p></div></body>`;

    const result = htmlToMarkdown(html, BASE);

    expect(result.markdown).toBe(story);
    expect(result.title).toBeNull();
  });

  it('should use the whole body when no content div is long enough', () => {
    const html = '<body><div class="sidebar">Short links</div><div class="story-content"><p>Tiny story.</p></div></body>';

    expect(htmlToMarkdown(html, BASE).markdown).toBe('Short links\n\nTiny story.');
  });
});
