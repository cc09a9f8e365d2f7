/**
 * News Reader — HTML to Markdown
 *
 * Picks the main content container of an article page and renders it
 * as Markdown, collecting images along the way. Pure: no I/O.
 */

import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { collapseWhitespace } from '../lib/text';

export interface ExtractedImage {
  url: string;
  alt: string | null;
  caption: string | null;
}

export interface MarkdownResult {
  markdown: string;
  title: string | null;
  images: ExtractedImage[];
}

// ============================================================
// CONSTANTS
// ============================================================

const MIN_CONTAINER_TEXT = 200;
const MAX_METADATA_TEXT = 250;
const MAX_CONTROL_TEXT = 20;

const SKIPPED_TAGS = new Set([
  'script', 'style', 'noscript', 'svg', 'form', 'button',
  'audio', 'video', 'source', 'track', 'nav', 'footer', 'aside',
]);

const BLOCK_TAGS = new Set(['article', 'main', 'section', 'div', 'header', 'body']);

const METADATA_CANDIDATE_TAGS = new Set([
  'section', 'div', 'p', 'ul', 'ol', 'li', 'h2', 'h3', 'h4', 'h5', 'h6',
]);

const CONTROL_NEEDLES = ['play', 'audio', 'video'];

const CONTAINER_KEYWORDS = /(article|content|pub|body)/i;
const PLAYER_CLASS = /(player|audio|video|vjs|media|play)/i;
const METADATA_CLASS = /(publication|issue|magazine|context|related|footer|language|promo|share)/i;

const IMAGE_SIZE_ATTRIBUTES = [
  'data-original', 'data-largest', 'data-large', 'data-medium', 'data-small', 'data-smallest',
];

const META_IMAGE_SELECTORS = [
  'meta[property="og:image"]',
  'meta[property="og:image:secure_url"]',
  'meta[name="twitter:image"]',
  'meta[name="twitter:image:src"]',
  'meta[itemprop="image"]',
];

// ============================================================
// DOM HELPERS
// ============================================================

function collectText(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!isTag(node)) return '';
  return node.children.map(collectText).join('');
}

function normalizedText(node: AnyNode): string {
  return collapseWhitespace(collectText(node));
}

function findFirstTag(element: Element, name: string): Element | undefined {
  for (const child of element.children) {
    if (!isTag(child)) continue;
    if (child.name === name) return child;
    const found = findFirstTag(child, name);
    if (found) return found;
  }
  return undefined;
}

function classAndId(element: Element): string {
  return `${element.attribs.id ?? ''} ${element.attribs.class ?? ''}`.trim();
}

function hasExactText(element: Element, target: string): boolean {
  if (normalizedText(element) === target) return true;
  return element.children.some(child => isTag(child) && hasExactText(child, target));
}

function resolveUrl(href: string, base: URL): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function attr(element: Element, name: string): string | undefined {
  const value = element.attribs[name]?.trim();
  return value ? value : undefined;
}

// ============================================================
// IMAGES
// ============================================================

/**
 * Largest candidate of a srcset by its width or density descriptor.
 * Ties go to the later candidate.
 */
export function bestSrcsetCandidate(srcset: string): string | undefined {
  let best: { url: string; score: number } | undefined;

  for (const part of srcset.split(',')) {
    const [url, descriptor] = part.trim().split(/\s+/);
    if (!url) continue;

    let score = 0;
    if (descriptor && /[wx]$/.test(descriptor)) {
      const parsed = Number.parseFloat(descriptor.slice(0, -1));
      score = Number.isNaN(parsed) ? 0 : parsed;
    }

    if (!best || score >= best.score) {
      best = { url, score };
    }
  }

  return best?.url;
}

function imageSource(img: Element, base: URL): string | null {
  const src =
    attr(img, 'data-src') ??
    attr(img, 'src') ??
    IMAGE_SIZE_ATTRIBUTES.map(name => attr(img, name)).find(Boolean) ??
    bestSrcsetCandidate(attr(img, 'srcset') ?? attr(img, 'data-srcset') ?? '');

  return src ? resolveUrl(src, base) : null;
}

function imageAlt(img: Element): string | null {
  return attr(img, 'alt') ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function imageFromJsonLd(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = imageFromJsonLd(item);
      if (found) return found;
    }
    return undefined;
  }
  if (!isRecord(value)) return undefined;

  for (const key of ['image', 'thumbnailUrl']) {
    const candidate = value[key];
    if (typeof candidate === 'string') return candidate;
    if (isRecord(candidate) && typeof candidate.url === 'string') return candidate.url;
    if (Array.isArray(candidate)) {
      for (const item of candidate) {
        if (typeof item === 'string') return item;
        if (isRecord(item) && typeof item.url === 'string') return item.url;
      }
    }
  }

  for (const nested of Object.values(value)) {
    const found = imageFromJsonLd(nested);
    if (found) return found;
  }
  return undefined;
}

/**
 * Page-level image for articles whose body has none: social meta
 * tags first, then JSON-LD.
 */
function fallbackImage($: cheerio.CheerioAPI, base: URL): string | null {
  for (const selector of META_IMAGE_SELECTORS) {
    const content = $(selector).first().attr('content')?.trim();
    if (content) return resolveUrl(content, base) ?? content;
  }

  for (const script of $('script[type="application/ld+json"]').toArray()) {
    let data: unknown;
    try {
      data = JSON.parse(collectText(script));
    } catch {
      continue;
    }
    const found = imageFromJsonLd(data);
    if (found) return resolveUrl(found, base) ?? found;
  }

  return null;
}

// ============================================================
// CONTAINER
// ============================================================

function findContainer($: cheerio.CheerioAPI): Element | undefined {
  const article = $('article').get(0);
  if (article) return article;

  const main = $('main').get(0);
  if (main) return main;

  let best: Element | undefined;
  let bestLength = 0;
  for (const div of $('div').toArray()) {
    if (!CONTAINER_KEYWORDS.test(classAndId(div))) continue;
    const length = normalizedText(div).length;
    if (length > bestLength) {
      best = div;
      bestLength = length;
    }
  }
  if (best && bestLength >= MIN_CONTAINER_TEXT) return best;

  return $('body').get(0);
}

// ============================================================
// MARKDOWN WALK
// ============================================================

class MarkdownWalker {
  readonly images: ExtractedImage[] = [];

  constructor(
    private readonly base: URL,
    private readonly title: string | null
  ) {}

  render(element: Element): string {
    if (this.shouldSkip(element)) return '';

    const name = element.name;

    switch (name) {
      case 'h1':
      case 'h2':
      case 'h3':
      case 'h4':
      case 'h5':
      case 'h6': {
        const text = normalizedText(element);
        return text ? `${'#'.repeat(Number(name[1]))} ${text}\n\n` : '';
      }

      case 'figure':
        return this.figure(element);

      case 'img':
        return this.image(element, null);

      case 'picture': {
        const img = findFirstTag(element, 'img');
        return img ? this.image(img, null) : '';
      }

      case 'a': {
        const content = this.children(element).trim();
        if (!content) return '';
        const href = attr(element, 'href');
        return href ? `[${content}](${resolveUrl(href, this.base) ?? href})` : content;
      }

      case 'p': {
        const content = this.children(element).trim();
        return content ? `${content}\n\n` : '';
      }

      case 'br':
        return '\n';

      case 'hr':
        return '\n---\n\n';

      case 'ul':
      case 'ol':
        return this.list(element, name === 'ol');

      case 'li': {
        const content = this.children(element).trim();
        return content ? `- ${content}\n` : '';
      }

      case 'strong':
      case 'b': {
        const content = this.children(element).trim();
        return content ? `**${content}**` : '';
      }

      case 'em':
      case 'i': {
        const content = this.children(element).trim();
        return content ? `*${content}*` : '';
      }

      case 'blockquote': {
        const content = this.children(element).trim();
        if (!content) return '';
        return `${content.split('\n').map(line => `> ${line}`).join('\n')}\n\n`;
      }

      case 'pre':
        return `\`\`\`\n${collectText(element)}\n\`\`\`\n\n`;

      case 'code':
        return `\`${collectText(element)}\``;

      default: {
        const content = this.children(element);
        if (!BLOCK_TAGS.has(name)) return content;
        return content.trim() ? `${content.trim()}\n\n` : '';
      }
    }
  }

  private children(element: Element): string {
    let out = '';
    for (const child of element.children) {
      if (isText(child)) {
        // Source indentation is not content
        const text = child.data.replace(/\s+/g, ' ');
        out += out === '' || out.endsWith('\n') ? text.trimStart() : text;
      } else if (isTag(child)) {
        out += this.render(child);
      }
    }
    return out;
  }

  private shouldSkip(element: Element): boolean {
    if (SKIPPED_TAGS.has(element.name)) return true;

    // Player controls
    for (const name of ['aria-label', 'title']) {
      const value = element.attribs[name]?.toLowerCase();
      if (value && CONTROL_NEEDLES.some(needle => value.includes(needle))) return true;
    }

    const role = element.attribs.role?.toLowerCase();
    if ((role === 'button' || role === 'link') && normalizedText(element).toLowerCase() === 'play') {
      return true;
    }

    const marker = classAndId(element);
    if (
      PLAYER_CLASS.test(marker) &&
      !findFirstTag(element, 'img') &&
      !findFirstTag(element, 'picture') &&
      normalizedText(element).length <= MAX_CONTROL_TEXT
    ) {
      return true;
    }

    // Short metadata blocks (issue info, share bars, related links)
    if (
      METADATA_CANDIDATE_TAGS.has(element.name) &&
      marker &&
      METADATA_CLASS.test(marker) &&
      normalizedText(element).length <= MAX_METADATA_TEXT &&
      !(this.title && hasExactText(element, this.title))
    ) {
      return true;
    }

    return false;
  }

  private image(img: Element, caption: string | null): string {
    const url = imageSource(img, this.base);
    if (!url) return '';

    const alt = imageAlt(img);
    this.images.push({ url, alt, caption });
    return `![${alt ?? ''}](${url})\n\n`;
  }

  private figure(element: Element): string {
    const img = findFirstTag(element, 'img');
    if (!img) return '';

    const figcaption = findFirstTag(element, 'figcaption');
    const caption = figcaption ? normalizedText(figcaption) || null : null;

    const rendered = this.image(img, caption);
    if (!rendered || !caption) return rendered;
    return `${rendered}*${caption}*\n\n`;
  }

  private list(element: Element, ordered: boolean): string {
    let out = '';
    let index = 1;

    for (const child of element.children) {
      if (!isTag(child) || child.name !== 'li') continue;
      const content = this.children(child).trim();
      if (!content) continue;
      out += ordered ? `${index++}. ${content}\n` : `- ${content}\n`;
    }

    return out ? `${out}\n` : '';
  }
}

// ============================================================
// POST-PROCESSING
// ============================================================

function ensureTitleHeading(markdown: string, title: string): string {
  const heading = `# ${title}`;
  const lines = markdown.split('\n');
  if (lines.some(line => line.trim() === heading)) return markdown;

  const first = lines.findIndex(line => line.trim() !== '');
  if (first === -1) return heading;

  if (lines[first].trim() === title) {
    lines[first] = heading;
    return lines.join('\n');
  }

  return `${heading}\n\n${markdown}`;
}

function insertAfterHeading(markdown: string, imageMarkdown: string): string {
  const lines = markdown.split('\n');
  const first = lines.findIndex(line => line.trim() !== '');
  if (first === -1) return imageMarkdown;

  if (!lines[first].startsWith('# ')) {
    return `${imageMarkdown}\n\n${markdown}`;
  }

  const head = lines.slice(0, first + 1).join('\n');
  const tail = lines.slice(first + 1).join('\n').trim();
  return tail ? `${head}\n\n${imageMarkdown}\n\n${tail}` : `${head}\n\n${imageMarkdown}`;
}

// ============================================================
// MAIN EXTRACTION
// ============================================================

/**
 * Convert an article page to Markdown. `baseUrl` resolves relative
 * links and image sources.
 */
export function htmlToMarkdown(html: string, baseUrl: string): MarkdownResult {
  const $ = cheerio.load(html);
  const base = new URL(baseUrl);

  const container = findContainer($);
  const h1 = container ? findFirstTag(container, 'h1') : undefined;
  const pageTitle = collapseWhitespace($('title').first().text());
  const title = (h1 ? normalizedText(h1) : '') || pageTitle || null;

  const walker = new MarkdownWalker(base, title);
  let markdown = container ? walker.render(container) : '';
  markdown = markdown.replace(/\n{3,}/g, '\n\n').trim();

  if (title) {
    markdown = ensureTitleHeading(markdown, title);
  }

  const images = walker.images;
  if (images.length === 0) {
    const fallback = fallbackImage($, base);
    if (fallback) {
      const image: ExtractedImage = { url: fallback, alt: title, caption: null };
      images.push(image);
      markdown = insertAfterHeading(markdown, `![${image.alt ?? ''}](${image.url})`);
    }
  }

  return { markdown, title, images };
}
