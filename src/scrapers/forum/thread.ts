import * as cheerio from 'cheerio';
import { isTag, isText, type Element } from 'domhandler';
import { ParseError } from '../../errors.js';
import type { ParseResult } from '../../types.js';
import { findBoldLabel, findNextAfter, normalizeText, resolveUrl, spoilerText } from './dom.js';
import { extractDownloadLinks } from './downloads.js';
import { normalizeContentImages } from './images.js';
import { extractMetadata, extractOverview, inferPlatforms } from './metadata.js';
import { disambiguateTitle, stripLabels } from './title.js';
import type { GameRecord, ThreadParseOptions, ThreadSummary } from './types.js';

const SPOILER = 'div.bbCodeSpoiler';

function pushUnique(target: string[], value: string): void {
  if (value && !target.includes(value)) {
    target.push(value);
  }
}

/**
 * Genre as written after a bold "Genre:" label: the text up to the next bold
 * label or line break, or the spoiler that follows when there is no such text.
 */
function extractGenre($: cheerio.CheerioAPI, content: cheerio.Cheerio<Element>): string | undefined {
  const label = findBoldLabel($, content, 'Genre');
  if (!label) {
    return undefined;
  }

  const parts: string[] = [];
  for (let node = label.next; node; node = node.next) {
    if (isTag(node) && (node.name === 'b' || node.name === 'br')) {
      break;
    }
    if (isText(node)) {
      const text = node.data.trim();
      if (text && text !== ':') {
        parts.push(text.replace(/^:\s*/, ''));
      }
    }
  }
  const inline = parts.join(' ').trim();
  if (inline) {
    return inline;
  }

  const spoiler = findNextAfter($, content, label, SPOILER);
  if (spoiler) {
    const text = normalizeText(spoilerText($, spoiler));
    return text || undefined;
  }
  return undefined;
}

function extractSpoilerSection(
  $: cheerio.CheerioAPI,
  content: cheerio.Cheerio<Element>,
  label: string
): string | undefined {
  const anchor = findBoldLabel($, content, label);
  if (!anchor) {
    return undefined;
  }
  const spoiler = findNextAfter($, content, anchor, SPOILER);
  if (!spoiler) {
    return undefined;
  }
  const text = spoilerText($, spoiler);
  return text || undefined;
}

function extractDeveloperUrl(
  $: cheerio.CheerioAPI,
  content: cheerio.Cheerio<Element>,
  baseUrl: string
): string | undefined {
  const anchor = findBoldLabel($, content, 'Developer');
  if (!anchor) {
    return undefined;
  }
  const link = findNextAfter($, content, anchor, 'a[href]');
  const href = link ? $(link).attr('href') : undefined;
  return href ? resolveUrl(href, baseUrl) : undefined;
}

/**
 * Builds a game record from a thread page. Only the title, the first post and
 * its content wrapper are required; every other field is best effort.
 */
export function parseThreadPage(html: string, summary: ThreadSummary, options: ThreadParseOptions): ParseResult {
  const $ = cheerio.load(html);

  const titleElem = $('h1.p-title-value').first();
  if (!titleElem.length) {
    return { ok: false, error: new ParseError('Could not find title', summary.threadId) };
  }

  const firstPost = $('article.message-body').first();
  if (!firstPost.length) {
    return { ok: false, error: new ParseError('Could not find first post content', summary.threadId) };
  }

  const content = firstPost.find('div.bbWrapper').first();
  if (!content.length) {
    return { ok: false, error: new ParseError('Could not find content wrapper', summary.threadId) };
  }

  const fullTitle = titleElem.text().trim();
  const labels = titleElem
    .find('span.label, span.pre-renpy')
    .toArray()
    .map(element => $(element).text().trim());
  const categories: string[] = [];
  labels.forEach(label => pushUnique(categories, label));

  const tags = $('span.js-tagList a.tagItem')
    .toArray()
    .map(element => $(element).text().trim())
    .filter(Boolean);

  const { title, version, developer } = disambiguateTitle(stripLabels(fullTitle, labels));

  const bodyText = content.text();
  inferPlatforms(bodyText).forEach(platform => pushUnique(categories, platform));
  const metadata = extractMetadata(bodyText);
  const overview = extractOverview(bodyText);
  const genre = extractGenre($, content);
  const developerUrl = extractDeveloperUrl($, content, options.baseUrl);
  const changelog = extractSpoilerSection($, content, 'Changelog');
  const installation = extractSpoilerSection($, content, 'Installation');
  const downloadLinks = extractDownloadLinks($, content);

  const { images, featuredImage } = normalizeContentImages(
    $,
    content,
    options.attachmentHost,
    options.imageProxyBase
  );

  const record: GameRecord = {
    ...summary,
    ...metadata,
    title,
    version,
    developer,
    categories,
    tags,
    content: $.html(content),
    downloadLinks,
    images,
    useExternalImages: featuredImage !== undefined
  };

  if (genre) record.genre = genre;
  if (overview) record.overview = overview;
  if (developerUrl) record.developerUrl = developerUrl;
  if (changelog) record.changelog = changelog;
  if (installation) record.installation = installation;
  if (featuredImage) record.featuredImage = featuredImage;

  return { ok: true, record };
}
