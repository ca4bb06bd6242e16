import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

export interface ImageSummary {
  images: string[];
  featuredImage?: string;
}

function isPlaceholder(src: string): boolean {
  return !src || src.startsWith('data:') || src.includes('data:image') || src.includes('svg+xml');
}

function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function toFullResolution(url: string): string {
  return url.replace('/thumb/', '/');
}

export function buildProxyUrl(imageProxyBase: string, imageUrl: string): string {
  return `${imageProxyBase.replace(/\/+$/, '')}/image-proxy?url=${encodeURIComponent(imageUrl)}`;
}

/**
 * Collapses lazy-load duplicates in place. Nodes sharing an effective source
 * with an earlier node are removed; kept nodes get their `data-src` promoted
 * to `src`. Running it again on its own output changes nothing.
 */
export function dedupeLazyImages($: CheerioAPI, content: Cheerio<Element>): void {
  const seen = new Set<string>();

  content.find('img.bbImage').each((_idx, element) => {
    const img = $(element);
    const dataSrc = img.attr('data-src');
    const effective = dataSrc || img.attr('src') || '';

    if (seen.has(effective)) {
      img.remove();
      return;
    }
    seen.add(effective);

    if (dataSrc) {
      img.attr('src', dataSrc);
      img.removeClass('lazyload');
      img.removeAttr('data-src');
    }
  });
}

/** Ordered, distinct full-resolution URLs of the post's images. */
export function collectImages($: CheerioAPI, content: Cheerio<Element>): ImageSummary {
  const images: string[] = [];
  const seen = new Set<string>();

  content.find('img.bbImage').each((_idx, element) => {
    const img = $(element);
    let src = img.attr('src') ?? '';
    if (isPlaceholder(src)) {
      src = img.attr('data-src') ?? '';
    }
    if (!src || !isHttpUrl(src)) {
      return;
    }
    const fullRes = toFullResolution(src);
    if (!seen.has(fullRes)) {
      seen.add(fullRes);
      images.push(fullRes);
    }
  });

  return { images, featuredImage: images[0] };
}

/** Points attachment-host images at the catalog's image proxy, at full resolution. */
export function proxyAttachmentImages(
  $: CheerioAPI,
  content: Cheerio<Element>,
  attachmentHost: string,
  imageProxyBase: string
): void {
  const proxyPrefix = buildProxyUrl(imageProxyBase, '');
  content.find('img').each((_idx, element) => {
    const img = $(element);
    const src = img.attr('src') ?? '';
    if (!src.includes(attachmentHost) || src.startsWith(proxyPrefix)) {
      return;
    }
    img.attr('src', buildProxyUrl(imageProxyBase, toFullResolution(src)));
  });
}

export function normalizeContentImages(
  $: CheerioAPI,
  content: Cheerio<Element>,
  attachmentHost: string,
  imageProxyBase: string
): ImageSummary {
  dedupeLazyImages($, content);
  const summary = collectImages($, content);
  proxyAttachmentImages($, content, attachmentHost, imageProxyBase);
  return summary;
}
