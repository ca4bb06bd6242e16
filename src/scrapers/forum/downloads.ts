import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { findTextNode } from './dom.js';
import type { DownloadLink } from './types.js';

export const HOSTING_DOMAINS: readonly string[] = [
  'mega.nz',
  'pixeldrain',
  'gofile',
  'anonfiles',
  'workupload',
  'mediafire',
  'uploadhaven',
  'mixdrop',
  'krakenfiles',
  'dropbox',
  'drive.google',
  'nopy.to',
  'wetransfer',
  'sendspace',
  'buzzheavier',
  'uploadnow',
  'f95zone.to/masked',
  'catbox.moe',
  'datanodes.to'
];

export const UI_CHROME_LABELS: ReadonlySet<string> = new Set([
  'REACTIONS',
  'MEMBERS',
  'LOGIN',
  'REGISTER',
  'FORUMS',
  'TAGS'
]);

const PLATFORM_KEYWORDS = ['Win', 'Mac', 'Linux', 'Android'] as const;

export function isHostingLink(href: string, domains: readonly string[] = HOSTING_DOMAINS): boolean {
  const lower = href.toLowerCase();
  return domains.some(domain => lower.includes(domain));
}

export function platformLabel(text: string): string {
  return PLATFORM_KEYWORDS.filter(keyword => text.includes(keyword)).join('/');
}

function nodeText(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (isTag(node)) {
    return node.children.map(nodeText).join('');
  }
  return '';
}

/**
 * Platform for a link, read from what precedes it on the same line (other
 * links skipped), then from its wrapping element when that is not the
 * section itself.
 */
function inferPlatform(link: Element, section: Element): string {
  for (let node = link.prev; node; node = node.prev) {
    if (isTag(node) && node.name === 'br') {
      break;
    }
    if (isTag(node) && node.name === 'a') {
      continue;
    }
    const label = platformLabel(nodeText(node));
    if (label) {
      return label;
    }
  }

  const parent = link.parent;
  if (parent && parent !== section && isTag(parent)) {
    return platformLabel(nodeText(parent));
  }
  return '';
}

export function extractDownloadLinks($: CheerioAPI, content: Cheerio<Element>): DownloadLink[] {
  const root = content.get(0);
  if (!root) {
    return [];
  }
  const marker = findTextNode(root, /DOWNLOAD/i);
  if (!marker?.parent || !isTag(marker.parent)) {
    return [];
  }

  const section = $(marker.parent).closest('div').get(0);
  if (!section || !isTag(section)) {
    return [];
  }

  const links: DownloadLink[] = [];
  $(section).find('a').each((_idx, element) => {
    const href = $(element).attr('href') ?? '';
    if (!href || !isHostingLink(href)) {
      return;
    }
    const text = $(element).text().trim();
    if (text.length < 2 || UI_CHROME_LABELS.has(text.toUpperCase())) {
      return;
    }
    links.push({
      platform: inferPlatform(element, section),
      host: text.toUpperCase(),
      url: href
    });
  });

  return links;
}
