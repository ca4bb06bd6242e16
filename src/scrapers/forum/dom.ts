import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Element, type Text } from 'domhandler';

export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  return value.replace(/\s+/g, ' ').trim();
}

export function resolveUrl(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return value;
  }
}

/** First `<b>` in scope whose own text is `label`, with or without a trailing colon. */
export function findBoldLabel($: CheerioAPI, scope: Cheerio<Element>, label: string): Element | null {
  const pattern = new RegExp(`^\\s*${label}\\s*:?\\s*$`, 'i');
  const match = scope.find('b').toArray().find(element => pattern.test($(element).text()));
  return match ?? null;
}

/** First element in scope matching `selector` that follows `anchor` in document order. */
export function findNextAfter(
  $: CheerioAPI,
  scope: Cheerio<Element>,
  anchor: Element,
  selector: string
): Element | null {
  const ordered = scope.find('*').toArray();
  const anchorIndex = ordered.indexOf(anchor);
  if (anchorIndex < 0) {
    return null;
  }
  for (let i = anchorIndex + 1; i < ordered.length; i += 1) {
    const candidate = ordered[i];
    if ($(candidate).is(selector) && !$(anchor).find(candidate).length) {
      return candidate;
    }
  }
  return null;
}

export function findTextNode(root: AnyNode, pattern: RegExp): Text | null {
  if (isText(root)) {
    return pattern.test(root.data) ? root : null;
  }
  if (!isTag(root)) {
    return null;
  }
  for (const child of root.children) {
    const found = findTextNode(child, pattern);
    if (found) {
      return found;
    }
  }
  return null;
}

/** Text of a spoiler block without its toggle button. */
export function spoilerText($: CheerioAPI, spoiler: Element): string {
  const body = $(spoiler).find('.bbCodeSpoiler-content').first();
  const text = body.length > 0 ? body.text() : $(spoiler).text();
  return text.trim();
}
