export interface TitleParts {
  title: string;
  version: string;
  developer: string;
}

const VERSION_PATTERN = /\[v?([\d.]+[^\]]*)\]/;
const LAST_BRACKET_PATTERN = /\[([^\]]+)\](?!.*\[)/;

export function stripLabels(fullTitle: string, labels: string[]): string {
  let clean = fullTitle;
  for (const label of labels) {
    if (label) {
      clean = clean.split(label).join('').trim();
    }
  }
  return clean;
}

/**
 * Splits a clean thread title into game name, version and developer.
 *
 * The version is the first bracket holding a dotted number. The developer is
 * the last bracket, unless that bracket is the version itself: titles put
 * either the version or the developer last, and this equality check is the
 * only tie-break.
 */
export function disambiguateTitle(cleanTitle: string): TitleParts {
  const versionMatch = cleanTitle.match(VERSION_PATTERN);
  const version = versionMatch?.[1] ?? '';

  const lastMatch = cleanTitle.match(LAST_BRACKET_PATTERN);
  const lastContent = lastMatch?.[1] ?? '';
  const developer = lastContent && lastContent !== version ? lastContent : '';

  let title = cleanTitle;
  if (version) {
    title = title.split(`[v${version}]`).join('').split(`[${version}]`).join('');
  }
  if (developer) {
    title = title.split(`[${developer}]`).join('');
  }

  return {
    title: title.replace(/\s{2,}/g, ' ').trim(),
    version,
    developer
  };
}
