import messages from '../messages.json';

export type Language = keyof typeof messages.reports;
export type ReportMessages = typeof messages.reports.en;

// Every language must carry the same template set as English
const reports: Record<Language, ReportMessages> = messages.reports;

function isLanguage(value: string): value is Language {
  return Object.prototype.hasOwnProperty.call(reports, value);
}

/** Picks the template set for a BCP 47 locale such as "zh-CN"; English otherwise. */
export function getMessages(locale: string): ReportMessages {
  const language = locale.split('-')[0].toLowerCase();
  return isLanguage(language) ? reports[language] : reports.en;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces the placeholder tokens of a template in one pass.
 * A line referencing a token whose value is undefined is dropped entirely,
 * so optional facts never leave half-filled lines behind.
 */
export function fillTemplate(template: string, values: Record<string, string | undefined>): string {
  const tokens = Object.keys(values).sort((a, b) => b.length - a.length);
  if (tokens.length === 0) return template.trim();
  const pattern = new RegExp(tokens.map(escapeRegExp).join('|'), 'g');

  const kept = template.split('\n').filter((line) => {
    const found = line.match(pattern) ?? [];
    return found.every((token) => values[token] !== undefined);
  });

  return kept
    .join('\n')
    .replace(pattern, (token) => values[token] ?? '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
