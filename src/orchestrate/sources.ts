/**
 * URL generation for configured sources
 */

import { subDays } from 'date-fns';
import { templatePlaceholders, type ResolvedSourceConfig } from '../config/schema.js';
import { formatReportStamp } from '../util/dates.js';

type UrlSource = Pick<
  ResolvedSourceConfig,
  'url_templates' | 'urls' | 'postal_codes' | 'counties' | 'cities' | 'date_offsets_days' | 'target_limit'
>;

function valuesFor(placeholder: string, source: UrlSource, now: Date): string[] {
  switch (placeholder) {
    case 'postal_code':
      return source.postal_codes;
    case 'county':
      return source.counties.map(county => encodeURIComponent(county));
    case 'city':
      return source.cities.map(city => encodeURIComponent(city));
    case 'date':
      return source.date_offsets_days.map(days => formatReportStamp(subDays(now, days)));
    default:
      return [];
  }
}

/**
 * Expand one template over every combination of its placeholder values
 */
export function expandTemplate(template: string, source: UrlSource, now: Date): string[] {
  const placeholders = Array.from(new Set(templatePlaceholders(template)));
  let urls = [template];

  for (const placeholder of placeholders) {
    const values = valuesFor(placeholder, source, now);
    const token = `{${placeholder}}`;
    urls = urls.flatMap(url => values.map(value => url.split(token).join(value)));
  }

  return urls;
}

/**
 * All URLs for a source run: expanded templates then static URLs,
 * deduplicated and capped at target_limit
 */
export function generateUrls(source: UrlSource, now: Date = new Date()): string[] {
  const urls = new Set<string>();
  for (const template of source.url_templates) {
    for (const url of expandTemplate(template, source, now)) {
      urls.add(url);
    }
  }
  for (const url of source.urls) {
    urls.add(url);
  }

  const all = Array.from(urls);
  return source.target_limit ? all.slice(0, source.target_limit) : all;
}
