/**
 * uptimeReporter.ts — Router uptime in fractional days.
 *
 * The system page prints uptime as a French composite string, e.g.
 * "Uptime since 3 jours 4 heures 5 minutes 6 secondes".  Each component is
 * extracted separately; components the router omits count as 0.
 */

import { BaseReporter } from './baseReporter';
import { extractField, extractRegion } from '../core/fieldExtractor';
import type { GraphInfo, MetricReport } from '../core/types';

const UPTIME_ANCHOR = 'Uptime since';

const SECONDS_PER_UNIT = [
  { unit: 'jour', seconds: 86_400 },
  { unit: 'heure', seconds: 3_600 },
  { unit: 'minute', seconds: 60 },
  { unit: 'seconde', seconds: 1 },
] as const;

export class UptimeReporter extends BaseReporter {
  readonly metric = 'uptime';
  readonly page = 'system';
  readonly graph: GraphInfo = {
    title: 'Freebox uptime',
    category: 'system',
    vlabel: 'uptime in days',
    args: '--base 1000 --lower-limit 0',
    fields: [{ key: 'uptime', label: 'uptime', draw: 'AREA' }],
  };

  report(pageText: string): MetricReport[] {
    const region = extractRegion(pageText, UPTIME_ANCHOR);
    if (region === null) {
      return [{ key: 'uptime', value: null }];
    }
    return [{ key: 'uptime', value: uptimeDays(region) }];
  }
}

/** `(d*86400 + h*3600 + m*60 + s) / 86400`, formatted with two decimals. */
export function uptimeDays(text: string): string {
  const totalSeconds = SECONDS_PER_UNIT.reduce((sum, { unit, seconds }) => {
    const count = extractField(text, { anchor: null, unit, occurrence: 1 }) ?? 0;
    return sum + count * seconds;
  }, 0);
  return (totalSeconds / 86_400).toFixed(2);
}
