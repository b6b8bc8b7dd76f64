/**
 * baseReporter.ts — Abstract base class for metric reporters.
 *
 * A reporter names the page it needs, turns that page's raw text into
 * ordered MetricReports, and carries the static graph metadata printed in
 * describe mode.  Reporters never touch the network: the orchestrator
 * fetches the page and hands the text over.
 */

import { extractField } from '../core/fieldExtractor';
import type {
  FieldSpec,
  GraphInfo,
  MetricName,
  MetricReport,
  PageId,
} from '../core/types';

export abstract class BaseReporter {
  abstract readonly metric: MetricName;
  abstract readonly page: PageId;
  abstract readonly graph: GraphInfo;

  /** Turn one fetched page into report values, in output order. */
  abstract report(pageText: string): MetricReport[];

  /** Graph metadata lines for describe mode. */
  describe(): string[] {
    const { title, category, vlabel, args, fields } = this.graph;
    const lines = [
      `graph_title ${title}`,
      `graph_category ${category}`,
      `graph_vlabel ${vlabel}`,
    ];
    if (args) lines.push(`graph_args ${args}`);

    for (const field of fields) {
      lines.push(`${field.key}.label ${field.label}`);
      if (field.min !== undefined) lines.push(`${field.key}.min ${field.min}`);
      if (field.draw) lines.push(`${field.key}.draw ${field.draw}`);
    }
    return lines;
  }

  protected field(pageText: string, spec: FieldSpec): number | null {
    return extractField(pageText, spec);
  }
}

/** Munin's `<key>.value <value>` lines; absent values stay empty. */
export function renderReports(reports: MetricReport[]): string[] {
  return reports.map(({ key, value }) => `${key}.value ${value ?? ''}`);
}
