import { BaseReporter } from './baseReporter';
import { extractElementText } from '../core/fieldExtractor';
import type { GraphInfo, MetricReport } from '../core/types';

/** 1 while the connection-state span reads the connected label, else 0. */
export class StatusReporter extends BaseReporter {
  readonly metric = 'status';
  readonly page = 'connection';
  readonly graph: GraphInfo = {
    title: 'Freebox connection status',
    category: 'network',
    vlabel: 'connected',
    args: '--lower-limit 0 --upper-limit 1',
    fields: [{ key: 'status', label: 'connected', min: 0 }],
  };

  constructor(private readonly connectedLabel: string) {
    super();
  }

  report(pageText: string): MetricReport[] {
    const state = extractElementText(pageText, 'conn_state');
    return [{ key: 'status', value: state === this.connectedLabel ? 1 : 0 }];
  }
}
