/**
 * reporters/index.ts — Reporter factory keyed by metric name.
 *
 * Adding a metric is two steps: declare its reporter (usually a FieldSpec
 * table in fieldReporter.ts) and register it below.
 */

import type { BaseReporter } from './baseReporter';
import {
  createAtmReporter,
  createAttenuationReporter,
  createFanReporter,
  createSnrReporter,
  createTemperatureReporter,
} from './fieldReporter';
import { StatusReporter } from './statusReporter';
import { UptimeReporter } from './uptimeReporter';
import type { MetricName, PluginConfig } from '../core/types';

export function getReporter(
  metric: MetricName,
  config: Pick<PluginConfig, 'connectedLabel'>,
): BaseReporter {
  switch (metric) {
    case 'status':
      return new StatusReporter(config.connectedLabel);
    case 'uptime':
      return new UptimeReporter();
    case 'temp':
      return createTemperatureReporter();
    case 'fan':
      return createFanReporter();
    case 'atm':
      return createAtmReporter();
    case 'attenuation':
      return createAttenuationReporter();
    case 'snr':
      return createSnrReporter();
  }
}

export { BaseReporter, renderReports } from './baseReporter';
