/**
 * fieldReporter.ts — Reporters that are nothing more than a FieldSpec table.
 *
 * Temperatures, fan speed and the ADSL line statistics each map one
 * extraction to one output key.  Only the fan declares a fallback: a
 * firmware that stops reporting it is read as a stopped fan.
 */

import { BaseReporter } from './baseReporter';
import type {
  FieldSpec,
  GraphInfo,
  MetricName,
  MetricReport,
  PageId,
} from '../core/types';

export interface ReportField {
  key: string;
  spec: FieldSpec;
  /** Value used when the field is absent; omitted means report it empty. */
  fallback?: number;
}

export class FieldReporter extends BaseReporter {
  constructor(
    readonly metric: MetricName,
    readonly page: PageId,
    readonly graph: GraphInfo,
    private readonly fields: ReportField[],
  ) {
    super();
  }

  report(pageText: string): MetricReport[] {
    return this.fields.map(({ key, spec, fallback }) => ({
      key,
      value: this.field(pageText, spec) ?? fallback ?? null,
    }));
  }
}

// ── Definitions ──────────────────────────────────────────

const anchored = (anchor: string, unit: string): FieldSpec => ({
  anchor,
  unit,
  occurrence: 1,
});

const nth = (unit: string, occurrence: number): FieldSpec => ({
  anchor: null,
  unit,
  occurrence,
});

export function createTemperatureReporter(): FieldReporter {
  return new FieldReporter(
    'temp',
    'system',
    {
      title: 'Freebox temperatures',
      category: 'sensors',
      vlabel: 'degrees Celsius',
      fields: [
        { key: 'tcpum', label: 'CPU M' },
        { key: 'tcpub', label: 'CPU B' },
        { key: 'tsw', label: 'Switch' },
      ],
    },
    [
      { key: 'tcpum', spec: anchored('Temperature CPUm', '°C') },
      { key: 'tcpub', spec: anchored('Temperature CPUb', '°C') },
      { key: 'tsw', spec: anchored('Temperature SW', '°C') },
    ],
  );
}

export function createFanReporter(): FieldReporter {
  return new FieldReporter(
    'fan',
    'system',
    {
      title: 'Freebox fan speed',
      category: 'sensors',
      vlabel: 'RPM',
      args: '--lower-limit 0',
      fields: [{ key: 'fan', label: 'fan', min: 0 }],
    },
    [{ key: 'fan', spec: anchored('Fan speed', 'RPM'), fallback: 0 }],
  );
}

export function createAtmReporter(): FieldReporter {
  return new FieldReporter(
    'atm',
    'adsl',
    {
      title: 'Freebox ATM bandwidth',
      category: 'network',
      vlabel: 'kbit/s',
      args: '--lower-limit 0',
      fields: [
        { key: 'atm_down', label: 'download', min: 0 },
        { key: 'atm_up', label: 'upload', min: 0 },
      ],
    },
    [
      { key: 'atm_down', spec: nth('kbit/s', 1) },
      { key: 'atm_up', spec: nth('kbit/s', 2) },
    ],
  );
}

export function createAttenuationReporter(): FieldReporter {
  return new FieldReporter(
    'attenuation',
    'adsl',
    {
      title: 'Freebox line attenuation',
      category: 'network',
      vlabel: 'dB',
      fields: [
        { key: 'attenuation_down', label: 'downstream' },
        { key: 'attenuation_up', label: 'upstream' },
      ],
    },
    [
      { key: 'attenuation_down', spec: nth('dB', 1) },
      { key: 'attenuation_up', spec: nth('dB', 2) },
    ],
  );
}

export function createSnrReporter(): FieldReporter {
  return new FieldReporter(
    'snr',
    'adsl',
    {
      title: 'Freebox SNR margin',
      category: 'network',
      vlabel: 'dB',
      fields: [
        { key: 'snr_down', label: 'downstream' },
        { key: 'snr_up', label: 'upstream' },
      ],
    },
    [
      // Attenuation takes the first two dB values on the page.
      { key: 'snr_down', spec: nth('dB', 3) },
      { key: 'snr_up', spec: nth('dB', 4) },
    ],
  );
}
