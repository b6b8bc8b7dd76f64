/**
 * freeboxPlugin.ts — The orchestrator that ties every layer together.
 *
 *   1. SELECT  → metric name from the symlink name or the first argument
 *   2. FETCH   → SessionManager returns the reporter's page, logging in as needed
 *   3. EXTRACT → the reporter turns the page text into MetricReports
 *   4. EMIT    → `<key>.value <value>` lines on stdout
 *
 * In describe mode (`config` argument) only the reporter's static graph
 * metadata is printed and the router is never contacted.
 */

import { basename } from 'path';
import { FileStateStore, SessionManager, type StateStore } from './agents';
import { lightFetch, type HttpTransport } from './middleware';
import { getReporter, renderReports } from './reporters';
import { Logger } from './core/logger';
import { EXIT_FAILURE, EXIT_OK, PluginError, UsageError } from './core/errors';
import {
  FREEBOX_PAGES,
  METRIC_NAMES,
  isMetricName,
  loadPluginConfig,
  type MetricName,
  type MetricReport,
  type PluginConfig,
} from './core/types';

const logger = new Logger('FreeboxPlugin');

export class FreeboxPlugin {
  constructor(
    private readonly config: PluginConfig,
    private readonly session: SessionManager,
  ) {}

  /** Fetch the metric's page and extract its values. */
  async collect(metric: MetricName): Promise<MetricReport[]> {
    const reporter = getReporter(metric, this.config);
    const page = await this.session.fetch(FREEBOX_PAGES[reporter.page]);
    const reports = reporter.report(page.body);

    const missing = reports.filter((r) => r.value === null).map((r) => r.key);
    if (missing.length > 0) {
      logger.warn(`No value found for ${missing.join(', ')} on ${page.url}`);
    }
    return reports;
  }

  describe(metric: MetricName): string[] {
    return getReporter(metric, this.config).describe();
  }
}

// ─── Invocation ────────────────────────────────────────────

export type Mode = 'fetch' | 'config';

export interface Invocation {
  metric: MetricName;
  mode: Mode;
}

export const USAGE = `Usage: freebox-munin <${METRIC_NAMES.join('|')}> [config]`;

/**
 * Work out what to run.  A program name ending in `_<metric>` (Munin's
 * symlink convention, e.g. `freebox_status`) selects the metric and leaves
 * the arguments for the mode; otherwise the first argument is the metric.
 *
 * @throws UsageError for a missing or unknown metric.
 */
export function parseInvocation(programPath: string, args: string[]): Invocation {
  const programName = basename(programPath).replace(/\.[cm]?[jt]s$/, '');
  const suffix = programName.slice(programName.lastIndexOf('_') + 1);

  let selector: string | undefined;
  let modeArg: string | undefined;
  if (programName.includes('_') && isMetricName(suffix)) {
    selector = suffix;
    modeArg = args[0];
  } else {
    selector = args[0];
    modeArg = args[1];
  }

  if (selector === undefined || !isMetricName(selector)) {
    const shown = selector === undefined ? '' : ` "${selector}"`;
    throw new UsageError(`Unknown metric${shown}.\n${USAGE}`);
  }
  return { metric: selector, mode: modeArg === 'config' ? 'config' : 'fetch' };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  transport?: HttpTransport;
  store?: StateStore;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Run one plugin invocation and resolve with the process exit code.
 * Nothing is written to stdout unless the whole run succeeds.
 */
export async function runCli(
  programPath: string,
  args: string[],
  deps: CliDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    const { metric, mode } = parseInvocation(programPath, args);
    const config = loadPluginConfig(deps.env);
    const store = deps.store ?? new FileStateStore(config.cookieFile, config.pageFile);
    const session = new SessionManager(config, deps.transport ?? lightFetch, store);
    const plugin = new FreeboxPlugin(config, session);

    const lines =
      mode === 'config'
        ? plugin.describe(metric)
        : renderReports(await plugin.collect(metric));

    stdout(lines.map((line) => `${line}\n`).join(''));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      stderr(`${err.message}\n`);
      return err.exitCode;
    }
    if (err instanceof PluginError) {
      logger.error(`${err.name}: ${err.message}`, err.cause);
      return err.exitCode;
    }
    logger.error('Unexpected failure', err);
    return EXIT_FAILURE;
  }
}
