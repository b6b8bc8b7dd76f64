/**
 * types.ts — Shared type definitions and configuration for the plugin.
 *
 * Every layer (transport, session manager, extractor, reporters, CLI) agrees
 * on the shapes below.  Configuration is read from the environment because
 * Munin hands plugin settings over as environment variables.
 */

import { tmpdir } from 'os';
import { join } from 'path';

// ─── Metrics ───────────────────────────────────────────────

export const METRIC_NAMES = [
  'status',
  'uptime',
  'temp',
  'fan',
  'atm',
  'attenuation',
  'snr',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value);
}

// ─── Router pages ──────────────────────────────────────────

/** Logical pages of the management interface, relative to the base URL. */
export const FREEBOX_PAGES = {
  connection: '/settings.php?page=conn_status',
  system: '/settings.php?page=misc_system',
  adsl: '/settings.php?page=conn_adsl_stats',
} as const;

export type PageId = keyof typeof FREEBOX_PAGES;

export const LOGIN_PATH = '/login.php';

/** The router only has one account; only the password varies. */
export const ACCOUNT_ID = 'freebox';

// ─── Session ───────────────────────────────────────────────

export type SessionState = 'no-session' | 'authenticating' | 'authenticated';

/**
 * An authenticated session as persisted between runs.
 * `token` is sent verbatim as the Cookie header.
 */
export interface Session {
  token: string;
  /** ISO-8601 timestamp of the login that produced the token. */
  acquiredAt: string;
}

export interface Credentials {
  accountId: string;
  secret: string;
}

/** Raw body of one page plus the URL it came from. */
export interface FetchedPage {
  url: string;
  body: string;
}

// ─── Extraction ────────────────────────────────────────────

/**
 * How to locate one numeric value in a page.
 *
 * With an anchor, only the lines containing it are searched.  Without one,
 * the whole page is scanned and `occurrence` picks among the matches in
 * document order (1-based).
 */
export interface FieldSpec {
  anchor: string | null;
  unit: string;
  occurrence: number;
}

// ─── Reports ───────────────────────────────────────────────

/** `null` renders as an empty value: the field is absent, not zero. */
export type ReportValue = number | string | null;

export interface MetricReport {
  key: string;
  value: ReportValue;
}

/** Static graph metadata printed in describe mode. */
export interface GraphField {
  key: string;
  label: string;
  min?: number;
  draw?: 'LINE1' | 'LINE2' | 'AREA';
}

export interface GraphInfo {
  title: string;
  category: string;
  vlabel: string;
  args?: string;
  fields: GraphField[];
}

// ─── Plugin configuration ──────────────────────────────────

export interface PluginConfig {
  baseUrl: string;
  password?: string;
  /** Present in the login form; its presence means "not authenticated". */
  badPassMarker: string;
  /** Text of the connection-state span when the line is up. */
  connectedLabel: string;
  cookieFile: string;
  /** Scratch copy of the last fetched page; null disables it. */
  pageFile: string | null;
  timeoutMs: number;
  /** Re-authentications allowed per page fetch before giving up. */
  maxReauth: number;
  /** Persisted sessions older than this are discarded; 0 disables the check. */
  cookieTtlHours: number;
  userAgent: string;
}

/** Values below `min` (or not numbers at all) fall back to the default. */
function intFromEnv(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

/** Build a PluginConfig from the environment with defaults. */
export function loadPluginConfig(
  env: NodeJS.ProcessEnv = process.env,
): PluginConfig {
  const pageFile = env.FREEBOX_PAGE_FILE ?? join(tmpdir(), 'munin-freebox-page.html');

  return {
    baseUrl: (env.FREEBOX_URL ?? 'http://mafreebox.freebox.fr').replace(/\/+$/, ''),
    password: env.FREEBOX_PASSWORD || undefined,
    badPassMarker: env.FREEBOX_BAD_PASS_MARKER || 'name="password"',
    connectedLabel: env.FREEBOX_CONNECTED_LABEL || 'Connecté',
    cookieFile:
      env.FREEBOX_COOKIE_FILE || join(tmpdir(), 'munin-freebox-cookie.json'),
    pageFile: pageFile === '' ? null : pageFile,
    timeoutMs: intFromEnv(env.FREEBOX_TIMEOUT_MS, 2000),
    // A rejected session always gets at least one fresh login.
    maxReauth: intFromEnv(env.FREEBOX_MAX_REAUTH, 3, 1),
    cookieTtlHours: intFromEnv(env.FREEBOX_COOKIE_TTL_HOURS, 24),
    userAgent: env.FREEBOX_USER_AGENT || 'freebox-munin/1.0',
  };
}
