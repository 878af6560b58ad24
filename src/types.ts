import type { ScanError } from './errors';

export interface Publisher {
  name: string;
  avatars: Record<string, unknown>;
}

/**
 * One dependent package as listed by the registry at fetch time.
 * Records are snapshots: created per fetch and dropped when the cycle ends.
 */
export interface PackageRecord {
  readonly name: string;
  /** Publish time in milliseconds since the epoch. */
  readonly publishedAt: number;
  /** Human-readable age reported by the registry, e.g. "3 hours ago". */
  readonly relativeDate?: string;
  readonly description?: string;
  readonly maintainers: readonly string[];
  readonly publisher?: Publisher;
  readonly version?: string;
}

export interface DependentsResponse {
  title: string;
  /** The package these dependents were listed for. */
  dependency: string;
  packages: PackageRecord[];
}

export type ScanOutcome =
  | { ok: true; packageName: string }
  | { ok: false; error: ScanError };

export interface WatchConfig {
  apiKey: string;
  lookbackHours: number;
  target: string;
  registryUrl: string;
  scannerUrl: string;
  timeoutMs: number;
  /** Minute of the hour at which scheduled cycles fire. */
  scheduleMinute: number;
  exitOnFailure: boolean;
}

export function isScoped(pkg: Pick<PackageRecord, 'name'>): boolean {
  return pkg.name.startsWith('@');
}
