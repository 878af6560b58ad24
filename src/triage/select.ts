import { PackageRecord, isScoped } from '../types';

export interface WalkOptions {
  /** Called when a record is newer than the one listed before it. */
  onOutOfOrder?: (previous: PackageRecord, current: PackageRecord) => void;
  onScopedSkip?: (record: PackageRecord) => void;
}

/**
 * Walks dependents newest-first and yields the ones to scan.
 *
 * The walk ends at the first record published before `cutoff`; everything
 * after it is assumed older. Scoped packages are never yielded.
 */
export function* walkForScan(
  packages: readonly PackageRecord[],
  cutoff: number,
  options: WalkOptions = {}
): Generator<PackageRecord, void, undefined> {
  let previous: PackageRecord | undefined;

  for (const pkg of packages) {
    if (previous && pkg.publishedAt > previous.publishedAt) {
      options.onOutOfOrder?.(previous, pkg);
    }
    previous = pkg;

    if (pkg.publishedAt < cutoff) {
      return;
    }

    if (isScoped(pkg)) {
      options.onScopedSkip?.(pkg);
      continue;
    }

    yield pkg;
  }
}

export function selectForScan(
  packages: readonly PackageRecord[],
  cutoff: number,
  options: WalkOptions = {}
): PackageRecord[] {
  return Array.from(walkForScan(packages, cutoff, options));
}
