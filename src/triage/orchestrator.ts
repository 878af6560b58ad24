import { FetchError, ScanError } from '../errors';
import { DependentsResponse, ScanOutcome } from '../types';
import { computeCutoff } from './cutoff';
import { walkForScan } from './select';
import { CycleState, CycleStateTracker } from './states';

export interface DependentsSource {
  fetchDependents(target: string): Promise<DependentsResponse>;
}

export interface PackageDispatcher {
  dispatch(packageName: string): Promise<ScanOutcome>;
}

export interface TriageOrchestratorOptions {
  feed: DependentsSource;
  scanner: PackageDispatcher;
  target: string;
  lookbackHours: number;
  now?: () => number;
}

interface CycleSummary {
  target: string;
  cutoff: number;
  /** Packages the scanner accepted, in dispatch order. */
  scanned: string[];
  skippedScoped: number;
  states: CycleState[];
}

export type CompletedCycle = CycleSummary & { status: 'done' };
export type FailedCycle = CycleSummary & { status: 'failed'; error: FetchError | ScanError };
export type CycleResult = CompletedCycle | FailedCycle;

/**
 * Runs triage cycles for one watched package. Holds no state between
 * cycles; every call starts from a fresh cutoff and a fresh listing.
 */
export class TriageOrchestrator {
  private readonly now: () => number;

  constructor(private readonly options: TriageOrchestratorOptions) {
    this.now = options.now ?? Date.now;
  }

  async runCycle(): Promise<CycleResult> {
    const { feed, scanner, target, lookbackHours } = this.options;
    const tracker = new CycleStateTracker();
    const scanned: string[] = [];
    let skippedScoped = 0;

    tracker.transition('computing-cutoff');
    const now = this.now();
    const cutoff = computeCutoff(now, lookbackHours);
    console.log(`⏱️ now: ${now} cutoff: ${new Date(cutoff).toISOString()}`);

    const summary = (): CycleSummary => ({
      target,
      cutoff,
      scanned: [...scanned],
      skippedScoped,
      states: tracker.getHistory()
    });

    tracker.transition('fetching');
    console.log(`🔍 getting dependents for ${target}`);

    let response: DependentsResponse;
    try {
      response = await feed.fetchDependents(target);
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      tracker.transition('failed');
      console.error(`❌ could not list dependents of ${target} (${error.kind}): ${error.message}`);
      return { ...summary(), status: 'failed', error };
    }

    console.log(`Found ${response.packages.length} dependents of ${target}`);
    tracker.transition('dispatching');

    const selection = walkForScan(response.packages, cutoff, {
      onOutOfOrder: (previous, current) => {
        console.warn(
          `⚠️ dependents of ${target} are out of order: ${current.name} (${current.publishedAt}) listed after ${previous.name} (${previous.publishedAt})`
        );
      },
      onScopedSkip: () => {
        skippedScoped++;
      }
    });

    for (const pkg of selection) {
      const outcome = await scanner.dispatch(pkg.name);
      if (!outcome.ok) {
        tracker.transition('failed');
        console.error(
          `❌ scanning ${outcome.error.packageName} failed (${outcome.error.kind}): ${outcome.error.message}; ` +
            `stopping triage of ${target} after ${scanned.length} package(s)`
        );
        return { ...summary(), status: 'failed', error: outcome.error };
      }
      scanned.push(pkg.name);
    }

    tracker.transition('done');
    console.log(
      `✅ sent ${scanned.length} dependent(s) of ${target} to scanner (${skippedScoped} scoped skipped)`
    );
    return { ...summary(), status: 'done' };
  }
}
