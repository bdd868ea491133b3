import { OracleUnreachableError } from '../errors.js';

/**
 * Tracks lookup outcomes for one run and trips when the oracle looks
 * unreachable: `maxConsecutiveFailures` failures with no success between them.
 * Fewer failures only degrade the affected projects to null coordinates.
 */
export class OracleHealthMonitor {
  private consecutiveFailures = 0;
  private lookupCount = 0;
  private failureCount = 0;
  private completedProjects = 0;

  constructor(private readonly maxConsecutiveFailures: number) {}

  get lookups(): number {
    return this.lookupCount;
  }

  get failedLookups(): number {
    return this.failureCount;
  }

  get projectsProcessed(): number {
    return this.completedProjects;
  }

  recordSuccess(): void {
    this.lookupCount++;
    this.consecutiveFailures = 0;
  }

  /**
   * @throws OracleUnreachableError once the consecutive-failure limit is reached
   */
  recordFailure(): void {
    this.lookupCount++;
    this.failureCount++;
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      throw new OracleUnreachableError(
        `${this.consecutiveFailures} consecutive lookups failed`,
        this.completedProjects
      );
    }
  }

  recordProjectCompleted(): void {
    this.completedProjects++;
  }
}
