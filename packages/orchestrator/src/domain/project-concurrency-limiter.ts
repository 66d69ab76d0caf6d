/**
 * Counts active jobs per project. Acquire and release are synchronous, so a
 * check-and-increment can never interleave with another submission.
 */
export class ProjectConcurrencyLimiter {
  private readonly activeByProject = new Map<string, number>();

  constructor(private readonly limit: number) {}

  tryAcquire(projectId: string): boolean {
    const active = this.activeCount(projectId);
    if (active >= this.limit) {
      return false;
    }

    this.activeByProject.set(projectId, active + 1);
    return true;
  }

  release(projectId: string): void {
    const active = this.activeCount(projectId);
    if (active <= 1) {
      this.activeByProject.delete(projectId);
      return;
    }

    this.activeByProject.set(projectId, active - 1);
  }

  activeCount(projectId: string): number {
    return this.activeByProject.get(projectId) ?? 0;
  }
}
