/**
 * Sink for assertion failures. Reporting a failure must not throw, so that
 * one assertion call can surface several failures.
 */
export interface TestReporter {
  error(message: string): void;
}

/**
 * TestReporter that keeps every failure in order.
 *
 * @example
 * ```typescript
 * const reporter = new RecordingReporter();
 * server.assertNoMissingMocks(reporter);
 * expect(reporter.failures).toEqual([]);
 * ```
 */
export class RecordingReporter implements TestReporter {
  private readonly recorded: string[] = [];

  error(message: string): void {
    this.recorded.push(message);
  }

  get failures(): string[] {
    return [...this.recorded];
  }

  get failed(): boolean {
    return this.recorded.length > 0;
  }

  /**
   * Throws a single Error listing every recorded failure, if there are any.
   */
  throwIfFailed(): void {
    if (this.recorded.length === 0) return;
    throw new Error(`${this.recorded.length} mock assertion(s) failed:\n${this.recorded.join('\n')}`);
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
