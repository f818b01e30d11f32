/**
 * Per-turn validation gate.
 *
 * Once the dataset fails validation, analysis tools refuse to run until the
 * conversation starts the next turn.
 */

export interface GuardTrip {
  reason: string;
  issues: string[];
}

export class TurnGuard {
  private trip: GuardTrip | null = null;
  private turn = 0;

  /** Called by the conversation before each query is sent. */
  beginTurn(): number {
    this.trip = null;
    this.turn += 1;
    return this.turn;
  }

  halt(reason: string, issues: string[] = []): void {
    this.trip = { reason, issues };
  }

  get halted(): GuardTrip | null {
    return this.trip;
  }

  get currentTurn(): number {
    return this.turn;
  }

  /** Console lines describing the current halt; empty when the gate is open. */
  report(): string[] {
    if (this.trip === null) return [];
    const issues = this.trip.issues.length > 0 ? this.trip.issues : [this.trip.reason];
    return ['Data issues:', ...issues.map(issue => `  - ${issue}`)];
  }
}
