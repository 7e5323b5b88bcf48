import { ITimer } from "./ITimer";

/**
 * Resolves immediately and remembers every requested delay.
 */
export class InMemoryTimer implements ITimer {
  private delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }

  getDelays(): number[] {
    return [...this.delays];
  }
}
