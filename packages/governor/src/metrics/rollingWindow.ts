/**
 * Fixed-capacity FIFO of numeric samples backed by a circular array.
 */
export class RollingWindow {
  private readonly samples: number[];

  private head = 0;

  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('rollingWindow.capacity must be a positive integer.');
    }

    this.samples = new Array<number>(capacity).fill(0);
  }

  public get size(): number {
    return this.count;
  }

  public get isFull(): boolean {
    return this.count === this.capacity;
  }

  public push(value: number): void {
    const tail = (this.head + this.count) % this.capacity;
    this.samples[tail] = value;

    if (this.count === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
      return;
    }

    this.count += 1;
  }

  /** Mean of the newest `lastN` samples (all by default); 0 when empty. */
  public average(lastN: number = this.count): number {
    const n = Math.min(Math.max(0, Math.floor(lastN)), this.count);
    if (n === 0) {
      return 0;
    }

    let sum = 0;
    for (let i = this.count - n; i < this.count; i += 1) {
      sum += this.samples[(this.head + i) % this.capacity];
    }

    return sum / n;
  }

  public values(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i += 1) {
      out.push(this.samples[(this.head + i) % this.capacity]);
    }

    return out;
  }

  public clear(): void {
    this.head = 0;
    this.count = 0;
  }
}
