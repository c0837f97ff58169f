export interface MemoryProbe {
  residentMemoryBytes(): number;
}

export const processMemoryProbe: MemoryProbe = {
  residentMemoryBytes: () => process.memoryUsage.rss(),
};

/**
 * Best-effort wrapper: a throwing probe or an unusable reading becomes 0.
 * The first failure is logged; later ones are not.
 */
export class SafeMemoryReader {
  private failureReported = false;

  constructor(private readonly probe: MemoryProbe) {}

  public read(): number {
    let reading: number;
    try {
      reading = this.probe.residentMemoryBytes();
    } catch (error) {
      this.reportFailure(error instanceof Error ? error.message : String(error));
      return 0;
    }

    if (!Number.isFinite(reading) || reading < 0) {
      this.reportFailure(`unusable reading ${String(reading)}`);
      return 0;
    }

    return reading;
  }

  private reportFailure(reason: string): void {
    if (this.failureReported) {
      return;
    }

    this.failureReported = true;
    console.warn(`[governor] memory probe failed, reporting 0 bytes: ${reason}`);
  }
}
