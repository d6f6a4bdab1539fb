export interface ManualControlTarget {
  isolate(): void;
  close(): void;
}

export interface ManualControlOptions {
  isolated?: boolean;
}

/**
 * Side-channel handle for isolating and closing circuits by hand. One handle
 * may be shared by several breakers; commands fan out to all of them.
 * Breakers attached while the handle is isolated start isolated.
 */
export class ManualControl {
  private readonly targets = new Set<ManualControlTarget>();
  private isolatedFlag: boolean;

  constructor(options: ManualControlOptions = {}) {
    this.isolatedFlag = options.isolated ?? false;
  }

  get isolated(): boolean {
    return this.isolatedFlag;
  }

  get size(): number {
    return this.targets.size;
  }

  attach(target: ManualControlTarget): () => void {
    this.targets.add(target);
    return () => {
      this.targets.delete(target);
    };
  }

  isolate(): void {
    this.isolatedFlag = true;
    for (const target of [...this.targets]) {
      target.isolate();
    }
  }

  close(): void {
    this.isolatedFlag = false;
    for (const target of [...this.targets]) {
      target.close();
    }
  }
}
