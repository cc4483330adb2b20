export type InterruptState = "idle" | "armed" | "signaled";

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Cancellation token fed by process signals. The listener only flips the
 * state; callers poll `isSignaled` between units of work.
 */
export class InterruptController {
  private current: InterruptState = "idle";
  private received: NodeJS.Signals | null = null;

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    if (this.current === "armed") {
      this.current = "signaled";
      this.received = signal;
    }
  };

  constructor(
    private readonly source: SignalSource = process,
    private readonly signals: readonly NodeJS.Signals[] = ["SIGINT"],
  ) {}

  get state(): InterruptState {
    return this.current;
  }

  get isSignaled(): boolean {
    return this.current === "signaled";
  }

  get signal(): NodeJS.Signals | null {
    return this.received;
  }

  arm(): void {
    if (this.current !== "idle") return;
    for (const signal of this.signals) {
      this.source.on(signal, this.onSignal);
    }
    this.current = "armed";
  }

  /** Detaches the listeners. A received signal stays recorded. */
  disarm(): void {
    for (const signal of this.signals) {
      this.source.off(signal, this.onSignal);
    }
    if (this.current === "armed") {
      this.current = "idle";
    }
  }
}
