import { LogOwnershipError } from "./errors";

export const MISSING_INVOCATION_ID = "(id missing)";

type MirrorLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
};

/**
 * A lent view of an InvocationLog. Must be released before the request is
 * encoded; a handle still alive at that point fails `finalize()`.
 */
export type InvocationLogHandle = {
  readonly invocationId: string;
  log(line: string): void;
  release(): void;
};

/**
 * Per-invocation ordered log sink.
 *
 * Lines are only visible to the host through the `Logs` field of the outbound
 * envelope, so the log is drained exactly once when the response is encoded.
 */
export class InvocationLog {
  public readonly invocationId: string;
  private lines: string[] = [];
  private borrowed = 0;
  private finalized = false;
  private readonly mirror?: MirrorLogger;

  constructor(invocationId: string, opts: { mirror?: MirrorLogger } = {}) {
    this.invocationId = invocationId;
    this.mirror = opts.mirror;
  }

  get outstanding(): number {
    return this.borrowed;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  append(line: string): void {
    if (this.finalized) {
      throw new LogOwnershipError("log_already_finalized");
    }
    this.lines.push(`${this.invocationId} ${line}`);
    this.mirror?.debug({ invocationId: this.invocationId }, line);
  }

  borrow(): InvocationLogHandle {
    if (this.finalized) {
      throw new LogOwnershipError("log_already_finalized");
    }

    this.borrowed += 1;
    let released = false;
    const owner = this;

    return {
      invocationId: this.invocationId,
      log(line: string) {
        if (released) {
          throw new LogOwnershipError("log_handle_released");
        }
        owner.append(line);
      },
      release() {
        if (released) return;
        released = true;
        owner.borrowed -= 1;
      },
    };
  }

  finalize(): string[] {
    if (this.finalized) {
      throw new LogOwnershipError("log_already_finalized");
    }
    if (this.borrowed > 0) {
      throw new LogOwnershipError("log_still_borrowed", this.borrowed);
    }

    this.finalized = true;
    const drained = this.lines;
    this.lines = [];
    return drained;
  }
}

/**
 * Lends a handle for the duration of `fn` and releases it afterwards, whether
 * `fn` resolves or throws.
 */
export async function withHandle<T>(
  log: InvocationLog,
  fn: (handle: InvocationLogHandle) => Promise<T> | T
): Promise<T> {
  const handle = log.borrow();
  try {
    return await fn(handle);
  } finally {
    handle.release();
  }
}
