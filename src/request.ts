export type RequestKind = "tag-send" | "tag-recv" | "stream-send" | "stream-recv";

/**
 * `pending` until the transport stages an outcome, `staged` while it sits in
 * the completion queue, `settled` once a progress drain has delivered it.
 */
export type RequestStatus = "pending" | "staged" | "settled";

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/** An in-flight transport operation as seen by the core. */
export interface PendingOperation<T> {
  readonly id: number;
  readonly kind: RequestKind;
  readonly status: RequestStatus;
  wait(): Promise<T>;
}

/** Type-erased view used by the completion queue and in-flight tracking. */
export interface Settleable {
  readonly id: number;
  readonly owner: bigint;
  readonly status: RequestStatus;
  fail(error: Error): boolean;
  settle(): void;
}

let nextRequestId = 1;

export class Request<T> implements PendingOperation<T>, Settleable {
  readonly id = nextRequestId++;
  private outcome?: Outcome<T>;
  private settled = false;
  private readonly promise: Promise<T>;
  private readonly resolve: (value: T) => void;
  private readonly reject: (error: Error) => void;

  constructor(
    readonly kind: RequestKind,
    readonly owner: bigint,
  ) {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: Error) => void = () => undefined;
    this.promise = new Promise<T>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.resolve = resolve;
    this.reject = reject;
  }

  get status(): RequestStatus {
    if (this.settled) return "settled";
    return this.outcome ? "staged" : "pending";
  }

  wait(): Promise<T> {
    return this.promise;
  }

  /** First outcome wins; later ones are ignored. */
  stage(outcome: Outcome<T>): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    return true;
  }

  complete(value: T): boolean {
    return this.stage({ ok: true, value });
  }

  fail(error: Error): boolean {
    return this.stage({ ok: false, error });
  }

  settle(): void {
    if (this.settled || !this.outcome) return;
    this.settled = true;
    if (this.outcome.ok) {
      this.resolve(this.outcome.value);
    } else {
      this.reject(this.outcome.error);
    }
  }
}
