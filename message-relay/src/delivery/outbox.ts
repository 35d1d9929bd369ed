import type { Connection, PushEvent } from "../types";
import { DeliveryAttemptFailure, errorMessage } from "../errors";

export type Send = (event: PushEvent) => Promise<boolean>;

// ---------------------------------------------------------------------------
// ConnectionOutbox — the only writer to one connection
//
// Work runs strictly in enqueue order, so a message queued first reaches the
// wire first. The first failed or timed-out push cancels the outbox: later
// frames are skipped rather than overtaking the lost one, and the engine
// recovers through redelivery when the user reconnects.
//
// Only backlog replays remember what they pushed: a live push of the same
// message queued behind the replay is skipped once, then forgotten.
// ---------------------------------------------------------------------------

export class ConnectionOutbox {
  private tail: Promise<void> = Promise.resolve();
  private cancelled = false;
  private readonly replayed = new Set<string>();

  constructor(
    readonly connection: Connection,
    private readonly pushTimeoutMs: number,
    private readonly onFailure: (err: DeliveryAttemptFailure) => void,
  ) {}

  /** Queue one push. Resolves true if the transport accepted it. */
  push(event: PushEvent): Promise<boolean> {
    return this.run((send) => send(event));
  }

  /** Queue a task that may push several frames back to back. */
  run<T>(task: (send: Send) => Promise<T>): Promise<T> {
    const result = this.tail.then(() => task((event) => this.sendNow(event)));
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Queue a backlog replay whose messages later live pushes must not repeat. */
  replay<T>(task: (send: Send) => Promise<T>): Promise<T> {
    return this.run((send) =>
      task(async (event) => {
        const accepted = await send(event);
        if (accepted && event.type === "new_message") {
          this.replayed.add(event.message.id);
        }
        return accepted;
      }),
    );
  }

  /** Replayed messages whose live push has not been skipped yet. */
  get pendingReplayed(): number {
    return this.replayed.size;
  }

  /** Skip everything still queued. In-flight sends are abandoned. */
  cancel(): void {
    this.cancelled = true;
  }

  private async sendNow(event: PushEvent): Promise<boolean> {
    if (this.cancelled) return false;
    if (event.type === "new_message" && this.replayed.delete(event.message.id)) {
      return true;
    }

    try {
      await withTimeout(this.connection.send(event), this.pushTimeoutMs);
    } catch (err: unknown) {
      if (this.cancelled) return false;
      this.cancel();
      this.onFailure(
        new DeliveryAttemptFailure(
          `push ${event.type} to ${this.connection.id} failed: ${errorMessage(err)}`,
          err,
        ),
      );
      return false;
    }

    return !this.cancelled;
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
