import type { TaskJob } from "../tasks/types";

export type RetryOutcome = "requeued" | "dead-lettered";

export interface Delivery {
  job: TaskJob;
  /** 1 on first delivery, incremented on every retry. */
  attempt: number;
  ack(): Promise<void>;
  /** Requeue while attempts remain, otherwise move the job to the dead-letter queue. */
  retry(reason: string): Promise<RetryOutcome>;
  /** Put the job back unchanged, without counting an attempt. */
  nack(): Promise<void>;
}

export interface DeadLetter {
  job: unknown;
  reason: string;
  attempt: number;
  deadLetteredAt: string;
}

export interface JobQueue {
  enqueue(job: TaskJob): Promise<void>;
  /** Non-blocking poll; resolves null when nothing is ready. */
  dequeue(): Promise<Delivery | null>;
  peekDeadLetters(limit: number): Promise<DeadLetter[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
