import { deadLettersTotal } from "../metrics";
import type { TaskJob } from "../tasks/types";
import type { DeadLetter, Delivery, JobQueue, RetryOutcome } from "./types";

interface Envelope {
  tag: number;
  job: TaskJob;
  attempt: number;
}

/**
 * In-process queue with the same delivery contract as the broker-backed one:
 * unacked deliveries stay in flight until acked, retried or returned by
 * `requeueInFlight` (a crashed consumer).
 */
export class InMemoryJobQueue implements JobQueue {
  private ready: Envelope[] = [];
  private inFlight = new Map<number, Envelope>();
  private deadLetters: DeadLetter[] = [];
  private nextTag = 1;

  constructor(private readonly maxAttempts = 3) { }

  async enqueue(job: TaskJob): Promise<void> {
    this.ready.push({ tag: this.nextTag++, job, attempt: 1 });
    console.log("[MQ] enqueued task", job.taskId);
  }

  async dequeue(): Promise<Delivery | null> {
    const envelope = this.ready.shift();
    if (!envelope) return null;

    this.inFlight.set(envelope.tag, envelope);
    return this.toDelivery(envelope);
  }

  async peekDeadLetters(limit: number): Promise<DeadLetter[]> {
    return this.deadLetters.slice(0, limit);
  }

  async ping(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }

  /** Return every unacked delivery to the queue, as a broker does when a consumer dies. */
  requeueInFlight(): number {
    const returned = [...this.inFlight.values()];
    this.inFlight.clear();
    this.ready.unshift(...returned.map((e) => ({ ...e, tag: this.nextTag++ })));
    return returned.length;
  }

  get depth() {
    return this.ready.length;
  }

  get inFlightCount() {
    return this.inFlight.size;
  }

  private toDelivery(envelope: Envelope): Delivery {
    const settle = () => {
      if (!this.inFlight.delete(envelope.tag)) {
        throw new Error(`Delivery ${envelope.tag} already settled`);
      }
    };

    return {
      job: envelope.job,
      attempt: envelope.attempt,
      ack: async () => {
        settle();
      },
      retry: async (reason: string): Promise<RetryOutcome> => {
        settle();
        if (envelope.attempt < this.maxAttempts) {
          this.ready.push({ tag: this.nextTag++, job: envelope.job, attempt: envelope.attempt + 1 });
          console.warn(`[MQ] task ${envelope.job.taskId} requeued (attempt ${envelope.attempt + 1}): ${reason}`);
          return "requeued";
        }
        this.deadLetters.push({
          job: envelope.job,
          reason,
          attempt: envelope.attempt,
          deadLetteredAt: new Date().toISOString(),
        });
        deadLettersTotal.inc();
        console.warn("[MQ] task sent to DLQ", envelope.job.taskId);
        return "dead-lettered";
      },
      nack: async () => {
        settle();
        this.ready.unshift({ ...envelope, tag: this.nextTag++ });
      },
    };
  }
}
