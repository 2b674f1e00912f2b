import amqp, { type ConfirmChannel, type GetMessage } from "amqplib";
import { z } from "zod";
import { deadLettersTotal } from "../metrics";
import { errorMessage } from "../errors";
import { TaskJob, taskJobSchema } from "../tasks/types";
import type { DeadLetter, Delivery, JobQueue, RetryOutcome } from "./types";

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

const ATTEMPT_HEADER = "x-attempt";

const deadLetterSchema = z.object({
  job: z.unknown(),
  reason: z.string(),
  attempt: z.number(),
  deadLetteredAt: z.string(),
});

export interface RabbitQueueOptions {
  url: string;
  queue: string;
  maxAttempts: number;
}

function readAttempt(msg: GetMessage): number {
  const value: unknown = msg.properties.headers?.[ATTEMPT_HEADER];
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : 1;
}

function parseBody(msg: GetMessage): unknown {
  const raw = msg.content.toString();
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export class RabbitJobQueue implements JobQueue {
  private connection: AmqpConnection | null = null;
  private connecting: Promise<ConfirmChannel> | null = null;
  private readonly dlq: string;

  constructor(private readonly options: RabbitQueueOptions) {
    this.dlq = `${options.queue}.dlq`;
  }

  async enqueue(job: TaskJob): Promise<void> {
    await this.publish(this.options.queue, job, 1);
    console.log("[MQ] enqueued task", job.taskId);
  }

  async dequeue(): Promise<Delivery | null> {
    const ch = await this.getChannel();
    const msg = await ch.get(this.options.queue, { noAck: false });
    if (!msg) return null;

    const attempt = readAttempt(msg);
    const body = parseBody(msg);

    const parsed = taskJobSchema.safeParse(body);
    if (!parsed.success) {
      console.error("[MQ] malformed job payload, dead-lettering", parsed.error.issues);
      await this.publishDeadLetter(body, "Malformed job payload", attempt);
      ch.ack(msg);
      return this.dequeue();
    }

    return this.toDelivery(ch, msg, parsed.data, attempt);
  }

  async peekDeadLetters(limit: number): Promise<DeadLetter[]> {
    const ch = await this.getChannel();
    const held: GetMessage[] = [];
    const letters: DeadLetter[] = [];

    try {
      for (let i = 0; i < limit; i++) {
        const msg = await ch.get(this.dlq, { noAck: false });
        if (!msg) break;
        held.push(msg);
        letters.push(this.readDeadLetter(msg));
      }
    } finally {
      // put everything back; peeking must not consume
      for (const msg of held) {
        ch.nack(msg, false, true);
      }
    }

    return letters;
  }

  async ping(): Promise<void> {
    const ch = await this.getChannel();
    await ch.checkQueue(this.options.queue);
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    this.connecting = null;
    if (!pending) return;

    try {
      await pending;
    } catch (err) {
      console.warn("[MQ] connection was never established:", errorMessage(err));
      return;
    }

    // closing the connection closes its channel too
    const connection = this.connection;
    this.connection = null;
    if (connection) await connection.close();
  }

  private readDeadLetter(msg: GetMessage): DeadLetter {
    const body = parseBody(msg);
    const parsed = deadLetterSchema.safeParse(body);
    if (parsed.success) {
      const { job, reason, attempt, deadLetteredAt } = parsed.data;
      return { job, reason, attempt, deadLetteredAt };
    }
    return { job: body, reason: "Unreadable dead letter", attempt: readAttempt(msg), deadLetteredAt: "" };
  }

  private toDelivery(ch: ConfirmChannel, msg: GetMessage, job: TaskJob, attempt: number): Delivery {
    return {
      job,
      attempt,
      ack: async () => {
        ch.ack(msg);
      },
      retry: async (reason: string): Promise<RetryOutcome> => {
        if (attempt < this.options.maxAttempts) {
          await this.publish(this.options.queue, job, attempt + 1);
          ch.ack(msg);
          console.warn(`[MQ] task ${job.taskId} requeued (attempt ${attempt + 1}): ${reason}`);
          return "requeued";
        }

        await this.publishDeadLetter(job, reason, attempt);
        ch.ack(msg);
        return "dead-lettered";
      },
      nack: async () => {
        ch.nack(msg, false, true);
      },
    };
  }

  private async publish(queue: string, body: unknown, attempt: number) {
    const ch = await this.getChannel();
    ch.sendToQueue(queue, Buffer.from(JSON.stringify(body)), {
      persistent: true,
      contentType: "application/json",
      headers: { [ATTEMPT_HEADER]: attempt },
    });
    await ch.waitForConfirms();
  }

  private async publishDeadLetter(job: unknown, reason: string, attempt: number) {
    const letter: DeadLetter = { job, reason, attempt, deadLetteredAt: new Date().toISOString() };
    await this.publish(this.dlq, letter, attempt);
    deadLettersTotal.inc();
    console.warn("[MQ] job sent to DLQ:", reason);
  }

  /** Concurrent callers share one connection attempt. */
  private getChannel(): Promise<ConfirmChannel> {
    if (!this.connecting) {
      this.connecting = this.open().catch((err: unknown) => {
        this.connecting = null;
        throw err;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<ConfirmChannel> {
    const conn = await amqp.connect(this.options.url);
    conn.on("error", (err: unknown) => {
      console.error("[MQ] connection error:", errorMessage(err));
    });
    conn.on("close", () => {
      console.warn("[MQ] connection closed");
      if (this.connection !== conn) return;
      this.connection = null;
      this.connecting = null;
    });
    this.connection = conn;

    try {
      const ch = await conn.createConfirmChannel();
      await ch.assertQueue(this.dlq, { durable: true });
      await ch.assertQueue(this.options.queue, { durable: true });
      return ch;
    } catch (err) {
      console.error("[MQ] channel setup failed:", errorMessage(err));
      await conn.close();
      throw err;
    }
  }
}
