import type { EventEmitter } from "node:events";
import { describeError, TransportFault } from "./errors.js";
import { createLogger, RateLimitedLog } from "./log.js";
import { toPublishMessage } from "./readings.js";
import type { Reading } from "./schema.js";

const log = createLogger("publisher");

export type PublishOptions = { qos: 0; retain: boolean };

/**
 * Connection to a broker. Emits "connect", "close" and "error"; never
 * reconnects on its own, the Publisher decides when to call connect() again.
 */
export interface BrokerTransport extends EventEmitter {
  readonly target: string;
  connect(): void;
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  end(): Promise<void>;
}

export type ConnectionState = "disabled" | "disconnected" | "connecting" | "connected";

export type PublisherOptions = {
  baseTopic: string;
  retain: boolean;
  minBackoffMs?: number;
  maxBackoffMs?: number;
};

export type PublisherCounters = {
  sent: number;
  dropped: number;
  failed: number;
  reconnects: number;
};

export function backoffDelay(attempt: number, minMs: number, maxMs: number): number {
  return Math.min(maxMs, minMs * 2 ** Math.min(attempt, 30));
}

/**
 * Best-effort live feed of readings. While the broker is unreachable
 * readings are dropped, not queued; the reading log is the durable copy.
 */
export class Publisher {
  private state: ConnectionState;
  private attempt = 0;
  private retryTimer?: NodeJS.Timeout;
  private started = false;
  private stopped = false;
  private counters: PublisherCounters = { sent: 0, dropped: 0, failed: 0, reconnects: 0 };
  private dropLog = new RateLimitedLog((msg) => log.debug(msg));
  private errorLog = new RateLimitedLog((msg) => log.warn(msg));
  private minBackoffMs: number;
  private maxBackoffMs: number;

  constructor(private transport: BrokerTransport | null, private options: PublisherOptions) {
    this.state = transport ? "disconnected" : "disabled";
    this.minBackoffMs = options.minBackoffMs ?? 1000;
    this.maxBackoffMs = options.maxBackoffMs ?? 60_000;
  }

  get enabled(): boolean {
    return this.transport !== null;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getCounters(): PublisherCounters {
    return { ...this.counters };
  }

  start() {
    const transport = this.transport;
    if (!transport) {
      log.info("no broker host configured, publishing disabled");
      return;
    }
    if (this.started) return;
    this.started = true;
    this.stopped = false;
    transport.on("connect", () => this.onConnect());
    transport.on("close", () => this.onClose());
    transport.on("error", (err: unknown) => this.onError(err));
    log.info(`connecting to broker ${transport.target}`);
    this.connect();
  }

  topicFor(sourceId: string): string {
    return `${this.options.baseTopic.replace(/\/+$/, "")}/${sourceId}`;
  }

  /** Never rejects; resolves true when the transport accepted the message. */
  async publish(sourceId: string, reading: Reading): Promise<boolean> {
    const transport = this.transport;
    if (!transport) return false;
    if (this.state !== "connected") {
      this.counters.dropped += 1;
      this.dropLog.emit(`broker ${this.state}, dropped reading of ${sourceId}`);
      return false;
    }
    const payload = JSON.stringify(toPublishMessage(reading));
    try {
      await transport.publish(this.topicFor(sourceId), payload, { qos: 0, retain: this.options.retain });
      this.counters.sent += 1;
      return true;
    } catch (err) {
      this.counters.failed += 1;
      this.errorLog.emit(`publish of ${sourceId} failed: ${describeError(err)}`);
      return false;
    }
  }

  async stop() {
    this.stopped = true;
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = undefined;
    if (!this.transport || !this.started) return;
    this.started = false;
    try {
      await this.transport.end();
    } catch (err) {
      log.warn(`closing broker connection failed: ${describeError(err)}`);
    }
    this.transport.removeAllListeners();
    this.state = "disconnected";
  }

  private connect() {
    if (!this.transport || this.stopped) return;
    this.state = "connecting";
    try {
      this.transport.connect();
    } catch (err) {
      this.onError(err);
      this.onClose();
    }
  }

  private onConnect() {
    if (this.stopped) return;
    this.state = "connected";
    this.attempt = 0;
    log.info(`connected to broker ${this.transport?.target ?? ""}`);
  }

  private onClose() {
    if (this.stopped) return;
    if (this.state === "connected") log.warn("connection to broker lost");
    this.state = "disconnected";
    this.scheduleReconnect();
  }

  private onError(err: unknown) {
    const fault = err instanceof TransportFault ? err : new TransportFault(describeError(err), { cause: err });
    this.errorLog.emit(`broker: ${fault.message}`);
  }

  private scheduleReconnect() {
    if (this.retryTimer || this.stopped) return;
    const wait = backoffDelay(this.attempt, this.minBackoffMs, this.maxBackoffMs);
    this.attempt += 1;
    log.debug(`reconnecting in ${wait} ms`);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      this.counters.reconnects += 1;
      this.connect();
    }, wait);
  }
}
