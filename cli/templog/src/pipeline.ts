import { Ec3Meter, type MeterCounters, type MeterPort } from "./apator-ec3.js";
import type { TemplogConfig } from "./config.js";
import { createDriver } from "./drivers.js";
import { describeError } from "./errors.js";
import { LogWriter, type LogWriterCounters } from "./log-writer.js";
import { createLogger } from "./log.js";
import { createMqttTransport } from "./mqtt-transport.js";
import { ChannelLocks } from "./mutex.js";
import { PigpioPipe, type GpioBackend } from "./pigpio.js";
import { Publisher, type BrokerTransport, type ConnectionState, type PublisherCounters } from "./publisher.js";
import { Scheduler } from "./scheduler.js";
import type { Reading, SourceCounters, SourceDescriptor } from "./schema.js";
import { SerialMeterPort } from "./serial-port.js";
import { SignalSource } from "./signal-source.js";
import { MeasurementStore, type ReadingListener, type StoreEntryStats } from "./store.js";
import { nowMs, preciseNowMs } from "./util.js";
import { WorkQueue, type WorkQueueCounters } from "./work-queue.js";

const log = createLogger("pipeline");

export type PipelineDeps = {
  /** Broker transport; undefined builds one from the configuration, null disables publishing. */
  transport?: BrokerTransport | null;
  gpio?: GpioBackend;
  /** Opens the serial link of an electricity meter. */
  meterPort?: (path: string) => MeterPort;
  /** Wall clock for store staleness, retention and replay. */
  clock?: () => number;
  /** Timestamp source for new readings. */
  readingClock?: () => number;
};

type QueuedReading = { sourceId: string; reading: Reading };

export type PipelineStatus = {
  running: boolean;
  started_at: number | null;
  sources: Record<string, SourceCounters>;
  store: StoreEntryStats[];
  log_writer: LogWriterCounters;
  log_queue: WorkQueueCounters;
  publish_queue: WorkQueueCounters;
  publisher: PublisherCounters & { state: ConnectionState };
  meters: Record<string, MeterCounters>;
};

/**
 * Owns the acquisition pipeline: sources feed the store on a schedule, the
 * store's readings fan out to the reading log and the broker through two
 * bounded queues.
 */
export class Pipeline {
  readonly store: MeasurementStore;
  readonly sources: SignalSource[];
  readonly writer: LogWriter;
  readonly publisher: Publisher;
  readonly scheduler: Scheduler;
  private logQueue: WorkQueue<QueuedReading>;
  private publishQueue: WorkQueue<QueuedReading>;
  private gpio?: GpioBackend;
  private meters = new Map<string, Ec3Meter>();
  private meterPort: (path: string) => MeterPort;
  private sweepTimer?: NodeJS.Timeout;
  private sweeping?: Promise<string[]>;
  private starting?: Promise<void>;
  private startedAt: number | null = null;
  private clock: () => number;

  constructor(private config: TemplogConfig, deps: PipelineDeps = {}) {
    this.clock = deps.clock ?? nowMs;
    this.gpio = deps.gpio;
    this.meterPort = deps.meterPort ?? ((path) => new SerialMeterPort(path));
    this.store = new MeasurementStore({
      historyWindowMs: config.history.windowMs,
      maxSamples: config.history.maxSamples,
      staleAfterMs: config.staleAfterMs,
      clock: this.clock,
    });
    const locks = new ChannelLocks();
    const driverDeps = {
      locks,
      gpio: () => (this.gpio ??= new PigpioPipe()),
      w1BusDir: config.w1.busDir,
      lookup: (id: string) => this.store.latest(id),
      meter: (port: string, intervalMs: number) => this.meterOn(port, intervalMs),
    };
    this.sources = config.sources.map((descriptor) => {
      this.store.register(descriptor);
      return new SignalSource(descriptor, createDriver(descriptor.driver, driverDeps), deps.readingClock ?? preciseNowMs);
    });

    this.writer = new LogWriter({
      dir: config.storage.dir,
      retentionMs: config.storage.retentionMs,
      fsync: config.storage.fsync,
      clock: this.clock,
    });
    const transport = deps.transport === undefined ? createMqttTransport(config.broker) : deps.transport;
    this.publisher = new Publisher(transport, { baseTopic: config.broker.baseTopic, retain: config.broker.retain });

    this.logQueue = new WorkQueue((item) => this.writer.append(item.sourceId, item.reading), {
      name: "log",
      capacity: config.queues.capacity,
    });
    this.publishQueue = new WorkQueue(
      async (item) => {
        await this.publisher.publish(item.sourceId, item.reading);
      },
      { name: "publish", capacity: config.queues.capacity }
    );

    this.scheduler = new Scheduler(
      this.sources,
      this.store,
      [
        (source, reading) => {
          this.logQueue.push({ sourceId: source.id, reading });
        },
        (source, reading) => {
          if (this.publisher.enabled) this.publishQueue.push({ sourceId: source.id, reading });
        },
      ],
      { intervalMs: config.pollIntervalMs, readTimeoutMs: config.readTimeoutMs, clock: this.clock }
    );
  }

  get running(): boolean {
    return this.startedAt !== null;
  }

  /** Overlapping calls share one startup. */
  start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.startOnce().catch((err: unknown) => {
        this.starting = undefined;
        throw err;
      });
    }
    return this.starting;
  }

  private async startOnce() {
    await this.sweep();
    await this.replayHistory();
    this.logQueue.start();
    this.publishQueue.start();
    this.publisher.start();
    this.scheduler.start();
    this.sweepTimer = setInterval(() => {
      void this.sweep();
    }, this.config.storage.sweepIntervalMs);
    this.startedAt = this.clock();
    log.info(`started with ${this.sources.length} source(s), log in ${this.writer.dir}`);
  }

  /** Starts the queues without polling, for callers that drive cycles themselves. */
  startSinks() {
    this.logQueue.start();
    this.publishQueue.start();
    this.publisher.start();
  }

  async stop() {
    const starting = this.starting;
    this.starting = undefined;
    if (starting) {
      try {
        await starting;
      } catch (err) {
        log.warn(`stopping after a failed start: ${describeError(err)}`);
      }
    }
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
    await this.scheduler.stop();
    const grace = this.config.queues.drainGraceMs;
    const [logged, published] = await Promise.all([this.logQueue.drain(grace), this.publishQueue.drain(grace)]);
    if (!logged || !published) log.warn("stopped with undelivered readings");
    await this.sweeping;
    await this.writer.close();
    await this.publisher.stop();
    await this.closeSources();
    this.startedAt = null;
    log.info("stopped");
  }

  /** Releases drivers and the GPIO backend. */
  async closeSources() {
    await Promise.all(this.sources.map((source) => source.close()));
    try {
      await this.gpio?.close?.();
    } catch (err) {
      log.warn(`closing GPIO backend failed: ${describeError(err)}`);
    }
  }

  /** One retention sweep; never throws. */
  sweep(): Promise<string[]> {
    if (this.sweeping) return this.sweeping;
    const run = this.writer
      .sweepExpired(this.clock())
      .catch((err: unknown) => {
        log.warn(`retention sweep failed: ${describeError(err)}`);
        return [];
      })
      .finally(() => {
        this.sweeping = undefined;
      });
    this.sweeping = run;
    return run;
  }

  /** Polls every source once and feeds the sinks; returns the readings in source order. */
  runCycle(): Promise<Reading[]> {
    return this.scheduler.runCycle();
  }

  latest(sourceId: string): Reading | undefined {
    return this.store.latest(sourceId);
  }

  history(sourceId: string, since?: number): Iterable<Reading> {
    return this.store.history(sourceId, since);
  }

  listSources(): SourceDescriptor[] {
    return this.store.sources();
  }

  subscribe(listener: ReadingListener): () => void {
    return this.store.subscribe(listener);
  }

  status(): PipelineStatus {
    return {
      running: this.running,
      started_at: this.startedAt,
      sources: this.scheduler.getCounters(),
      store: this.store.stats(),
      log_writer: this.writer.getCounters(),
      log_queue: this.logQueue.getCounters(),
      publish_queue: this.publishQueue.getCounters(),
      publisher: { ...this.publisher.getCounters(), state: this.publisher.getState() },
      meters: Object.fromEntries(Array.from(this.meters, ([path, meter]) => [path, meter.getCounters()])),
    };
  }

  private meterOn(path: string, intervalMs: number): Ec3Meter {
    let meter = this.meters.get(path);
    if (!meter) {
      meter = new Ec3Meter(this.meterPort(path), { intervalMs, clock: this.clock });
      this.meters.set(path, meter);
    }
    return meter;
  }

  /** Seeds the store from the reading log; returns how many readings were taken. */
  async replayHistory(): Promise<number> {
    let recent: Map<string, Reading[]>;
    try {
      recent = await this.writer.loadRecent(this.config.history.windowMs, this.clock());
    } catch (err) {
      log.warn(`history replay failed, starting empty: ${describeError(err)}`);
      return 0;
    }
    let total = 0;
    for (const source of this.sources) {
      const readings = recent.get(source.id);
      if (!readings) continue;
      const taken = this.store.preload(
        source.id,
        readings.map((reading) => source.restore(reading))
      );
      total += taken;
      log.debug(`${source.id}: replayed ${taken} reading(s)`);
    }
    return total;
  }
}
