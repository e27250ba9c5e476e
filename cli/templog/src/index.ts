export * from "./schema.js";
export * from "./errors.js";
export { createLogger, RateLimitedLog, setLogLevel, getLogLevel, parseLogLevel, type Logger, type LogLevel } from "./log.js";
export { loadConfig, parseConfig, ConfigSchema, type TemplogConfig, type RawConfig } from "./config.js";
export { createDriver, DeltaDriver, DigitalInDriver, type SensorDriver, type DriverDeps } from "./drivers.js";
export { W1Driver, parseW1Slave, W1_BUS_DIR } from "./w1.js";
export { TsicDriver, ZacWireDecoder, TSIC_MODELS, type TsicType } from "./tsic.js";
export { PigpioPipe, type GpioBackend, type GpioEdge, type EdgeWatch } from "./pigpio.js";
export { SimulatedDriver } from "./simulated.js";
export { Ec3Meter, MeterDriver, TariffPowerTracker, parseEc3Telegram, type MeterPort, type MeterTotals } from "./apator-ec3.js";
export { SerialMeterPort } from "./serial-port.js";
export { SignalSource } from "./signal-source.js";
export { MeasurementStore, type StoreOptions, type ReadingListener } from "./store.js";
export { HistoryRing } from "./ring.js";
export { LogWriter, partitionName, type LogWriterOptions } from "./log-writer.js";
export { Publisher, backoffDelay, type BrokerTransport, type PublisherOptions, type ConnectionState } from "./publisher.js";
export { MqttTransport, createMqttTransport, loadBrokerCredentials, type BrokerConfig } from "./mqtt-transport.js";
export { Scheduler, type ReadingSink, type SchedulerOptions } from "./scheduler.js";
export { WorkQueue } from "./work-queue.js";
export { Mutex, ChannelLocks } from "./mutex.js";
export { Pipeline, type PipelineDeps, type PipelineStatus } from "./pipeline.js";
export { TemplogServer, route, type ReadApi } from "./server.js";
export { makeReading, okReading, errorReading, toPublishMessage, toLogRecord, fromLogRecord, FORMATTED_MISSING } from "./readings.js";
