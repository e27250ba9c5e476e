import { EventEmitter } from "node:events";
import { existsSync, readFileSync } from "node:fs";
import { connect, type IClientOptions, type MqttClient } from "mqtt";
import { ConfigurationFault, describeError, TransportFault } from "./errors.js";
import type { BrokerTransport, PublishOptions } from "./publisher.js";

export type BrokerConfig = {
  host: string;
  port: number;
  tls: boolean;
  username: string;
  passwordFile?: string;
  caFile?: string;
  baseTopic: string;
  clientId?: string;
  retain: boolean;
  connectTimeoutMs: number;
};

export type BrokerCredentials = {
  password?: string;
  ca?: Buffer;
};

function readRequired(path: string, what: string): Buffer {
  if (!existsSync(path)) {
    throw new ConfigurationFault(`broker ${what} file not found: ${path}`);
  }
  try {
    return readFileSync(path);
  } catch (err) {
    throw new ConfigurationFault(`cannot read broker ${what} file ${path}: ${describeError(err)}`);
  }
}

/** Reads the password and CA certificate named by the configuration. */
export function loadBrokerCredentials(config: BrokerConfig): BrokerCredentials {
  const credentials: BrokerCredentials = {};
  if (config.passwordFile) {
    credentials.password = readRequired(config.passwordFile, "password").toString("utf8").trim();
  }
  if (config.caFile) {
    credentials.ca = readRequired(config.caFile, "CA certificate");
  }
  if (config.tls && config.username && !credentials.password) {
    throw new ConfigurationFault(`broker user "${config.username}" configured without a password file`);
  }
  return credentials;
}

export class MqttTransport extends EventEmitter implements BrokerTransport {
  readonly target: string;
  private client?: MqttClient;

  constructor(private config: BrokerConfig, private credentials: BrokerCredentials) {
    super();
    this.target = `${config.tls ? "mqtts" : "mqtt"}://${config.host}:${config.port}`;
  }

  connect() {
    this.dispose();
    const options: IClientOptions = {
      host: this.config.host,
      port: this.config.port,
      protocol: this.config.tls ? "mqtts" : "mqtt",
      clientId: this.config.clientId,
      username: this.config.username || undefined,
      password: this.credentials.password,
      ca: this.credentials.ca,
      rejectUnauthorized: true,
      reconnectPeriod: 0,
      connectTimeout: this.config.connectTimeoutMs,
      queueQoSZero: false,
      clean: true,
    };
    const client = connect(options);
    client.on("connect", () => this.emit("connect"));
    client.on("close", () => this.emit("close"));
    client.on("error", (err) => this.emit("error", new TransportFault(describeError(err), { cause: err })));
    this.client = client;
  }

  publish(topic: string, payload: string, options: PublishOptions): Promise<void> {
    const client = this.client;
    if (!client?.connected) return Promise.reject(new TransportFault("not connected"));
    return new Promise((resolve, reject) => {
      client.publish(topic, payload, { qos: options.qos, retain: options.retain }, (err) => {
        if (err) reject(new TransportFault(describeError(err), { cause: err }));
        else resolve();
      });
    });
  }

  async end() {
    const client = this.client;
    this.client = undefined;
    if (!client) return;
    await client.endAsync();
    client.removeAllListeners();
  }

  private dispose() {
    const client = this.client;
    this.client = undefined;
    if (!client) return;
    // errors of the abandoned client still reach the publisher's log
    client.removeAllListeners("connect");
    client.removeAllListeners("close");
    client.end(true);
  }
}

/** Null when no host is configured, which disables publishing. */
export function createMqttTransport(config: BrokerConfig): MqttTransport | null {
  if (!config.host.trim()) return null;
  return new MqttTransport(config, loadBrokerCredentials(config));
}
