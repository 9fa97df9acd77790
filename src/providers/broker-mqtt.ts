/**
 * MQTT Broker Client
 *
 * Adapts an mqtt.js client to the BrokerClient interface. mqtt.js's own
 * reconnect is disabled (reconnectPeriod: 0); BrokerConnectionManager
 * owns the reconnect policy and subscription restore.
 */

import { randomBytes } from "crypto";
import { connectAsync, type IClientOptions, type MqttClient } from "mqtt";
import type {
  BrokerClient,
  BrokerClientFactory,
  BrokerConnectOptions,
  QoS,
} from "../broker-connection.js";

class MqttBrokerClient implements BrokerClient {
  private lastError?: Error;

  constructor(private readonly client: MqttClient) {
    // Without a listener an 'error' event would throw
    this.client.on("error", (error) => {
      this.lastError = error;
    });
  }

  async subscribe(topic: string, qos: QoS): Promise<void> {
    await this.client.subscribeAsync(topic, { qos });
  }

  async unsubscribe(topic: string): Promise<void> {
    await this.client.unsubscribeAsync(topic);
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    await this.client.publishAsync(topic, payload, { qos });
  }

  onMessage(handler: (topic: string, payload: Buffer) => void): void {
    this.client.on("message", (topic, payload) => handler(topic, payload));
  }

  onClose(handler: (error?: Error) => void): void {
    this.client.once("close", () => handler(this.lastError));
  }

  async end(): Promise<void> {
    await this.client.endAsync();
  }
}

/**
 * Connect to an MQTT broker with a single attempt.
 */
export const connectMqttBroker: BrokerClientFactory = async (
  options: BrokerConnectOptions,
): Promise<BrokerClient> => {
  const clientOptions: IClientOptions = {
    clientId: `${options.clientId}-${randomBytes(4).toString("hex")}`,
    username: options.username,
    password: options.password,
    connectTimeout: options.connectTimeoutMs,
    reconnectPeriod: 0,
    clean: true,
  };

  // allowRetries=false: reject on the first close instead of waiting for a reconnect
  const brokerUrl = `mqtt://${options.host}:${options.port}`;
  const client = await connectAsync(brokerUrl, clientOptions, false);
  return new MqttBrokerClient(client);
};
