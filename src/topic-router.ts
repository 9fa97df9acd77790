/**
 * Topic Router
 *
 * Routes inbound broker messages into satellite delivery queues:
 * - the broadcast topic fans out to every registered session
 * - any other topic goes to the sessions registered for it
 *
 * route() is synchronous, so one message is fully dispatched before the
 * broker hands over the next one.
 */

import type { Logger } from "./bridge.js";
import {
  MessageParseError,
  cloneBrokerMessage,
  decodePayload,
  parseBrokerMessage,
} from "./broker-messages.js";
import type { SessionRegistry } from "./session-registry.js";
import type { BrokerMessage } from "./types.js";

export interface TopicRouterOptions {
  registry: SessionRegistry;
  broadcastTopic: string;
  logger?: Logger;
}

/**
 * Outcome of routing one message.
 */
export type RouteResult =
  | { status: "delivered"; queues: number }
  | { status: "no-sessions" }
  | { status: "unroutable" }
  | { status: "invalid"; reason: string };

export class TopicRouter {
  private readonly registry: SessionRegistry;
  private readonly broadcastTopic: string;
  private logger?: Logger;

  constructor(options: TopicRouterOptions) {
    this.registry = options.registry;
    this.broadcastTopic = options.broadcastTopic;
    this.logger = options.logger;
  }

  /**
   * Route a single broker message. Never throws.
   */
  route(topic: string, payload: Buffer | string): RouteResult {
    let raw: string;
    try {
      raw = decodePayload(payload);
    } catch (err) {
      return this.invalid(topic, err);
    }

    if (topic === this.broadcastTopic) {
      return this.routeBroadcast(topic, raw);
    }

    const queues = this.registry.queuesForTopic(topic);
    if (queues.length === 0) {
      this.logger?.warn(`[TopicRouter] ${topic} seems to have no queue. Discarding message.`);
      return { status: "unroutable" };
    }

    const message = this.parse(topic, raw);
    if (!message.ok) return message.result;

    let delivered = 0;
    for (const queue of queues) {
      if (queue.push(queues.length === 1 ? message.value : cloneBrokerMessage(message.value))) {
        delivered++;
      }
    }
    return { status: "delivered", queues: delivered };
  }

  private routeBroadcast(topic: string, raw: string): RouteResult {
    const message = this.parse(topic, raw);
    if (!message.ok) return message.result;

    const queues = this.registry.broadcastQueues();
    if (queues.length === 0) {
      this.logger?.debug("[TopicRouter] Broadcast received with no sessions registered");
      return { status: "no-sessions" };
    }

    let delivered = 0;
    for (const queue of queues) {
      if (queue.push(cloneBrokerMessage(message.value))) delivered++;
    }
    this.logger?.debug(`[TopicRouter] Broadcast delivered to ${delivered} sessions`);
    return { status: "delivered", queues: delivered };
  }

  private parse(
    topic: string,
    raw: string,
  ): { ok: true; value: BrokerMessage } | { ok: false; result: RouteResult } {
    try {
      return { ok: true, value: parseBrokerMessage(raw) };
    } catch (err) {
      return { ok: false, result: this.invalid(topic, err) };
    }
  }

  private invalid(topic: string, err: unknown): RouteResult {
    const reason = err instanceof MessageParseError ? err.message : String(err);
    this.logger?.error(`[TopicRouter] Message on ${topic} failed validation: ${reason}`);
    return { status: "invalid", reason };
  }
}
