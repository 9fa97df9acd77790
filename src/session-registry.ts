/**
 * Session Registry
 *
 * Owns the process-wide tables shared by the bridge, the topic router
 * and the satellite sessions:
 * - active sessions by session id
 * - broker topic → delivery queues
 *
 * Every mutation completes synchronously, so the tables are never
 * observed half-updated across an await.
 */

import type { Logger } from "./bridge.js";
import { OUTPUT_TOPIC_SUFFIX } from "./config.js";
import type { DeliveryQueue } from "./delivery-queue.js";
import type { SatelliteCloseCode, SatelliteSessionInfo } from "./types.js";

/**
 * Handle the registry keeps for each session.
 */
export interface RegisteredSession {
  readonly sessionId: string;
  /** Force the session closed (transport close + teardown) */
  close(code: SatelliteCloseCode, reason: string): void;
  getInfo(): SatelliteSessionInfo;
}

/**
 * Keeps the broker's subscription set in step with the registry.
 */
export interface SubscriptionTracker {
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): void;
}

interface SessionEntry {
  handle: RegisteredSession;
  outputTopic?: string;
  queue?: DeliveryQueue;
}

export interface SessionRegistryOptions {
  logger?: Logger;
  subscriptions?: SubscriptionTracker;
}

export class SessionRegistry {
  private sessions = new Map<string, SessionEntry>();
  private topicQueues = new Map<string, DeliveryQueue[]>();
  private readonly subscriptions?: SubscriptionTracker;
  private readonly logger?: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = options.logger;
    this.subscriptions = options.subscriptions;
  }

  /**
   * Register a session.
   *
   * @returns false if a session with the same id is already registered
   */
  register(handle: RegisteredSession): boolean {
    if (this.sessions.has(handle.sessionId)) {
      this.logger?.warn(`[SessionRegistry] Duplicate session rejected: ${handle.sessionId}`);
      return false;
    }
    this.sessions.set(handle.sessionId, { handle });
    this.logger?.debug(`[SessionRegistry] Registered ${handle.sessionId} (${this.sessions.size} active)`);
    return true;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Attach a session's delivery queue under its output topic and
   * subscribe the broker to that topic.
   */
  attachOutput(sessionId: string, outputTopic: string, queue: DeliveryQueue): Promise<void> {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return Promise.reject(new Error(`Session ${sessionId} is not registered`));
    }
    if (entry.queue) {
      return Promise.reject(new Error(`Session ${sessionId} already has an output queue`));
    }

    entry.outputTopic = outputTopic;
    entry.queue = queue;

    const queues = this.topicQueues.get(outputTopic);
    if (queues) {
      queues.push(queue);
    } else {
      this.topicQueues.set(outputTopic, [queue]);
    }

    return this.subscriptions?.subscribe(outputTopic) ?? Promise.resolve();
  }

  /**
   * Remove a session and everything routed to it.
   * Safe to call more than once.
   *
   * @returns true if the session was registered
   */
  deregister(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;

    this.sessions.delete(sessionId);

    const { outputTopic, queue } = entry;
    if (queue) {
      queue.close();
    }
    if (outputTopic && queue) {
      const remaining = (this.topicQueues.get(outputTopic) ?? []).filter((q) => q !== queue);
      if (remaining.length > 0) {
        this.topicQueues.set(outputTopic, remaining);
      } else {
        this.topicQueues.delete(outputTopic);
        this.subscriptions?.unsubscribe(outputTopic);
      }
    }

    this.logger?.debug(`[SessionRegistry] Removed ${sessionId} (${this.sessions.size} active)`);
    return true;
  }

  /**
   * Queues subscribed to a topic (empty if none).
   */
  queuesForTopic(topic: string): readonly DeliveryQueue[] {
    return this.topicQueues.get(topic) ?? [];
  }

  /**
   * Every distinct queue registered under a session output topic.
   */
  broadcastQueues(): DeliveryQueue[] {
    const seen = new Set<DeliveryQueue>();
    for (const [topic, queues] of this.topicQueues) {
      if (!topic.endsWith(OUTPUT_TOPIC_SUFFIX)) continue;
      for (const queue of queues) seen.add(queue);
    }
    return [...seen];
  }

  /**
   * Output topics of all registered sessions.
   */
  outputTopics(): string[] {
    return [...this.topicQueues.keys()];
  }

  /**
   * Force-close every registered session.
   */
  closeAll(code: SatelliteCloseCode, reason: string): number {
    const handles = [...this.sessions.values()].map((entry) => entry.handle);
    for (const handle of handles) {
      try {
        handle.close(code, reason);
      } catch (err) {
        this.logger?.error(`[SessionRegistry] Failed to close ${handle.sessionId}:`, err);
        this.deregister(handle.sessionId);
      }
    }
    return handles.length;
  }

  get size(): number {
    return this.sessions.size;
  }

  getSessionInfo(sessionId: string): SatelliteSessionInfo | undefined {
    return this.sessions.get(sessionId)?.handle.getInfo();
  }

  listSessions(): SatelliteSessionInfo[] {
    return [...this.sessions.values()].map((entry) => entry.handle.getInfo());
  }
}
