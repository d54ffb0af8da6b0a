import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../logger';

export interface BusMessage<T = unknown> {
    id: string;
    topic: string;
    payload: T;
    timestamp: Date;
    source?: string;
    correlationId?: string;
    replyTo?: string;
}

export type MessageHandler = (message: BusMessage) => void | Promise<void>;
export type MessageFilter = (message: BusMessage) => boolean;

export interface PublishOptions {
    source?: string;
    correlationId?: string;
    replyTo?: string;
}

interface Subscription {
    id: string;
    pattern: string;
    handler: MessageHandler;
    filter?: MessageFilter;
}

const LOG = 'MessageBus';

/**
 * Checks a dotted topic against a pattern. `*` matches exactly one level and
 * `#` matches all remaining levels, including none:
 * 'resource.*' matches 'resource.request' but not 'resource.release.response.a';
 * 'resource.#' matches both, and 'resource' itself.
 */
export function topicMatches(topic: string, pattern: string): boolean {
    if (pattern === topic) return true;

    const topicParts = topic.split('.');
    const patternParts = pattern.split('.');

    for (let i = 0; i < patternParts.length; i++) {
        const part = patternParts[i];
        if (part === '#') {
            return true;
        }
        if (i >= topicParts.length) {
            return false;
        }
        if (part !== '*' && part !== topicParts[i]) {
            return false;
        }
    }
    return topicParts.length === patternParts.length;
}

/**
 * In-process publish/subscribe bus with request/reply. A failing handler is
 * logged and does not affect the publisher or the other subscribers.
 */
export class MessageBus extends EventEmitter {
    private subscriptions: Map<string, Subscription> = new Map();

    public subscribe(pattern: string, handler: MessageHandler, filter?: MessageFilter): string {
        const id = uuidv4();
        this.subscriptions.set(id, { id, pattern, handler, filter });
        return id;
    }

    public unsubscribe(subscriptionId: string): boolean {
        return this.subscriptions.delete(subscriptionId);
    }

    public subscriberCount(topic?: string): number {
        if (topic === undefined) {
            return this.subscriptions.size;
        }
        return Array.from(this.subscriptions.values())
            .filter(subscription => topicMatches(topic, subscription.pattern))
            .length;
    }

    /**
     * Delivers to every matching subscriber and resolves once all handlers settle.
     */
    public async publish<T>(topic: string, payload: T, options: PublishOptions = {}): Promise<BusMessage<T>> {
        const message: BusMessage<T> = {
            id: uuidv4(),
            topic,
            payload,
            timestamp: new Date(),
            ...options
        };

        const targets = Array.from(this.subscriptions.values())
            .filter(subscription => topicMatches(topic, subscription.pattern));

        await Promise.all(targets.map(subscription => this.deliver(subscription, message)));
        this.emit('published', message);
        return message;
    }

    /**
     * Publishes and waits for the first reply addressed back to this request.
     * The reply payload is returned as-is; callers validate its shape.
     */
    public request(topic: string, payload: unknown, timeoutMs: number, source?: string): Promise<BusMessage> {
        const replyTo = `_reply.${uuidv4()}`;

        return new Promise<BusMessage>((resolve, reject) => {
            let settled = false;

            const finish = () => {
                settled = true;
                clearTimeout(timer);
                this.unsubscribe(subscriptionId);
            };

            const subscriptionId = this.subscribe(replyTo, reply => {
                if (settled) return;
                finish();
                resolve(reply);
            });

            const timer = setTimeout(() => {
                if (settled) return;
                finish();
                reject(new Error(`Request to ${topic} timed out after ${timeoutMs}ms`));
            }, timeoutMs);

            this.publish(topic, payload, { replyTo, source }).catch(error => {
                if (settled) return;
                finish();
                reject(error);
            });
        });
    }

    /**
     * Answers a request. Falls back to `fallbackTopic` when the sender did not ask for a reply.
     */
    public async reply<T>(request: BusMessage, payload: T, fallbackTopic?: string): Promise<void> {
        const topic = request.replyTo ?? fallbackTopic;
        if (!topic) {
            return;
        }
        await this.publish(topic, payload, { correlationId: request.id });
    }

    public clear(): void {
        this.subscriptions.clear();
    }

    private async deliver(subscription: Subscription, message: BusMessage): Promise<void> {
        try {
            if (subscription.filter && !subscription.filter(message)) {
                return;
            }
            await subscription.handler(message);
        } catch (error) {
            getLogger().error(LOG, `Handler for ${subscription.pattern} failed on ${message.topic}`, { messageId: message.id }, error);
            this.emit('handler:error', { subscriptionId: subscription.id, topic: message.topic, error });
        }
    }
}
