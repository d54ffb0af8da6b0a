import { EventEmitter } from 'events';
import { governorConfig } from '../config/resources';
import { getLogger } from '../logger';
import { CapacityMap, Priority, RESOURCE_TYPES, ResourceType } from '../types/resources';
import { errorMessage } from './errors';
import { MessageBus } from './messageBus';
import {
    AllocationNotification,
    parseAllocationNotification,
    parseReleaseReply,
    parseRequestReply,
    Topics
} from './messages';

export interface ResourceClientOptions {
    timeoutMs?: number;
}

export interface ResourceRequestOptions {
    priority?: Priority;
    reason?: string;
}

const LOG = 'ResourceClient';

/**
 * Consumer-side view of the governor over the message bus. Keeps track of
 * what this consumer currently holds, including changes pushed by rebalancing.
 *
 * Emits 'allocation:updated' with the AllocationNotification it applied.
 */
export class ResourceClient extends EventEmitter {
    public readonly consumerId: string;
    private readonly bus: MessageBus;
    private readonly timeoutMs: number;
    private holdings: Map<ResourceType, number> = new Map();
    private subscriptionId: string | null = null;

    constructor(bus: MessageBus, consumerId: string, options: ResourceClientOptions = {}) {
        super();
        this.bus = bus;
        this.consumerId = consumerId;
        this.timeoutMs = options.timeoutMs ?? governorConfig.requestTimeoutMs;
    }

    /**
     * Announces the consumer and starts following allocation changes addressed to it.
     */
    public async start(): Promise<void> {
        if (!this.subscriptionId) {
            this.subscriptionId = this.bus.subscribe(
                Topics.ALLOCATION,
                message => this.applyNotification(message.payload),
                message => this.isAddressedToMe(message.payload)
            );
        }
        await this.bus.publish(Topics.COMPONENT_STARTED, { consumer_id: this.consumerId }, { source: this.consumerId });
    }

    /**
     * Releases everything still held, then announces the stop. A release that
     * fails is logged; the governor drops whatever is left when it sees the stop.
     */
    public async stop(): Promise<void> {
        for (const resourceType of Array.from(this.holdings.keys())) {
            try {
                await this.releaseResource(resourceType);
            } catch (error) {
                getLogger().warn(LOG, `Failed to release ${resourceType} before stopping`, { consumerId: this.consumerId }, errorMessage(error));
            }
        }

        if (this.subscriptionId) {
            this.bus.unsubscribe(this.subscriptionId);
            this.subscriptionId = null;
        }
        await this.bus.publish(Topics.COMPONENT_STOPPED, { consumer_id: this.consumerId }, { source: this.consumerId });
        this.holdings.clear();
    }

    /**
     * Asks for `amount` of a resource and returns what the governor now holds
     * for this consumer. A partial grant is still held and returned; a rejected
     * request leaves the existing grant in place and returns it.
     */
    public async requestResource(
        resourceType: ResourceType,
        amount: number,
        options: ResourceRequestOptions = {}
    ): Promise<number> {
        getLogger().info(LOG, `Requesting ${amount} of ${resourceType}`, { consumerId: this.consumerId });

        const response = await this.bus.request(Topics.REQUEST, {
            consumer_id: this.consumerId,
            resource_type: resourceType,
            requested_amount: amount,
            priority: options.priority ?? Priority.NORMAL,
            reason: options.reason
        }, this.timeoutMs, this.consumerId);
        const reply = parseRequestReply(response.payload);

        if (!reply.success) {
            getLogger().warn(LOG, `Resource request not fully granted: ${reply.message}`, {
                consumerId: this.consumerId,
                allocated: reply.allocated_amount
            });
        }

        if (reply.allocated_amount > 0) {
            this.holdings.set(resourceType, reply.allocated_amount);
        } else {
            this.holdings.delete(resourceType);
        }
        return reply.allocated_amount;
    }

    public async releaseResource(resourceType: ResourceType): Promise<boolean> {
        if (!this.holdings.has(resourceType)) {
            return false;
        }

        const response = await this.bus.request(Topics.RELEASE, {
            consumer_id: this.consumerId,
            resource_type: resourceType
        }, this.timeoutMs, this.consumerId);
        const reply = parseReleaseReply(response.payload);

        if (reply.success) {
            this.holdings.delete(resourceType);
            getLogger().info(LOG, `Resource ${resourceType} released`, { consumerId: this.consumerId });
        } else {
            getLogger().warn(LOG, `Resource release failed: ${reply.message}`, { consumerId: this.consumerId });
        }
        return reply.success;
    }

    public getAllocation(resourceType: ResourceType): number {
        return this.holdings.get(resourceType) ?? 0;
    }

    public getAllocations(): CapacityMap {
        const allocations: CapacityMap = {};
        for (const type of RESOURCE_TYPES) {
            const amount = this.holdings.get(type);
            if (amount !== undefined) {
                allocations[type] = amount;
            }
        }
        return allocations;
    }

    private isAddressedToMe(payload: unknown): boolean {
        return typeof payload === 'object'
            && payload !== null
            && 'consumer_id' in payload
            && payload.consumer_id === this.consumerId;
    }

    private applyNotification(payload: unknown): void {
        let notification: AllocationNotification;
        try {
            notification = parseAllocationNotification(payload);
        } catch (error) {
            getLogger().warn(LOG, 'Ignoring malformed allocation notification', { consumerId: this.consumerId }, errorMessage(error));
            return;
        }

        if (notification.allocation > 0) {
            this.holdings.set(notification.resource_type, notification.allocation);
        } else {
            this.holdings.delete(notification.resource_type);
        }
        getLogger().info(LOG, `Resource allocation updated: ${notification.resource_type} = ${notification.previous_allocation} -> ${notification.allocation}`, {
            consumerId: this.consumerId
        });
        this.emit('allocation:updated', notification);
    }
}
