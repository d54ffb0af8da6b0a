import { getLogger } from '../logger';
import { AllocationChange, ReleaseResult } from '../types/resources';
import { errorMessage } from './errors';
import { BusMessage, MessageBus } from './messageBus';
import {
    describePayload,
    parseLifecycleMessage,
    Topics,
    toAllocationNotification,
    toReleaseReply
} from './messages';
import { ResourceManager } from './resourceManager';

const LOG = 'ResourceBusBinding';
const SOURCE = 'resource-manager';

/**
 * Connects a ResourceManager to the message bus: inbound request, release and
 * lifecycle topics are handled by the manager, rebalance changes go out on
 * `resource.allocation` and every successful release is acknowledged on
 * `resource.released`, whichever surface it came through.
 */
export class ResourceBusBinding {
    private readonly bus: MessageBus;
    private readonly manager: ResourceManager;
    private subscriptionIds: string[] = [];
    private readonly onAllocationChanged = (change: AllocationChange) => {
        this.publishSafely(Topics.ALLOCATION, toAllocationNotification(change));
    };
    private readonly onReleased = (result: ReleaseResult) => {
        this.publishSafely(Topics.RELEASED, toReleaseReply(result));
    };

    constructor(bus: MessageBus, manager: ResourceManager) {
        this.bus = bus;
        this.manager = manager;
    }

    public attach(): void {
        if (this.subscriptionIds.length > 0) {
            return;
        }

        this.subscriptionIds = [
            this.bus.subscribe(Topics.REQUEST, message => this.handleRequest(message)),
            this.bus.subscribe(Topics.RELEASE, message => this.handleRelease(message)),
            this.bus.subscribe(Topics.COMPONENT_STARTED, message => this.handleStarted(message)),
            this.bus.subscribe(Topics.COMPONENT_STOPPED, message => this.handleStopped(message))
        ];
        this.manager.on('allocation:changed', this.onAllocationChanged);
        this.manager.on('allocation:released', this.onReleased);
        getLogger().info(LOG, 'Subscribed to resource topics');
    }

    public detach(): void {
        for (const id of this.subscriptionIds) {
            this.bus.unsubscribe(id);
        }
        this.subscriptionIds = [];
        this.manager.off('allocation:changed', this.onAllocationChanged);
        this.manager.off('allocation:released', this.onReleased);
    }

    public isAttached(): boolean {
        return this.subscriptionIds.length > 0;
    }

    private async handleRequest(message: BusMessage): Promise<void> {
        const reply = await this.manager.submitRequest(message.payload);
        await this.bus.reply(message, reply, Topics.requestResponse(reply.consumer_id ?? 'unknown'));
    }

    private async handleRelease(message: BusMessage): Promise<void> {
        const reply = await this.manager.submitRelease(message.payload);
        await this.bus.reply(message, reply, Topics.releaseResponse(reply.consumer_id ?? 'unknown'));
    }

    private handleStarted(message: BusMessage): void {
        try {
            this.manager.onConsumerStarted(parseLifecycleMessage(message.payload));
        } catch (error) {
            getLogger().warn(LOG, 'Ignoring malformed component.started message', describePayload(message.payload), errorMessage(error));
        }
    }

    private handleStopped(message: BusMessage): void {
        try {
            this.manager.onConsumerStopped(parseLifecycleMessage(message.payload));
        } catch (error) {
            getLogger().warn(LOG, 'Ignoring malformed component.stopped message', describePayload(message.payload), errorMessage(error));
        }
    }

    private publishSafely(topic: string, payload: unknown): void {
        this.bus.publish(topic, payload, { source: SOURCE }).catch(error => {
            getLogger().error(LOG, `Failed to publish ${topic}`, undefined, error);
        });
    }
}
