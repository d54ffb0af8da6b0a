import { EventEmitter } from 'events';
import { governorConfig, UsageWindows } from '../config/resources';
import { getLogger } from '../logger';
import {
    AllocationChange,
    CapacityMap,
    ConsumerResourceUsage,
    ConsumerUsageReport,
    isResourceType,
    RebalanceRule,
    ReleaseResult,
    ResourceAllocation,
    ResourceManagerEvents,
    ResourceRequest,
    ResourceTotals,
    ResourceType,
    SystemUsageReport
} from '../types/resources';
import { decideAllocation } from './allocationArbiter';
import { errorMessage, ValidationError } from './errors';
import { KeyedMutex } from './keyedMutex';
import {
    describePayload,
    parseReleaseMessage,
    parseRequestMessage,
    payloadAmount,
    ResourceReleaseReply,
    ResourceRequestReply,
    toReleaseReply,
    toRequestReply
} from './messages';
import { ResourceCatalog } from './resourceCatalog';
import { Clock, UsageHistory } from './usageHistory';

export interface ResourceManagerOptions {
    historySize?: number;
    clock?: Clock;
    windows?: UsageWindows;
}

export type AllocationProposer = (history: UsageHistory) => { proposed: number; rule: RebalanceRule } | null;

const LOG = 'ResourceManager';

function assertValidProposal(proposed: number): void {
    if (!Number.isFinite(proposed) || proposed < 0) {
        throw new ValidationError(`Proposed allocation must be a non-negative number, got ${proposed}`, 'proposed');
    }
}

/**
 * Tracks every consumer's grants and usage, and is the only place that
 * changes allocations. Each read-committed/decide/write sequence runs under
 * a lock for its resource type, so concurrent requests cannot over-commit.
 *
 * Events: 'allocation:changed', 'allocation:released', 'consumer:started',
 * 'consumer:stopped' (payloads in ResourceManagerEvents).
 */
export class ResourceManager extends EventEmitter {
    private readonly catalog: ResourceCatalog;
    private readonly consumers: Map<string, Map<ResourceType, UsageHistory>>;
    private readonly locks: KeyedMutex<ResourceType>;
    private readonly historySize: number;
    private readonly clock: Clock;
    private readonly windows: UsageWindows;

    constructor(catalog: ResourceCatalog, options: ResourceManagerOptions = {}) {
        super();
        this.catalog = catalog;
        this.consumers = new Map();
        this.locks = new KeyedMutex();
        this.historySize = options.historySize ?? governorConfig.historySize;
        this.clock = options.clock ?? Date.now;
        this.windows = options.windows ?? governorConfig.rebalance.windows;
    }

    /**
     * Grants as much of the request as capacity allows. A partial grant is
     * reported with `success: false` and the amount actually granted. A rejected
     * request changes nothing and reports the grant the pair still holds.
     */
    public async handleRequest(request: ResourceRequest): Promise<ResourceAllocation> {
        const { consumerId, resourceType, requestedAmount } = request;

        if (!Number.isFinite(requestedAmount) || requestedAmount < 0) {
            return {
                consumerId,
                resourceType,
                requestedAmount,
                allocatedAmount: this.getAllocation(consumerId, resourceType),
                success: false,
                message: `Requested amount must be a non-negative number, got ${requestedAmount}`
            };
        }

        getLogger().info(LOG, `Resource request from ${consumerId}: ${resourceType}=${requestedAmount}`, {
            priority: request.priority,
            reason: request.reason
        });

        return this.locks.runExclusive(resourceType, () => {
            const history = this.ensureHistory(consumerId, resourceType);
            const previous = history.allocation;
            const committedElsewhere = this.committedExcluding(resourceType, consumerId);
            const decision = decideAllocation(requestedAmount, committedElsewhere, this.catalog.capacity(resourceType));

            history.allocation = decision.granted;

            if (!decision.fulfilled) {
                getLogger().warn(LOG, `Insufficient ${resourceType} for ${consumerId}`, {
                    requested: requestedAmount,
                    available: decision.available
                });
            }
            if (previous !== decision.granted) {
                getLogger().info(LOG, `Allocated ${resourceType} for ${consumerId}: ${previous} -> ${decision.granted}`);
            }

            return {
                consumerId,
                resourceType,
                requestedAmount,
                allocatedAmount: decision.granted,
                success: decision.fulfilled,
                message: decision.fulfilled
                    ? 'Resource request granted'
                    : `Resource request partially granted. Requested: ${requestedAmount}, Allocated: ${decision.granted}`
            };
        });
    }

    public async handleRelease(consumerId: string, resourceType: ResourceType): Promise<ReleaseResult> {
        const result = await this.locks.runExclusive(resourceType, (): ReleaseResult => {
            const history = this.consumers.get(consumerId)?.get(resourceType);

            if (!history || history.allocation === 0) {
                getLogger().warn(LOG, `Release request for unallocated resource: ${consumerId}, ${resourceType}`);
                return {
                    consumerId,
                    resourceType,
                    success: false,
                    message: `Resource ${resourceType} was not allocated to ${consumerId}`
                };
            }

            const previous = history.allocation;
            history.allocation = 0;
            getLogger().info(LOG, `Released ${resourceType} for ${consumerId}: ${previous} -> 0`);

            return {
                consumerId,
                resourceType,
                success: true,
                message: `Resource ${resourceType} released`
            };
        });

        if (result.success) {
            this.emitEvent('allocation:released', result);
        }
        return result;
    }

    /**
     * Validates a raw `resource.request` payload and handles it. Validation
     * failures come back as a failed reply carrying the pair's current grant;
     * nothing is mutated.
     */
    public async submitRequest(payload: unknown): Promise<ResourceRequestReply> {
        try {
            const { requestId, request } = parseRequestMessage(payload);
            const allocation = await this.handleRequest(request);
            return toRequestReply(allocation, requestId);
        } catch (error) {
            return this.requestFailure(payload, error);
        }
    }

    public async submitRelease(payload: unknown): Promise<ResourceReleaseReply> {
        try {
            const { requestId, consumerId, resourceType } = parseReleaseMessage(payload);
            const result = await this.handleRelease(consumerId, resourceType);
            return toReleaseReply(result, requestId);
        } catch (error) {
            this.logFailure('release', error);
            return { ...describePayload(payload), success: false, message: errorMessage(error) };
        }
    }

    public onConsumerStarted(consumerId: string): void {
        getLogger().info(LOG, `Component started: ${consumerId}`);
        if (!this.consumers.has(consumerId)) {
            this.consumers.set(consumerId, new Map());
        }
        this.emitEvent('consumer:started', { consumerId });
    }

    /**
     * Drops every resource the consumer holds. Returns what was released.
     */
    public onConsumerStopped(consumerId: string): CapacityMap {
        getLogger().info(LOG, `Component stopped: ${consumerId}`);
        const released: CapacityMap = {};
        const resources = this.consumers.get(consumerId);
        if (!resources) {
            return released;
        }

        for (const [resourceType, history] of resources) {
            if (history.allocation > 0) {
                released[resourceType] = history.allocation;
                getLogger().info(LOG, `Auto-releasing ${resourceType} for stopped component ${consumerId}: ${history.allocation} -> 0`);
            }
        }
        this.consumers.delete(consumerId);

        this.emitEvent('consumer:stopped', { consumerId, released });
        return released;
    }

    /**
     * Records a usage reading for a tracked pair. Returns false when the pair is unknown.
     */
    public recordUsage(consumerId: string, resourceType: ResourceType, value: number, timestamp?: number): boolean {
        const history = this.consumers.get(consumerId)?.get(resourceType);
        if (!history) {
            return false;
        }
        history.addSample(value, timestamp);
        return true;
    }

    /**
     * Moves a grant toward `proposed`, capped by what the other consumers leave free.
     * Returns the change, or null when the allocation stayed the same or the pair
     * is no longer tracked.
     */
    public async adjustAllocation(
        consumerId: string,
        resourceType: ResourceType,
        proposed: number,
        rule: RebalanceRule
    ): Promise<AllocationChange | null> {
        assertValidProposal(proposed);
        return this.rebalance(consumerId, resourceType, () => ({ proposed, rule }));
    }

    /**
     * Asks `propose` for a new grant and applies it. The proposer sees the pair's
     * history under the resource type's lock, so the grant it reads is the one
     * that gets replaced.
     */
    public async rebalance(
        consumerId: string,
        resourceType: ResourceType,
        propose: AllocationProposer
    ): Promise<AllocationChange | null> {
        const change = await this.locks.runExclusive(resourceType, () => {
            const history = this.consumers.get(consumerId)?.get(resourceType);
            if (!history) {
                return null;
            }

            const proposal = propose(history);
            if (!proposal) {
                return null;
            }
            assertValidProposal(proposal.proposed);

            const committedElsewhere = this.committedExcluding(resourceType, consumerId);
            const decision = decideAllocation(proposal.proposed, committedElsewhere, this.catalog.capacity(resourceType));
            if (!decision.fulfilled) {
                getLogger().warn(LOG, `Resource ${resourceType} allocation for ${consumerId} limited by system capacity`, {
                    proposed: proposal.proposed,
                    granted: decision.granted
                });
            }

            const previousAllocation = history.allocation;
            if (decision.granted === previousAllocation) {
                return null;
            }

            history.allocation = decision.granted;
            getLogger().info(LOG, `Adjusted ${resourceType} allocation for ${consumerId}: ${previousAllocation.toFixed(2)} -> ${decision.granted.toFixed(2)}`, {
                rule: proposal.rule
            });

            const adjusted: AllocationChange = {
                consumerId,
                resourceType,
                previousAllocation,
                allocation: decision.granted,
                rule: proposal.rule,
                timestamp: new Date(this.clock())
            };
            return adjusted;
        });

        if (change) {
            this.emitEvent('allocation:changed', change);
        }
        return change;
    }

    public trackedHistories(): UsageHistory[] {
        const histories: UsageHistory[] = [];
        for (const resources of this.consumers.values()) {
            histories.push(...resources.values());
        }
        return histories;
    }

    public isTracking(consumerId: string, resourceType: ResourceType, history: UsageHistory): boolean {
        return this.consumers.get(consumerId)?.get(resourceType) === history;
    }

    public getHistory(consumerId: string, resourceType: ResourceType): UsageHistory | undefined {
        return this.consumers.get(consumerId)?.get(resourceType);
    }

    public hasConsumer(consumerId: string): boolean {
        return this.consumers.has(consumerId);
    }

    public listConsumers(): string[] {
        return Array.from(this.consumers.keys());
    }

    public getAllocation(consumerId: string, resourceType: ResourceType): number {
        return this.consumers.get(consumerId)?.get(resourceType)?.allocation ?? 0;
    }

    public totalAllocated(resourceType: ResourceType): number {
        return this.committedExcluding(resourceType);
    }

    /**
     * Usage snapshot for one consumer (undefined if it is not tracked), or for the whole system.
     */
    public getUsage(): SystemUsageReport;
    public getUsage(consumerId: string): ConsumerUsageReport | undefined;
    public getUsage(consumerId?: string): ConsumerUsageReport | SystemUsageReport | undefined {
        if (consumerId !== undefined) {
            const resources = this.consumers.get(consumerId);
            if (!resources) {
                return undefined;
            }

            const report: ConsumerUsageReport = { scope: 'consumer', consumerId, resources: {} };
            for (const [resourceType, history] of resources) {
                report.resources[resourceType] = this.describeHistory(history);
            }
            return report;
        }

        const totals: Record<ResourceType, ResourceTotals> = {
            [ResourceType.CPU]: this.totalsFor(ResourceType.CPU),
            [ResourceType.MEMORY]: this.totalsFor(ResourceType.MEMORY),
            [ResourceType.STORAGE]: this.totalsFor(ResourceType.STORAGE),
            [ResourceType.NETWORK]: this.totalsFor(ResourceType.NETWORK),
            [ResourceType.GPU]: this.totalsFor(ResourceType.GPU),
            [ResourceType.IO]: this.totalsFor(ResourceType.IO)
        };

        const consumers: SystemUsageReport['consumers'] = {};
        for (const [id, resources] of this.consumers) {
            const entry: SystemUsageReport['consumers'][string] = {};
            for (const [resourceType, history] of resources) {
                entry[resourceType] = {
                    allocation: history.allocation,
                    currentUsage: history.average(this.windows.currentUsage)
                };
            }
            consumers[id] = entry;
        }

        return { scope: 'system', totals, consumers };
    }

    private totalsFor(resourceType: ResourceType): ResourceTotals {
        const capacity = this.catalog.capacity(resourceType);
        const allocated = this.totalAllocated(resourceType);
        return {
            capacity,
            allocated,
            // What a newcomer could still be granted
            available: decideAllocation(Infinity, allocated, capacity).granted
        };
    }

    private describeHistory(history: UsageHistory): ConsumerResourceUsage {
        return {
            allocation: history.allocation,
            currentUsage: history.average(this.windows.currentUsage),
            peakUsage: history.peak(this.windows.queryPeak),
            trend: history.trend(this.windows.trend)
        };
    }

    private ensureHistory(consumerId: string, resourceType: ResourceType): UsageHistory {
        let resources = this.consumers.get(consumerId);
        if (!resources) {
            resources = new Map();
            this.consumers.set(consumerId, resources);
        }

        let history = resources.get(resourceType);
        if (!history) {
            history = new UsageHistory(consumerId, resourceType, {
                maxSamples: this.historySize,
                clock: this.clock
            });
            resources.set(resourceType, history);
        }
        return history;
    }

    private committedExcluding(resourceType: ResourceType, excludedConsumer?: string): number {
        let total = 0;
        for (const [id, resources] of this.consumers) {
            if (id === excludedConsumer) continue;
            total += resources.get(resourceType)?.allocation ?? 0;
        }
        return total;
    }

    private requestFailure(payload: unknown, error: unknown): ResourceRequestReply {
        this.logFailure('request', error);
        return {
            ...describePayload(payload),
            requested_amount: payloadAmount(payload),
            allocated_amount: this.currentAllocationFor(payload),
            success: false,
            message: errorMessage(error)
        };
    }

    /**
     * What the payload's pair holds now, for replies to requests that changed nothing.
     */
    private currentAllocationFor(payload: unknown): number {
        const { consumer_id: consumerId, resource_type: rawType } = describePayload(payload);
        const resourceType = rawType?.trim().toUpperCase();
        if (consumerId === undefined || !isResourceType(resourceType)) {
            return 0;
        }
        return this.getAllocation(consumerId.trim(), resourceType);
    }

    private logFailure(kind: 'request' | 'release', error: unknown): void {
        if (error instanceof ValidationError) {
            getLogger().warn(LOG, `Rejected resource ${kind}`, { field: error.field }, error);
        } else {
            getLogger().error(LOG, `Error handling resource ${kind}`, undefined, error);
        }
    }

    // A throwing listener must not undo or mask a change that is already written
    private emitEvent<K extends keyof ResourceManagerEvents>(event: K, payload: ResourceManagerEvents[K]): void {
        try {
            this.emit(event, payload);
        } catch (error) {
            getLogger().error(LOG, `Listener for ${event} failed`, undefined, error);
        }
    }
}
